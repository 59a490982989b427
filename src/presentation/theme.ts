import type { ThemeName } from "../config.js";

export type ThemePalette = {
  name: ThemeName;
  background: string | null;
  foreground: string | null;
  button: string | null;
};

/** `null` means the front end's own default colour. */
export const THEMES: Record<ThemeName, ThemePalette> = {
  light: { name: "light", background: null, foreground: null, button: null },
  dark: { name: "dark", background: "#2e2e2e", foreground: "#ffffff", button: "#444444" }
};

export const nextTheme = (current: ThemeName): ThemeName => (current === "dark" ? "light" : "dark");
