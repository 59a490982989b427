import type { ThemePalette } from "./theme.js";

export type FormValues = {
  bill: string;
  tipPercent: number;
  partySize: number;
  roundUp?: boolean;
};

/**
 * What a front end has to provide for {@link TipCalculatorController} to drive it.
 * Getters return the raw widget state; the controller does all validation.
 */
export interface TipCalculatorView {
  getBillText(): string;
  getTipPercent(): number;
  getPartySize(): string | number;
  getRoundUp(): boolean;
  getCurrencyLabel(): string;

  showResult(text: string): void;
  showError(error: { code?: string; message: string }): void;
  showHistory(lines: string[]): void;
  setInputs(values: FormValues): void;
  setTipPercent(percent: number): void;
  setTipLabel(text: string): void;
  applyTheme(palette: ThemePalette): void;
  showNotice(title: string, text: string): void;
}

export interface Clipboard {
  writeText(text: string): Promise<void>;
}
