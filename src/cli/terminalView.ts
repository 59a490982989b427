import type { ThemePalette } from "../presentation/theme.js";
import type { Clipboard, FormValues, TipCalculatorView } from "../presentation/view.js";
import { DEFAULT_FORM } from "../presentation/controller.js";

export type Output = {
  write(text: string): unknown;
};

const RESET = "\u001b[0m";

function hexToRgb(hex: string): [number, number, number] | null {
  const match = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
  if (!match) {
    return null;
  }
  return [Number.parseInt(match[1], 16), Number.parseInt(match[2], 16), Number.parseInt(match[3], 16)];
}

export function paletteEscape(palette: ThemePalette): string {
  const codes: string[] = [];
  const fg = palette.foreground ? hexToRgb(palette.foreground) : null;
  const bg = palette.background ? hexToRgb(palette.background) : null;
  if (fg) {
    codes.push(`\u001b[38;2;${fg.join(";")}m`);
  }
  if (bg) {
    codes.push(`\u001b[48;2;${bg.join(";")}m`);
  }
  return codes.length > 0 ? codes.join("") : RESET;
}

/** Form state held in memory and rendered as plain lines. */
export class TerminalView implements TipCalculatorView {
  bill = DEFAULT_FORM.bill;
  tipPercent = DEFAULT_FORM.tipPercent;
  partySize: string | number = DEFAULT_FORM.partySize;
  roundUp = DEFAULT_FORM.roundUp;
  currency: string;
  history: string[] = [];

  constructor(private readonly output: Output, currency: string) {
    this.currency = currency;
  }

  getBillText(): string {
    return this.bill;
  }

  getTipPercent(): number {
    return this.tipPercent;
  }

  getPartySize(): string | number {
    return this.partySize;
  }

  getRoundUp(): boolean {
    return this.roundUp;
  }

  getCurrencyLabel(): string {
    return this.currency;
  }

  showResult(text: string): void {
    this.print(text);
  }

  showError(error: { code?: string; message: string }): void {
    this.print(`Input error: ${error.message}`);
  }

  showHistory(lines: string[]): void {
    this.history = lines;
  }

  setInputs(values: FormValues): void {
    this.bill = values.bill;
    this.tipPercent = values.tipPercent;
    this.partySize = values.partySize;
    if (values.roundUp !== undefined) {
      this.roundUp = values.roundUp;
    }
  }

  setTipPercent(percent: number): void {
    this.tipPercent = percent;
  }

  setTipLabel(text: string): void {
    this.print(text);
  }

  applyTheme(palette: ThemePalette): void {
    this.output.write(paletteEscape(palette));
  }

  showNotice(title: string, text: string): void {
    this.print(`${title}: ${text}`);
  }

  printHistory(): void {
    if (this.history.length === 0) {
      this.print("No history entries found.");
      return;
    }
    this.print(this.history.map((line, index) => `${index + 1}. ${line}`).join("\n"));
  }

  print(text: string): void {
    this.output.write(`${text}\n`);
  }
}

/** Puts text on the clipboard through the terminal's OSC 52 sequence. */
export function createOsc52Clipboard(output: Output): Clipboard {
  return {
    async writeText(text) {
      const encoded = Buffer.from(text, "utf8").toString("base64");
      output.write(`\u001b]52;c;${encoded}\u0007`);
    }
  };
}
