import type { AppConfig, ThemeName } from "../config.js";
import { NO_RESULT_TEXT, formatHistoryLine, formatResult, formatTipLabel } from "../calculator/format.js";
import type { CalculationOutcome } from "../calculator/types.js";
import type { HistoryRecord, HistoryStore } from "../history/types.js";
import { calculateAndRecord } from "../services/calculation.js";
import { THEMES, nextTheme } from "./theme.js";
import type { Clipboard, FormValues, TipCalculatorView } from "./view.js";

export const TIP_PRESETS = [10, 12, 15] as const;

export const DEFAULT_FORM: Required<FormValues> = {
  bill: "0.00",
  tipPercent: 15,
  partySize: 1,
  roundUp: false
};

export const ABOUT_TEXT = "Tip Calculator\nFeatures: presets, slider, split, history, theme, copy.";
export const COPY_FAILED_MESSAGE = "Could not copy to clipboard.";

export type TipCalculatorControllerOptions = {
  view: TipCalculatorView;
  history: HistoryStore;
  clipboard: Clipboard;
  config: Pick<AppConfig, "theme">;
  now?: () => Date;
  /** Zone used for history timestamps; the host's local zone when omitted. */
  timeZone?: string;
};

export class TipCalculatorController {
  private readonly view: TipCalculatorView;
  private readonly history: HistoryStore;
  private readonly clipboard: Clipboard;
  private readonly now: () => Date;
  private readonly timeZone: string | undefined;
  private theme: ThemeName;
  private lastResultText: string | null = null;

  constructor(options: TipCalculatorControllerOptions) {
    this.view = options.view;
    this.history = options.history;
    this.clipboard = options.clipboard;
    this.now = options.now ?? (() => new Date());
    this.timeZone = options.timeZone;
    this.theme = options.config.theme;
  }

  get lastResult(): string | null {
    return this.lastResultText;
  }

  /** Pushes the initial theme, tip label and history list to the view. */
  async init(): Promise<void> {
    this.view.applyTheme(THEMES[this.theme]);
    this.view.setTipLabel(formatTipLabel(this.view.getTipPercent()));
    await this.refreshHistory();
  }

  async calculate(): Promise<CalculationOutcome> {
    const currency = this.view.getCurrencyLabel();
    const run = await calculateAndRecord(
      this.history,
      {
        bill: this.view.getBillText(),
        tipPercent: this.view.getTipPercent(),
        partySize: this.view.getPartySize(),
        roundUp: this.view.getRoundUp()
      },
      this.now()
    );

    if (!run.outcome.ok) {
      this.view.showError(run.outcome.error);
      return run.outcome;
    }

    const text = formatResult(run.outcome.result, currency);
    this.lastResultText = text;
    this.view.showResult(text);
    await this.refreshHistory();
    return run.outcome;
  }

  async refreshHistory(): Promise<HistoryRecord[]> {
    const records = await this.history.loadAll();
    const currency = this.view.getCurrencyLabel();
    this.view.showHistory(records.map((record) => formatHistoryLine(record, currency, this.timeZone)));
    return records;
  }

  /** Repopulates bill, tip and party size; rounding and the shown result are left alone. */
  async loadSelectedHistory(index: number): Promise<HistoryRecord | null> {
    const record = await this.history.select(index);
    if (!record) {
      return null;
    }
    this.view.setInputs({
      bill: record.bill.toFixed(2),
      tipPercent: record.tipPercent,
      partySize: record.partySize
    });
    this.view.setTipLabel(formatTipLabel(record.tipPercent));
    return record;
  }

  async copyResult(): Promise<boolean> {
    if (this.lastResultText === null) {
      return false;
    }
    try {
      await this.clipboard.writeText(this.lastResultText);
    } catch {
      this.view.showError({ message: COPY_FAILED_MESSAGE });
      return false;
    }
    this.view.showNotice("Copied", "Result copied to clipboard.");
    return true;
  }

  setTipPreset(percent: number): void {
    this.view.setTipPercent(percent);
    this.view.setTipLabel(formatTipLabel(percent));
  }

  onTipChange(value: number): void {
    const percent = Number.isFinite(value) ? value : this.view.getTipPercent();
    this.view.setTipLabel(formatTipLabel(percent));
  }

  clearInputs(): void {
    this.view.setInputs(DEFAULT_FORM);
    this.view.setTipLabel(formatTipLabel(DEFAULT_FORM.tipPercent));
    this.view.showResult(NO_RESULT_TEXT);
    this.lastResultText = null;
  }

  toggleTheme(): ThemeName {
    this.theme = nextTheme(this.theme);
    this.view.applyTheme(THEMES[this.theme]);
    return this.theme;
  }

  about(): void {
    this.view.showNotice("About", ABOUT_TEXT);
  }
}
