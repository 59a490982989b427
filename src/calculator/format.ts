import { DEFAULT_CURRENCY } from "../config.js";
import type { HistoryRecord } from "../history/types.js";
import type { CalculationResult } from "./types.js";

export const NO_RESULT_TEXT = "No calculation yet";

const money = (currency: string, amount: number): string => `${currency}${amount.toFixed(2)}`;

const resolveCurrency = (currency: string | undefined): string =>
  currency && currency.length > 0 ? currency : DEFAULT_CURRENCY;

export function formatTipLabel(percent: number): string {
  return `Tip: ${percent.toFixed(1)}%`;
}

export function formatResult(result: CalculationResult, currency?: string): string {
  const c = resolveCurrency(currency);
  return [
    `Bill: ${money(c, result.bill)}`,
    `Tip (${result.tipPercent.toFixed(1)}%): ${money(c, result.tipAmount)}`,
    `Total: ${money(c, result.total)}`,
    `Each (x${result.partySize}): ${money(c, result.perPerson)}`
  ].join("\n");
}

function formatTimestamp(epochSeconds: number, timeZone?: string): string {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23"
  });
  const parts: Record<string, string> = {};
  for (const part of formatter.formatToParts(new Date(epochSeconds * 1000))) {
    parts[part.type] = part.value;
  }
  return `${parts.year}-${parts.month}-${parts.day} ${parts.hour}:${parts.minute}:${parts.second}`;
}

export function formatHistoryLine(record: HistoryRecord, currency?: string, timeZone?: string): string {
  const c = resolveCurrency(currency);
  const when = formatTimestamp(record.timestamp, timeZone);
  return `${when} — ${money(c, record.bill)} +${record.tipPercent.toFixed(1)}% → ${money(c, record.perPerson)}/pp`;
}
