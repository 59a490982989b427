import type { CalculationResult } from "../calculator/types.js";
import type { HistoryRecord } from "./types.js";

export function roundCurrency(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function createHistoryRecord(result: CalculationResult, now: Date = new Date()): HistoryRecord {
  return Object.freeze({
    timestamp: Math.floor(now.getTime() / 1000),
    bill: roundCurrency(result.bill),
    tipPercent: roundCurrency(result.tipPercent),
    partySize: result.partySize,
    perPerson: roundCurrency(result.perPerson),
    total: roundCurrency(result.total)
  });
}
