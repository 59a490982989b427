import { compute } from "../calculator/compute.js";
import type { CalculationOutcome, RawCalculationInput } from "../calculator/types.js";
import { createHistoryRecord } from "../history/record.js";
import type { HistoryRecord, HistoryStore } from "../history/types.js";
import { incrementCalculations, incrementHistoryWriteFailures, incrementValidationFailures } from "../metrics.js";

export type CalculationRun =
  | { outcome: Extract<CalculationOutcome, { ok: false }>; record: null; saved: false }
  | { outcome: Extract<CalculationOutcome, { ok: true }>; record: HistoryRecord; saved: boolean };

/**
 * Computes and, on success, appends the result to history. A failed write is
 * logged and reported through `saved`; it never fails the calculation.
 */
export async function calculateAndRecord(
  history: HistoryStore,
  input: RawCalculationInput,
  now: Date = new Date()
): Promise<CalculationRun> {
  const outcome = compute(input);
  if (!outcome.ok) {
    incrementValidationFailures();
    return { outcome, record: null, saved: false };
  }
  incrementCalculations();

  const record = createHistoryRecord(outcome.result, now);
  const stored = await history.append(record);
  if (!stored.ok) {
    incrementHistoryWriteFailures();
    console.warn("[history] failed to persist calculation", stored.error.message);
  }
  return { outcome, record, saved: stored.ok };
}
