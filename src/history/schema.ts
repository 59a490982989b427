import { z } from "zod";
import type { HistoryRecord, StoredHistoryEntry } from "./types.js";

const Amount = z.number().finite();

export const StoredHistoryEntrySchema = z.object({
  time: z.number().int(),
  bill: Amount,
  tip_percent: Amount,
  people: z.number().int().min(1),
  per_person: Amount,
  total: Amount
});

export const StoredHistorySchema = z.array(StoredHistoryEntrySchema);

export function toStoredEntry(record: HistoryRecord): StoredHistoryEntry {
  return {
    time: record.timestamp,
    bill: record.bill,
    tip_percent: record.tipPercent,
    people: record.partySize,
    per_person: record.perPerson,
    total: record.total
  };
}

export function fromStoredEntry(entry: StoredHistoryEntry): HistoryRecord {
  return {
    timestamp: entry.time,
    bill: entry.bill,
    tipPercent: entry.tip_percent,
    partySize: entry.people,
    perPerson: entry.per_person,
    total: entry.total
  };
}

/** Parses a decoded history document; `null` when it is not a valid log. */
export function parseStoredHistory(document: unknown): HistoryRecord[] | null {
  const parsed = StoredHistorySchema.safeParse(document);
  if (!parsed.success) {
    return null;
  }
  return parsed.data.map(fromStoredEntry);
}
