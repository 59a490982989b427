export type HistoryRecord = {
  readonly timestamp: number;
  readonly bill: number;
  readonly tipPercent: number;
  readonly partySize: number;
  readonly perPerson: number;
  readonly total: number;
};

/** On-disk shape of a history entry. */
export type StoredHistoryEntry = {
  time: number;
  bill: number;
  tip_percent: number;
  people: number;
  per_person: number;
  total: number;
};

export type StoreResult = { ok: true } | { ok: false; error: Error };

export interface HistoryStore {
  /** Most recent first. Never rejects: an unreadable log is an empty one. */
  loadAll(): Promise<HistoryRecord[]>;
  append(record: HistoryRecord): Promise<StoreResult>;
  select(index: number): Promise<HistoryRecord | null>;
  clear(): Promise<StoreResult>;
}
