import type { HistoryRecord, HistoryStore } from "../../history/types.js";
import { isValidIndex } from "../shared.js";

export function createMemoryHistoryStore(limit: number, seed: HistoryRecord[] = []): HistoryStore {
  let records = seed.slice(0, limit);

  return {
    async loadAll() {
      return [...records];
    },
    async append(record) {
      records = [record, ...records].slice(0, limit);
      return { ok: true };
    },
    async select(index) {
      if (!isValidIndex(index)) {
        return null;
      }
      return records[index] ?? null;
    },
    async clear() {
      records = [];
      return { ok: true };
    }
  };
}
