import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { parseStoredHistory, toStoredEntry } from "../../history/schema.js";
import type { HistoryRecord, HistoryStore, StoreResult } from "../../history/types.js";
import { isValidIndex, toError } from "../shared.js";

export type FileHistoryStoreOptions = {
  filePath: string;
  limit: number;
};

export function createFileHistoryStore(options: FileHistoryStoreOptions): HistoryStore {
  const { filePath, limit } = options;

  async function readRecords(): Promise<HistoryRecord[]> {
    let content: string;
    try {
      content = await readFile(filePath, "utf8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException)?.code !== "ENOENT") {
        console.warn(`[history] unable to read ${filePath}; treating as empty`, error);
      }
      return [];
    }

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch {
      console.warn(`[history] ${filePath} is not valid JSON; treating as empty`);
      return [];
    }

    const records = parseStoredHistory(document);
    if (!records) {
      console.warn(`[history] ${filePath} does not hold a history log; treating as empty`);
      return [];
    }
    return records.slice(0, limit);
  }

  async function writeRecords(records: HistoryRecord[]): Promise<StoreResult> {
    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      const payload = JSON.stringify(records.map(toStoredEntry), null, 2);
      await writeFile(filePath, `${payload}\n`, "utf8");
      return { ok: true };
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }

  return {
    loadAll: readRecords,
    async append(record) {
      const current = await readRecords();
      return writeRecords([record, ...current].slice(0, limit));
    },
    async select(index) {
      if (!isValidIndex(index)) {
        return null;
      }
      const records = await readRecords();
      return records[index] ?? null;
    },
    clear() {
      return writeRecords([]);
    }
  };
}
