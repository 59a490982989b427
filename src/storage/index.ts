import type { AppConfig } from "../config.js";
import type { HistoryStore } from "../history/types.js";
import { createFileHistoryStore } from "./file/history.js";
import { createMemoryHistoryStore } from "./memory/history.js";

export type StorageConfig = Pick<AppConfig, "storageBackend" | "historyPath" | "historyLimit">;

export function createHistoryStore(config: StorageConfig): HistoryStore {
  if (config.storageBackend === "memory") {
    return createMemoryHistoryStore(config.historyLimit);
  }
  return createFileHistoryStore({ filePath: config.historyPath, limit: config.historyLimit });
}
