import path from "node:path";
import dotenv from "dotenv";

dotenv.config();

export type StorageBackend = "file" | "memory";
export type ThemeName = "light" | "dark";

export type AppConfig = {
  historyPath: string;
  historyLimit: number;
  storageBackend: StorageBackend;
  currency: string;
  theme: ThemeName;
  apiKeys: string[];
  port: number;
};

type Env = Record<string, string | undefined>;

export const DEFAULT_HISTORY_LIMIT = 20;
export const DEFAULT_CURRENCY = "$";

const normalizeBoolean = (value: string | undefined, defaultValue = false): boolean => {
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

const normalizeNumber = (value: string | undefined, defaultValue: number): number => {
  if (!value) {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
};

const normalizeCsv = (value: string | undefined): string[] =>
  (value ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

const resolvePath = (value: string | undefined, fallback: string): string =>
  value && value.trim().length > 0 ? path.resolve(value.trim()) : fallback;

const normalizeBackend = (value: string | undefined): StorageBackend =>
  (value ?? "file").trim().toLowerCase() === "memory" ? "memory" : "file";

const normalizeTheme = (value: string | undefined): ThemeName =>
  (value ?? "light").trim().toLowerCase() === "dark" ? "dark" : "light";

const normalizeLabel = (value: string | undefined, fallback: string): string => {
  if (value === undefined) {
    return fallback;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : fallback;
};

export const resolveHistoryPath = (env: Env = process.env): string =>
  resolvePath(env.TIPSPLIT_HISTORY_PATH, path.resolve(process.cwd(), "data", "tip_history.json"));

export const isStackdriverRequested = (env: Env = process.env): boolean =>
  normalizeBoolean(env.TIPSPLIT_STACKDRIVER_ENABLED, false);

export function loadConfig(env: Env = process.env): AppConfig {
  const limit = normalizeNumber(env.TIPSPLIT_HISTORY_LIMIT, DEFAULT_HISTORY_LIMIT);
  return {
    historyPath: resolveHistoryPath(env),
    historyLimit: limit > 0 ? limit : DEFAULT_HISTORY_LIMIT,
    storageBackend: normalizeBackend(env.TIPSPLIT_STORAGE_BACKEND),
    currency: normalizeLabel(env.TIPSPLIT_CURRENCY, DEFAULT_CURRENCY),
    theme: normalizeTheme(env.TIPSPLIT_THEME),
    apiKeys: normalizeCsv(env.TIPSPLIT_API_KEYS),
    port: normalizeNumber(env.PORT, 3001)
  };
}
