import { Logging } from "@google-cloud/logging";
import { isStackdriverRequested } from "../config.js";

type Env = Record<string, string | undefined>;
export type LogLevel = "log" | "info" | "warn" | "error";
type ConsoleMethod = (...args: unknown[]) => void;

export interface LogSink {
  write(level: LogLevel, line: string): void;
}

const SECRET_ENV_KEYS = ["TIPSPLIT_API_KEYS", "SENTRY_DSN", "GCP_SA_KEY"] as const;
const LEVELS: readonly LogLevel[] = ["log", "info", "warn", "error"];

const SEVERITY: Record<LogLevel, string> = {
  log: "INFO",
  info: "INFO",
  warn: "WARNING",
  error: "ERROR"
};

let patched = false;

export function collectSecrets(env: Env = process.env): string[] {
  return SECRET_ENV_KEYS.flatMap((key) =>
    (env[key] ?? "")
      .split(",")
      .map((value) => value.trim())
      .filter((value) => value.length > 0)
  );
}

const escapeRegExp = (text: string): string => text.replace(/[-/\\^$*+?.()|[\]{}]/g, "\\$&");

/** One case-insensitive pass over all secrets; longer secrets win where they overlap. */
export function redactString(input: string, secrets: string[]): string {
  if (secrets.length === 0) {
    return input;
  }
  const pattern = [...secrets]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|");
  return input.replace(new RegExp(pattern, "gi"), "[REDACTED]");
}

function describeEntry(entry: unknown): string {
  if (typeof entry === "string") {
    return entry;
  }
  if (entry instanceof Error) {
    return `${entry.name}: ${entry.message}`;
  }
  try {
    return JSON.stringify(entry) ?? String(entry);
  } catch {
    return String(entry);
  }
}

export function formatMessage(args: unknown[], secrets: string[]): string {
  return redactString(args.map(describeEntry).join(" "), secrets);
}

/** Console replacement that prints one redacted line and hands it to `sink`. */
export function createConsoleWriter(
  level: LogLevel,
  original: ConsoleMethod,
  secrets: string[],
  sink: LogSink | null = null
): ConsoleMethod {
  return (...args: unknown[]): void => {
    const line = formatMessage(args, secrets);
    original(line);
    sink?.write(level, line);
  };
}

function createCloudLoggingSink(env: Env, warn: ConsoleMethod): LogSink | null {
  if (!isStackdriverRequested(env)) {
    return null;
  }
  try {
    const log = new Logging({ projectId: env.GCP_PROJECT_ID || env.GOOGLE_CLOUD_PROJECT || undefined }).log(
      env.TIPSPLIT_STACKDRIVER_LOG || "tipsplit"
    );
    return {
      write(level, line) {
        const entry = log.entry(
          { resource: { type: "global" }, severity: SEVERITY[level] },
          { message: line, timestamp: new Date().toISOString() }
        );
        log.write(entry).catch((error: unknown) => {
          warn("[logging] cloud logging write failed", describeEntry(error));
        });
      }
    };
  } catch (error) {
    warn("[logging] cloud logging disabled", describeEntry(error));
    return null;
  }
}

/** Redacts configured secrets from console output and mirrors it to Cloud Logging when enabled. */
export function patchLogging(env: Env = process.env): void {
  if (patched) {
    return;
  }
  const secrets = collectSecrets(env);
  const warn = console.warn.bind(console);
  const sink = createCloudLoggingSink(env, warn);
  for (const level of LEVELS) {
    console[level] = createConsoleWriter(level, console[level].bind(console), secrets, sink);
  }
  patched = true;
}
