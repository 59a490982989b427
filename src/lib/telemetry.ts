import * as Sentry from "@sentry/node";

type Env = Record<string, string | undefined>;

export type ServerErrorContext = {
  method: string;
  path: string;
};

let sentryReady = false;

export function sampleRateFrom(value: string | undefined): number {
  const parsed = Number.parseFloat(value ?? "");
  if (Number.isNaN(parsed) || parsed < 0) {
    return 0;
  }
  return Math.min(parsed, 1);
}

/** Starts Sentry when `SENTRY_DSN` is set; returns whether reporting is active. */
export function initSentry(env: Env = process.env): boolean {
  if (sentryReady) {
    return true;
  }
  const dsn = env.SENTRY_DSN?.trim();
  if (!dsn) {
    return false;
  }
  Sentry.init({
    dsn,
    environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV || "development",
    tracesSampleRate: sampleRateFrom(env.SENTRY_TRACES_SAMPLE_RATE),
    release: env.npm_package_version
  });
  sentryReady = true;
  return true;
}

export function captureServerException(error: unknown, context?: ServerErrorContext): void {
  if (!sentryReady) {
    return;
  }
  Sentry.captureException(error, { tags: { component: "server" }, extra: context });
}
