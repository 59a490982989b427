import type { HistoryStore } from "./history/types.js";

type CounterName =
  | "calculations_total"
  | "validation_failures_total"
  | "history_write_failures_total";

type Counter = {
  name: CounterName;
  help: string;
  value: number;
};

const counters = new Map<CounterName, Counter>();

function defineCounter(name: CounterName, help: string): Counter {
  const existing = counters.get(name);
  if (existing) {
    return existing;
  }
  const counter: Counter = { name, help, value: 0 };
  counters.set(name, counter);
  return counter;
}

const calculationsCounter = defineCounter("calculations_total", "Total number of successful calculations");
const validationFailuresCounter = defineCounter(
  "validation_failures_total",
  "Total number of calculations rejected by input validation"
);
const historyWriteFailuresCounter = defineCounter(
  "history_write_failures_total",
  "Total number of history writes that could not be persisted"
);

export function incrementCalculations(amount = 1): void {
  calculationsCounter.value += amount;
}

export function incrementValidationFailures(amount = 1): void {
  validationFailuresCounter.value += amount;
}

export function incrementHistoryWriteFailures(amount = 1): void {
  historyWriteFailuresCounter.value += amount;
}

export function getCounterValue(name: CounterName): number {
  return counters.get(name)?.value ?? 0;
}

export async function renderMetrics(history?: HistoryStore): Promise<string> {
  const lines: string[] = [];
  for (const counter of counters.values()) {
    lines.push(`# HELP ${counter.name} ${counter.help}`);
    lines.push(`# TYPE ${counter.name} counter`);
    lines.push(`${counter.name} ${counter.value}`);
  }
  if (history) {
    const entries = (await history.loadAll()).length;
    lines.push("# HELP history_entries Current number of stored history entries");
    lines.push("# TYPE history_entries gauge");
    lines.push(`history_entries ${entries}`);
  }
  return lines.join("\n") + "\n";
}

export function resetMetrics(): void {
  for (const counter of counters.values()) {
    counter.value = 0;
  }
}
