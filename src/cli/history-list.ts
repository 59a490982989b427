#!/usr/bin/env node
import process from "node:process";
import { formatHistoryLine } from "../calculator/format.js";
import { loadConfig } from "../config.js";
import { createHistoryStore } from "../storage/index.js";

type ListOptions = {
  limit?: number;
  json?: boolean;
};

function parseArgs(argv: string[]): ListOptions {
  const options: ListOptions = {};
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if ((arg === "--limit" || arg === "-n") && argv[index + 1]) {
      const parsed = Number.parseInt(argv[index + 1], 10);
      if (Number.isFinite(parsed) && parsed > 0) {
        options.limit = parsed;
      }
      index += 1;
    } else if (arg === "--json") {
      options.json = true;
    } else if (arg === "--help" || arg === "-h") {
      printHelp();
      process.exit(0);
    }
  }
  return options;
}

function printHelp(): void {
  console.info(`Usage: npm run history:list -- [--limit N] [--json]

Options:
  --limit N          Show at most N entries (default: all stored).
  --json             Print the stored records as JSON.
  --help             Show this help message.
`);
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const records = (await createHistoryStore(config).loadAll()).slice(0, options.limit);

  if (options.json) {
    process.stdout.write(`${JSON.stringify(records, null, 2)}\n`);
    return;
  }

  if (records.length === 0) {
    console.info("No history entries found.");
    return;
  }

  for (const [index, record] of records.entries()) {
    console.info(`${index + 1}. ${formatHistoryLine(record, config.currency)}`);
  }
}

main().catch((error) => {
  console.error("Failed to list history", error);
  process.exit(1);
});
