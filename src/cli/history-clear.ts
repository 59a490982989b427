#!/usr/bin/env node
import process from "node:process";
import { loadConfig } from "../config.js";
import { createHistoryStore } from "../storage/index.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const cleared = await createHistoryStore(config).clear();
  if (!cleared.ok) {
    console.error(`Could not clear ${config.historyPath}:`, cleared.error.message);
    process.exit(1);
  }
  console.info(`Cleared history at ${config.historyPath}.`);
}

main().catch((error) => {
  console.error("Failed to clear history", error);
  process.exit(1);
});
