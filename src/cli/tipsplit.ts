#!/usr/bin/env node
import { createInterface } from "node:readline";
import process from "node:process";
import { loadConfig } from "../config.js";
import { patchLogging } from "../lib/logging.js";
import { TipCalculatorController } from "../presentation/controller.js";
import { createHistoryStore } from "../storage/index.js";
import { runCommand } from "./commands.js";
import { TerminalView, createOsc52Clipboard } from "./terminalView.js";

async function main(): Promise<void> {
  patchLogging();
  const config = loadConfig();
  const view = new TerminalView(process.stdout, config.currency);
  const controller = new TipCalculatorController({
    view,
    history: createHistoryStore(config),
    clipboard: createOsc52Clipboard(process.stdout),
    config
  });
  await controller.init();
  view.print("Type 'help' for commands.");

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: "tip> " });
  rl.prompt();
  for await (const line of rl) {
    if ((await runCommand(controller, view, line)) === "quit") {
      break;
    }
    rl.prompt();
  }
  rl.close();
  process.stdout.write("\u001b[0m");
}

main().catch((error) => {
  console.error("Failed to run tipsplit", error);
  process.exit(1);
});
