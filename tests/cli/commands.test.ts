import { describe, expect, it } from "vitest";
import { runCommand } from "../../src/cli/commands.js";
import { TerminalView, createOsc52Clipboard, paletteEscape } from "../../src/cli/terminalView.js";
import { TipCalculatorController } from "../../src/presentation/controller.js";
import { THEMES } from "../../src/presentation/theme.js";
import { createMemoryHistoryStore } from "../../src/storage/memory/history.js";

function setup() {
  const chunks: string[] = [];
  const output = { write: (text: string) => chunks.push(text) };
  const view = new TerminalView(output, "$");
  const controller = new TipCalculatorController({
    view,
    history: createMemoryHistoryStore(20),
    clipboard: createOsc52Clipboard(output),
    config: { theme: "light" },
    now: () => new Date("2025-01-01T12:00:00.000Z"),
    timeZone: "UTC"
  });
  const run = async (...lines: string[]) => {
    for (const line of lines) {
      await runCommand(controller, view, line);
    }
  };
  return { chunks, view, controller, run };
}

describe("terminal commands", () => {
  it("fills the form and prints the result", async () => {
    const { chunks, run } = setup();

    await run("bill 50", "preset 15", "people 3", "round on", "calc");

    expect(chunks).toEqual([
      "Tip: 15.0%\n",
      "Round up per person: on\n",
      "Bill: $50.00\nTip (15.0%): $7.50\nTotal: $57.50\nEach (x3): $19.17\n"
    ]);
  });

  it("prints validation errors", async () => {
    const { chunks, run } = setup();

    await run("bill ten", "calc");

    expect(chunks).toEqual(["Input error: Please enter a valid bill amount.\n"]);
  });

  it("lists history and loads an entry by its listed number", async () => {
    const { chunks, view, run } = setup();
    await run("bill 20", "tip 10", "calc", "clear");
    chunks.length = 0;

    await run("history", "load 1");

    expect(chunks).toEqual([
      "1. 2025-01-01 12:00:00 — $20.00 +10.0% → $22.00/pp\n",
      "Tip: 10.0%\n",
      "Loaded: bill 20.00, tip 10%, 1 people\n"
    ]);
    expect(view.bill).toBe("20.00");
  });

  it("rejects tips outside 0-50 and unknown presets", async () => {
    const { chunks, view, run } = setup();

    await run("tip 51", "preset 11");

    expect(chunks).toEqual(["Tip must be a number between 0 and 50.\n", "Presets: 10%, 12%, 15%\n"]);
    expect(view.tipPercent).toBe(15);
  });

  it("rejects tips with trailing text", async () => {
    const { chunks, view, run } = setup();

    await run("tip 15abc", "tip 1e1", "tip 12.5");

    expect(chunks).toEqual([
      "Tip must be a number between 0 and 50.\n",
      "Tip must be a number between 0 and 50.\n",
      "Tip: 12.5%\n"
    ]);
    expect(view.tipPercent).toBe(12.5);
  });

  it("loads nothing for a malformed entry number", async () => {
    const { chunks, view, run } = setup();
    await run("bill 20", "calc", "clear");
    chunks.length = 0;

    await run("load 1x", "load 0");

    expect(chunks).toEqual(["Usage: load <n>, where n is a number from 'history'.\n"]);
    expect(view.bill).toBe("0.00");
  });

  it("copies through OSC 52", async () => {
    const { chunks, run } = setup();
    await run("bill 10", "calc");
    chunks.length = 0;

    await run("copy");

    const encoded = Buffer.from("Bill: $10.00\nTip (15.0%): $1.50\nTotal: $11.50\nEach (x1): $11.50").toString(
      "base64"
    );
    expect(chunks).toEqual([`\u001b]52;c;${encoded}\u0007`, "Copied: Result copied to clipboard.\n"]);
  });

  it("stops on quit", async () => {
    const { view, controller } = setup();

    expect(await runCommand(controller, view, "quit")).toBe("quit");
    expect(await runCommand(controller, view, "")).toBe("continue");
  });
});

describe("paletteEscape", () => {
  it("maps palettes to 24-bit colour escapes", () => {
    expect(paletteEscape(THEMES.dark)).toBe("\u001b[38;2;255;255;255m\u001b[48;2;46;46;46m");
    expect(paletteEscape(THEMES.light)).toBe("\u001b[0m");
  });
});
