import { TIP_PRESETS, type TipCalculatorController } from "../presentation/controller.js";
import { TIP_PERCENT_MAX, TIP_PERCENT_MIN } from "../schemas/calculate.js";
import type { TerminalView } from "./terminalView.js";

export type CommandStatus = "continue" | "quit";

export const HELP_TEXT = `Commands:
  bill <amount>        Set the bill amount
  tip <percent>        Set the tip percent (${TIP_PERCENT_MIN}-${TIP_PERCENT_MAX})
  preset <${TIP_PRESETS.join("|")}>    Use a preset tip
  people <n>           Split between n people
  round on|off         Round the per-person share up to the cent
  currency <label>     Currency label used in results
  calc                 Calculate and save to history
  history              List saved calculations
  load <n>             Load entry n from the history list
  copy                 Copy the last result
  clear                Reset the form
  theme                Toggle light/dark
  about                About this program
  quit                 Exit`;

const TIP_PATTERN = /^(\d+(\.\d*)?|\.\d+)$/;
const POSITION_PATTERN = /^\d+$/;

function parseTip(raw: string): number | null {
  if (!TIP_PATTERN.test(raw)) {
    return null;
  }
  const value = Number(raw);
  if (value < TIP_PERCENT_MIN || value > TIP_PERCENT_MAX) {
    return null;
  }
  return value;
}

export async function runCommand(
  controller: TipCalculatorController,
  view: TerminalView,
  line: string
): Promise<CommandStatus> {
  const [command = "", ...rest] = line.trim().split(/\s+/);
  const argument = rest.join(" ");

  switch (command.toLowerCase()) {
    case "":
      return "continue";
    case "bill":
      view.bill = argument;
      return "continue";
    case "tip": {
      const percent = parseTip(argument);
      if (percent === null) {
        view.print(`Tip must be a number between ${TIP_PERCENT_MIN} and ${TIP_PERCENT_MAX}.`);
        return "continue";
      }
      view.setTipPercent(percent);
      controller.onTipChange(percent);
      return "continue";
    }
    case "preset": {
      const preset = TIP_PRESETS.find((value) => String(value) === argument.replace(/%$/, ""));
      if (preset === undefined) {
        view.print(`Presets: ${TIP_PRESETS.map((value) => `${value}%`).join(", ")}`);
        return "continue";
      }
      controller.setTipPreset(preset);
      return "continue";
    }
    case "people":
      view.partySize = argument;
      return "continue";
    case "round":
      view.roundUp = argument.toLowerCase() === "on";
      view.print(`Round up per person: ${view.roundUp ? "on" : "off"}`);
      return "continue";
    case "currency":
      view.currency = argument;
      return "continue";
    case "calc":
      await controller.calculate();
      return "continue";
    case "history":
      await controller.refreshHistory();
      view.printHistory();
      return "continue";
    case "load": {
      if (!POSITION_PATTERN.test(argument)) {
        view.print("Usage: load <n>, where n is a number from 'history'.");
        return "continue";
      }
      const record = await controller.loadSelectedHistory(Number(argument) - 1);
      if (record) {
        view.print(`Loaded: bill ${view.bill}, tip ${view.tipPercent}%, ${view.partySize} people`);
      }
      return "continue";
    }
    case "copy":
      await controller.copyResult();
      return "continue";
    case "clear":
      controller.clearInputs();
      return "continue";
    case "theme":
      controller.toggleTheme();
      return "continue";
    case "about":
      controller.about();
      return "continue";
    case "help":
      view.print(HELP_TEXT);
      return "continue";
    case "quit":
    case "exit":
      return "quit";
    default:
      view.print(`Unknown command '${command}'. Type 'help' for a list.`);
      return "continue";
  }
}
