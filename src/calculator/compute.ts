import type {
  CalculationError,
  CalculationErrorCode,
  CalculationOutcome,
  CalculationResult,
  RawCalculationInput
} from "./types.js";

export const VALIDATION_MESSAGES: Record<CalculationErrorCode, string> = {
  InvalidBill: "Please enter a valid bill amount.",
  NegativeBill: "Bill amount cannot be negative.",
  InvalidPartySize: "Please enter a valid number of people (>=1)."
};

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

function failure(code: CalculationErrorCode): CalculationOutcome {
  const error: CalculationError = { code, message: VALIDATION_MESSAGES[code] };
  return { ok: false, error };
}

export function parseBill(value: string | number): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function parsePartySize(value: string | number): number | null {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value >= 1 ? value : null;
  }
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }
  const parsed = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) && parsed >= 1 ? parsed : null;
}

/**
 * Smallest cent multiple at or above `amount`.
 *
 * `amount * 100` can land a hair off the true product in either direction
 * (`0.07 * 100 === 7.000000000000001`), so the candidate is checked against
 * `amount` itself rather than trusted.
 */
export function ceilToCent(amount: number): number {
  let cents = Math.ceil(amount * 100);
  if (cents / 100 < amount) {
    cents += 1;
  } else if ((cents - 1) / 100 >= amount) {
    cents -= 1;
  }
  return cents / 100;
}

/**
 * Validates the raw form values and derives tip, total and per-person share.
 *
 * The tip percent is taken as given: the slider bounds it for fresh input and
 * values reloaded from history are not re-validated.
 */
export function compute(input: RawCalculationInput): CalculationOutcome {
  const bill = parseBill(input.bill);
  if (bill === null) {
    return failure("InvalidBill");
  }
  if (bill < 0) {
    return failure("NegativeBill");
  }
  const partySize = parsePartySize(input.partySize);
  if (partySize === null) {
    return failure("InvalidPartySize");
  }

  const tipPercent = input.tipPercent;
  const tipAmount = bill * (tipPercent / 100);
  const total = bill + tipAmount;
  const rawPerPerson = total / partySize;
  const perPerson = input.roundUp ? ceilToCent(rawPerPerson) : rawPerPerson;

  const result: CalculationResult = {
    bill,
    tipPercent,
    partySize,
    roundUp: input.roundUp,
    tipAmount,
    total,
    perPerson,
    rawPerPerson
  };
  return { ok: true, result };
}
