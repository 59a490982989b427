export type CalculationErrorCode = "InvalidBill" | "NegativeBill" | "InvalidPartySize";

export type CalculationError = {
  code: CalculationErrorCode;
  message: string;
};

export type RawCalculationInput = {
  bill: string | number;
  tipPercent: number;
  partySize: string | number;
  roundUp: boolean;
};

export type CalculationInput = {
  readonly bill: number;
  readonly tipPercent: number;
  readonly partySize: number;
  readonly roundUp: boolean;
};

export type CalculationResult = CalculationInput & {
  readonly tipAmount: number;
  readonly total: number;
  readonly perPerson: number;
  /** Share before the cent ceiling was applied; equals `perPerson` when `roundUp` is off. */
  readonly rawPerPerson: number;
};

export type CalculationOutcome =
  | { ok: true; result: CalculationResult }
  | { ok: false; error: CalculationError };
