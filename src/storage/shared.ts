export function isValidIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
