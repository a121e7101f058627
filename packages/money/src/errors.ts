/**
 * Error thrown by monetary arithmetic.
 */
export class MoneyError extends Error {
  public readonly code: MoneyErrorCode;
  constructor(code: MoneyErrorCode, message: string) {
    super(message);
    this.name = "MoneyError";
    this.code = code;
  }
}

export type MoneyErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_MONEY"
  | "INVALID_FACTOR"
  | "CURRENCY_MISMATCH";
