/**
 * Swap operation errors.
 */

export type SwapErrorCode =
  | "VALIDATION_ERROR"
  | "INVALID_TRANSITION"
  | "CAPACITY_EXCEEDED"
  | "AGENT_UNAVAILABLE"
  | "DUPLICATE_DISPUTE"
  | "NOT_FOUND"
  | "FORBIDDEN";

export class SwapError extends Error {
  public readonly code: SwapErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: SwapErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "SwapError";
    this.code = code;
    this.details = details;
  }
}
