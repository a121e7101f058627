/**
 * Money Types
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit
 * - Arithmetic lives in @swapdesk/money, never here
 */

/**
 * Currency identifier (ISO 4217 code, e.g. "MWK").
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 */
export interface Money {
  /** String representation of the amount (e.g., "1000.00") */
  readonly amount: string;

  /** Currency code (e.g., "MWK") */
  readonly currency: Currency;

  /** Number of decimal places for this currency (MWK = 2) */
  readonly decimals: number;
}
