/**
 * @swapdesk/money: Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Currency must match for all operations
 * - Amounts must be valid decimal strings
 * - Multiplication rounds half-to-even at the currency's precision
 */

import type { Money } from "@swapdesk/types";
import { MoneyError } from "./errors.js";

// ─── Internal Helpers ────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=2 → 10000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new MoneyError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new MoneyError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new MoneyError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Integer division rounding half-to-even.
 */
function divideHalfEven(numerator: bigint, denominator: bigint): bigint {
  const negative = numerator < 0n !== denominator < 0n;
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;

  let q = n / d;
  const twiceRemainder = (n % d) * 2n;
  if (twiceRemainder > d || (twiceRemainder === d && q % 2n === 1n)) {
    q += 1n;
  }
  return negative ? -q : q;
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Build a Money value from a decimal string, normalizing it to the
 * currency's precision ("1000" → "1000.00").
 */
export function toMoney(amount: string, currency: string, decimals: number): Money {
  return {
    amount: formatAmount(parseAmount(amount, decimals), decimals),
    currency,
    decimals,
  };
}

/**
 * Validate that a Money object is well-formed.
 * Throws MoneyError if invalid.
 */
export function validateMoney(money: Money): void {
  if (typeof money.amount !== "string" || money.amount.trim() === "") {
    throw new MoneyError("INVALID_MONEY", `Money amount must be a non-empty string, got: "${String(money.amount)}"`);
  }

  if (typeof money.currency !== "string" || money.currency.trim() === "") {
    throw new MoneyError("INVALID_MONEY", `Money currency must be a non-empty string, got: "${String(money.currency)}"`);
  }

  if (!Number.isInteger(money.decimals) || money.decimals < 0) {
    throw new MoneyError("INVALID_MONEY", `Money decimals must be a non-negative integer, got: ${String(money.decimals)}`);
  }

  parseAmount(money.amount, money.decimals);
}

/**
 * Assert two Money values have the same currency and decimals.
 */
export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency) {
    throw new MoneyError(
      "CURRENCY_MISMATCH",
      `Cannot operate on different currencies: "${a.currency}" vs "${b.currency}"`,
    );
  }
  if (a.decimals !== b.decimals) {
    throw new MoneyError(
      "CURRENCY_MISMATCH",
      `Decimal mismatch for currency "${a.currency}": ${String(a.decimals)} vs ${String(b.decimals)}`,
    );
  }
}

export function addMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  const sum = parseAmount(a.amount, a.decimals) + parseAmount(b.amount, b.decimals);
  return { amount: formatAmount(sum, a.decimals), currency: a.currency, decimals: a.decimals };
}

export function subtractMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  const diff = parseAmount(a.amount, a.decimals) - parseAmount(b.amount, b.decimals);
  return { amount: formatAmount(diff, a.decimals), currency: a.currency, decimals: a.decimals };
}

/**
 * Sum a list of Money values. Returns zero in the given currency when empty.
 */
export function sumMoney(values: readonly Money[], currency: string, decimals: number): Money {
  let total = zeroMoney(currency, decimals);
  for (const value of values) {
    total = addMoney(total, value);
  }
  return total;
}

/**
 * Multiply a Money value by a non-negative decimal factor ("0.006").
 * The product is rounded half-to-even to the currency's precision.
 */
export function multiplyMoney(money: Money, factor: string): Money {
  const trimmed = factor.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new MoneyError("INVALID_FACTOR", `Invalid factor: "${factor}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");
  const numerator = BigInt(intPart + fracPart);
  const scale = 10n ** BigInt(fracPart.length);

  const product = divideHalfEven(parseAmount(money.amount, money.decimals) * numerator, scale);
  return { amount: formatAmount(product, money.decimals), currency: money.currency, decimals: money.decimals };
}

export function isZero(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) === 0n;
}

export function isPositive(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) > 0n;
}

export function isNegative(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) < 0n;
}

export function zeroMoney(currency: string, decimals: number): Money {
  return { amount: formatAmount(0n, decimals), currency, decimals };
}

/**
 * Compare two Money values. Returns -1, 0, or 1.
 */
export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertSameCurrency(a, b);
  const va = parseAmount(a.amount, a.decimals);
  const vb = parseAmount(b.amount, b.decimals);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

export function maxMoney(a: Money, b: Money): Money {
  return compareMoney(a, b) >= 0 ? a : b;
}

export function absMoney(money: Money): Money {
  const scaled = parseAmount(money.amount, money.decimals);
  const abs = scaled < 0n ? -scaled : scaled;
  return { amount: formatAmount(abs, money.decimals), currency: money.currency, decimals: money.decimals };
}
