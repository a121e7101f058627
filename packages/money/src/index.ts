/**
 * @swapdesk/money: Exact decimal arithmetic for SwapDesk.
 *
 * @packageDocumentation
 */

export { MoneyError } from "./errors.js";
export type { MoneyErrorCode } from "./errors.js";

export {
  parseAmount,
  formatAmount,
  toMoney,
  validateMoney,
  assertSameCurrency,
  addMoney,
  subtractMoney,
  sumMoney,
  multiplyMoney,
  isZero,
  isPositive,
  isNegative,
  zeroMoney,
  compareMoney,
  maxMoney,
  absMoney,
} from "./money-math.js";
