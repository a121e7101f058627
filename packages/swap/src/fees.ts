/**
 * Fee split for a swap.
 *
 *   total       = round(max(amount × feeRate, minFeeFloor))
 *   platformFee = round(total × platformFeeShare)
 *   agentFee    = total − platformFee
 *
 * Rounding is half-to-even at the currency's precision. Fees are recorded
 * for monthly invoicing and never debited.
 */

import type { Money } from "@swapdesk/types";
import {
  compareMoney,
  maxMoney,
  multiplyMoney,
  subtractMoney,
  toMoney,
} from "@swapdesk/money";
import type { SwapConfig } from "./config.js";
import { SwapError } from "./errors.js";

export interface FeeSplit {
  readonly total: Money;
  readonly platformFee: Money;
  readonly agentFee: Money;
}

export type FeeConfig = Pick<SwapConfig, "feeRate" | "platformFeeShare" | "minFeeFloor">;

export function calculateFees(amount: Money, config: FeeConfig): FeeSplit {
  const floor = toMoney(config.minFeeFloor, amount.currency, amount.decimals);
  const total = maxMoney(multiplyMoney(amount, config.feeRate), floor);
  const platformFee = multiplyMoney(total, config.platformFeeShare);
  const agentFee = subtractMoney(total, platformFee);

  if (compareMoney(total, amount) > 0) {
    throw new SwapError(
      "VALIDATION_ERROR",
      `Fees of ${total.amount} ${total.currency} exceed the swap amount of ${amount.amount}`,
    );
  }

  return { total, platformFee, agentFee };
}
