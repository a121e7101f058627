/**
 * Input validation for swap requests.
 */

import type { Money, WalletService } from "@swapdesk/types";
import { compareMoney, isPositive, MoneyError, toMoney } from "@swapdesk/money";
import type { SwapConfig } from "./config.js";
import { SwapError } from "./errors.js";

/** Local number prefix per wallet network */
export const WALLET_PREFIXES: Readonly<Record<WalletService, string>> = {
  TNM: "088",
  AIRTEL: "099",
};

const COUNTRY_CODE = "265";

/**
 * Normalize a Malawian mobile number to its 10-digit local form.
 *
 * "+265 99 123 4567" → "0991234567"
 */
export function normalizeWalletNumber(raw: string): string {
  const digits = raw.replace(/[\s\-()]/g, "").replace(/^\+/, "");
  if (digits.startsWith(COUNTRY_CODE) && digits.length === 12) {
    return `0${digits.slice(COUNTRY_CODE.length)}`;
  }
  return digits;
}

/**
 * @returns The normalized number
 * @throws SwapError VALIDATION_ERROR when it is not a number on `service`
 */
export function validateDestNumber(raw: string, service: WalletService): string {
  const normalized = normalizeWalletNumber(raw);
  const prefix = WALLET_PREFIXES[service];
  if (!/^0\d{9}$/.test(normalized) || !normalized.startsWith(prefix)) {
    throw new SwapError(
      "VALIDATION_ERROR",
      `Destination number "${raw}" is not a ${service} number (expected ${prefix}XXXXXXX)`,
      { field: "destNumber" },
    );
  }
  return normalized;
}

/**
 * @throws SwapError VALIDATION_ERROR when malformed or outside the limits
 */
export function validateSwapAmount(
  amount: string,
  config: Pick<SwapConfig, "currency" | "decimals" | "minSwapAmount" | "maxSwapAmount">,
): Money {
  let money: Money;
  try {
    money = toMoney(amount, config.currency, config.decimals);
  } catch (err) {
    if (err instanceof MoneyError) {
      throw new SwapError(
        "VALIDATION_ERROR",
        `Amount "${amount}" must be a decimal with at most ${config.decimals} places`,
        { field: "amount" },
      );
    }
    throw err;
  }

  const min = toMoney(config.minSwapAmount, config.currency, config.decimals);
  const max = toMoney(config.maxSwapAmount, config.currency, config.decimals);
  if (!isPositive(money) || compareMoney(money, min) < 0 || compareMoney(money, max) > 0) {
    throw new SwapError(
      "VALIDATION_ERROR",
      `Amount must be between ${min.amount} and ${max.amount} ${config.currency}`,
      { field: "amount" },
    );
  }
  return money;
}
