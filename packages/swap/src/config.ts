/**
 * Swap policy configuration.
 *
 * Decimal values (rates, shares, amounts) are strings so they stay exact.
 */

import { MoneyError, parseAmount } from "@swapdesk/money";
import { LOW_CONFIDENCE } from "@swapdesk/proof";
import { SwapError } from "./errors.js";

export interface SwapConfig {
  /** Fee as a fraction of the amount, e.g. "0.006" */
  readonly feeRate: string;
  readonly platformFeeShare: string;
  readonly agentFeeShare: string;

  /** Lowest total fee, in currency units */
  readonly minFeeFloor: string;

  readonly minSwapAmount: string;
  readonly maxSwapAmount: string;

  /** PENDING swaps older than this expire */
  readonly pendingTimeoutMinutes: number;

  /** ACCEPTED swaps without a client proof are cancelled after this */
  readonly acceptedTimeoutHours: number;

  /** PENDING swaps older than this trigger an agent reminder */
  readonly pendingReminderMinutes: number;

  /** Proofs above this confidence with no validation errors are verified */
  readonly autoVerifyConfidence: number;

  readonly minDisputeReasonLength: number;

  readonly currency: string;
  readonly decimals: number;

  /** Daily capacity given to newly registered agents */
  readonly defaultDailyCapacity: number;
}

export const DEFAULT_SWAP_CONFIG: SwapConfig = {
  feeRate: "0.006",
  platformFeeShare: "0.25",
  agentFeeShare: "0.75",
  minFeeFloor: "50.00",
  minSwapAmount: "50.00",
  maxSwapAmount: "50000.00",
  pendingTimeoutMinutes: 30,
  acceptedTimeoutHours: 2,
  pendingReminderMinutes: 10,
  autoVerifyConfidence: 0.8,
  minDisputeReasonLength: 10,
  currency: "MWK",
  decimals: 2,
  defaultDailyCapacity: 20,
};

/** Precision used to compare rates and shares */
const RATE_SCALE = 12;

function invalid(message: string): SwapError {
  return new SwapError("VALIDATION_ERROR", `Invalid swap config: ${message}`);
}

function scaled(name: string, value: string, decimals: number): bigint {
  try {
    return parseAmount(value, decimals);
  } catch (err) {
    if (err instanceof MoneyError) {
      throw invalid(`${name} "${value}" is not a decimal with at most ${decimals} places`);
    }
    throw err;
  }
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw invalid(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws SwapError VALIDATION_ERROR
 */
export function resolveSwapConfig(overrides: Partial<SwapConfig> = {}): SwapConfig {
  const config: SwapConfig = { ...DEFAULT_SWAP_CONFIG, ...overrides };

  if (!Number.isInteger(config.decimals) || config.decimals < 0) {
    throw invalid(`decimals must be a non-negative integer, got ${config.decimals}`);
  }
  if (config.currency.trim().length === 0) {
    throw invalid("currency must not be empty");
  }

  const rate = scaled("feeRate", config.feeRate, RATE_SCALE);
  const platformShare = scaled("platformFeeShare", config.platformFeeShare, RATE_SCALE);
  const agentShare = scaled("agentFeeShare", config.agentFeeShare, RATE_SCALE);
  if (rate < 0n || platformShare < 0n || agentShare < 0n) {
    throw invalid("rates and shares must not be negative");
  }
  if (platformShare + agentShare !== 10n ** BigInt(RATE_SCALE)) {
    throw invalid(
      `platformFeeShare (${config.platformFeeShare}) and agentFeeShare (${config.agentFeeShare}) must sum to 1`,
    );
  }

  const floor = scaled("minFeeFloor", config.minFeeFloor, config.decimals);
  const min = scaled("minSwapAmount", config.minSwapAmount, config.decimals);
  const max = scaled("maxSwapAmount", config.maxSwapAmount, config.decimals);
  if (floor < 0n) {
    throw invalid("minFeeFloor must not be negative");
  }
  if (min <= 0n || min > max) {
    throw invalid(`swap limits must satisfy 0 < min <= max, got ${config.minSwapAmount}..${config.maxSwapAmount}`);
  }

  assertPositiveInteger("pendingTimeoutMinutes", config.pendingTimeoutMinutes);
  assertPositiveInteger("acceptedTimeoutHours", config.acceptedTimeoutHours);
  assertPositiveInteger("pendingReminderMinutes", config.pendingReminderMinutes);
  assertPositiveInteger("minDisputeReasonLength", config.minDisputeReasonLength);
  assertPositiveInteger("defaultDailyCapacity", config.defaultDailyCapacity);

  // Below LOW_CONFIDENCE a proof is flagged for review, so it must never auto-verify
  if (config.autoVerifyConfidence < LOW_CONFIDENCE || config.autoVerifyConfidence > 1) {
    throw invalid(
      `autoVerifyConfidence must be within [${LOW_CONFIDENCE}, 1], got ${config.autoVerifyConfidence}`,
    );
  }

  return config;
}
