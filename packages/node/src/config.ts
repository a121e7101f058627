/**
 * @swapdesk/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Swap policy variables map onto the core `SwapConfig`; unset ones keep
 * the core defaults.
 */

import { z } from "zod";
import type { SwapConfig } from "@swapdesk/swap";

// =============================================================================
// Schema
// =============================================================================

const decimalString = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "Expected a non-negative decimal string");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Actors allowed to verify agents, review proofs and resolve disputes
  OPERATOR_IDS: z.string().default("admin"),

  // Swap policy
  CURRENCY: z.string().min(1).optional(),
  CURRENCY_DECIMALS: z.coerce.number().int().min(0).max(18).optional(),
  FEE_RATE: decimalString.optional(),
  PLATFORM_FEE_SHARE: decimalString.optional(),
  AGENT_FEE_SHARE: decimalString.optional(),
  MIN_FEE_FLOOR: decimalString.optional(),
  MIN_SWAP_AMOUNT: decimalString.optional(),
  MAX_SWAP_AMOUNT: decimalString.optional(),
  PENDING_TIMEOUT_MINUTES: z.coerce.number().int().min(1).optional(),
  ACCEPTED_TIMEOUT_HOURS: z.coerce.number().int().min(1).optional(),
  PENDING_REMINDER_MINUTES: z.coerce.number().int().min(1).optional(),
  AUTO_VERIFY_CONFIDENCE: z.coerce.number().min(0.5).max(1).optional(),
  MIN_DISPUTE_REASON_LENGTH: z.coerce.number().int().min(1).optional(),
  DEFAULT_DAILY_CAPACITY: z.coerce.number().int().min(1).optional(),

  // Ledger
  LEDGER_FILE: z.string().min(1).optional(),
  LEDGER_MAX_EVENTS_PER_BLOCK: z.coerce.number().int().min(1).default(100),

  // Background jobs (0 disables a job)
  SWEEP_INTERVAL_MS: z.coerce.number().int().min(0).default(60_000),
  REMINDER_INTERVAL_MS: z.coerce.number().int().min(0).default(300_000),
  INTEGRITY_CHECK_INTERVAL_MS: z.coerce.number().int().min(0).default(3_600_000),
  INVOICE_INTERVAL_MS: z.coerce.number().int().min(0).default(86_400_000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Operator Parsing
// =============================================================================

/**
 * Parse the OPERATOR_IDS env var.
 *
 * Format: "ops-1,ops-2"
 */
export function parseOperatorIds(raw: string): readonly string[] {
  const ids = raw
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id !== "");
  return [...new Set(ids)];
}

// =============================================================================
// Swap Policy
// =============================================================================

/**
 * The swap policy overrides set in the environment.
 */
export function toSwapConfig(config: AppConfig): Partial<SwapConfig> {
  const overrides: { -readonly [K in keyof SwapConfig]?: SwapConfig[K] } = {};
  if (config.CURRENCY !== undefined) overrides.currency = config.CURRENCY;
  if (config.CURRENCY_DECIMALS !== undefined) overrides.decimals = config.CURRENCY_DECIMALS;
  if (config.FEE_RATE !== undefined) overrides.feeRate = config.FEE_RATE;
  if (config.PLATFORM_FEE_SHARE !== undefined) overrides.platformFeeShare = config.PLATFORM_FEE_SHARE;
  if (config.AGENT_FEE_SHARE !== undefined) overrides.agentFeeShare = config.AGENT_FEE_SHARE;
  if (config.MIN_FEE_FLOOR !== undefined) overrides.minFeeFloor = config.MIN_FEE_FLOOR;
  if (config.MIN_SWAP_AMOUNT !== undefined) overrides.minSwapAmount = config.MIN_SWAP_AMOUNT;
  if (config.MAX_SWAP_AMOUNT !== undefined) overrides.maxSwapAmount = config.MAX_SWAP_AMOUNT;
  if (config.PENDING_TIMEOUT_MINUTES !== undefined) {
    overrides.pendingTimeoutMinutes = config.PENDING_TIMEOUT_MINUTES;
  }
  if (config.ACCEPTED_TIMEOUT_HOURS !== undefined) {
    overrides.acceptedTimeoutHours = config.ACCEPTED_TIMEOUT_HOURS;
  }
  if (config.PENDING_REMINDER_MINUTES !== undefined) {
    overrides.pendingReminderMinutes = config.PENDING_REMINDER_MINUTES;
  }
  if (config.AUTO_VERIFY_CONFIDENCE !== undefined) {
    overrides.autoVerifyConfidence = config.AUTO_VERIFY_CONFIDENCE;
  }
  if (config.MIN_DISPUTE_REASON_LENGTH !== undefined) {
    overrides.minDisputeReasonLength = config.MIN_DISPUTE_REASON_LENGTH;
  }
  if (config.DEFAULT_DAILY_CAPACITY !== undefined) {
    overrides.defaultDailyCapacity = config.DEFAULT_DAILY_CAPACITY;
  }
  return overrides;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
