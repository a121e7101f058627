/**
 * Runtime Type Guards
 *
 * Narrowing functions for SwapDesk domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized data, persisted records).
 */

import type { Money } from "./money.js";
import type { GeoLocation } from "./party.js";
import type { SourceService, SwapStatus, WalletService } from "./swap.js";
import type { DisputeOutcome, DisputeSeverity } from "./dispute.js";
import type { ProofKind } from "./proof.js";

// =============================================================================
// Value sets
// =============================================================================

export const SWAP_STATUSES: readonly SwapStatus[] = [
  "PENDING",
  "ACCEPTED",
  "REJECTED",
  "CLIENT_PROOF_UPLOADED",
  "AGENT_PROOF_UPLOADED",
  "COMPLETE",
  "DISPUTE",
  "CANCELLED",
  "EXPIRED",
];

/**
 * States a swap never leaves.
 */
export const TERMINAL_STATUSES: readonly SwapStatus[] = [
  "COMPLETE",
  "REJECTED",
  "CANCELLED",
  "EXPIRED",
];

export const SOURCE_SERVICES: readonly SourceService[] = [
  "national_bank",
  "standard_bank",
  "fdh_bank",
  "nedbank",
  "mpamba",
  "airtel_money",
];

/**
 * Source services that are bank accounts (proof references are checked).
 */
export const BANK_SERVICES: readonly SourceService[] = [
  "national_bank",
  "standard_bank",
  "fdh_bank",
  "nedbank",
];

export const WALLET_SERVICES: readonly WalletService[] = ["TNM", "AIRTEL"];

const SEVERITIES = new Set<string>(["low", "medium", "high"]);
const OUTCOMES = new Set<string>(["resume", "complete", "cancel"]);
const PROOF_KINDS = new Set<string>(["sms", "image"]);

// =============================================================================
// Guards
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

export function isMoney(value: unknown): value is Money {
  if (!isRecord(value)) return false;
  return (
    typeof value.amount === "string" &&
    typeof value.currency === "string" &&
    typeof value.decimals === "number" &&
    Number.isInteger(value.decimals) &&
    value.decimals >= 0
  );
}

export function isSwapStatus(value: unknown): value is SwapStatus {
  return typeof value === "string" && SWAP_STATUSES.some((s) => s === value);
}

export function isTerminalStatus(status: SwapStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isSourceService(value: unknown): value is SourceService {
  return typeof value === "string" && SOURCE_SERVICES.some((s) => s === value);
}

export function isBankService(service: SourceService): boolean {
  return BANK_SERVICES.includes(service);
}

export function isWalletService(value: unknown): value is WalletService {
  return typeof value === "string" && WALLET_SERVICES.some((s) => s === value);
}

export function isDisputeSeverity(value: unknown): value is DisputeSeverity {
  return typeof value === "string" && SEVERITIES.has(value);
}

export function isDisputeOutcome(value: unknown): value is DisputeOutcome {
  return typeof value === "string" && OUTCOMES.has(value);
}

export function isProofKind(value: unknown): value is ProofKind {
  return typeof value === "string" && PROOF_KINDS.has(value);
}

export function isGeoLocation(value: unknown): value is GeoLocation {
  if (!isRecord(value)) return false;
  return (
    typeof value.lat === "number" &&
    typeof value.lng === "number" &&
    Number.isFinite(value.lat) &&
    Number.isFinite(value.lng) &&
    value.lat >= -90 &&
    value.lat <= 90 &&
    value.lng >= -180 &&
    value.lng <= 180 &&
    typeof value.address === "string"
  );
}
