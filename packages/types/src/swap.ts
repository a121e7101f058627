/**
 * Swap Types
 *
 * The swap lifecycle:
 *   PENDING → ACCEPTED → CLIENT_PROOF_UPLOADED → AGENT_PROOF_UPLOADED → COMPLETE
 *
 * with side branches REJECTED, CANCELLED, EXPIRED and DISPUTE.
 * The platform never holds funds: client pays agent, agent pays the
 * client's wallet, and fees are recorded for external invoicing only.
 */

import type { Money } from "./money.js";

/**
 * Lifecycle states of a swap.
 */
export type SwapStatus =
  | "PENDING"
  | "ACCEPTED"
  | "REJECTED"
  | "CLIENT_PROOF_UPLOADED"
  | "AGENT_PROOF_UPLOADED"
  | "COMPLETE"
  | "DISPUTE"
  | "CANCELLED"
  | "EXPIRED";

/**
 * Where the client's money comes from.
 */
export type SourceService =
  | "national_bank"
  | "standard_bank"
  | "fdh_bank"
  | "nedbank"
  | "mpamba"
  | "airtel_money";

/**
 * Which wallet the client receives into.
 */
export type WalletService = "TNM" | "AIRTEL";

export interface SwapRequest {
  /** Opaque unique identifier */
  readonly id: string;

  readonly clientId: string;
  readonly agentId: string;

  readonly amount: Money;
  readonly fromService: SourceService;
  readonly toService: WalletService;
  readonly destNumber: string;

  readonly status: SwapStatus;

  /** Human-readable reference, e.g. "SWAP7K2Q9XMA" */
  readonly reference: string;

  /** Informational only; never debited */
  readonly platformFee: Money;
  readonly agentFee: Money;

  readonly createdAt: string;
  readonly agentRespondedAt?: string;
  readonly clientProofUploadedAt?: string;
  readonly agentProofUploadedAt?: string;
  readonly completedAt?: string;

  /** Set when a dispute resumes the swap; timeouts restart from here */
  readonly resumedAt?: string;

  readonly rejectionReason?: string;
  readonly cancellationReason?: string;

  /** Status held when a dispute was opened (restored on "resume") */
  readonly statusBeforeDispute?: SwapStatus;

  /** Optimistic concurrency version (1 on creation) */
  readonly version: number;
}
