/**
 * Dispute Types
 *
 * A dispute freezes a swap in the DISPUTE state until an operator
 * resolves it. At most one unresolved dispute exists per swap.
 */

export type DisputeSeverity = "low" | "medium" | "high";

export type DisputeStatus = "open" | "investigating" | "resolved" | "escalated";

/**
 * What resolving a dispute does to the swap.
 *
 * - resume: back to the status held before the dispute
 * - complete: mark the swap COMPLETE
 * - cancel: mark the swap CANCELLED
 */
export type DisputeOutcome = "resume" | "complete" | "cancel";

export interface Dispute {
  readonly id: string;
  readonly swapId: string;
  readonly openedBy: string;
  readonly reason: string;
  readonly severity: DisputeSeverity;
  readonly status: DisputeStatus;
  readonly openedAt: string;

  readonly resolution?: string;
  readonly outcome?: DisputeOutcome;
  readonly resolvedBy?: string;
  readonly resolvedAt?: string;

  /** Optimistic concurrency version (1 on creation) */
  readonly version: number;
}
