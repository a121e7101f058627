/**
 * Swap state machine.
 *
 *   PENDING → ACCEPTED → CLIENT_PROOF_UPLOADED → AGENT_PROOF_UPLOADED → COMPLETE
 *
 * PENDING may also end REJECTED, CANCELLED or EXPIRED; ACCEPTED may be
 * CANCELLED. Any non-terminal state may enter DISPUTE, and resolving a
 * dispute returns the swap to an active state or ends it.
 */

import type { SwapRequest, SwapStatus } from "@swapdesk/types";
import { SwapError } from "./errors.js";

export const VALID_TRANSITIONS: Record<SwapStatus, readonly SwapStatus[]> = {
  PENDING: ["ACCEPTED", "REJECTED", "CANCELLED", "EXPIRED", "DISPUTE"],
  ACCEPTED: ["CLIENT_PROOF_UPLOADED", "CANCELLED", "DISPUTE"],
  CLIENT_PROOF_UPLOADED: ["AGENT_PROOF_UPLOADED", "DISPUTE"],
  AGENT_PROOF_UPLOADED: ["COMPLETE", "DISPUTE"],
  DISPUTE: [
    "PENDING",
    "ACCEPTED",
    "CLIENT_PROOF_UPLOADED",
    "AGENT_PROOF_UPLOADED",
    "COMPLETE",
    "CANCELLED",
  ],
  COMPLETE: [],
  REJECTED: [],
  CANCELLED: [],
  EXPIRED: [],
};

export function canTransition(from: SwapStatus, to: SwapStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * @param from - When given, the swap must also currently be in one of
 *   these states. Operations use it to refuse paths the table only
 *   allows for dispute resolution.
 */
export function assertTransition(
  swap: SwapRequest,
  target: SwapStatus,
  from?: readonly SwapStatus[],
): void {
  if (
    (from !== undefined && !from.includes(swap.status)) ||
    !canTransition(swap.status, target)
  ) {
    throw new SwapError(
      "INVALID_TRANSITION",
      `Cannot transition swap '${swap.reference}' from '${swap.status}' to '${target}'`,
      { swapId: swap.id, from: swap.status, to: target },
    );
  }
}
