/**
 * Timeout sweep selection.
 *
 * Pure functions over a snapshot of swaps. The lifecycle applies the
 * resulting transitions; a scheduler decides when to run them.
 */

import type { SwapRequest } from "@swapdesk/types";
import type { SwapConfig } from "./config.js";
import { minutesBefore } from "./clock.js";

type SweepConfig = Pick<
  SwapConfig,
  "pendingTimeoutMinutes" | "acceptedTimeoutHours" | "pendingReminderMinutes"
>;

function olderThan(timestamp: string, cutoff: Date): boolean {
  return Date.parse(timestamp) < cutoff.getTime();
}

function pendingSince(swap: SwapRequest): string {
  return swap.resumedAt ?? swap.createdAt;
}

/**
 * PENDING swaps created (or resumed from a dispute) more than
 * `pendingTimeoutMinutes` ago.
 */
export function selectExpiredPending(
  swaps: readonly SwapRequest[],
  now: Date,
  config: SweepConfig,
): SwapRequest[] {
  const cutoff = minutesBefore(now, config.pendingTimeoutMinutes);
  return swaps.filter((s) => s.status === "PENDING" && olderThan(pendingSince(s), cutoff));
}

/**
 * ACCEPTED swaps whose agent responded (or that were resumed) more than
 * `acceptedTimeoutHours` ago and that still have no client proof.
 */
export function selectStaleAccepted(
  swaps: readonly SwapRequest[],
  now: Date,
  config: SweepConfig,
): SwapRequest[] {
  const cutoff = minutesBefore(now, config.acceptedTimeoutHours * 60);
  return swaps.filter((s) => {
    const since = s.resumedAt ?? s.agentRespondedAt;
    return (
      s.status === "ACCEPTED" &&
      s.clientProofUploadedAt === undefined &&
      since !== undefined &&
      olderThan(since, cutoff)
    );
  });
}

/**
 * PENDING swaps past the reminder threshold that have not yet expired.
 */
export function selectRemindable(
  swaps: readonly SwapRequest[],
  now: Date,
  config: SweepConfig,
): SwapRequest[] {
  const remindCutoff = minutesBefore(now, config.pendingReminderMinutes);
  const expiryCutoff = minutesBefore(now, config.pendingTimeoutMinutes);
  return swaps.filter(
    (s) =>
      s.status === "PENDING" &&
      olderThan(pendingSince(s), remindCutoff) &&
      !olderThan(pendingSince(s), expiryCutoff),
  );
}
