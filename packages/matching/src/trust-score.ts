/**
 * @swapdesk/matching: Trust scoring.
 *
 * An agent's trust score is a weighted composite of four components,
 * each in [0, 100], less a penalty per dispute:
 *
 *   trust = 0.2 × response + 0.3 × completion + 0.3 × rating + 0.2 × experience
 *           − min(20, 5 × disputes)
 *
 * floored at 0 and rounded to one decimal. Weights and tier thresholds
 * are fixed.
 */

import type { AgentProfile } from "@swapdesk/types";

export type AgentStats = Pick<
  AgentProfile,
  | "completedSwaps"
  | "swapAttempts"
  | "responseTimeSumSeconds"
  | "responseTimeCount"
  | "ratingSum"
  | "ratingCount"
  | "disputeCount"
>;

export type TrustTier =
  | "Excellent"
  | "Very Good"
  | "Good"
  | "Fair"
  | "Needs Improvement";

export interface TrustBreakdown {
  readonly responseScore: number;
  readonly completionScore: number;
  readonly ratingScore: number;
  readonly experienceScore: number;
  readonly disputePenalty: number;
  readonly trustScore: number;
}

export const TRUST_WEIGHTS = {
  response: 0.2,
  completion: 0.3,
  rating: 0.3,
  experience: 0.2,
} as const;

const PENALTY_PER_DISPUTE = 5;
const MAX_DISPUTE_PENALTY = 20;

/** Completed swaps at which the experience component reaches 100 */
const EXPERIENCE_SATURATION = 50;

const TIERS: ReadonlyArray<readonly [number, TrustTier]> = [
  [90, "Excellent"],
  [80, "Very Good"],
  [70, "Good"],
  [60, "Fair"],
];

function clamp(value: number, min = 0, max = 100): number {
  return Math.min(max, Math.max(min, value));
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

// ─── Derived Stats ──────────────────────────────────────────────────────

/** Average accept latency in minutes, or null without samples */
export function averageResponseMinutes(stats: AgentStats): number | null {
  if (stats.responseTimeCount === 0) return null;
  return stats.responseTimeSumSeconds / stats.responseTimeCount / 60;
}

/** Completed / attempted as a percentage; 100 before any attempt */
export function completionRate(stats: AgentStats): number {
  if (stats.swapAttempts === 0) return 100;
  return clamp((stats.completedSwaps / stats.swapAttempts) * 100);
}

/** Mean rating in [1, 5]; 5 before any rating */
export function averageRating(stats: AgentStats): number {
  if (stats.ratingCount === 0) return 5;
  return stats.ratingSum / stats.ratingCount;
}

// ─── Scoring ────────────────────────────────────────────────────────────

export function trustBreakdown(stats: AgentStats): TrustBreakdown {
  const avgMinutes = averageResponseMinutes(stats);
  const responseScore = avgMinutes === null ? 100 : clamp(100 - 2 * avgMinutes);
  const completionScore = completionRate(stats);
  const ratingScore = clamp((averageRating(stats) / 5) * 100);
  const experienceScore = clamp(
    (Math.log(stats.completedSwaps + 1) / Math.log(EXPERIENCE_SATURATION + 1)) * 100,
  );
  const disputePenalty = Math.min(
    MAX_DISPUTE_PENALTY,
    stats.disputeCount * PENALTY_PER_DISPUTE,
  );

  const weighted =
    TRUST_WEIGHTS.response * responseScore +
    TRUST_WEIGHTS.completion * completionScore +
    TRUST_WEIGHTS.rating * ratingScore +
    TRUST_WEIGHTS.experience * experienceScore;

  return {
    responseScore,
    completionScore,
    ratingScore,
    experienceScore,
    disputePenalty,
    trustScore: round1(Math.max(0, weighted - disputePenalty)),
  };
}

export function trustScore(stats: AgentStats): number {
  return trustBreakdown(stats).trustScore;
}

export function trustTier(score: number): TrustTier {
  for (const [threshold, tier] of TIERS) {
    if (score >= threshold) return tier;
  }
  return "Needs Improvement";
}

/**
 * Human-readable experience level from completed swaps.
 */
export function experienceLabel(completedSwaps: number): string {
  if (completedSwaps === 0) return "New Agent";
  if (completedSwaps < 10) return `${completedSwaps} swaps`;
  if (completedSwaps < 50) return "Experienced";
  return "Expert";
}
