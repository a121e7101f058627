/**
 * @swapdesk/matching: RecommendationEngine.
 *
 * Ranks eligible agents for a client request:
 *
 *   1. Candidates: verified AND online (capacity is checked at accept time)
 *   2. Score trust, proximity, availability and service
 *   3. combined = 0.4 × trust + 0.3 × proximity + 0.2 × availability + 0.1 × service
 *   4. Stable sort, descending; equal scores keep directory order
 *   5. Truncate to maxResults
 */

import type {
  AgentProfile,
  ClientProfile,
  Money,
  WalletService,
} from "@swapdesk/types";
import { areaType, estimateTransferTime, haversineKm } from "./geo.js";
import {
  averageResponseMinutes,
  completionRate,
  experienceLabel,
  trustScore,
  trustTier,
} from "./trust-score.js";
import type { TrustTier } from "./trust-score.js";

/**
 * Read access to agents and their current workload.
 */
export interface AgentDirectory {
  /** All agents, in a stable order */
  listAgents(): readonly AgentProfile[];

  /** Swaps assigned to the agent that are not yet terminal */
  countActiveSwaps(agentId: string): number;
}

export interface RecommendationRequest {
  readonly client: Pick<ClientProfile, "id" | "location">;
  readonly amount: Money;
  readonly targetService: WalletService;
  readonly maxResults?: number;
}

export interface AgentRecommendation {
  readonly agent: AgentProfile;
  readonly trustScore: number;
  readonly trustTier: TrustTier;
  readonly proximityScore: number;
  readonly availabilityScore: number;
  readonly serviceScore: number;
  readonly recommendationScore: number;
  readonly distanceKm: number | null;
  readonly estimatedTime: string;
  readonly completionRate: number;
  readonly averageResponseMinutes: number | null;
  readonly experience: string;
}

export const RECOMMENDATION_WEIGHTS = {
  trust: 0.4,
  proximity: 0.3,
  availability: 0.2,
  service: 0.1,
} as const;

export const DEFAULT_MAX_RESULTS = 5;

/** Score when either party has no location */
const NEUTRAL_PROXIMITY = 50;

/** Every candidate serves every wallet */
const SERVICE_SCORE = 100;

export function proximityScore(distanceKm: number | null): number {
  if (distanceKm === null) return NEUTRAL_PROXIMITY;
  if (distanceKm <= 1) return 100;
  if (distanceKm <= 5) return 80;
  if (distanceKm <= 10) return 60;
  if (distanceKm <= 20) return 40;
  return 20;
}

export function availabilityScore(activeSwaps: number): number {
  if (activeSwaps <= 0) return 100;
  if (activeSwaps === 1) return 80;
  if (activeSwaps === 2) return 60;
  if (activeSwaps === 3) return 40;
  return 20;
}

export function combinedScore(
  trust: number,
  proximity: number,
  availability: number,
  service: number,
): number {
  return (
    RECOMMENDATION_WEIGHTS.trust * trust +
    RECOMMENDATION_WEIGHTS.proximity * proximity +
    RECOMMENDATION_WEIGHTS.availability * availability +
    RECOMMENDATION_WEIGHTS.service * service
  );
}

export class RecommendationEngine {
  constructor(private readonly _directory: AgentDirectory) {}

  recommend(request: RecommendationRequest): AgentRecommendation[] {
    const maxResults = request.maxResults ?? DEFAULT_MAX_RESULTS;
    if (maxResults <= 0) return [];

    const scored = this._directory
      .listAgents()
      .filter((agent) => agent.verified && agent.online)
      .map((agent) => this._score(agent, request.client));

    // Array.prototype.sort is stable
    scored.sort((a, b) => b.recommendationScore - a.recommendationScore);
    return scored.slice(0, maxResults);
  }

  private _score(
    agent: AgentProfile,
    client: RecommendationRequest["client"],
  ): AgentRecommendation {
    const distanceKm =
      agent.location !== undefined && client.location !== undefined
        ? haversineKm(client.location, agent.location)
        : null;

    const trust = trustScore(agent);
    const proximity = proximityScore(distanceKm);
    const availability = availabilityScore(
      this._directory.countActiveSwaps(agent.id),
    );

    return {
      agent,
      trustScore: trust,
      trustTier: trustTier(trust),
      proximityScore: proximity,
      availabilityScore: availability,
      serviceScore: SERVICE_SCORE,
      recommendationScore: combinedScore(trust, proximity, availability, SERVICE_SCORE),
      distanceKm,
      estimatedTime: estimateTransferTime(
        distanceKm,
        agent.location !== undefined ? areaType(agent.location.address) : "unknown",
      ),
      completionRate: completionRate(agent),
      averageResponseMinutes: averageResponseMinutes(agent),
      experience: experienceLabel(agent.completedSwaps),
    };
  }
}
