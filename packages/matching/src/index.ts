/**
 * @swapdesk/matching
 *
 * Trust scoring for agents and ranking of agents for a client request.
 *
 * @packageDocumentation
 */

export {
  trustScore,
  trustBreakdown,
  trustTier,
  experienceLabel,
  averageResponseMinutes,
  completionRate,
  averageRating,
  TRUST_WEIGHTS,
} from "./trust-score.js";
export type { AgentStats, TrustTier, TrustBreakdown } from "./trust-score.js";

export {
  haversineKm,
  areaType,
  estimateTransferTime,
  EARTH_RADIUS_KM,
  AREA_SPEEDS,
} from "./geo.js";
export type { AreaType } from "./geo.js";

export {
  RecommendationEngine,
  proximityScore,
  availabilityScore,
  combinedScore,
  RECOMMENDATION_WEIGHTS,
  DEFAULT_MAX_RESULTS,
} from "./recommendation.js";
export type {
  AgentDirectory,
  RecommendationRequest,
  AgentRecommendation,
} from "./recommendation.js";
