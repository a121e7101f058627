/**
 * Route barrel.
 */

export { createHealthRoutes } from "./health.js";
export { createAgentRoutes } from "./agents.js";
export { createClientRoutes } from "./clients.js";
export { createRecommendationRoutes } from "./recommendations.js";
export { createSwapRoutes } from "./swaps.js";
export { createProofRoutes } from "./proofs.js";
export { createDisputeRoutes } from "./disputes.js";
export { createLedgerRoutes } from "./ledger.js";
export { createReportRoutes } from "./reports.js";
