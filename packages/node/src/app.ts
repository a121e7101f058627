/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from
 * main.ts so tests can build the app without starting a server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { SwapDeskService } from "./services/swapdesk-service.js";
import type { SwapDeskServiceConfig } from "./services/swapdesk-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { actorMiddleware } from "./middleware/actor.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAgentRoutes } from "./routes/agents.js";
import { createClientRoutes } from "./routes/clients.js";
import { createRecommendationRoutes } from "./routes/recommendations.js";
import { createSwapRoutes } from "./routes/swaps.js";
import { createProofRoutes } from "./routes/proofs.js";
import { createDisputeRoutes } from "./routes/disputes.js";
import { createLedgerRoutes } from "./routes/ledger.js";
import { createReportRoutes } from "./routes/reports.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Prebuilt service; otherwise one is built from `serviceConfig` */
  readonly service?: SwapDeskService;
  readonly serviceConfig?: SwapDeskServiceConfig;

  readonly logFn?: (entry: RequestLogEntry) => void;

  /** Receives unexpected (500) failures */
  readonly logger?: Logger;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: SwapDeskService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const service = options.service ?? new SwapDeskService(options.serviceConfig);
  service.initialize();

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger ?? pino({ level: "silent" })));

  // ─── Health Routes (no actor required) ──────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", actorMiddleware());
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/agents", createAgentRoutes());
  app.route("/api/v1/clients", createClientRoutes());
  app.route("/api/v1/recommendations", createRecommendationRoutes());
  app.route("/api/v1/swaps", createSwapRoutes());
  app.route("/api/v1/proofs", createProofRoutes());
  app.route("/api/v1/disputes", createDisputeRoutes());
  app.route("/api/v1/ledger", createLedgerRoutes());
  app.route("/api/v1/reports", createReportRoutes());

  return { app, service };
}
