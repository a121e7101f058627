/**
 * Health check routes.
 *
 * GET /health Liveness probe (always 200 if server is running)
 * GET /ready  Readiness probe (deep check: ledger chain integrity)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { SwapDeskService } from "../services/swapdesk-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: SwapDeskService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.checkLedger();
    const ledgerStatus: SubsystemStatus = integrity.valid
      ? { status: "ok" }
      : {
          status: "down",
          detail: `lastVerifiedIndex=${integrity.lastVerifiedIndex}, errors=${integrity.errors.length}`,
        };
    const ready = service.isReady() && integrity.valid;

    const body = {
      status: ready ? "ready" : "not_ready",
      subsystems: { ledger: ledgerStatus },
      timestamp: new Date().toISOString(),
    };
    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
