/**
 * Dispute routes.
 *
 * GET  /api/v1/disputes              List disputes (operator)
 * GET  /api/v1/disputes/:id          Get a single dispute
 * POST /api/v1/disputes/:id/status   investigating / escalated (operator)
 * POST /api/v1/disputes/:id/resolve  Resolve (operator)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  MoveDisputeSchema,
  PaginationQuerySchema,
  ResolveDisputeSchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";

export function createDisputeRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", validateQuery(PaginationQuerySchema), (c) => {
    const service = c.get("service");
    service.assertOperator(c.get("actor"));
    const query = c.req.valid("query");
    const sorted = [...service.lifecycle.listDisputes()].sort((a, b) =>
      `${a.openedAt}|${a.id}`.localeCompare(`${b.openedAt}|${b.id}`),
    );
    return c.json(paginate(sorted, query, (d) => `${d.openedAt}|${d.id}`, "openedAt"));
  });

  routes.get("/:id", (c) => {
    const { lifecycle } = c.get("service");
    const id = c.req.param("id");
    const dispute = lifecycle.getDispute(id);
    if (dispute === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Dispute '${id}' not found`), 404);
    }
    return c.json({ data: dispute });
  });

  routes.post("/:id/status", validateBody(MoveDisputeSchema), (c) => {
    const { lifecycle } = c.get("service");
    const body = c.req.valid("json");
    const id = c.req.param("id");
    const dispute =
      body.status === "investigating"
        ? lifecycle.markInvestigating(id, c.get("actor"))
        : lifecycle.escalateDispute(id, c.get("actor"));
    return c.json({ data: dispute });
  });

  routes.post("/:id/resolve", validateBody(ResolveDisputeSchema), (c) => {
    const { lifecycle } = c.get("service");
    const body = c.req.valid("json");
    const result = lifecycle.resolveDispute(
      c.req.param("id"),
      c.get("actor"),
      body.resolution,
      body.outcome,
    );
    return c.json({ data: result });
  });

  return routes;
}
