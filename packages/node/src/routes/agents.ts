/**
 * Agent routes.
 *
 * POST /api/v1/agents                      Register an agent
 * GET  /api/v1/agents                      List agents (cursor pagination)
 * GET  /api/v1/agents/:id                  Get a single agent
 * POST /api/v1/agents/:id/verify           KYC decision (operator)
 * POST /api/v1/agents/:id/status           Go online/offline, or toggle
 * GET  /api/v1/agents/:id/invoices/:month  Monthly fee statement
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AgentStatusSchema,
  PaginationQuerySchema,
  RegisterAgentSchema,
  ReportMonthSchema,
  VerifyAgentSchema,
} from "../types/dto.js";
import { formatZodErrors, validateBody, validateQuery } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";

export function createAgentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(RegisterAgentSchema), (c) => {
    const { lifecycle } = c.get("service");
    const agent = lifecycle.registerAgent(c.req.valid("json"));
    return c.json({ data: agent }, 201);
  });

  routes.get("/", validateQuery(PaginationQuerySchema), (c) => {
    const { lifecycle } = c.get("service");
    const query = c.req.valid("query");
    const sorted = [...lifecycle.listAgents()].sort((a, b) => a.id.localeCompare(b.id));
    return c.json(paginate(sorted, query, (agent) => agent.id, "id"));
  });

  routes.get("/:id", (c) => {
    const { lifecycle } = c.get("service");
    const id = c.req.param("id");
    const agent = lifecycle.getAgent(id);
    if (agent === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Agent '${id}' not found`), 404);
    }
    return c.json({ data: agent });
  });

  routes.post("/:id/verify", validateBody(VerifyAgentSchema), (c) => {
    const { lifecycle } = c.get("service");
    const body = c.req.valid("json");
    const agent = lifecycle.verifyAgent(c.req.param("id"), c.get("actor"), body.approved, body.reason);
    return c.json({ data: agent });
  });

  routes.post("/:id/status", validateBody(AgentStatusSchema), (c) => {
    const { lifecycle } = c.get("service");
    const body = c.req.valid("json");
    const id = c.req.param("id");
    const agent =
      body.online === undefined
        ? lifecycle.toggleAgentOnline(id, c.get("actor"))
        : lifecycle.setAgentOnline(id, c.get("actor"), body.online);
    return c.json({ data: agent });
  });

  routes.get("/:id/invoices/:month", (c) => {
    const service = c.get("service");
    const id = c.req.param("id");
    const month = ReportMonthSchema.safeParse(c.req.param("month"));
    if (!month.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid month", {
          issues: formatZodErrors(month.error),
        }),
        400,
      );
    }
    service.assertSelfOrOperator(c.get("actor"), id);
    return c.json({ data: service.lifecycle.generateAgentInvoice(id, month.data) });
  });

  return routes;
}
