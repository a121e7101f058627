/**
 * Client routes.
 *
 * POST /api/v1/clients      Register a client
 * GET  /api/v1/clients/:id  Get a single client
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RegisterClientSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createClientRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(RegisterClientSchema), (c) => {
    const { lifecycle } = c.get("service");
    const client = lifecycle.registerClient(c.req.valid("json"));
    return c.json({ data: client }, 201);
  });

  routes.get("/:id", (c) => {
    const { lifecycle } = c.get("service");
    const id = c.req.param("id");
    const client = lifecycle.getClient(id);
    if (client === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Client '${id}' not found`), 404);
    }
    return c.json({ data: client });
  });

  return routes;
}
