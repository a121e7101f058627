/**
 * Proof review.
 *
 * POST /api/v1/proofs/:id/review Operator verifies or rejects a proof
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ReviewProofSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createProofRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/:id/review", validateBody(ReviewProofSchema), (c) => {
    const { lifecycle } = c.get("service");
    const body = c.req.valid("json");
    const result = lifecycle.reviewProof(c.req.param("id"), c.get("actor"), body.decision);
    return c.json({ data: result });
  });

  return routes;
}
