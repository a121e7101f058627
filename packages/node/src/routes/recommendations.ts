/**
 * Agent recommendations for the calling client.
 *
 * GET /api/v1/recommendations?amount=1000&toService=AIRTEL&limit=5
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RecommendationQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";

export function createRecommendationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", validateQuery(RecommendationQuerySchema), (c) => {
    const { lifecycle } = c.get("service");
    const query = c.req.valid("query");
    const recommendations = lifecycle.recommend(
      c.get("actor"),
      query.amount,
      query.toService,
      query.limit,
    );
    return c.json({ data: recommendations });
  });

  return routes;
}
