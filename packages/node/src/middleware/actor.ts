/**
 * Actor middleware.
 *
 * Reads the caller identity from X-Actor-Id. Authentication happens in
 * front of this service; the header is trusted as given. Requests
 * without it are rejected with 401.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const ACTOR_HEADER = "X-Actor-Id";

export function actorMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const actor = c.req.header(ACTOR_HEADER)?.trim();
    if (actor === undefined || actor === "") {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `Missing ${ACTOR_HEADER} header`),
        401,
      );
    }
    c.set("actor", actor);
    await next();
  };
}
