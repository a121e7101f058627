/**
 * Request logging middleware.
 *
 * Emits one entry per request after the response is built. The caller
 * decides where entries go; main.ts sends them to pino.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;

  /** X-Actor-Id of the caller, when one was sent */
  readonly actor?: string;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const actor = c.get("actor");
    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      ...(actor !== undefined ? { actor } : {}),
    };

    log(entry);
  };
}
