/**
 * Global error handler.
 *
 * Catches errors thrown by route handlers and produces a consistent
 * error envelope. Domain errors map to HTTP statuses by code; anything
 * else is a 500 with no internal detail.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { Logger } from "pino";
import { SwapError } from "@swapdesk/swap";
import type { SwapErrorCode } from "@swapdesk/swap";
import { LedgerError } from "@swapdesk/event-ledger";
import type { LedgerErrorCode } from "@swapdesk/event-ledger";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500;

const STATUS_MAP: Record<SwapErrorCode | LedgerErrorCode, ErrorStatus> = {
  // Swap errors
  VALIDATION_ERROR: 400,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  DUPLICATE_DISPUTE: 409,
  CAPACITY_EXCEEDED: 422,
  AGENT_UNAVAILABLE: 422,

  // Ledger errors
  INVALID_EVENT: 400,
  INVALID_PAYLOAD: 400,
  BLOCK_NOT_OPEN: 409,
  INTEGRITY_VIOLATION: 500,
};

// =============================================================================
// Handler
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  if (err instanceof SwapError || err instanceof LedgerError) {
    const status = STATUS_MAP[err.code];
    if (status === 500) {
      return c.json(createErrorEnvelope(err.code, "Internal server error"), 500);
    }
    const details = err instanceof SwapError ? err.details : undefined;
    return c.json(createErrorEnvelope(err.code, err.message, details), status);
  }

  // Malformed JSON bodies surface as HTTPException(400) from the validator
  if (err instanceof HTTPException) {
    if (err.status === 400) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"), 400);
    }
    return err.getResponse();
  }

  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}

/**
 * handleError that also logs unexpected failures.
 */
export function createErrorHandler(
  logger: Logger,
): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    const response = handleError(err, c);
    if (response.status >= 500) {
      logger.error(
        { err, requestId: c.get("requestId"), method: c.req.method, path: c.req.path },
        "Request failed",
      );
    }
    return response;
  };
}
