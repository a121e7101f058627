/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect, vi } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import pino from "pino";
import { SwapError } from "@swapdesk/swap";
import { LedgerError } from "@swapdesk/event-ledger";
import type { AppEnv } from "../../src/types/api-contract.js";
import { createErrorHandler, handleError } from "../../src/middleware/error-handler.js";
import { requestIdMiddleware } from "../../src/middleware/request-id.js";

function appThrowing(err: Error): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.use("*", requestIdMiddleware());
  app.onError(handleError);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

describe("handleError", () => {
  it.each([
    ["VALIDATION_ERROR", 400],
    ["FORBIDDEN", 403],
    ["NOT_FOUND", 404],
    ["INVALID_TRANSITION", 409],
    ["DUPLICATE_DISPUTE", 409],
    ["CAPACITY_EXCEEDED", 422],
    ["AGENT_UNAVAILABLE", 422],
  ] as const)("maps %s to %i", async (code, status) => {
    const res = await appThrowing(new SwapError(code, "nope")).request("/boom");

    expect(res.status).toBe(status);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code, message: "nope" });
  });

  it("includes swap error details", async () => {
    const res = await appThrowing(
      new SwapError("VALIDATION_ERROR", "Amount too small", { field: "amount" }),
    ).request("/boom");

    const body = (await res.json()) as { error: { details: unknown } };
    expect(body.error.details).toEqual({ field: "amount" });
  });

  it("maps ledger input errors to 400", async () => {
    const res = await appThrowing(new LedgerError("INVALID_PAYLOAD", "Payload must be a plain object")).request(
      "/boom",
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("INVALID_PAYLOAD");
  });

  it("hides integrity violation details", async () => {
    const res = await appThrowing(
      new LedgerError("INTEGRITY_VIOLATION", "Ledger integrity violated at block 3: Hash mismatch"),
    ).request("/boom");

    expect(res.status).toBe(500);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code: "INTEGRITY_VIOLATION", message: "Internal server error" });
  });

  it("turns a 400 HTTPException into a validation error", async () => {
    const res = await appThrowing(new HTTPException(400, { message: "Malformed JSON" })).request("/boom");

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code: "VALIDATION_ERROR", message: "Invalid JSON in request body" });
  });

  it("passes other HTTPExceptions through", async () => {
    const res = await appThrowing(new HTTPException(413, { message: "Too large" })).request("/boom");

    expect(res.status).toBe(413);
  });

  it("returns 500 INTERNAL_ERROR for unknown errors", async () => {
    const res = await appThrowing(new Error("database exploded")).request("/boom");

    expect(res.status).toBe(500);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code: "INTERNAL_ERROR", message: "Internal server error" });
  });
});

describe("createErrorHandler", () => {
  it("logs only server errors", async () => {
    const logger = pino({ level: "silent" });
    const spy = vi.spyOn(logger, "error");

    const app = new Hono<AppEnv>();
    app.use("*", requestIdMiddleware());
    app.onError(createErrorHandler(logger));
    app.get("/missing", () => {
      throw new SwapError("NOT_FOUND", "gone");
    });
    app.get("/crash", () => {
      throw new Error("database exploded");
    });

    await app.request("/missing");
    expect(spy).not.toHaveBeenCalled();

    await app.request("/crash");
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0]?.[1]).toBe("Request failed");
  });
});
