/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import { CLIENT, createTestApp, jsonRequest } from "../setup.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({}, { logFn: (entry) => entries.push(entry) });

    await app.request("/health");

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ method: "GET", path: "/health", status: 200 });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
    expect(entries[0]?.requestId).toBeDefined();
    expect(entries[0]?.actor).toBeUndefined();
  });

  it("records the actor and status of API calls", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({}, { logFn: (entry) => entries.push(entry) });

    await app.request(
      jsonRequest(
        "/api/v1/clients",
        "POST",
        { id: CLIENT, displayName: "Client One", phone: "0999000001" },
        CLIENT,
      ),
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ method: "POST", status: 201, actor: CLIENT });
  });

  it("logs rejected requests", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({}, { logFn: (entry) => entries.push(entry) });

    await app.request(jsonRequest("/api/v1/clients/nobody"));

    expect(entries[0]?.status).toBe(401);
  });
});
