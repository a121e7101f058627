/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - GET /ready reflects ledger chain integrity
 * - X-Request-Id is set on responses
 */

import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { AGENT, OPERATOR, createTestApp, jsonRequest, seedParties } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(body.timestamp).toBeDefined();
  });

  it("does not need an actor", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/health"));

    expect(res.status).toBe(200);
  });

  it("includes X-Request-Id header", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, undefined, {
        "X-Request-Id": "test-req-123",
      }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("replaces an oversized X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, undefined, {
        "X-Request-Id": "r".repeat(129),
      }),
    );

    expect(res.headers.get("X-Request-Id")).not.toBe("r".repeat(129));
  });
});

describe("GET /ready", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir !== undefined) {
      rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it("returns 200 ready with a healthy ledger", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);

    const body = (await res.json()) as {
      status: string;
      subsystems: { ledger: { status: string } };
    };
    expect(body.status).toBe("ready");
    expect(body.subsystems.ledger).toEqual({ status: "ok" });
  });

  it("returns 503 after the service stops", async () => {
    const { app, service } = createTestApp();
    await service.stop();

    const res = await app.request("/ready");
    expect(res.status).toBe(503);

    const body = (await res.json()) as { status: string };
    expect(body.status).toBe("not_ready");
  });

  it("returns 503 when a sealed block on disk was altered", async () => {
    dir = mkdtempSync(join(tmpdir(), "swapdesk-ledger-"));
    const ledgerFile = join(dir, "ledger.jsonl");

    const first = createTestApp({ ledgerFile });
    await seedParties(first);
    await first.app.request(jsonRequest("/api/v1/ledger/seal", "POST", {}, OPERATOR));

    const original = readFileSync(ledgerFile, "utf-8");
    expect(original).toContain(`"entityRef":"${AGENT}"`);
    writeFileSync(ledgerFile, original.replaceAll(`"entityRef":"${AGENT}"`, '"entityRef":"agent-9"'));

    const reopened = createTestApp({ ledgerFile });
    expect(reopened.service.isReady()).toBe(false);

    const res = await reopened.app.request("/ready");
    expect(res.status).toBe(503);
    const body = (await res.json()) as {
      status: string;
      subsystems: { ledger: { status: string; detail: string } };
    };
    expect(body.status).toBe("not_ready");
    expect(body.subsystems.ledger.status).toBe("down");
    expect(body.subsystems.ledger.detail).toMatch(/^lastVerifiedIndex=0, errors=[1-9]\d*$/);
  });
});

describe("unknown routes", () => {
  it("returns 404 under /api", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/nonexistent", "GET", undefined, OPERATOR));

    expect(res.status).toBe(404);
  });

  it("asks for an actor before routing", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/nonexistent");

    expect(res.status).toBe(401);
  });
});
