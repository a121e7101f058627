/**
 * Tests for the audit ledger routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CLIENT, OPERATOR, createTestApp, jsonRequest } from "./setup.js";
import type { TestApp } from "./setup.js";

let instance: TestApp;

beforeEach(() => {
  instance = createTestApp();
});

interface EventBody {
  eventId: string;
  sequence: number;
  eventType: string;
  entityRef: string;
  actor: string;
  signature?: string;
}

function recordEvent(entityRef: string, signature?: string): Request {
  return jsonRequest(
    "/api/v1/ledger/events",
    "POST",
    {
      eventType: "AGENT_RATED",
      entityRef,
      payload: { agentId: entityRef, rating: 4 },
      ...(signature !== undefined ? { signature } : {}),
    },
    OPERATOR,
  );
}

// =============================================================================
// Status & verification
// =============================================================================

describe("GET /api/v1/ledger/status", () => {
  it("reports the genesis block and the open block", async () => {
    const { app } = instance;
    const res = await app.request(jsonRequest("/api/v1/ledger/status", "GET", undefined, CLIENT));

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({
      latestIndex: 1,
      totalBlocks: 2,
      totalEvents: 0,
      integrityOk: true,
    });
  });
});

describe("GET /api/v1/ledger/verify", () => {
  it("returns a clean integrity report", async () => {
    const { app } = instance;
    await app.request(recordEvent("agent-1"));
    await app.request(jsonRequest("/api/v1/ledger/seal", "POST", {}, OPERATOR));

    const res = await app.request(jsonRequest("/api/v1/ledger/verify", "GET", undefined, CLIENT));

    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({ valid: true, lastVerifiedIndex: 2, errors: [] });
  });
});

// =============================================================================
// Recording
// =============================================================================

describe("POST /api/v1/ledger/events", () => {
  it("records an event with the caller as actor", async () => {
    const { app } = instance;
    const res = await app.request(recordEvent("agent-1", "sig-placeholder"));

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: EventBody };
    expect(body.data).toMatchObject({
      sequence: 1,
      eventType: "AGENT_RATED",
      entityRef: "agent-1",
      actor: OPERATOR,
      signature: "sig-placeholder",
    });
    expect(body.data.eventId).toMatch(/^evt[0-9a-f]{16}$/);
  });

  it("returns 403 for non-operators", async () => {
    const { app } = instance;
    const res = await app.request(
      jsonRequest(
        "/api/v1/ledger/events",
        "POST",
        { eventType: "AGENT_RATED", entityRef: "agent-1", payload: {} },
        CLIENT,
      ),
    );

    expect(res.status).toBe(403);
  });

  it("rejects unknown event types", async () => {
    const { app } = instance;
    const res = await app.request(
      jsonRequest(
        "/api/v1/ledger/events",
        "POST",
        { eventType: "SWAP_TELEPORTED", entityRef: "agent-1", payload: {} },
        OPERATOR,
      ),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });

  it("returns 400 INVALID_EVENT for a blank entity reference", async () => {
    const { app } = instance;
    const res = await app.request(recordEvent("   "));

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toMatchObject({
      code: "INVALID_EVENT",
      message: "entityRef must not be empty",
    });
  });
});

// =============================================================================
// Listing & sealing
// =============================================================================

describe("GET /api/v1/ledger/events", () => {
  it("pages through events in sequence order", async () => {
    const { app } = instance;
    for (const ref of ["agent-1", "agent-2", "agent-3"]) {
      await app.request(recordEvent(ref));
    }

    const first = await app.request(jsonRequest("/api/v1/ledger/events?limit=2", "GET", undefined, CLIENT));
    const page1 = (await first.json()) as {
      data: EventBody[];
      pagination: { cursor: string | null; hasMore: boolean };
    };
    expect(page1.data.map((e) => e.sequence)).toEqual([1, 2]);
    expect(page1.pagination.hasMore).toBe(true);

    const second = await app.request(
      jsonRequest(`/api/v1/ledger/events?limit=2&cursor=${page1.pagination.cursor}`, "GET", undefined, CLIENT),
    );
    const page2 = (await second.json()) as { data: EventBody[]; pagination: { hasMore: boolean } };
    expect(page2.data.map((e) => e.entityRef)).toEqual(["agent-3"]);
    expect(page2.pagination.hasMore).toBe(false);
  });

  it("filters by entity reference", async () => {
    const { app } = instance;
    await app.request(recordEvent("agent-1"));
    await app.request(recordEvent("agent-2"));

    const res = await app.request(
      jsonRequest("/api/v1/ledger/events?entityRef=agent-2", "GET", undefined, CLIENT),
    );
    const body = (await res.json()) as { data: EventBody[] };
    expect(body.data.map((e) => e.sequence)).toEqual([2]);
  });

  it("rejects an unknown event type filter", async () => {
    const { app } = instance;
    const res = await app.request(
      jsonRequest("/api/v1/ledger/events?eventType=NOPE", "GET", undefined, CLIENT),
    );

    expect(res.status).toBe(400);
  });
});

describe("POST /api/v1/ledger/seal", () => {
  it("seals the open block once", async () => {
    const { app } = instance;
    await app.request(recordEvent("agent-1"));

    const res = await app.request(jsonRequest("/api/v1/ledger/seal", "POST", {}, OPERATOR));
    const body = (await res.json()) as {
      data: { sealed: { index: number; hash: string; events: EventBody[] } | null };
    };
    expect(body.data.sealed?.index).toBe(1);
    expect(body.data.sealed?.hash).toMatch(/^[0-9a-f]{64}$/);
    expect(body.data.sealed?.events).toHaveLength(1);

    const again = await app.request(jsonRequest("/api/v1/ledger/seal", "POST", {}, OPERATOR));
    const empty = (await again.json()) as { data: { sealed: unknown } };
    expect(empty.data.sealed).toBeNull();
  });

  it("returns 403 for non-operators", async () => {
    const { app } = instance;
    const res = await app.request(jsonRequest("/api/v1/ledger/seal", "POST", {}, CLIENT));

    expect(res.status).toBe(403);
  });
});
