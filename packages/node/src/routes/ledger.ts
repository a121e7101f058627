/**
 * Audit ledger routes.
 *
 * GET  /api/v1/ledger/status  Block/event counts and chain health
 * GET  /api/v1/ledger/verify  Full integrity report
 * GET  /api/v1/ledger/events  Events (cursor pagination by sequence)
 * POST /api/v1/ledger/events  Record a business event (operator)
 * POST /api/v1/ledger/seal    Seal the open block (operator)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ListLedgerEventsQuerySchema,
  RecordLedgerEventSchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { paginate } from "../types/pagination.js";

/** Zero-padded so string order matches numeric order */
function sequenceKey(sequence: number): string {
  return sequence.toString().padStart(12, "0");
}

export function createLedgerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/status", (c) => {
    return c.json({ data: c.get("service").ledger.getStatus() });
  });

  routes.get("/verify", (c) => {
    const integrity = c.get("service").checkLedger();
    return c.json({ data: integrity });
  });

  routes.get("/events", validateQuery(ListLedgerEventsQuerySchema), (c) => {
    const { ledger } = c.get("service");
    const query = c.req.valid("query");
    const events = ledger.listEvents({
      ...(query.entityRef !== undefined ? { entityRef: query.entityRef } : {}),
      ...(query.eventType !== undefined ? { eventType: query.eventType } : {}),
    });
    return c.json(
      paginate(
        events,
        { cursor: query.cursor, limit: query.limit },
        (event) => sequenceKey(event.sequence),
        "sequence",
      ),
    );
  });

  routes.post("/events", validateBody(RecordLedgerEventSchema), (c) => {
    const service = c.get("service");
    const actor = c.get("actor");
    service.assertOperator(actor);
    const body = c.req.valid("json");
    const event = service.lifecycle.recordLedgerEvent({
      eventType: body.eventType,
      entityRef: body.entityRef,
      payload: body.payload,
      actor,
      ...(body.signature !== undefined ? { signature: body.signature } : {}),
    });
    return c.json({ data: event }, 201);
  });

  routes.post("/seal", (c) => {
    const service = c.get("service");
    service.assertOperator(c.get("actor"));
    const sealed = service.sealLedgerBlock();
    return c.json({ data: { sealed: sealed ?? null } });
  });

  return routes;
}
