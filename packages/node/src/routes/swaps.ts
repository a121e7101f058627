/**
 * Swap lifecycle routes.
 *
 * POST   /api/v1/swaps                         Request a swap (actor = client)
 * GET    /api/v1/swaps                         List swaps (cursor pagination)
 * GET    /api/v1/swaps/by-reference/:reference Look up by reference
 * GET    /api/v1/swaps/:id                     Get a single swap
 * POST   /api/v1/swaps/:id/accept              Agent accepts
 * POST   /api/v1/swaps/:id/reject              Agent rejects
 * POST   /api/v1/swaps/:id/cancel              Client cancels
 * POST   /api/v1/swaps/:id/client-proof        Client payment proof
 * POST   /api/v1/swaps/:id/agent-proof         Agent transfer proof
 * POST   /api/v1/swaps/:id/complete            Complete after agent proof
 * GET    /api/v1/swaps/:id/proofs              Proofs for a swap
 * POST   /api/v1/swaps/:id/disputes            Open a dispute
 * GET    /api/v1/swaps/:id/disputes            Disputes for a swap
 * POST   /api/v1/swaps/:id/rating              Client rates the agent
 */

import { Hono } from "hono";
import type { SwapRequest } from "@swapdesk/types";
import type { ProofInput, WriteOptions } from "@swapdesk/swap";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateSwapSchema,
  ListSwapsQuerySchema,
  OpenDisputeSchema,
  RateAgentSchema,
  SubmitProofSchema,
  SwapReasonSchema,
  SwapWriteSchema,
} from "../types/dto.js";
import type { SubmitProofDto } from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";

function writeOptions(body: { expectedVersion?: number | undefined }): WriteOptions {
  return body.expectedVersion !== undefined ? { expectedVersion: body.expectedVersion } : {};
}

function toProofInput(body: SubmitProofDto): ProofInput {
  return body.kind === "sms"
    ? { kind: "sms", text: body.text }
    : { kind: "image", bytes: Buffer.from(body.imageBase64, "base64") };
}

/** Creation order, with the id breaking ties */
function swapCursorKey(swap: SwapRequest): string {
  return `${swap.createdAt}|${swap.id}`;
}

export function createSwapRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/swaps: Request
  routes.post("/", validateBody(CreateSwapSchema), (c) => {
    const { lifecycle } = c.get("service");
    const body = c.req.valid("json");

    const swap = lifecycle.createSwap({
      clientId: c.get("actor"),
      amount: body.amount,
      fromService: body.fromService,
      toService: body.toService,
      destNumber: body.destNumber,
      ...(body.agentId !== undefined ? { agentId: body.agentId } : {}),
    });

    return c.json({ data: swap }, 201);
  });

  // GET /api/v1/swaps: List
  routes.get("/", validateQuery(ListSwapsQuerySchema), (c) => {
    const { lifecycle } = c.get("service");
    const query = c.req.valid("query");

    const swaps = lifecycle.listSwaps({
      ...(query.status !== undefined ? { status: query.status } : {}),
      ...(query.clientId !== undefined ? { clientId: query.clientId } : {}),
      ...(query.agentId !== undefined ? { agentId: query.agentId } : {}),
    });
    const sorted = [...swaps].sort((a, b) => swapCursorKey(a).localeCompare(swapCursorKey(b)));

    return c.json(
      paginate(sorted, { cursor: query.cursor, limit: query.limit }, swapCursorKey, "createdAt"),
    );
  });

  // GET /api/v1/swaps/by-reference/:reference
  routes.get("/by-reference/:reference", (c) => {
    const { lifecycle } = c.get("service");
    const reference = c.req.param("reference");
    const swap = lifecycle.getSwapByReference(reference);

    if (swap === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Swap with reference '${reference}' not found`),
        404,
      );
    }
    return c.json({ data: swap });
  });

  // GET /api/v1/swaps/:id
  routes.get("/:id", (c) => {
    const { lifecycle } = c.get("service");
    const id = c.req.param("id");
    const swap = lifecycle.getSwap(id);

    if (swap === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Swap '${id}' not found`), 404);
    }
    return c.json({ data: swap });
  });

  // ─── Agent response ─────────────────────────────────────────────

  routes.post("/:id/accept", validateBody(SwapWriteSchema), (c) => {
    const { lifecycle } = c.get("service");
    const body = c.req.valid("json");
    const swap = lifecycle.acceptSwap(c.req.param("id"), c.get("actor"), writeOptions(body));
    return c.json({ data: swap });
  });

  routes.post("/:id/reject", validateBody(SwapReasonSchema), (c) => {
    const { lifecycle } = c.get("service");
    const body = c.req.valid("json");
    const swap = lifecycle.rejectSwap(
      c.req.param("id"),
      c.get("actor"),
      body.reason,
      writeOptions(body),
    );
    return c.json({ data: swap });
  });

  routes.post("/:id/cancel", validateBody(SwapReasonSchema), (c) => {
    const { lifecycle } = c.get("service");
    const body = c.req.valid("json");
    const swap = lifecycle.cancelSwap(
      c.req.param("id"),
      c.get("actor"),
      body.reason,
      writeOptions(body),
    );
    return c.json({ data: swap });
  });

  // ─── Proofs ─────────────────────────────────────────────────────

  routes.post("/:id/client-proof", validateBody(SubmitProofSchema), (c) => {
    const { lifecycle } = c.get("service");
    const body = c.req.valid("json");
    const result = lifecycle.submitClientProof(
      c.req.param("id"),
      c.get("actor"),
      toProofInput(body),
      writeOptions(body),
    );
    return c.json({ data: result }, 201);
  });

  routes.post("/:id/agent-proof", validateBody(SubmitProofSchema), (c) => {
    const { lifecycle } = c.get("service");
    const body = c.req.valid("json");
    const result = lifecycle.submitAgentProof(
      c.req.param("id"),
      c.get("actor"),
      toProofInput(body),
      writeOptions(body),
    );
    return c.json({ data: result }, 201);
  });

  routes.post("/:id/complete", validateBody(SwapWriteSchema), (c) => {
    const { lifecycle } = c.get("service");
    const body = c.req.valid("json");
    const swap = lifecycle.completeSwap(c.req.param("id"), c.get("actor"), writeOptions(body));
    return c.json({ data: swap });
  });

  routes.get("/:id/proofs", (c) => {
    const { lifecycle } = c.get("service");
    const id = c.req.param("id");
    if (lifecycle.getSwap(id) === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Swap '${id}' not found`), 404);
    }
    return c.json({ data: lifecycle.listProofs(id) });
  });

  // ─── Disputes & rating ──────────────────────────────────────────

  routes.post("/:id/disputes", validateBody(OpenDisputeSchema), (c) => {
    const { lifecycle } = c.get("service");
    const body = c.req.valid("json");
    const result = lifecycle.openDispute(
      c.req.param("id"),
      c.get("actor"),
      body.reason,
      body.severity,
      writeOptions(body),
    );
    return c.json({ data: result }, 201);
  });

  routes.get("/:id/disputes", (c) => {
    const { lifecycle } = c.get("service");
    const id = c.req.param("id");
    if (lifecycle.getSwap(id) === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Swap '${id}' not found`), 404);
    }
    return c.json({ data: lifecycle.listDisputes(id) });
  });

  routes.post("/:id/rating", validateBody(RateAgentSchema), (c) => {
    const { lifecycle } = c.get("service");
    const body = c.req.valid("json");
    const agent = lifecycle.rateAgent(c.req.param("id"), c.get("actor"), body.rating);
    return c.json({ data: agent });
  });

  return routes;
}
