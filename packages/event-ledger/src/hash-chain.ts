/**
 * @swapdesk/event-ledger: Block hashing and chain verification.
 *
 * Hashes use RFC 8785 (JCS) canonicalization + SHA-256:
 *
 *   eventId    = "evt" + sha256(canonicalize(eventBody))[0..16]
 *   block.hash = sha256(canonicalize(blockHeader + eventSummaries))
 *
 * A block's header includes its predecessor's hash, so changing any
 * sealed block breaks every link after it.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  IntegrityError,
  LedgerBlock,
  LedgerEvent,
  LedgerIntegrityResult,
} from "./types.js";

/** `previousHash` of the genesis block */
export const ZERO_HASH = "0".repeat(64);

export const EVENT_ID_PREFIX = "evt";

function sha256(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

/**
 * Hash a payload after canonicalization. Key order never matters.
 */
export function hashPayload(payload: object): string {
  return sha256(canonicalize(payload));
}

type EventBody = Omit<LedgerEvent, "eventId">;

function eventBody(event: EventBody): Record<string, unknown> {
  const body: Record<string, unknown> = {
    sequence: event.sequence,
    eventType: event.eventType,
    timestamp: event.timestamp,
    entityRef: event.entityRef,
    payloadHash: event.payloadHash,
    actor: event.actor,
  };
  if (event.signature !== undefined) {
    body["signature"] = event.signature;
  }
  return body;
}

export function computeEventId(event: EventBody): string {
  return EVENT_ID_PREFIX + sha256(canonicalize(eventBody(event))).slice(0, 16);
}

/**
 * Compute the hash of a block as it will be (or was) sealed.
 *
 * Covers index, timestamps, previous hash and every event summary.
 */
export function computeBlockHash(
  block: Pick<LedgerBlock, "index" | "openedAt" | "previousHash" | "events">,
  sealedAt: string,
): string {
  return sha256(
    canonicalize({
      index: block.index,
      openedAt: block.openedAt,
      sealedAt,
      previousHash: block.previousHash,
      events: block.events.map((e) => ({ eventId: e.eventId, ...eventBody(e) })),
    }),
  );
}

/**
 * Verify a chain of blocks in index order.
 *
 * Checks:
 * - indexes start at 0 and have no gaps
 * - genesis links to ZERO_HASH, every other block to its predecessor's hash
 * - every event id matches its recomputed value
 * - every sealed block's hash matches its recomputed value
 * - only the last block may be open
 *
 * An empty chain is valid.
 */
export function verifyChain(
  blocks: readonly LedgerBlock[],
): LedgerIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedIndex = -1;
  let expectedPrevious = ZERO_HASH;

  blocks.forEach((block, position) => {
    const before = errors.length;

    if (block.index !== position) {
      errors.push({
        blockIndex: block.index,
        reason: `Block index ${block.index} at position ${position}`,
      });
    }

    if (block.previousHash !== expectedPrevious) {
      errors.push({
        blockIndex: block.index,
        reason: `previousHash mismatch: expected "${expectedPrevious}", got "${block.previousHash}"`,
      });
    }

    for (const event of block.events) {
      const recomputed = computeEventId(event);
      if (recomputed !== event.eventId) {
        errors.push({
          blockIndex: block.index,
          reason: `Event id mismatch for sequence ${event.sequence}: expected "${recomputed}", got "${event.eventId}"`,
        });
      }
    }

    if (block.hash === null || block.sealedAt === null) {
      if (position !== blocks.length - 1) {
        errors.push({
          blockIndex: block.index,
          reason: "Unsealed block before the end of the chain",
        });
      }
    } else {
      const recomputed = computeBlockHash(block, block.sealedAt);
      if (recomputed !== block.hash) {
        errors.push({
          blockIndex: block.index,
          reason: `Hash mismatch: expected "${recomputed}", got "${block.hash}"`,
        });
      }
      expectedPrevious = block.hash;
    }

    if (errors.length === before && lastVerifiedIndex === position - 1) {
      lastVerifiedIndex = position;
    }
  });

  return {
    valid: errors.length === 0,
    lastVerifiedIndex,
    errors,
  };
}
