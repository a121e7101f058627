/**
 * @swapdesk/event-ledger: Core types.
 *
 * The ledger is a chain of blocks. Each block holds event summaries and
 * links to its predecessor by hash:
 *
 *   block[0].previousHash = ZERO_HASH            (genesis)
 *   block[n].previousHash = block[n-1].hash
 *
 * Only the newest block is open. Sealing a block fixes its hash and
 * opens the next one. Events are immutable once appended.
 */

import type { LedgerEventType } from "./event-types.js";

// =============================================================================
// Events & Blocks
// =============================================================================

/**
 * A business event as recorded in the ledger.
 *
 * The payload itself is not stored; only its canonical SHA-256 hash.
 */
export interface LedgerEvent {
  /** "evt" + 16 hex chars, derived from the canonical event body */
  readonly eventId: string;

  /** Position across the whole ledger (1-based, no gaps) */
  readonly sequence: number;

  readonly eventType: LedgerEventType;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** What the event is about (swap reference, agent id, ...) */
  readonly entityRef: string;

  /** SHA-256 hex of the RFC 8785 canonical payload */
  readonly payloadHash: string;

  /** Who caused the event */
  readonly actor: string;

  readonly signature?: string;
}

export interface LedgerBlock {
  readonly index: number;
  readonly openedAt: string;

  /** Null while the block is open */
  readonly sealedAt: string | null;

  readonly previousHash: string;

  /** Null while the block is open */
  readonly hash: string | null;

  readonly events: readonly LedgerEvent[];
}

/**
 * An event that has been validated and hashed but not yet appended.
 * Sequence and id are assigned at commit time.
 */
export interface PreparedEvent {
  readonly eventType: LedgerEventType;
  readonly timestamp: string;
  readonly entityRef: string;
  readonly payloadHash: string;
  readonly actor: string;
  readonly signature?: string;
}

export interface RecordEventInput {
  readonly eventType: LedgerEventType;
  readonly entityRef: string;
  /** Plain JSON object; arrays and primitives are rejected */
  readonly payload: object;
  readonly actor: string;
  readonly signature?: string;
}

// =============================================================================
// Status & Integrity
// =============================================================================

export interface LedgerStatus {
  readonly latestIndex: number;
  readonly totalBlocks: number;
  readonly totalEvents: number;
  readonly integrityOk: boolean;
}

export interface IntegrityError {
  readonly blockIndex: number;
  readonly reason: string;
}

export interface LedgerIntegrityResult {
  readonly valid: boolean;

  /** Index of the last block that passed every check, -1 if none */
  readonly lastVerifiedIndex: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Store
// =============================================================================

/**
 * Persistence for ledger blocks.
 *
 * Writes are append-only: new blocks, new events on the open block,
 * and a one-time seal per block. Implementations throw on I/O failure
 * and must leave their state unchanged when they do.
 */
export interface LedgerStore {
  /** All blocks in index order */
  loadBlocks(): readonly LedgerBlock[];

  /** Append a new block (genesis, or the next open block) */
  appendBlock(block: LedgerBlock): void;

  /** Append events to the open block */
  appendEvents(blockIndex: number, events: readonly LedgerEvent[]): void;

  /** Seal a block with its final hash */
  sealBlock(blockIndex: number, sealedAt: string, hash: string): void;
}

// =============================================================================
// Errors
// =============================================================================

export type LedgerErrorCode =
  | "INVALID_EVENT"
  | "INVALID_PAYLOAD"
  | "BLOCK_NOT_OPEN"
  | "INTEGRITY_VIOLATION";

/**
 * Error thrown by ledger operations.
 *
 * INTEGRITY_VIOLATION is an alerting condition, distinct from
 * ordinary input errors.
 */
export class LedgerError extends Error {
  constructor(
    public readonly code: LedgerErrorCode,
    message: string,
    public readonly integrity?: LedgerIntegrityResult,
  ) {
    super(message);
    this.name = "LedgerError";
  }
}
