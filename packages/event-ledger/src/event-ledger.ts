/**
 * @swapdesk/event-ledger: EventLedger.
 *
 * Append-only audit ledger. Events land in the open block; blocks are
 * sealed with a hash over their contents and the previous block's hash.
 *
 * Recording is two-phase so a caller can append inside its own commit:
 *
 *   const prepared = ledger.prepareEvent(input);   // validate + hash, no writes
 *   ...
 *   ledger.commitEvents([prepared]);               // one store write
 *
 * `recordEvent` does both at once.
 */

import {
  computeBlockHash,
  computeEventId,
  hashPayload,
  verifyChain,
  ZERO_HASH,
} from "./hash-chain.js";
import { isLedgerEventType } from "./event-types.js";
import type { LedgerEventType } from "./event-types.js";
import type {
  LedgerBlock,
  LedgerEvent,
  LedgerIntegrityResult,
  LedgerStatus,
  LedgerStore,
  PreparedEvent,
  RecordEventInput,
} from "./types.js";
import { LedgerError } from "./types.js";

export interface EventLedgerOptions {
  readonly store: LedgerStore;

  /** Events per block before it is sealed (default: 100) */
  readonly maxEventsPerBlock?: number;

  /** Clock (default: system time) */
  readonly now?: () => Date;

  /** Alert hook, invoked before assertIntegrity() throws */
  readonly onIntegrityViolation?: (result: LedgerIntegrityResult) => void;
}

export interface LedgerEventFilter {
  readonly entityRef?: string;
  readonly eventType?: LedgerEventType;
}

const DEFAULT_MAX_EVENTS_PER_BLOCK = 100;

export class EventLedger {
  private readonly _store: LedgerStore;
  private readonly _maxEventsPerBlock: number;
  private readonly _now: () => Date;
  private readonly _onIntegrityViolation:
    | ((result: LedgerIntegrityResult) => void)
    | undefined;

  constructor(options: EventLedgerOptions) {
    const max = options.maxEventsPerBlock ?? DEFAULT_MAX_EVENTS_PER_BLOCK;
    if (!Number.isInteger(max) || max < 1) {
      throw new LedgerError(
        "INVALID_EVENT",
        `maxEventsPerBlock must be a positive integer, got ${max}`,
      );
    }
    this._store = options.store;
    this._maxEventsPerBlock = max;
    this._now = options.now ?? (() => new Date());
    this._onIntegrityViolation = options.onIntegrityViolation;
  }

  // ─── Setup ──────────────────────────────────────────────────────────

  /**
   * Create the genesis block and the first open block if the store is
   * empty. Safe to call repeatedly.
   */
  initialize(): void {
    if (this._store.loadBlocks().length > 0) {
      return;
    }
    const at = this._timestamp();
    const genesis: LedgerBlock = {
      index: 0,
      openedAt: at,
      sealedAt: at,
      previousHash: ZERO_HASH,
      hash: computeBlockHash(
        { index: 0, openedAt: at, previousHash: ZERO_HASH, events: [] },
        at,
      ),
      events: [],
    };
    this._store.appendBlock(genesis);
    this._openNext(genesis, at);
  }

  // ─── Recording ──────────────────────────────────────────────────────

  /**
   * Validate an event and hash its payload. Performs no writes.
   *
   * @throws LedgerError INVALID_EVENT / INVALID_PAYLOAD
   */
  prepareEvent(input: RecordEventInput): PreparedEvent {
    if (!isLedgerEventType(input.eventType)) {
      throw new LedgerError(
        "INVALID_EVENT",
        `Unknown event type "${String(input.eventType)}"`,
      );
    }
    if (input.entityRef.trim().length === 0) {
      throw new LedgerError("INVALID_EVENT", "entityRef must not be empty");
    }
    if (input.actor.trim().length === 0) {
      throw new LedgerError("INVALID_EVENT", "actor must not be empty");
    }

    const payload: unknown = input.payload;
    if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
      throw new LedgerError("INVALID_PAYLOAD", "Payload must be a plain object");
    }

    let payloadHash: string;
    try {
      payloadHash = hashPayload(input.payload);
    } catch (err) {
      throw new LedgerError(
        "INVALID_PAYLOAD",
        `Payload cannot be canonicalized: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const prepared: PreparedEvent = {
      eventType: input.eventType,
      timestamp: this._timestamp(),
      entityRef: input.entityRef,
      payloadHash,
      actor: input.actor,
    };
    return input.signature !== undefined
      ? { ...prepared, signature: input.signature }
      : prepared;
  }

  /**
   * Append prepared events to the open block in a single store write.
   *
   * A full open block is sealed first, so the append itself is the last
   * write. If the store throws, no events are recorded.
   */
  commitEvents(prepared: readonly PreparedEvent[]): LedgerEvent[] {
    if (prepared.length === 0) {
      return [];
    }
    this.initialize();

    let open = this._openBlock();
    if (open.events.length >= this._maxEventsPerBlock) {
      this.sealBlock();
      open = this._openBlock();
    }

    let sequence = this._totalEvents() + 1;
    const events = prepared.map((p) => {
      const body = { ...p, sequence: sequence++ };
      return { eventId: computeEventId(body), ...body };
    });

    this._store.appendEvents(open.index, events);
    return events;
  }

  recordEvent(input: RecordEventInput): LedgerEvent {
    const [event] = this.commitEvents([this.prepareEvent(input)]);
    if (event === undefined) {
      throw new LedgerError("INVALID_EVENT", "Event was not recorded");
    }
    return event;
  }

  /**
   * Seal the open block and open the next one.
   *
   * @returns The sealed block, or undefined when the open block is empty
   */
  sealBlock(): LedgerBlock | undefined {
    this.initialize();
    const open = this._openBlock();
    if (open.events.length === 0) {
      return undefined;
    }

    const sealedAt = this._timestamp();
    const hash = computeBlockHash(open, sealedAt);
    this._store.sealBlock(open.index, sealedAt, hash);

    const sealed: LedgerBlock = { ...open, sealedAt, hash };
    this._openNext(sealed, sealedAt);
    return sealed;
  }

  // ─── Verification ───────────────────────────────────────────────────

  verify(): LedgerIntegrityResult {
    return verifyChain(this._store.loadBlocks());
  }

  verifyIntegrity(): boolean {
    return this.verify().valid;
  }

  /**
   * @throws LedgerError INTEGRITY_VIOLATION after the alert hook runs
   */
  assertIntegrity(): void {
    const result = this.verify();
    if (result.valid) {
      return;
    }
    this._onIntegrityViolation?.(result);
    const first = result.errors[0];
    throw new LedgerError(
      "INTEGRITY_VIOLATION",
      first !== undefined
        ? `Ledger integrity violated at block ${first.blockIndex}: ${first.reason}`
        : "Ledger integrity violated",
      result,
    );
  }

  // ─── Queries ────────────────────────────────────────────────────────

  getStatus(): LedgerStatus {
    const blocks = this._store.loadBlocks();
    const last = blocks[blocks.length - 1];
    return {
      latestIndex: last !== undefined ? last.index : -1,
      totalBlocks: blocks.length,
      totalEvents: blocks.reduce((n, b) => n + b.events.length, 0),
      integrityOk: verifyChain(blocks).valid,
    };
  }

  getBlocks(): readonly LedgerBlock[] {
    return this._store.loadBlocks();
  }

  listEvents(filter: LedgerEventFilter = {}): LedgerEvent[] {
    return this._store
      .loadBlocks()
      .flatMap((b) => b.events)
      .filter(
        (e) =>
          (filter.entityRef === undefined || e.entityRef === filter.entityRef) &&
          (filter.eventType === undefined || e.eventType === filter.eventType),
      );
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _timestamp(): string {
    return this._now().toISOString();
  }

  private _totalEvents(): number {
    return this._store
      .loadBlocks()
      .reduce((n, b) => n + b.events.length, 0);
  }

  private _openBlock(): LedgerBlock {
    const blocks = this._store.loadBlocks();
    const last = blocks[blocks.length - 1];
    if (last === undefined || last.hash !== null) {
      throw new LedgerError("BLOCK_NOT_OPEN", "Ledger has no open block");
    }
    return last;
  }

  private _openNext(previous: LedgerBlock, at: string): void {
    if (previous.hash === null) {
      throw new LedgerError("BLOCK_NOT_OPEN", "Cannot link to an open block");
    }
    this._store.appendBlock({
      index: previous.index + 1,
      openedAt: at,
      sealedAt: null,
      previousHash: previous.hash,
      hash: null,
      events: [],
    });
  }
}
