/**
 * @swapdesk/event-ledger: File-based JSONL LedgerStore.
 *
 * One JSON object per line, three kinds:
 *
 *   {"kind":"block","block":{...}}                       new block
 *   {"kind":"events","blockIndex":1,"events":[...]}      one commit
 *   {"kind":"seal","blockIndex":1,"sealedAt":"...","hash":"..."}
 *
 * Each write is flushed with fsync before returning. The file is never
 * truncated or rewritten. A torn trailing line from a crash is skipped on
 * load, which drops the whole commit it belonged to.
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";
import { isLedgerEventType } from "./event-types.js";
import { InMemoryLedgerStore } from "./in-memory-store.js";
import type { LedgerBlock, LedgerEvent, LedgerStore } from "./types.js";

export interface JsonlLedgerStoreOptions {
  /** Path to the JSONL file; parent directories are created */
  readonly filePath: string;
}

type JsonlRecord =
  | { readonly kind: "block"; readonly block: LedgerBlock }
  | {
      readonly kind: "events";
      readonly blockIndex: number;
      readonly events: readonly LedgerEvent[];
    }
  | {
      readonly kind: "seal";
      readonly blockIndex: number;
      readonly sealedAt: string;
      readonly hash: string;
    };

export class JsonlLedgerStore implements LedgerStore {
  private readonly _filePath: string;
  private readonly _memory: InMemoryLedgerStore;

  constructor(options: JsonlLedgerStoreOptions) {
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._memory = new InMemoryLedgerStore(this._loadFromFile());
  }

  get filePath(): string {
    return this._filePath;
  }

  loadBlocks(): readonly LedgerBlock[] {
    return this._memory.loadBlocks();
  }

  appendBlock(block: LedgerBlock): void {
    this._writeAndSync({ kind: "block", block });
    this._memory.appendBlock(block);
  }

  appendEvents(blockIndex: number, events: readonly LedgerEvent[]): void {
    this._writeAndSync({ kind: "events", blockIndex, events });
    this._memory.appendEvents(blockIndex, events);
  }

  sealBlock(blockIndex: number, sealedAt: string, hash: string): void {
    this._writeAndSync({ kind: "seal", blockIndex, sealedAt, hash });
    this._memory.sealBlock(blockIndex, sealedAt, hash);
  }

  // ─── File I/O ───────────────────────────────────────────────────────

  private _writeAndSync(record: JsonlRecord): void {
    this._writeLine(JSON.stringify(record));
  }

  private _writeLine(line: string): void {
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, line + "\n", "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  private _loadFromFile(): LedgerBlock[] {
    if (!existsSync(this._filePath)) {
      return [];
    }

    const blocks: LedgerBlock[] = [];
    const content = readFileSync(this._filePath, "utf-8");
    if (content.length > 0 && !content.endsWith("\n")) {
      // Terminate a torn line so the next record starts on its own line
      this._writeLine("");
    }
    const lines = content.split("\n");

    for (const line of lines) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let raw: unknown;
      try {
        raw = JSON.parse(trimmed);
      } catch {
        // Torn line from an interrupted write
        continue;
      }

      const record = parseRecord(raw);
      if (record === null) {
        continue;
      }
      applyRecord(blocks, record);
    }

    return blocks;
  }
}

// =============================================================================
// Record parsing
// =============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseEvent(value: unknown): LedgerEvent | null {
  if (!isObject(value)) return null;
  const {
    eventId,
    sequence,
    eventType,
    timestamp,
    entityRef,
    payloadHash,
    actor,
    signature,
  } = value;
  if (
    typeof eventId !== "string" ||
    typeof sequence !== "number" ||
    !isLedgerEventType(eventType) ||
    typeof timestamp !== "string" ||
    typeof entityRef !== "string" ||
    typeof payloadHash !== "string" ||
    typeof actor !== "string"
  ) {
    return null;
  }
  const event: LedgerEvent = {
    eventId,
    sequence,
    eventType,
    timestamp,
    entityRef,
    payloadHash,
    actor,
  };
  return typeof signature === "string" ? { ...event, signature } : event;
}

function parseEvents(value: unknown): LedgerEvent[] | null {
  if (!Array.isArray(value)) return null;
  const events: LedgerEvent[] = [];
  for (const item of value) {
    const event = parseEvent(item);
    if (event === null) return null;
    events.push(event);
  }
  return events;
}

function nullableString(value: unknown): string | null | undefined {
  if (value === null) return null;
  return typeof value === "string" ? value : undefined;
}

function parseBlock(value: unknown): LedgerBlock | null {
  if (!isObject(value)) return null;
  const sealedAt = nullableString(value["sealedAt"]);
  const hash = nullableString(value["hash"]);
  const events = parseEvents(value["events"]);
  const { index, openedAt, previousHash } = value;
  if (
    typeof index !== "number" ||
    typeof openedAt !== "string" ||
    typeof previousHash !== "string" ||
    sealedAt === undefined ||
    hash === undefined ||
    events === null
  ) {
    return null;
  }
  return { index, openedAt, sealedAt, previousHash, hash, events };
}

function parseRecord(raw: unknown): JsonlRecord | null {
  if (!isObject(raw)) return null;

  switch (raw["kind"]) {
    case "block": {
      const block = parseBlock(raw["block"]);
      return block === null ? null : { kind: "block", block };
    }
    case "events": {
      const blockIndex = raw["blockIndex"];
      const events = parseEvents(raw["events"]);
      if (typeof blockIndex !== "number" || events === null) return null;
      return { kind: "events", blockIndex, events };
    }
    case "seal": {
      const { blockIndex, sealedAt, hash } = raw;
      if (
        typeof blockIndex !== "number" ||
        typeof sealedAt !== "string" ||
        typeof hash !== "string"
      ) {
        return null;
      }
      return { kind: "seal", blockIndex, sealedAt, hash };
    }
    default:
      return null;
  }
}

/**
 * Replay one record. Records that do not fit the chain so far (events for
 * a sealed block, a block out of order) are dropped; verification of the
 * loaded chain reports whatever that leaves inconsistent.
 */
function applyRecord(blocks: LedgerBlock[], record: JsonlRecord): void {
  switch (record.kind) {
    case "block":
      if (record.block.index === blocks.length) {
        blocks.push(record.block);
      }
      return;
    case "events": {
      const block = blocks[record.blockIndex];
      if (block !== undefined && block.hash === null) {
        blocks[record.blockIndex] = {
          ...block,
          events: [...block.events, ...record.events],
        };
      }
      return;
    }
    case "seal": {
      const block = blocks[record.blockIndex];
      if (block !== undefined && block.hash === null) {
        blocks[record.blockIndex] = {
          ...block,
          sealedAt: record.sealedAt,
          hash: record.hash,
        };
      }
      return;
    }
  }
}
