import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { appendFileSync, existsSync, mkdirSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import { JsonlLedgerStore } from "../src/jsonl-store.js";
import { EventLedger } from "../src/event-ledger.js";
import type { RecordEventInput } from "../src/types.js";

let testDir: string;
let testFile: string;

beforeEach(() => {
  testDir = join(tmpdir(), `swapdesk-ledger-${randomUUID()}`);
  mkdirSync(testDir, { recursive: true });
  testFile = join(testDir, "ledger.jsonl");
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

function input(ref: string): RecordEventInput {
  return {
    eventType: "SWAP_CREATED",
    entityRef: ref,
    payload: { swapRef: ref },
    actor: "client-1",
  };
}

function openLedger(): EventLedger {
  return new EventLedger({ store: new JsonlLedgerStore({ filePath: testFile }) });
}

describe("JsonlLedgerStore", () => {
  it("does not create the file until the first write", () => {
    const store = new JsonlLedgerStore({ filePath: testFile });
    expect(store.loadBlocks()).toEqual([]);
    expect(existsSync(testFile)).toBe(false);
  });

  it("creates missing parent directories", () => {
    const nested = join(testDir, "a", "b", "ledger.jsonl");
    const ledger = new EventLedger({ store: new JsonlLedgerStore({ filePath: nested }) });
    ledger.recordEvent(input("SWAPAAAA1111"));
    expect(existsSync(nested)).toBe(true);
  });

  it("writes one line per block, commit and seal", () => {
    const ledger = openLedger();
    ledger.recordEvent(input("SWAPAAAA1111"));
    ledger.sealBlock();

    const kinds = readFileSync(testFile, "utf-8")
      .trim()
      .split("\n")
      .map((line) => {
        const parsed: unknown = JSON.parse(line);
        return typeof parsed === "object" && parsed !== null && "kind" in parsed
          ? parsed.kind
          : null;
      });
    // genesis, block 1, events, seal of block 1, block 2
    expect(kinds).toEqual(["block", "block", "events", "seal", "block"]);
  });

  it("reloading reproduces the chain", () => {
    const first = openLedger();
    first.recordEvent(input("SWAPAAAA1111"));
    first.sealBlock();
    first.recordEvent(input("SWAPBBBB2222"));

    const reopened = openLedger();
    expect(reopened.getBlocks()).toEqual(first.getBlocks());
    expect(reopened.verifyIntegrity()).toBe(true);

    const next = reopened.recordEvent(input("SWAPCCCC3333"));
    expect(next.sequence).toBe(3);
    expect(reopened.getBlocks()[2]?.events).toHaveLength(2);
  });

  it("skips a torn trailing line", () => {
    const first = openLedger();
    first.recordEvent(input("SWAPAAAA1111"));
    appendFileSync(testFile, '{"kind":"events","blockIndex":1,"eve');

    const reopened = openLedger();
    expect(reopened.getStatus()).toEqual({
      latestIndex: 1,
      totalBlocks: 2,
      totalEvents: 1,
      integrityOk: true,
    });

    reopened.recordEvent(input("SWAPBBBB2222"));
    expect(openLedger().getStatus().totalEvents).toBe(2);
  });

  it("skips records with missing fields", () => {
    const first = openLedger();
    first.recordEvent(input("SWAPAAAA1111"));
    appendFileSync(testFile, '{"kind":"seal","blockIndex":1}\n{"kind":"unknown"}\n');

    expect(openLedger().getBlocks()).toEqual(first.getBlocks());
  });
});
