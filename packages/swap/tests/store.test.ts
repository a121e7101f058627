import { describe, it, expect, beforeEach } from "vitest";
import { InMemorySwapStore, StoreAgentDirectory } from "../src/store.js";
import { SwapError } from "../src/errors.js";
import { makeSwap } from "./helpers.js";

describe("InMemorySwapStore", () => {
  let store: InMemorySwapStore;

  beforeEach(() => {
    store = new InMemorySwapStore();
    store.commit({ swaps: [makeSwap()] });
  });

  it("inserts records at version 1", () => {
    expect(store.getSwap("swap-1")?.version).toBe(1);
    expect(store.getSwapByReference("SWAPTEST0001")?.id).toBe("swap-1");
  });

  it("accepts the next version", () => {
    store.commit({ swaps: [makeSwap({ status: "ACCEPTED", version: 2 })] });
    expect(store.getSwap("swap-1")?.status).toBe("ACCEPTED");
  });

  it("rejects a write based on a stale version", () => {
    expect(() => store.commit({ swaps: [makeSwap({ status: "ACCEPTED", version: 1 })] })).toThrow(
      "Stale swap 'swap-1': stored version 1, write expects 0",
    );
    expect(store.getSwap("swap-1")?.status).toBe("PENDING");
  });

  it("rejects the whole change set when one record is stale", () => {
    expect(() =>
      store.commit({
        swaps: [
          makeSwap({ id: "swap-2", reference: "SWAPTEST0002" }),
          makeSwap({ status: "EXPIRED", version: 3 }),
        ],
      }),
    ).toThrow(SwapError);
    expect(store.getSwap("swap-2")).toBeUndefined();
  });

  it("writes nothing when the in-commit step throws", () => {
    expect(() =>
      store.commit({ swaps: [makeSwap({ status: "ACCEPTED", version: 2 })] }, () => {
        throw new Error("ledger unavailable");
      }),
    ).toThrow("ledger unavailable");
    expect(store.getSwap("swap-1")?.version).toBe(1);
  });

  it("does not run the in-commit step for stale writes", () => {
    let ran = false;
    expect(() =>
      store.commit({ swaps: [makeSwap({ version: 5 })] }, () => {
        ran = true;
      }),
    ).toThrow(SwapError);
    expect(ran).toBe(false);
  });

  it("filters swaps", () => {
    store.commit({
      swaps: [makeSwap({ id: "swap-2", reference: "SWAPTEST0002", agentId: "agent-2", status: "COMPLETE" })],
    });

    expect(store.listSwaps({ agentId: "agent-2" }).map((s) => s.id)).toEqual(["swap-2"]);
    expect(store.listSwaps({ status: "PENDING" }).map((s) => s.id)).toEqual(["swap-1"]);
    expect(store.listSwaps({ clientId: "client-1" })).toHaveLength(2);
  });
});

describe("StoreAgentDirectory", () => {
  it("counts only swaps that are still active", () => {
    const store = new InMemorySwapStore();
    store.commit({
      swaps: [
        makeSwap({ id: "s1", status: "PENDING" }),
        makeSwap({ id: "s2", status: "DISPUTE" }),
        makeSwap({ id: "s3", status: "COMPLETE" }),
        makeSwap({ id: "s4", status: "EXPIRED" }),
        makeSwap({ id: "s5", agentId: "agent-2", status: "ACCEPTED" }),
      ],
    });

    const directory = new StoreAgentDirectory(store);
    expect(directory.countActiveSwaps("agent-1")).toBe(2);
    expect(directory.countActiveSwaps("agent-2")).toBe(1);
  });
});
