import { describe, it, expect } from "vitest";
import type { SwapRequest, SwapStatus } from "@swapdesk/types";
import { SWAP_STATUSES } from "@swapdesk/types";
import { VALID_TRANSITIONS, assertTransition, canTransition } from "../src/transitions.js";
import { SwapError } from "../src/errors.js";
import { makeSwap } from "./helpers.js";

function swapIn(status: SwapStatus): SwapRequest {
  return makeSwap({ status });
}

describe("swap state machine", () => {
  it("follows the happy path", () => {
    expect(canTransition("PENDING", "ACCEPTED")).toBe(true);
    expect(canTransition("ACCEPTED", "CLIENT_PROOF_UPLOADED")).toBe(true);
    expect(canTransition("CLIENT_PROOF_UPLOADED", "AGENT_PROOF_UPLOADED")).toBe(true);
    expect(canTransition("AGENT_PROOF_UPLOADED", "COMPLETE")).toBe(true);
  });

  it("does not skip steps", () => {
    expect(canTransition("PENDING", "COMPLETE")).toBe(false);
    expect(canTransition("ACCEPTED", "AGENT_PROOF_UPLOADED")).toBe(false);
    expect(canTransition("CLIENT_PROOF_UPLOADED", "CANCELLED")).toBe(false);
  });

  it("has no way out of terminal states", () => {
    for (const status of ["COMPLETE", "REJECTED", "CANCELLED", "EXPIRED"] as const) {
      expect(VALID_TRANSITIONS[status]).toEqual([]);
    }
  });

  it("lets every active state enter a dispute", () => {
    const active = SWAP_STATUSES.filter((s) => VALID_TRANSITIONS[s].length > 0 && s !== "DISPUTE");
    expect(active).toEqual(["PENDING", "ACCEPTED", "CLIENT_PROOF_UPLOADED", "AGENT_PROOF_UPLOADED"]);
    for (const status of active) {
      expect(canTransition(status, "DISPUTE")).toBe(true);
    }
  });

  it("never leaves a dispute for REJECTED or EXPIRED", () => {
    expect(canTransition("DISPUTE", "REJECTED")).toBe(false);
    expect(canTransition("DISPUTE", "EXPIRED")).toBe(false);
  });
});

describe("assertTransition", () => {
  it("passes allowed transitions", () => {
    expect(() => assertTransition(swapIn("PENDING"), "ACCEPTED")).not.toThrow();
  });

  it("names the swap and both states", () => {
    expect(() => assertTransition(swapIn("EXPIRED"), "ACCEPTED")).toThrow(
      "Cannot transition swap 'SWAPTEST0001' from 'EXPIRED' to 'ACCEPTED'",
    );
  });

  it("restricts the source states when asked", () => {
    expect(() => assertTransition(swapIn("DISPUTE"), "ACCEPTED", ["PENDING"])).toThrow(SwapError);
    expect(() => assertTransition(swapIn("PENDING"), "ACCEPTED", ["PENDING"])).not.toThrow();
  });
});
