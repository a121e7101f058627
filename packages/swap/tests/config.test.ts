import { describe, it, expect } from "vitest";
import { DEFAULT_SWAP_CONFIG, resolveSwapConfig } from "../src/config.js";

describe("resolveSwapConfig", () => {
  it("returns the defaults without overrides", () => {
    expect(resolveSwapConfig()).toEqual(DEFAULT_SWAP_CONFIG);
  });

  it("merges overrides", () => {
    const config = resolveSwapConfig({ pendingTimeoutMinutes: 45, minFeeFloor: "0" });

    expect(config.pendingTimeoutMinutes).toBe(45);
    expect(config.minFeeFloor).toBe("0");
    expect(config.feeRate).toBe("0.006");
  });

  it("accepts shares that sum to one at any precision", () => {
    expect(resolveSwapConfig({ platformFeeShare: "0.3", agentFeeShare: "0.700" }).agentFeeShare).toBe("0.700");
  });

  it("requires the shares to sum to one", () => {
    expect(() => resolveSwapConfig({ platformFeeShare: "0.3", agentFeeShare: "0.75" })).toThrow(
      /must sum to 1/,
    );
  });

  it("rejects malformed decimals", () => {
    expect(() => resolveSwapConfig({ feeRate: "abc" })).toThrow(/feeRate "abc"/);
    expect(() => resolveSwapConfig({ minSwapAmount: "10.001" })).toThrow(/minSwapAmount/);
  });

  it("requires min <= max swap amount", () => {
    expect(() => resolveSwapConfig({ minSwapAmount: "60000" })).toThrow(/0 < min <= max/);
  });

  it("requires positive integer timeouts", () => {
    expect(() => resolveSwapConfig({ pendingTimeoutMinutes: 0 })).toThrow(
      "Invalid swap config: pendingTimeoutMinutes must be a positive integer, got 0",
    );
    expect(() => resolveSwapConfig({ acceptedTimeoutHours: 1.5 })).toThrow(/acceptedTimeoutHours/);
  });

  it("bounds the auto-verify confidence", () => {
    expect(() => resolveSwapConfig({ autoVerifyConfidence: 1.5 })).toThrow(/autoVerifyConfidence/);
  });

  it("refuses an auto-verify threshold below the review threshold", () => {
    expect(() => resolveSwapConfig({ autoVerifyConfidence: 0.3 })).toThrow(
      "Invalid swap config: autoVerifyConfidence must be within [0.5, 1], got 0.3",
    );
    expect(resolveSwapConfig({ autoVerifyConfidence: 0.5 }).autoVerifyConfidence).toBe(0.5);
  });
});
