import { describe, it, expect } from "vitest";
import { calculateFees } from "../src/fees.js";
import { DEFAULT_SWAP_CONFIG } from "../src/config.js";
import { SwapError } from "../src/errors.js";
import { mwk } from "./helpers.js";

const NO_FLOOR = { ...DEFAULT_SWAP_CONFIG, minFeeFloor: "0" };

describe("calculateFees", () => {
  it("applies the minimum fee floor", () => {
    const fees = calculateFees(mwk("1000.00"), DEFAULT_SWAP_CONFIG);

    expect(fees.total.amount).toBe("50.00");
    expect(fees.platformFee.amount).toBe("12.50");
    expect(fees.agentFee.amount).toBe("37.50");
  });

  it("uses the rate when it exceeds the floor", () => {
    const fees = calculateFees(mwk("20000.00"), DEFAULT_SWAP_CONFIG);

    expect(fees.total.amount).toBe("120.00");
    expect(fees.platformFee.amount).toBe("30.00");
    expect(fees.agentFee.amount).toBe("90.00");
  });

  it("splits a rate-based fee without a floor", () => {
    const fees = calculateFees(mwk("1000.00"), NO_FLOOR);

    expect(fees.total.amount).toBe("6.00");
    expect(fees.platformFee.amount).toBe("1.50");
    expect(fees.agentFee.amount).toBe("4.50");
  });

  it("rounds each step to the currency precision", () => {
    const fees = calculateFees(mwk("12345.67"), NO_FLOOR);

    expect(fees.total.amount).toBe("74.07");
    expect(fees.platformFee.amount).toBe("18.52");
    expect(fees.agentFee.amount).toBe("55.55");
  });

  it("rounds ties to even and gives the remainder to the agent", () => {
    const fees = calculateFees(mwk("50.00"), { ...NO_FLOOR, feeRate: "0.002" });

    expect(fees.total.amount).toBe("0.10");
    expect(fees.platformFee.amount).toBe("0.02");
    expect(fees.agentFee.amount).toBe("0.08");
  });

  it("keeps the currency of the amount", () => {
    const fees = calculateFees(mwk("1000.00"), DEFAULT_SWAP_CONFIG);
    expect(fees.agentFee).toEqual({ amount: "37.50", currency: "MWK", decimals: 2 });
  });

  it("refuses fees larger than the amount", () => {
    expect(() => calculateFees(mwk("40.00"), DEFAULT_SWAP_CONFIG)).toThrow(SwapError);
  });
});
