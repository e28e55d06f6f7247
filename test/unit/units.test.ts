import { describe, expect, it } from "vitest";
import { hasPassed, refundAmount, settlementShare } from "../../oracle/units";

describe("deadline normalisation", () => {
  it("treats the exact deadline instant as not passed", () => {
    expect(hasPassed(1_700_000_000n, "seconds", 1_700_000_000_000)).toBe(false);
    expect(hasPassed(1_700_000_000_000n, "milliseconds", 1_700_000_000_000)).toBe(false);
  });

  it("reports a deadline one unit in the past as passed", () => {
    expect(hasPassed(1_700_000_000n, "seconds", 1_700_000_001_000)).toBe(true);
    expect(hasPassed(1_700_000_000_000n, "milliseconds", 1_700_000_000_001)).toBe(true);
  });

  it("compares second deadlines at whole-second granularity", () => {
    expect(hasPassed(1_700_000_000n, "seconds", 1_700_000_000_400)).toBe(false);
    expect(hasPassed(1_700_000_000n, "seconds", 1_700_000_000_999)).toBe(false);
  });

  it("does not confuse a second deadline with a millisecond clock", () => {
    // 1.7e9 read as milliseconds is January 1970, long expired
    expect(hasPassed(1_700_000_000n, "milliseconds", 1_700_000_000_000)).toBe(true);
    expect(hasPassed(1_700_000_100n, "seconds", 1_700_000_000_000)).toBe(false);
  });
});

describe("amounts", () => {
  it("refunds the stored amount as is", () => {
    expect(refundAmount(1_234_567n)).toBe(1_234_567n);
  });

  it("pays 90% of the stored amount in the same unit", () => {
    expect(settlementShare(1_000_000n, 9_000)).toBe(900_000n);
  });

  it("rounds the share half-up", () => {
    // 15 * 0.9 = 13.5
    expect(settlementShare(15n, 9_000)).toBe(14n);
    // 11 * 0.9 = 9.9
    expect(settlementShare(11n, 9_000)).toBe(10n);
    // 12 * 0.9 = 10.8
    expect(settlementShare(12n, 9_000)).toBe(11n);
    // 21 * 0.9 = 18.9
    expect(settlementShare(21n, 9_000)).toBe(19n);
  });

  it("never pays more than the refund would", () => {
    for (const amount of [0n, 1n, 9n, 10n, 999_999n, 10n ** 24n]) {
      expect(settlementShare(amount, 9_000) <= refundAmount(amount)).toBe(true);
    }
  });

  it("rejects fractions outside 0..10000 bps", () => {
    expect(() => settlementShare(100n, 10_001)).toThrow(RangeError);
    expect(() => settlementShare(100n, -1)).toThrow(RangeError);
    expect(() => settlementShare(100n, 12.5)).toThrow(RangeError);
  });
});
