/*
 * Deadline and amount conventions.
 *
 * Deadlines: the contract stores them either in seconds or in milliseconds
 * depending on the deployment. The clock is truncated to the deadline's unit
 * before comparing, the way a block timestamp would be.
 *
 * Amounts: `totalAmount` is already in token base units. The refund is the
 * amount as stored; the payout is the settlement share of that same integer,
 * rounded half-up. Neither is rescaled by the token's decimals.
 */

export type DeadlineUnit = "seconds" | "milliseconds";

export const BPS_DENOMINATOR = 10_000n;

/** Strictly after: a deadline equal to the current second (or millisecond) has not passed yet. */
export function hasPassed(deadline: bigint, unit: DeadlineUnit, nowMs: number): boolean {
  const now = BigInt(Math.floor(nowMs));
  return unit === "seconds" ? now / 1000n > deadline : now > deadline;
}

export function refundAmount(totalAmount: bigint): bigint {
  return totalAmount;
}

export function settlementShare(totalAmount: bigint, fractionBps: number): bigint {
  if (!Number.isInteger(fractionBps) || fractionBps < 0 || fractionBps > 10_000) {
    throw new RangeError(`settlement fraction must be 0..10000 bps, got ${fractionBps}`);
  }
  return (totalAmount * BigInt(fractionBps) + BPS_DENOMINATOR / 2n) / BPS_DENOMINATOR;
}
