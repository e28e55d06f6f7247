import { describe, expect, it } from "vitest";
import { DEFAULT_POLICY, evaluate, settlementTransfer } from "../../oracle/evaluator";
import { CREATOR, KOL, NOW_MS, NOW_S, campaignId, makeCampaign } from "../support/fakeChain";

const id = campaignId(1);

describe("evaluate", () => {
  describe("OPEN", () => {
    it("does nothing while the offer window is open", () => {
      const action = evaluate(makeCampaign({ offerDeadline: NOW_S + 1n }), NOW_MS);
      expect(action).toEqual({ kind: "none", campaignId: id, reason: "offer still open" });
    });

    it("does nothing exactly at the offer deadline", () => {
      const action = evaluate(makeCampaign({ offerDeadline: NOW_S }), NOW_MS);
      expect(action.kind).toBe("none");
    });

    it("discards and refunds the creator once the offer deadline passed", () => {
      const action = evaluate(makeCampaign({ offerDeadline: NOW_S - 1n, totalAmount: 5_000_000n }), NOW_MS);
      expect(action).toEqual({ kind: "discard", campaignId: id, transferTo: CREATOR, amount: 5_000_000n });
    });
  });

  describe("ACCEPTED", () => {
    const accepted = { status: "ACCEPTED" as const, offerDeadline: NOW_S - 86_400n };

    it("fulfils and pays the settlement share before the promotion deadline", () => {
      const action = evaluate(
        makeCampaign({ ...accepted, promotionDeadline: NOW_S + 3600n, totalAmount: 2_000_000n }),
        NOW_MS,
      );
      expect(action).toEqual({ kind: "fulfil", campaignId: id, transferTo: KOL, amount: 1_800_000n });
    });

    it("still fulfils exactly at the promotion deadline", () => {
      const action = evaluate(makeCampaign({ ...accepted, promotionDeadline: NOW_S }), NOW_MS);
      expect(action.kind).toBe("fulfil");
    });

    it("marks unfulfilled and refunds the creator after the promotion deadline", () => {
      const action = evaluate(
        makeCampaign({ ...accepted, promotionDeadline: NOW_S - 1n, totalAmount: 2_000_000n }),
        NOW_MS,
      );
      expect(action).toEqual({ kind: "unfulfill", campaignId: id, transferTo: CREATOR, amount: 2_000_000n });
    });

    it("waits for the deadline when early fulfilment is disabled", () => {
      const policy = { ...DEFAULT_POLICY, fulfilBeforeDeadline: false };
      const action = evaluate(makeCampaign({ ...accepted, promotionDeadline: NOW_S + 60n }), NOW_MS, policy);
      expect(action).toEqual({ kind: "none", campaignId: id, reason: "promotion in progress" });
    });

    it("uses the configured settlement fraction", () => {
      const policy = { ...DEFAULT_POLICY, settlementFractionBps: 7_500 };
      const action = evaluate(makeCampaign({ ...accepted, totalAmount: 1_000n }), NOW_MS, policy);
      expect(action).toMatchObject({ kind: "fulfil", amount: 750n });
    });
  });

  it.each(["FULFILLED", "UNFULFILLED", "DISCARDED"] as const)("never acts on %s campaigns", (status) => {
    for (const offset of [-86_400n, 0n, 86_400n]) {
      const action = evaluate(
        makeCampaign({ status, offerDeadline: NOW_S + offset, promotionDeadline: NOW_S + offset }),
        NOW_MS,
      );
      expect(action).toEqual({ kind: "none", campaignId: id, reason: `terminal status ${status}` });
    }
  });

  it("compares millisecond deadlines against the millisecond clock", () => {
    const policy = { ...DEFAULT_POLICY, deadlineUnit: "milliseconds" as const };
    const open = makeCampaign({ offerDeadline: BigInt(NOW_MS) + 1n });
    expect(evaluate(open, NOW_MS, policy).kind).toBe("none");
    expect(evaluate(open, NOW_MS + 2, policy).kind).toBe("discard");
  });

  it("returns the same action for the same inputs", () => {
    const c = makeCampaign({ status: "ACCEPTED" });
    expect(evaluate(c, NOW_MS)).toEqual(evaluate(c, NOW_MS));
  });
});

describe("settlementTransfer", () => {
  it("pays the kol on fulfilment and the creator otherwise", () => {
    const c = makeCampaign({ totalAmount: 100n });
    expect(settlementTransfer("fulfil", c, DEFAULT_POLICY)).toEqual({ to: KOL, amount: 90n });
    expect(settlementTransfer("discard", c, DEFAULT_POLICY)).toEqual({ to: CREATOR, amount: 100n });
    expect(settlementTransfer("unfulfill", c, DEFAULT_POLICY)).toEqual({ to: CREATOR, amount: 100n });
  });
});
