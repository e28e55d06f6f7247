import { formatCampaignId, type Campaign, type SettlementAction, type TransitionKind } from "./types";
import { hasPassed, refundAmount, settlementShare, type DeadlineUnit } from "./units";

export interface SettlementPolicy {
  deadlineUnit: DeadlineUnit;
  /** Share of the escrow paid to the KOL on fulfilment, in basis points. */
  settlementFractionBps: number;
  /** When false an ACCEPTED campaign is left alone until its promotion deadline passes. */
  fulfilBeforeDeadline: boolean;
}

export const DEFAULT_POLICY: SettlementPolicy = {
  deadlineUnit: "seconds",
  settlementFractionBps: 9_000,
  fulfilBeforeDeadline: true,
};

/**
 * Recipient and amount of the transfer that accompanies a transition. The
 * executor calls this again on the snapshot read after the transition lands.
 */
export function settlementTransfer(
  kind: TransitionKind,
  campaign: Campaign,
  policy: SettlementPolicy,
): { to: string; amount: bigint } {
  if (kind === "fulfil") {
    return { to: campaign.kol, amount: settlementShare(campaign.totalAmount, policy.settlementFractionBps) };
  }
  return { to: campaign.creator, amount: refundAmount(campaign.totalAmount) };
}

function transition(kind: TransitionKind, campaign: Campaign, policy: SettlementPolicy): SettlementAction {
  const { to, amount } = settlementTransfer(kind, campaign, policy);
  return { kind, campaignId: campaign.id, transferTo: to, amount };
}

/**
 * Maps a campaign snapshot and the current time (epoch ms) to the single
 * action the bot should take. Pure: reads nothing but its arguments.
 */
export function evaluate(
  campaign: Campaign,
  nowMs: number,
  policy: SettlementPolicy = DEFAULT_POLICY,
): SettlementAction {
  const campaignId = campaign.id;

  switch (campaign.status) {
    case "OPEN":
      if (hasPassed(campaign.offerDeadline, policy.deadlineUnit, nowMs)) {
        return transition("discard", campaign, policy);
      }
      return { kind: "none", campaignId, reason: "offer still open" };

    case "ACCEPTED":
      if (hasPassed(campaign.promotionDeadline, policy.deadlineUnit, nowMs)) {
        return transition("unfulfill", campaign, policy);
      }
      if (!policy.fulfilBeforeDeadline) {
        return { kind: "none", campaignId, reason: "promotion in progress" };
      }
      return transition("fulfil", campaign, policy);

    case "FULFILLED":
    case "UNFULFILLED":
    case "DISCARDED":
      return { kind: "none", campaignId, reason: `terminal status ${campaign.status}` };

    default: {
      const unknownStatus: never = campaign.status;
      throw new Error(`campaign ${formatCampaignId(campaignId)} has unknown status ${String(unknownStatus)}`);
    }
  }
}
