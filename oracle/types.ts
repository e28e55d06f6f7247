/*
 * Shared domain types for the settlement oracle.
 *
 * Campaign snapshots are read fresh every pass and actions live for a single
 * pass; nothing here is persisted.
 */

/** bytes32 campaigns carry a 0x-prefixed hex id, uint256 campaigns a bigint handle. */
export type CampaignId = string | bigint;

export type CampaignIdType = "bytes32" | "uint256";

// Ordinal order matches the marketplace contract's enum.
export const CAMPAIGN_STATUSES = [
  "OPEN",
  "ACCEPTED",
  "FULFILLED",
  "UNFULFILLED",
  "DISCARDED",
] as const;

export type CampaignStatus = (typeof CAMPAIGN_STATUSES)[number];

export interface Campaign {
  id: CampaignId;
  creator: string;
  kol: string;
  /** Raw on-chain value, in the configured deadline unit. */
  offerDeadline: bigint;
  /** Raw on-chain value, in the configured deadline unit. */
  promotionDeadline: bigint;
  /** Token base units. */
  totalAmount: bigint;
  status: CampaignStatus;
}

export type TransitionKind = "discard" | "fulfil" | "unfulfill";

export type SettlementAction =
  | { kind: "none"; campaignId: CampaignId; reason: string }
  | { kind: "accept"; campaignId: CampaignId }
  | {
      kind: TransitionKind;
      campaignId: CampaignId;
      transferTo: string;
      amount: bigint;
    };

export type TransferAction = Extract<SettlementAction, { kind: TransitionKind }>;

/** Write calls the chain client knows how to build. */
export type ContractCall =
  | { method: "acceptProjectCampaign"; campaignId: CampaignId }
  | { method: "fulfilProjectCampaign"; campaignId: CampaignId }
  | { method: "discardCampaign"; campaignId: CampaignId }
  | { method: "unfulfillCampaign"; campaignId: CampaignId }
  | { method: "transfer"; to: string; amount: bigint };

export type ContractMethod = ContractCall["method"];

export interface TxReceipt {
  hash: string;
  nonce: number;
  blockNumber: number;
  gasUsed: bigint;
}

export function formatCampaignId(id: CampaignId): string {
  return typeof id === "bigint" ? id.toString() : id;
}

/** Log-friendly view of a snapshot (pino cannot serialise bigint). */
export function describeCampaign(c: Campaign): Record<string, string> {
  return {
    id: formatCampaignId(c.id),
    creator: c.creator,
    kol: c.kol,
    offerDeadline: c.offerDeadline.toString(),
    promotionDeadline: c.promotionDeadline.toString(),
    totalAmount: c.totalAmount.toString(),
    status: c.status,
  };
}
