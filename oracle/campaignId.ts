import { isHexString } from "ethers";
import type { CampaignId, CampaignIdType } from "./types";

/**
 * Normalises an identifier coming from the contract or the registry into the
 * representation the marketplace ABI expects. Throws TypeError when the value
 * cannot be one.
 */
export function parseCampaignId(value: unknown, idType: CampaignIdType): CampaignId {
  if (idType === "bytes32") {
    if (typeof value === "string" && isHexString(value, 32)) return value.toLowerCase();
    throw new TypeError(`not a bytes32 campaign id: ${String(value)}`);
  }

  if (typeof value === "bigint" && value >= 0n) return value;
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) return BigInt(value);
  if (typeof value === "string" && /^\d+$/.test(value)) return BigInt(value);
  throw new TypeError(`not a uint256 campaign id: ${String(value)}`);
}
