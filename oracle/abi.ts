import fs from "fs";
import path from "path";
import type { InterfaceAbi } from "ethers";
import { z } from "zod";
import { ConfigError } from "./errors";
import type { CampaignIdType } from "./types";

// ---------------------------------------------------------------------------
// Contract ABIs (only the functions we call).
// ---------------------------------------------------------------------------
export function marketplaceAbi(idType: CampaignIdType): string[] {
  const id = idType;
  return [
    `function getAllCampaigns() view returns (${id}[])`,
    `function getCampaignInfo(${id} campaignId) view returns (tuple(${id} campaignId, uint256 createdAt, address creatorAddress, address selectedKol, uint256 offerEndsIn, uint256 promotionEndsIn, uint256 amountOffered, uint8 campaignStatus))`,
    `function acceptProjectCampaign(${id} campaignId) external`,
    `function fulfilProjectCampaign(${id} campaignId) external`,
    `function discardCampaign(${id} campaignId) external`,
    `function unfulfillCampaign(${id} campaignId) external`,
  ];
}

export const TOKEN_ABI = ["function transfer(address to, uint256 amount) returns (bool)"];

const artifactSchema = z.object({ abi: z.array(z.unknown()).nonempty() });

/**
 * Reads a compiled artifact (`{ "abi": [...] }`) from disk. Relative paths
 * resolve against the working directory.
 */
export function loadAbiFile(file: string): InterfaceAbi {
  const resolved = path.resolve(process.cwd(), file);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, "utf8");
  } catch (err) {
    throw new ConfigError(`ABI file not found: ${resolved}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`ABI file is not valid JSON: ${resolved}`, { cause: err });
  }

  const artifact = artifactSchema.safeParse(parsed);
  if (!artifact.success) {
    throw new ConfigError(`ABI file has no "abi" array: ${resolved}`);
  }
  // ethers accepts the JSON text of an ABI directly.
  return JSON.stringify(artifact.data.abi);
}
