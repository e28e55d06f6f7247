import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { parseCampaignId } from "./campaignId";
import type { ChainClient } from "./chainClient";
import { SourceUnavailableError, errorMessage } from "./errors";
import type { RegistryConfig } from "./config";
import { formatCampaignId, type CampaignId, type CampaignIdType, type CampaignStatus } from "./types";

/**
 * Supplies the ids to evaluate in a pass. Implementations must fail with
 * SourceUnavailableError rather than return an empty list on error.
 */
export interface CampaignSource {
  readonly name: string;
  listCampaignIds(): Promise<CampaignId[]>;
}

/** Receives status changes the bot has settled on-chain. */
export interface StatusNotifier {
  notifyStatus(id: CampaignId, status: CampaignStatus): Promise<void>;
}

/** Enumerates campaigns straight from the marketplace contract. */
export class ContractCampaignSource implements CampaignSource {
  readonly name = "contract";

  constructor(private readonly chain: Pick<ChainClient, "getAllCampaigns">) {}

  async listCampaignIds(): Promise<CampaignId[]> {
    try {
      return await this.chain.getAllCampaigns();
    } catch (err) {
      throw new SourceUnavailableError(`contract enumeration failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

const campaignListSchema = z.object({
  result: z.array(z.union([z.string(), z.number()])),
});

/**
 * External campaign registry over HTTP:
 *   GET  {base}/get-all-campaigns -> { result: [id, ...] }
 *   POST {base}/update-campaign   <- { campaign_id, status }
 */
export class RegistryCampaignSource implements CampaignSource, StatusNotifier {
  readonly name = "registry";
  private readonly http: AxiosInstance;

  constructor(
    config: RegistryConfig,
    private readonly idType: CampaignIdType,
    http?: AxiosInstance,
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
      });
    this.http.defaults.headers.common["x-api-key"] = config.apiKey;
    this.http.defaults.headers.common["source"] = config.sourceTag;
  }

  async listCampaignIds(): Promise<CampaignId[]> {
    let body: unknown;
    try {
      const res = await this.http.get<unknown>("/get-all-campaigns");
      body = res.data;
    } catch (err) {
      throw new SourceUnavailableError(`registry request failed: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = campaignListSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceUnavailableError("registry response has no result list");
    }
    try {
      return parsed.data.result.map((id) => parseCampaignId(id, this.idType));
    } catch (err) {
      throw new SourceUnavailableError(`registry returned a malformed id: ${errorMessage(err)}`, { cause: err });
    }
  }

  async notifyStatus(id: CampaignId, status: CampaignStatus): Promise<void> {
    await this.http.post(
      "/update-campaign",
      { campaign_id: formatCampaignId(id), status },
      { headers: { "Content-Type": "application/json" } },
    );
  }
}
