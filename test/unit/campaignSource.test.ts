import axios, { type InternalAxiosRequestConfig } from "axios";
import { describe, expect, it } from "vitest";
import { ContractCampaignSource, RegistryCampaignSource } from "../../oracle/campaignSource";
import type { RegistryConfig } from "../../oracle/config";
import { ReadError, SourceUnavailableError } from "../../oracle/errors";
import { FakeChain, campaignId, makeCampaign } from "../support/fakeChain";

const registryConfig: RegistryConfig = {
  baseUrl: "https://registry.test/api",
  apiKey: "test-api-key",
  sourceTag: "oracle-test",
  timeoutMs: 1000,
};

/** axios instance answering from an in-process handler instead of the network. */
function fakeHttp(handler: (config: InternalAxiosRequestConfig) => unknown) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    baseURL: registryConfig.baseUrl,
    adapter: async (config) => {
      requests.push(config);
      return { data: handler(config), status: 200, statusText: "OK", headers: {}, config };
    },
  });
  return { http, requests };
}

describe("ContractCampaignSource", () => {
  it("lists ids from the contract", async () => {
    const chain = new FakeChain().add(makeCampaign({ id: campaignId(1) }), makeCampaign({ id: campaignId(2) }));
    expect(await new ContractCampaignSource(chain).listCampaignIds()).toEqual([campaignId(1), campaignId(2)]);
  });

  it("turns a failed enumeration into SourceUnavailable", async () => {
    const chain = new FakeChain();
    chain.listError = new ReadError(undefined, "getAllCampaigns failed: timeout");
    await expect(new ContractCampaignSource(chain).listCampaignIds()).rejects.toBeInstanceOf(SourceUnavailableError);
  });
});

describe("RegistryCampaignSource", () => {
  it("fetches the id list with the api key and source headers", async () => {
    const { http, requests } = fakeHttp(() => ({ result: [campaignId(3).toUpperCase().replace("0X", "0x")] }));
    const source = new RegistryCampaignSource(registryConfig, "bytes32", http);

    expect(await source.listCampaignIds()).toEqual([campaignId(3)]);
    expect(requests).toHaveLength(1);
    expect(requests[0]?.method).toBe("get");
    expect(requests[0]?.url).toBe("/get-all-campaigns");
    expect(requests[0]?.headers.get("x-api-key")).toBe("test-api-key");
    expect(requests[0]?.headers.get("source")).toBe("oracle-test");
  });

  it("parses integer handles for uint256 marketplaces", async () => {
    const { http } = fakeHttp(() => ({ result: [1, "2", 42] }));
    const source = new RegistryCampaignSource(registryConfig, "uint256", http);
    expect(await source.listCampaignIds()).toEqual([1n, 2n, 42n]);
  });

  it("returns an empty list when the registry has no campaigns", async () => {
    const { http } = fakeHttp(() => ({ result: [] }));
    expect(await new RegistryCampaignSource(registryConfig, "bytes32", http).listCampaignIds()).toEqual([]);
  });

  it("fails instead of returning nothing when the body is malformed", async () => {
    const { http } = fakeHttp(() => ({ campaigns: [] }));
    await expect(
      new RegistryCampaignSource(registryConfig, "bytes32", http).listCampaignIds(),
    ).rejects.toThrow("registry response has no result list");
  });

  it("fails on ids that do not fit the marketplace id type", async () => {
    const { http } = fakeHttp(() => ({ result: ["0x1234"] }));
    await expect(
      new RegistryCampaignSource(registryConfig, "bytes32", http).listCampaignIds(),
    ).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it("fails with SourceUnavailable on transport errors", async () => {
    const http = axios.create({
      adapter: async () => {
        throw new Error("connect ECONNREFUSED");
      },
    });
    await expect(
      new RegistryCampaignSource(registryConfig, "bytes32", http).listCampaignIds(),
    ).rejects.toThrow("registry request failed: connect ECONNREFUSED");
  });

  it("posts status updates as JSON", async () => {
    const { http, requests } = fakeHttp(() => ({ ok: true }));
    const source = new RegistryCampaignSource(registryConfig, "uint256", http);

    await source.notifyStatus(7n, "DISCARDED");

    expect(requests[0]?.method).toBe("post");
    expect(requests[0]?.url).toBe("/update-campaign");
    expect(requests[0]?.headers.get("Content-Type")).toBe("application/json");
    expect(requests[0]?.headers.get("x-api-key")).toBe("test-api-key");
    expect(JSON.parse(String(requests[0]?.data))).toEqual({ campaign_id: "7", status: "DISCARDED" });
  });
});
