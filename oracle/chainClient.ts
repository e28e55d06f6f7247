import {
  Contract,
  Wallet,
  isAddress,
  type ContractTransactionReceipt,
  type ContractTransactionResponse,
  type InterfaceAbi,
  type Provider,
} from "ethers";
import { parseCampaignId } from "./campaignId";
import { ReadError, SubmissionError, errorMessage } from "./errors";
import type { Logger } from "./logger";
import {
  CAMPAIGN_STATUSES,
  formatCampaignId,
  type Campaign,
  type CampaignId,
  type CampaignIdType,
  type ContractCall,
  type ContractMethod,
  type TxReceipt,
} from "./types";

/**
 * Read/write gateway to the marketplace and the settlement token. Every
 * write blocks until the transaction is mined (or the bounded wait expires).
 */
export interface ChainClient {
  readonly address: string;
  getAllCampaigns(): Promise<CampaignId[]>;
  getCampaignInfo(id: CampaignId): Promise<Campaign>;
  currentGasPrice(): Promise<bigint>;
  accountNonce(address: string): Promise<number>;
  buildAndSubmit(call: ContractCall, nonce: number, gasLimit: bigint): Promise<TxReceipt>;
}

// Static budgets rather than estimateGas: predictable, one less RPC round trip.
export const GAS_LIMITS: Record<ContractMethod, bigint> = {
  acceptProjectCampaign: 100_000n,
  fulfilProjectCampaign: 200_000n,
  discardCampaign: 100_000n,
  unfulfillCampaign: 100_000n,
  transfer: 100_000n,
};

/**
 * Decodes a `getCampaignInfo` result:
 * (campaignId, createdAt, creatorAddress, selectedKol, offerEndsIn,
 *  promotionEndsIn, amountOffered, campaignStatus)
 */
export function decodeCampaign(id: CampaignId, raw: unknown): Campaign {
  if (!Array.isArray(raw) || raw.length < 8) {
    throw new ReadError(id, `campaign ${formatCampaignId(id)}: unexpected getCampaignInfo result`);
  }
  const fields: unknown[] = Array.from(raw);
  const [, , creator, kol, offerDeadline, promotionDeadline, amount, status] = fields;

  if (typeof creator !== "string" || !isAddress(creator)) {
    throw new ReadError(id, `campaign ${formatCampaignId(id)}: bad creator address`);
  }
  if (typeof kol !== "string" || !isAddress(kol)) {
    throw new ReadError(id, `campaign ${formatCampaignId(id)}: bad kol address`);
  }
  if (
    typeof offerDeadline !== "bigint" ||
    typeof promotionDeadline !== "bigint" ||
    typeof amount !== "bigint"
  ) {
    throw new ReadError(id, `campaign ${formatCampaignId(id)}: non-integer deadline or amount`);
  }
  const ordinal = typeof status === "bigint" || typeof status === "number" ? Number(status) : -1;
  const decodedStatus = CAMPAIGN_STATUSES[ordinal];
  if (decodedStatus === undefined) {
    throw new ReadError(id, `campaign ${formatCampaignId(id)}: unknown status ${String(status)}`);
  }

  return {
    id,
    creator,
    kol,
    offerDeadline,
    promotionDeadline,
    totalAmount: amount,
    status: decodedStatus,
  };
}

export interface EthersChainClientOptions {
  provider: Provider;
  privateKey: string;
  marketplaceAddress: string;
  tokenAddress: string;
  marketplaceAbi: InterfaceAbi;
  tokenAbi: InterfaceAbi;
  idType: CampaignIdType;
  confirmations: number;
  txTimeoutMs: number;
  logger: Logger;
}

export class EthersChainClient implements ChainClient {
  readonly address: string;
  private readonly provider: Provider;
  private readonly marketplace: Contract;
  private readonly token: Contract;
  private readonly idType: CampaignIdType;
  private readonly confirmations: number;
  private readonly txTimeoutMs: number;
  private readonly logger: Logger;

  constructor(opts: EthersChainClientOptions) {
    const wallet = new Wallet(opts.privateKey, opts.provider);
    this.address = wallet.address;
    this.provider = opts.provider;
    this.marketplace = new Contract(opts.marketplaceAddress, opts.marketplaceAbi, wallet);
    this.token = new Contract(opts.tokenAddress, opts.tokenAbi, wallet);
    this.idType = opts.idType;
    this.confirmations = opts.confirmations;
    this.txTimeoutMs = opts.txTimeoutMs;
    this.logger = opts.logger.child({ component: "chain" });
  }

  async chainId(): Promise<bigint> {
    const network = await this.provider.getNetwork();
    return network.chainId;
  }

  async getAllCampaigns(): Promise<CampaignId[]> {
    let raw: unknown;
    try {
      raw = await this.marketplace.getFunction("getAllCampaigns").staticCall();
    } catch (err) {
      throw new ReadError(undefined, `getAllCampaigns failed: ${errorMessage(err)}`, { cause: err });
    }
    if (!Array.isArray(raw)) {
      throw new ReadError(undefined, "getAllCampaigns returned a non-list");
    }
    const ids: unknown[] = Array.from(raw);
    try {
      return ids.map((v) => parseCampaignId(v, this.idType));
    } catch (err) {
      throw new ReadError(undefined, `getAllCampaigns: ${errorMessage(err)}`, { cause: err });
    }
  }

  async getCampaignInfo(id: CampaignId): Promise<Campaign> {
    let raw: unknown;
    try {
      raw = await this.marketplace.getFunction("getCampaignInfo").staticCall(id);
    } catch (err) {
      throw new ReadError(id, `getCampaignInfo(${formatCampaignId(id)}) failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    return decodeCampaign(id, raw);
  }

  async currentGasPrice(): Promise<bigint> {
    const fees = await this.provider.getFeeData();
    if (fees.gasPrice === null) {
      throw new ReadError(undefined, "node returned no gas price");
    }
    return fees.gasPrice;
  }

  async accountNonce(address: string): Promise<number> {
    try {
      return await this.provider.getTransactionCount(address, "pending");
    } catch (err) {
      throw new ReadError(undefined, `getTransactionCount(${address}) failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async buildAndSubmit(call: ContractCall, nonce: number, gasLimit: bigint): Promise<TxReceipt> {
    const { contract, args } = this.route(call);

    let tx: ContractTransactionResponse;
    try {
      const gasPrice = await this.currentGasPrice();
      tx = await contract.getFunction(call.method).send(...args, { nonce, gasLimit, gasPrice });
    } catch (err) {
      throw new SubmissionError(`${call.method} rejected (nonce ${nonce}): ${errorMessage(err)}`, {
        cause: err,
        outcome: "rejected",
      });
    }
    this.logger.info({ method: call.method, nonce, hash: tx.hash }, "transaction sent");

    let receipt: ContractTransactionReceipt | null;
    try {
      receipt = await tx.wait(this.confirmations, this.txTimeoutMs);
    } catch (err) {
      throw new SubmissionError(`${call.method} ${tx.hash} not confirmed: ${errorMessage(err)}`, {
        cause: err,
        outcome: "unconfirmed",
        txHash: tx.hash,
        nonce,
      });
    }
    if (receipt === null) {
      throw new SubmissionError(`${call.method} ${tx.hash} not confirmed: no receipt`, {
        outcome: "unconfirmed",
        txHash: tx.hash,
        nonce,
      });
    }
    if (receipt.status !== 1) {
      throw new SubmissionError(`${call.method} ${tx.hash} reverted`, { outcome: "reverted", txHash: tx.hash, nonce });
    }

    this.logger.info({ method: call.method, hash: receipt.hash, block: receipt.blockNumber }, "transaction mined");
    return {
      hash: receipt.hash,
      nonce: tx.nonce,
      blockNumber: receipt.blockNumber,
      gasUsed: receipt.gasUsed,
    };
  }

  private route(call: ContractCall): { contract: Contract; args: unknown[] } {
    switch (call.method) {
      case "transfer":
        return { contract: this.token, args: [call.to, call.amount] };
      case "acceptProjectCampaign":
      case "fulfilProjectCampaign":
      case "discardCampaign":
      case "unfulfillCampaign":
        return { contract: this.marketplace, args: [call.campaignId] };
    }
  }
}
