import { JsonRpcProvider } from "ethers";
import { loadAbiFile, marketplaceAbi, TOKEN_ABI } from "./abi";
import { SlackAnomalyReporter, noopReporter, type AnomalyReporter } from "./alerts";
import {
  ContractCampaignSource,
  RegistryCampaignSource,
  type CampaignSource,
  type StatusNotifier,
} from "./campaignSource";
import { EthersChainClient, type ChainClient } from "./chainClient";
import type { OracleConfig } from "./config";
import { ConfigError, errorMessage } from "./errors";
import { DEFAULT_POLICY, type SettlementPolicy } from "./evaluator";
import { SettlementExecutor } from "./executor";
import type { Logger } from "./logger";
import { createMetrics, type OracleMetrics } from "./metrics";
import { NonceSequencer } from "./nonceSequencer";

export interface EngineSettings {
  pollIntervalMs: number;
  concurrency: number;
}

/**
 * Everything a settlement pass needs, constructed explicitly and handed to
 * the orchestrator.
 */
export interface SettlementEngine {
  chain: ChainClient;
  source: CampaignSource;
  sequencer: NonceSequencer;
  executor: SettlementExecutor;
  policy: SettlementPolicy;
  settings: EngineSettings;
  logger: Logger;
  metrics: OracleMetrics;
}

export interface EngineParts {
  chain: ChainClient;
  source: CampaignSource;
  logger: Logger;
  policy?: SettlementPolicy;
  settings?: Partial<EngineSettings>;
  notifier?: StatusNotifier;
  alerts?: AnomalyReporter;
  metrics?: OracleMetrics;
}

export function assembleEngine(parts: EngineParts): SettlementEngine {
  const policy = parts.policy ?? DEFAULT_POLICY;
  const sequencer = new NonceSequencer(parts.chain, parts.chain.address);
  const executor = new SettlementExecutor({
    chain: parts.chain,
    sequencer,
    policy,
    logger: parts.logger,
    alerts: parts.alerts ?? noopReporter,
    notifier: parts.notifier,
  });

  return {
    chain: parts.chain,
    source: parts.source,
    sequencer,
    executor,
    policy,
    settings: {
      pollIntervalMs: parts.settings?.pollIntervalMs ?? 10_000,
      concurrency: parts.settings?.concurrency ?? 1,
    },
    logger: parts.logger,
    metrics: parts.metrics ?? createMetrics(),
  };
}

function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(message)), ms);
  });
  return Promise.race([promise, expiry]).finally(() => clearTimeout(timer));
}

/**
 * Builds the production engine: RPC provider, settlement wallet, contracts
 * and the configured campaign source. Startup problems are ConfigErrors.
 */
export async function createEngine(config: OracleConfig, logger: Logger): Promise<SettlementEngine> {
  const provider = new JsonRpcProvider(config.rpcUrl);

  let chain: EthersChainClient;
  try {
    chain = new EthersChainClient({
      provider,
      privateKey: config.privateKey,
      marketplaceAddress: config.marketplaceAddress,
      tokenAddress: config.tokenAddress,
      marketplaceAbi: config.marketplaceAbiPath
        ? loadAbiFile(config.marketplaceAbiPath)
        : marketplaceAbi(config.campaignIdType),
      tokenAbi: config.tokenAbiPath ? loadAbiFile(config.tokenAbiPath) : TOKEN_ABI,
      idType: config.campaignIdType,
      confirmations: config.confirmations,
      txTimeoutMs: config.txTimeoutMs,
      logger,
    });
  } catch (err) {
    provider.destroy();
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(`cannot set up chain client: ${errorMessage(err)}`, { cause: err });
  }

  let chainId: bigint;
  try {
    chainId = await withTimeout(chain.chainId(), config.txTimeoutMs, `no response from ${config.rpcUrl}`);
  } catch (err) {
    provider.destroy();
    throw new ConfigError(`RPC endpoint unreachable: ${errorMessage(err)}`, { cause: err });
  }
  logger.info({ chainId: chainId.toString(), account: chain.address }, "connected to chain");

  let source: CampaignSource;
  let notifier: StatusNotifier | undefined;
  if (config.registry) {
    const registry = new RegistryCampaignSource(config.registry, config.campaignIdType);
    source = registry;
    notifier = registry;
  } else {
    source = new ContractCampaignSource(chain);
  }

  return assembleEngine({
    chain,
    source,
    logger,
    notifier,
    alerts: config.slackWebhook ? new SlackAnomalyReporter(config.slackWebhook, logger) : undefined,
    policy: {
      deadlineUnit: config.deadlineUnit,
      settlementFractionBps: config.settlementFractionBps,
      fulfilBeforeDeadline: config.fulfilBeforeDeadline,
    },
    settings: { pollIntervalMs: config.pollIntervalMs, concurrency: config.concurrency },
  });
}
