import { z } from "zod";
import { ConfigError } from "./errors";

const hexAddress = z.string().regex(/^0x[0-9a-fA-F]{40}$/, "expected a 0x-prefixed 20-byte address");

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const positiveInt = z.coerce.number().int().positive();

const envSchema = z
  .object({
    RPC_URL: z.string().url(),
    PRIVATE_KEY: z.string().regex(/^(0x)?[0-9a-fA-F]{64}$/, "expected a 32-byte hex private key"),
    MARKETPLACE_ADDRESS: hexAddress,
    TOKEN_ADDRESS: hexAddress,
    MARKETPLACE_ABI_PATH: z.string().min(1).optional(),
    TOKEN_ABI_PATH: z.string().min(1).optional(),
    CAMPAIGN_ID_TYPE: z.enum(["bytes32", "uint256"]).default("bytes32"),
    CAMPAIGN_SOURCE: z.enum(["contract", "registry"]).default("contract"),
    REGISTRY_URL: z.string().url().optional(),
    REGISTRY_API_KEY: z.string().min(1).optional(),
    REGISTRY_SOURCE_TAG: z.string().min(1).default("oracle"),
    POLL_INTERVAL_MS: positiveInt.default(10_000),
    DEADLINE_UNIT: z.enum(["seconds", "milliseconds"]).default("seconds"),
    SETTLEMENT_FRACTION_BPS: z.coerce.number().int().min(1).max(10_000).default(9_000),
    FULFIL_BEFORE_DEADLINE: flag.default("true"),
    TX_TIMEOUT_MS: positiveInt.default(120_000),
    CONFIRMATIONS: positiveInt.default(1),
    HTTP_TIMEOUT_MS: positiveInt.default(10_000),
    CONCURRENCY: positiveInt.default(1),
    METRICS_PORT: positiveInt.optional(),
    SLACK_WEBHOOK: z.string().url().optional(),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    LOG_PRETTY: flag.default("false"),
  })
  .superRefine((env, ctx) => {
    if (env.CAMPAIGN_SOURCE !== "registry") return;
    for (const key of ["REGISTRY_URL", "REGISTRY_API_KEY"] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: "required when CAMPAIGN_SOURCE=registry",
        });
      }
    }
  });

export interface RegistryConfig {
  baseUrl: string;
  apiKey: string;
  sourceTag: string;
  timeoutMs: number;
}

export interface OracleConfig {
  rpcUrl: string;
  privateKey: string;
  marketplaceAddress: string;
  tokenAddress: string;
  marketplaceAbiPath?: string;
  tokenAbiPath?: string;
  campaignIdType: "bytes32" | "uint256";
  registry?: RegistryConfig;
  pollIntervalMs: number;
  deadlineUnit: "seconds" | "milliseconds";
  settlementFractionBps: number;
  fulfilBeforeDeadline: boolean;
  txTimeoutMs: number;
  confirmations: number;
  concurrency: number;
  metricsPort?: number;
  slackWebhook?: string;
  logLevel: string;
  logPretty: boolean;
}

// Empty strings in .env files mean "unset".
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value.trim();
  }
  return out;
}

/**
 * Validates the process environment. Any missing or malformed value is a
 * ConfigError listing every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): OracleConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }
  const e = parsed.data;

  const registry =
    e.CAMPAIGN_SOURCE === "registry" && e.REGISTRY_URL && e.REGISTRY_API_KEY
      ? {
          baseUrl: e.REGISTRY_URL.replace(/\/+$/, ""),
          apiKey: e.REGISTRY_API_KEY,
          sourceTag: e.REGISTRY_SOURCE_TAG,
          timeoutMs: e.HTTP_TIMEOUT_MS,
        }
      : undefined;

  return {
    rpcUrl: e.RPC_URL,
    privateKey: e.PRIVATE_KEY.startsWith("0x") ? e.PRIVATE_KEY : `0x${e.PRIVATE_KEY}`,
    marketplaceAddress: e.MARKETPLACE_ADDRESS,
    tokenAddress: e.TOKEN_ADDRESS,
    marketplaceAbiPath: e.MARKETPLACE_ABI_PATH,
    tokenAbiPath: e.TOKEN_ABI_PATH,
    campaignIdType: e.CAMPAIGN_ID_TYPE,
    registry,
    pollIntervalMs: e.POLL_INTERVAL_MS,
    deadlineUnit: e.DEADLINE_UNIT,
    settlementFractionBps: e.SETTLEMENT_FRACTION_BPS,
    fulfilBeforeDeadline: e.FULFIL_BEFORE_DEADLINE,
    txTimeoutMs: e.TX_TIMEOUT_MS,
    confirmations: e.CONFIRMATIONS,
    concurrency: e.CONCURRENCY,
    metricsPort: e.METRICS_PORT,
    slackWebhook: e.SLACK_WEBHOOK,
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY,
  };
}
