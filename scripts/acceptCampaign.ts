import "dotenv/config";
import { parseCampaignId } from "../oracle/campaignId";
import { loadConfig } from "../oracle/config";
import { createEngine } from "../oracle/engine";
import { errorKind, errorMessage } from "../oracle/errors";
import { bootLogger, createLogger } from "../oracle/logger";

// usage: tsx scripts/acceptCampaign.ts <campaignId>
async function main() {
  const rawId = process.argv[2];
  if (!rawId) {
    throw new Error("usage: tsx scripts/acceptCampaign.ts <campaignId>");
  }

  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, pretty: config.logPretty });
  const campaignId = parseCampaignId(rawId, config.campaignIdType);
  const engine = await createEngine(config, logger);

  const campaign = await engine.chain.getCampaignInfo(campaignId);
  if (campaign.status !== "OPEN") {
    throw new Error(`campaign ${rawId} is ${campaign.status}, only OPEN campaigns can be accepted`);
  }
  const [receipt] = await engine.executor.execute({ kind: "accept", campaignId });
  logger.info({ campaignId: rawId, hash: receipt?.hash }, "acceptProjectCampaign confirmed");
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    bootLogger.error({ kind: errorKind(err), err: errorMessage(err) }, "acceptCampaign failed");
    process.exit(1);
  },
);
