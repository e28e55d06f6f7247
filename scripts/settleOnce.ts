import "dotenv/config";
import { loadConfig } from "../oracle/config";
import { createEngine } from "../oracle/engine";
import { errorKind, errorMessage } from "../oracle/errors";
import { bootLogger, createLogger } from "../oracle/logger";
import { SettlementOrchestrator } from "../oracle/orchestrator";

// Runs a single settlement pass and exits; non-zero when the pass could not run.
async function main() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, pretty: config.logPretty });
  const engine = await createEngine(config, logger);

  const report = await new SettlementOrchestrator(engine).runPass();
  logger.info(
    { campaigns: report.campaigns, settled: report.settled, skipped: report.skipped, failed: report.failed },
    "pass complete",
  );
  for (const o of report.outcomes.filter((o) => o.result !== "skipped")) {
    logger.info(o, `campaign ${o.campaignId}: ${o.result}`);
  }
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    bootLogger.error({ kind: errorKind(err), err: errorMessage(err) }, "settleOnce failed");
    process.exit(1);
  },
);
