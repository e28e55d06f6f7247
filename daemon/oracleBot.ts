import "dotenv/config";
import http from "http";
import client from "prom-client";
import { loadConfig } from "../oracle/config";
import { createEngine } from "../oracle/engine";
import { errorKind, errorMessage } from "../oracle/errors";
import { bootLogger, createLogger } from "../oracle/logger";
import { SettlementOrchestrator } from "../oracle/orchestrator";

/*
 * oracleBot – campaign settlement daemon
 * --------------------------------------
 * Polls every campaign, discards expired offers, fulfils or unfulfils
 * accepted campaigns and pays out the escrow from the settlement account.
 */

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, pretty: config.logPretty });
  const engine = await createEngine(config, logger);

  // Expose metrics on the configured port.
  let server: http.Server | undefined;
  if (config.metricsPort !== undefined) {
    client.collectDefaultMetrics({ register: engine.metrics.registry });
    const port = config.metricsPort;
    server = http.createServer((_req, res) => {
      engine.metrics.registry.metrics().then(
        (body) => {
          res.writeHead(200, { "Content-Type": engine.metrics.registry.contentType });
          res.end(body);
        },
        (err: unknown) => {
          res.writeHead(500);
          res.end(errorMessage(err));
        },
      );
    });
    server.listen(port, () => logger.info({ port }, "metrics listening"));
  }

  const shutdown = new AbortController();
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      logger.info({ signal }, "shutting down after the current pass");
      shutdown.abort();
    });
  }

  const orchestrator = new SettlementOrchestrator(engine);
  try {
    await orchestrator.run(shutdown.signal);
  } finally {
    server?.close();
  }
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    bootLogger.fatal({ kind: errorKind(err), err: errorMessage(err) }, "oracleBot stopped");
    process.exit(1);
  },
);
