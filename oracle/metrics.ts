import { Counter, Gauge, Histogram, Registry } from "prom-client";

export interface OracleMetrics {
  registry: Registry;
  passes: Counter<"result">;
  actions: Counter<"action" | "result">;
  failures: Counter<"kind">;
  lastPassCampaigns: Gauge;
  passDuration: Histogram;
}

/**
 * One registry per engine so that several engines (and test runs) never
 * collide on metric names in the global registry.
 */
export function createMetrics(registry = new Registry()): OracleMetrics {
  return {
    registry,
    passes: new Counter({
      name: "oracle_passes_total",
      help: "Settlement passes by result",
      labelNames: ["result"],
      registers: [registry],
    }),
    actions: new Counter({
      name: "oracle_actions_total",
      help: "Settlement actions executed by kind and result",
      labelNames: ["action", "result"],
      registers: [registry],
    }),
    failures: new Counter({
      name: "oracle_campaign_failures_total",
      help: "Per-campaign failures by error kind",
      labelNames: ["kind"],
      registers: [registry],
    }),
    lastPassCampaigns: new Gauge({
      name: "oracle_last_pass_campaigns",
      help: "Campaigns evaluated in the last pass",
      registers: [registry],
    }),
    passDuration: new Histogram({
      name: "oracle_pass_duration_seconds",
      help: "Wall time of a settlement pass",
      buckets: [0.5, 1, 5, 15, 30, 60, 120, 300],
      registers: [registry],
    }),
  };
}
