import type { SettlementEngine } from "./engine";
import { errorKind, errorMessage, isFatal, type ErrorKind } from "./errors";
import { evaluate } from "./evaluator";
import type { Logger } from "./logger";
import {
  describeCampaign,
  formatCampaignId,
  type Campaign,
  type CampaignId,
  type SettlementAction,
} from "./types";

export type OrchestratorState = "idle" | "polling";

export interface CampaignOutcome {
  campaignId: string;
  action: SettlementAction["kind"] | "unknown";
  result: "skipped" | "settled" | "failed";
  txHashes: string[];
  errorKind?: ErrorKind | "Unexpected";
  error?: string;
}

export interface PassReport {
  campaigns: number;
  settled: number;
  skipped: number;
  failed: number;
  durationMs: number;
  outcomes: CampaignOutcome[];
}

export interface OrchestratorOptions {
  /** Epoch milliseconds. */
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}

async function mapWithConcurrency<T, R>(items: T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let cursor = 0;
  async function worker() {
    while (cursor < items.length) {
      const index = cursor++;
      results[index] = await fn(items[index]);
    }
  }
  await Promise.all(Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker));
  return results;
}

/**
 * The polling loop. A pass lists campaign ids, evaluates and settles each one
 * independently, then the loop sleeps; passes never overlap. Per-campaign
 * failures are logged and counted, never propagated. A pass whose source is
 * unavailable fails as a whole and is retried after the interval.
 */
export class SettlementOrchestrator {
  private state: OrchestratorState = "idle";
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly pause: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly engine: SettlementEngine,
    opts: OrchestratorOptions = {},
  ) {
    this.logger = engine.logger.child({ component: "orchestrator" });
    this.now = opts.now ?? Date.now;
    this.pause = opts.sleep ?? sleep;
  }

  get currentState(): OrchestratorState {
    return this.state;
  }

  async runPass(): Promise<PassReport> {
    if (this.state === "polling") {
      throw new Error("a settlement pass is already running");
    }
    this.state = "polling";
    const started = Date.now();
    const endTimer = this.engine.metrics.passDuration.startTimer();

    try {
      const ids = await this.engine.source.listCampaignIds();
      this.logger.info({ source: this.engine.source.name, campaigns: ids.length }, "processing campaigns");

      const outcomes = await mapWithConcurrency(ids, this.engine.settings.concurrency, (id) =>
        this.processCampaign(id),
      );

      const report: PassReport = {
        campaigns: ids.length,
        settled: outcomes.filter((o) => o.result === "settled").length,
        skipped: outcomes.filter((o) => o.result === "skipped").length,
        failed: outcomes.filter((o) => o.result === "failed").length,
        durationMs: Date.now() - started,
        outcomes,
      };
      this.engine.metrics.lastPassCampaigns.set(ids.length);
      return report;
    } finally {
      endTimer();
      this.state = "idle";
    }
  }

  /** Loops until `signal` aborts. Only fatal errors escape. */
  async run(signal?: AbortSignal): Promise<void> {
    const interval = this.engine.settings.pollIntervalMs;
    this.logger.info({ intervalMs: interval, account: this.engine.chain.address }, "settlement loop started");

    while (!signal?.aborted) {
      try {
        const report = await this.runPass();
        this.engine.metrics.passes.inc({ result: "ok" });
        this.logger.info(
          {
            campaigns: report.campaigns,
            settled: report.settled,
            skipped: report.skipped,
            failed: report.failed,
            durationMs: report.durationMs,
          },
          "campaigns processed",
        );
      } catch (err) {
        if (isFatal(err)) throw err;
        this.engine.metrics.passes.inc({ result: "failed" });
        this.logger.error({ kind: errorKind(err), err: errorMessage(err) }, "settlement pass failed");
      }
      if (signal?.aborted) break;
      this.logger.debug({ ms: interval }, "sleeping");
      await this.pause(interval, signal);
    }
    this.logger.info("settlement loop stopped");
  }

  private async processCampaign(id: CampaignId): Promise<CampaignOutcome> {
    const campaignId = formatCampaignId(id);
    let snapshot: Campaign | undefined;
    let action: SettlementAction | undefined;

    try {
      snapshot = await this.engine.chain.getCampaignInfo(id);
      action = evaluate(snapshot, this.now(), this.engine.policy);

      if (action.kind === "none") {
        this.logger.debug({ campaignId, reason: action.reason }, "nothing to do");
        return { campaignId, action: "none", result: "skipped", txHashes: [] };
      }

      this.logger.info({ campaignId, action: action.kind, status: snapshot.status }, "executing action");
      const receipts = await this.engine.executor.execute(action);
      this.engine.metrics.actions.inc({ action: action.kind, result: "ok" });
      return { campaignId, action: action.kind, result: "settled", txHashes: receipts.map((r) => r.hash) };
    } catch (err) {
      const kind = errorKind(err);
      this.engine.metrics.failures.inc({ kind });
      if (action) this.engine.metrics.actions.inc({ action: action.kind, result: "failed" });
      this.logger.error(
        { campaignId, kind, err: errorMessage(err), snapshot: snapshot ? describeCampaign(snapshot) : undefined },
        "campaign processing failed",
      );
      return {
        campaignId,
        action: action?.kind ?? "unknown",
        result: "failed",
        txHashes: [],
        errorKind: kind,
        error: errorMessage(err),
      };
    }
  }
}
