import { IncomingWebhook } from "@slack/webhook";
import { errorMessage } from "./errors";
import type { Logger } from "./logger";

export interface Anomaly {
  campaignId: string;
  message: string;
  details?: Record<string, string>;
}

export interface AnomalyReporter {
  report(anomaly: Anomaly): Promise<void>;
}

/** Posts anomalies to a Slack channel; delivery problems are logged only. */
export class SlackAnomalyReporter implements AnomalyReporter {
  private readonly webhook: IncomingWebhook;

  constructor(url: string, private readonly logger: Logger) {
    this.webhook = new IncomingWebhook(url);
  }

  async report(anomaly: Anomaly): Promise<void> {
    const lines = [`[settlement-oracle] ${anomaly.message}`, `campaign: ${anomaly.campaignId}`];
    for (const [key, value] of Object.entries(anomaly.details ?? {})) {
      lines.push(`${key}: ${value}`);
    }
    try {
      await this.webhook.send({ text: lines.join("\n") });
    } catch (err) {
      this.logger.warn({ campaignId: anomaly.campaignId, err: errorMessage(err) }, "Slack alert delivery failed");
    }
  }
}

export const noopReporter: AnomalyReporter = {
  async report() {},
};
