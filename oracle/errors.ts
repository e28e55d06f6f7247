import { formatCampaignId, type CampaignId } from "./types";

export type ErrorKind =
  | "ConfigError"
  | "SourceUnavailable"
  | "ReadError"
  | "SubmissionError";

export abstract class OracleError extends Error {
  abstract readonly kind: ErrorKind;
  /** Fatal errors stop the daemon; everything else is retried next pass. */
  readonly fatal: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends OracleError {
  readonly kind = "ConfigError";
  override readonly fatal = true;
}

export class SourceUnavailableError extends OracleError {
  readonly kind = "SourceUnavailable";
}

export class ReadError extends OracleError {
  readonly kind = "ReadError";

  constructor(
    readonly campaignId: CampaignId | undefined,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * `rejected`: the node refused the transaction, nothing was broadcast.
 * `reverted`: it was mined and failed.
 * `unconfirmed`: it was broadcast but no receipt arrived in time, so it may
 * still be mined later.
 */
export type SubmissionOutcome = "rejected" | "reverted" | "unconfirmed";

export interface SubmissionErrorOptions {
  cause?: unknown;
  outcome?: SubmissionOutcome;
  txHash?: string;
  nonce?: number;
}

export class SubmissionError extends OracleError {
  readonly kind = "SubmissionError";
  readonly outcome: SubmissionOutcome;
  readonly txHash: string | undefined;
  readonly nonce: number | undefined;

  constructor(message: string, options: SubmissionErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.outcome = options.outcome ?? "rejected";
    this.txHash = options.txHash;
    this.nonce = options.nonce;
  }
}

/**
 * The state transition landed but the paired transfer did not. The contract
 * already reports the terminal status, so the next pass will not retry the
 * transfer: this needs manual reconciliation.
 */
export class PartialSettlementError extends SubmissionError {
  constructor(
    readonly campaignId: CampaignId,
    readonly completedStep: string,
    readonly completedTxHash: string,
    options?: { cause?: unknown },
  ) {
    super(
      `campaign ${formatCampaignId(campaignId)}: ${completedStep} confirmed in ${completedTxHash} but the transfer failed`,
      options,
    );
  }
}

export function errorKind(err: unknown): ErrorKind | "Unexpected" {
  return err instanceof OracleError ? err.kind : "Unexpected";
}

export function isFatal(err: unknown): boolean {
  return err instanceof OracleError && err.fatal;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
