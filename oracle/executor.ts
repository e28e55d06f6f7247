import type { AnomalyReporter } from "./alerts";
import type { StatusNotifier } from "./campaignSource";
import { GAS_LIMITS, type ChainClient } from "./chainClient";
import { PartialSettlementError, SubmissionError, errorMessage } from "./errors";
import { settlementTransfer, type SettlementPolicy } from "./evaluator";
import type { Logger } from "./logger";
import type { NonceSequencer } from "./nonceSequencer";
import {
  formatCampaignId,
  type CampaignId,
  type CampaignStatus,
  type ContractCall,
  type ContractMethod,
  type SettlementAction,
  type TransferAction,
  type TransitionKind,
  type TxReceipt,
} from "./types";

interface Transition {
  method: Exclude<ContractMethod, "transfer" | "acceptProjectCampaign">;
  status: CampaignStatus;
}

const TRANSITIONS: Record<TransitionKind, Transition> = {
  discard: { method: "discardCampaign", status: "DISCARDED" },
  fulfil: { method: "fulfilProjectCampaign", status: "FULFILLED" },
  unfulfill: { method: "unfulfillCampaign", status: "UNFULFILLED" },
};

export interface ExecutorDeps {
  chain: ChainClient;
  sequencer: NonceSequencer;
  policy: SettlementPolicy;
  logger: Logger;
  alerts: AnomalyReporter;
  notifier?: StatusNotifier;
}

/**
 * Carries out an action as a two-phase sequence under the account lock:
 *
 *   1. submit the state transition and wait for its receipt;
 *   2. re-read the campaign, derive the transfer and a fresh nonce from that
 *      state, submit the transfer and wait for its receipt.
 *
 * A rejected or reverted transition leaves nothing behind and the next pass
 * retries. A transition whose receipt timed out is checked against the
 * contract: if it landed, phase 2 runs; if not, it may still land, so the
 * campaign is reported for reconciliation. A failure in phase 2 cannot be
 * rolled back and surfaces as PartialSettlementError.
 */
export class SettlementExecutor {
  private readonly logger: Logger;

  constructor(private readonly deps: ExecutorDeps) {
    this.logger = deps.logger.child({ component: "executor" });
  }

  async execute(action: SettlementAction): Promise<TxReceipt[]> {
    switch (action.kind) {
      case "none":
        return [];
      case "accept":
        return this.deps.sequencer.exclusive(() => this.accept(action.campaignId));
      case "discard":
      case "fulfil":
      case "unfulfill":
        return this.deps.sequencer.exclusive(() => this.settle(action));
    }
  }

  private async accept(campaignId: CampaignId): Promise<TxReceipt[]> {
    const receipt = await this.submit({ method: "acceptProjectCampaign", campaignId });
    this.logger.info({ campaignId: formatCampaignId(campaignId), hash: receipt.hash }, "campaign accepted");
    await this.notify(campaignId, "ACCEPTED");
    return [receipt];
  }

  private async settle(action: TransferAction): Promise<TxReceipt[]> {
    const step = TRANSITIONS[action.kind];
    const id = formatCampaignId(action.campaignId);

    let transition: TxReceipt | undefined;
    let transitionHash: string;
    try {
      transition = await this.submit({ method: step.method, campaignId: action.campaignId });
      transitionHash = transition.hash;
    } catch (err) {
      if (!(err instanceof SubmissionError) || err.outcome !== "unconfirmed") throw err;
      transitionHash = await this.recoverUnconfirmed(action, step, err);
    }

    let transfer: TxReceipt;
    try {
      const fresh = await this.deps.chain.getCampaignInfo(action.campaignId);
      if (fresh.status !== step.status) {
        throw new SubmissionError(`expected ${step.status} after ${step.method}, contract reports ${fresh.status}`);
      }
      const { to, amount } = settlementTransfer(action.kind, fresh, this.deps.policy);
      transfer = await this.submit({ method: "transfer", to, amount });
      this.logger.info({ campaignId: id, to, amount: amount.toString(), hash: transfer.hash }, "funds transferred");
    } catch (err) {
      const partial = new PartialSettlementError(action.campaignId, step.method, transitionHash, { cause: err });
      this.logger.error(
        { campaignId: id, completedStep: step.method, txHash: transitionHash, err: errorMessage(err) },
        "partial settlement, manual reconciliation required",
      );
      await this.deps.alerts.report({
        campaignId: id,
        message: partial.message,
        details: { cause: errorMessage(err), intendedRecipient: action.transferTo },
      });
      throw partial;
    }

    await this.notify(action.campaignId, step.status);
    return transition ? [transition, transfer] : [transfer];
  }

  /** Returns the transition's hash when the contract shows it landed; reports and rethrows otherwise. */
  private async recoverUnconfirmed(action: TransferAction, step: Transition, err: SubmissionError): Promise<string> {
    const id = formatCampaignId(action.campaignId);
    const txHash = err.txHash ?? "unknown";

    let status: CampaignStatus | undefined;
    try {
      status = (await this.deps.chain.getCampaignInfo(action.campaignId)).status;
    } catch (readErr) {
      this.logger.warn({ campaignId: id, err: errorMessage(readErr) }, "re-read after unconfirmed transition failed");
    }

    if (status === step.status) {
      if (err.nonce !== undefined) this.deps.sequencer.confirm(err.nonce);
      this.logger.warn({ campaignId: id, method: step.method, txHash }, "transition landed after its receipt timed out");
      return txHash;
    }

    this.logger.error(
      { campaignId: id, method: step.method, txHash, status: status ?? "unknown", err: err.message },
      "transition unconfirmed, possible partial settlement",
    );
    await this.deps.alerts.report({
      campaignId: id,
      message: `campaign ${id}: ${step.method} ${txHash} was broadcast but not confirmed; if it lands the transfer is not sent`,
      details: { cause: err.message, status: status ?? "unknown", intendedRecipient: action.transferTo },
    });
    throw err;
  }

  private async submit(call: ContractCall): Promise<TxReceipt> {
    const nonce = await this.deps.sequencer.next();
    const receipt = await this.deps.chain.buildAndSubmit(call, nonce, GAS_LIMITS[call.method]);
    this.deps.sequencer.confirm(receipt.nonce);
    return receipt;
  }

  private async notify(campaignId: CampaignId, status: CampaignStatus): Promise<void> {
    if (!this.deps.notifier) return;
    try {
      await this.deps.notifier.notifyStatus(campaignId, status);
    } catch (err) {
      this.logger.warn(
        { campaignId: formatCampaignId(campaignId), status, err: errorMessage(err) },
        "registry status update failed",
      );
    }
  }
}
