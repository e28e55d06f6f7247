import type { ChainClient } from "./chainClient";

export type NonceSource = Pick<ChainClient, "accountNonce">;

/**
 * Nonce bookkeeping for the single settlement account.
 *
 * Submissions run one at a time through `exclusive`, and each nonce is
 * derived only after the previous transaction has been confirmed: the node's
 * pending count, floored at last confirmed + 1 so a lagging node cannot hand
 * back a nonce that was already used.
 */
export class NonceSequencer {
  private tail: Promise<unknown> = Promise.resolve();
  private lastConfirmed = -1;

  constructor(
    private readonly source: NonceSource,
    readonly address: string,
  ) {}

  /** Runs `task` after every previously queued task has settled. */
  exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task);
    this.tail = run.catch(() => undefined);
    return run;
  }

  async next(): Promise<number> {
    const onChain = await this.source.accountNonce(this.address);
    return Math.max(onChain, this.lastConfirmed + 1);
  }

  /**
   * `count` consecutive nonces starting at `next()`. Only safe when the
   * transactions do not depend on each other; dependent steps call `next()`
   * again after each confirmation.
   */
  async reserve(count: number): Promise<number[]> {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`cannot reserve ${count} nonces`);
    }
    const first = await this.next();
    return Array.from({ length: count }, (_, i) => first + i);
  }

  confirm(nonce: number): void {
    this.lastConfirmed = Math.max(this.lastConfirmed, nonce);
  }
}
