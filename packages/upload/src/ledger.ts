/**
 * Replication Ledger
 *
 * Per-target record of a run's outcomes. Lanes for different targets append
 * concurrently; every append goes through `record`, and the engine seals the
 * ledger before handing it on.
 */

import type { TransferOutcome, UploadItem } from '@skyrelay/core';

export class ReplicationLedger {
  private readonly succeededByTarget = new Map<string, UploadItem[]>();
  private readonly recorded: TransferOutcome[] = [];
  private readonly pairs = new Set<string>();
  private sealed = false;

  /**
   * Register an admitted target so it appears in the ledger even with no
   * successes. Rejected and unavailable targets are never tracked.
   */
  track(target: string): void {
    this.assertOpen();
    if (!this.succeededByTarget.has(target)) {
      this.succeededByTarget.set(target, []);
    }
  }

  record(outcome: TransferOutcome): void {
    this.assertOpen();

    const pair = `${outcome.target}\u0000${outcome.item.name}`;
    if (this.pairs.has(pair)) {
      throw new Error(`Outcome already recorded for ${outcome.item.name} on ${outcome.target}`);
    }
    this.pairs.add(pair);
    this.recorded.push(outcome);

    if (outcome.status === 'succeeded') {
      this.track(outcome.target);
      this.succeededByTarget.get(outcome.target)?.push(outcome.item);
    }
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Items that reached `succeeded` on the target, in upload order
   */
  succeeded(target: string): readonly UploadItem[] {
    return [...(this.succeededByTarget.get(target) ?? [])];
  }

  /**
   * Admitted targets and targets with at least one success
   */
  targets(): string[] {
    return [...this.succeededByTarget.keys()];
  }

  outcomes(target?: string): readonly TransferOutcome[] {
    return target === undefined
      ? [...this.recorded]
      : this.recorded.filter((o) => o.target === target);
  }

  failures(target?: string): readonly TransferOutcome[] {
    return this.outcomes(target).filter((o) => o.status !== 'succeeded');
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new Error('Replication ledger is sealed');
    }
  }
}
