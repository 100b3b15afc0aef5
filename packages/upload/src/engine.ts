/**
 * Replication Engine
 *
 * Uploads one batch of files to every eligible target.
 *
 * - Occupied size is measured per target and the whole batch is admitted or
 *   rejected per target by the CapacityGuard
 * - Each admitted target gets its own lane that walks the items in order, so a
 *   stalled target never holds up another one
 * - Every (item, target) pair ends in exactly one outcome; failures are data
 * - Each pair runs under a deadline and an explicit retry policy
 * - Large files go up in parts, `maxConcurrentParts` at a time
 *
 * Events: `decision`, `transfer:start`, `progress`, `transfer:complete`.
 */

import { EventEmitter } from 'node:events';
import {
  ConfigurationError,
  NoEligibleTargetsError,
  NoFilesFoundError,
  TransferCancelledError,
  type CapacityDecision,
  type StorageTarget,
  type TransferOutcome,
  type UploadItem,
} from '@skyrelay/core';
import {
  createLimiter,
  createLogger,
  errorMessage,
  raceAbort,
  retry,
  type Limiter,
  type Logger,
  type RetryOptions,
} from '@skyrelay/utils';
import { CapacityGuard } from './capacityGuard.js';
import type { ConnectedTarget } from './connect.js';
import { ReplicationLedger } from './ledger.js';
import { ProgressTracker } from './progress.js';
import { totalBytes } from './scanner.js';
import type { TransferClient } from './targets/transferClient.js';
import { measureUsage, type BucketUsage } from './usage.js';

export type RetryPolicy = Pick<RetryOptions, 'maxAttempts' | 'initialDelay' | 'maxDelay' | 'backoffMultiplier'>;

/** Failed transfers are not retried unless a policy says so */
export const NO_RETRY: RetryPolicy = {
  maxAttempts: 1,
  initialDelay: 2000,
  maxDelay: 60000,
  backoffMultiplier: 2,
};

export const DEFAULT_TRANSFER_TIMEOUT_MS = 6 * 60 * 60 * 1000;
export const DEFAULT_PART_SIZE_BYTES = 8 * 1024 * 1024;
export const DEFAULT_MAX_CONCURRENT_PARTS = 10;

export interface ReplicationEngineOptions {
  guard?: CapacityGuard;
  retry?: Partial<RetryPolicy>;
  /** Deadline for one (item, target) pair including retries; 0 disables it */
  transferTimeoutMs?: number;
  /** Upper bound on simultaneous transfers across all targets */
  maxConcurrentTransfers?: number;
  partSizeBytes?: number;
  maxConcurrentParts?: number;
  /** Reject a quota-bound target when its usage listing failed */
  rejectDegradedUsage?: boolean;
  progressIntervalMs?: number;
  now?: () => number;
  logger?: Logger;
}

export interface TargetAssessment {
  connected: ConnectedTarget;
  decision: CapacityDecision;
  usage?: BucketUsage;
}

export interface ReplicationResult {
  ledger: ReplicationLedger;
  decisions: CapacityDecision[];
  usage: Record<string, BucketUsage>;
  items: readonly UploadItem[];
  pendingBytes: number;
  durationMs: number;
}

export interface TransferStartEvent {
  target: string;
  item: UploadItem;
  attempt: number;
}

export interface TransferProgressEvent {
  target: string;
  item: UploadItem;
  line: string;
}

export class ReplicationEngine extends EventEmitter {
  private readonly guard: CapacityGuard;
  private readonly retryPolicy: RetryPolicy;
  private readonly transferTimeoutMs: number;
  private readonly maxConcurrentTransfers: number;
  private readonly partSizeBytes: number;
  private readonly maxConcurrentParts: number;
  private readonly rejectDegradedUsage: boolean;
  private readonly progressIntervalMs: number;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(options: ReplicationEngineOptions = {}) {
    super();
    this.guard = options.guard ?? new CapacityGuard();
    this.retryPolicy = { ...NO_RETRY, ...options.retry };
    this.transferTimeoutMs = options.transferTimeoutMs ?? DEFAULT_TRANSFER_TIMEOUT_MS;
    this.maxConcurrentTransfers = options.maxConcurrentTransfers ?? Infinity;
    this.partSizeBytes = options.partSizeBytes ?? DEFAULT_PART_SIZE_BYTES;
    this.maxConcurrentParts = options.maxConcurrentParts ?? DEFAULT_MAX_CONCURRENT_PARTS;
    this.rejectDegradedUsage = options.rejectDegradedUsage ?? false;
    this.progressIntervalMs = options.progressIntervalMs ?? 1000;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger({ component: 'replication' });
  }

  /**
   * Replicate `items` to every enabled target.
   * Throws NoFilesFoundError and NoEligibleTargetsError as terminal outcomes,
   * and ConfigurationError for a batch with two items under one key, before
   * anything is transferred.
   */
  async run(
    targets: readonly ConnectedTarget[],
    items: readonly UploadItem[],
    signal?: AbortSignal
  ): Promise<ReplicationResult> {
    if (items.length === 0) {
      throw new NoFilesFoundError();
    }
    assertUniqueKeys(items);

    const startedAt = this.now();
    const pendingBytes = totalBytes(items);
    const enabled = targets.filter((t) => t.target.enabled);

    const assessments = await Promise.all(enabled.map((t) => this.assess(t, pendingBytes)));
    const decisions = assessments.map((a) => a.decision);
    for (const decision of decisions) {
      this.emit('decision', decision);
    }

    if (!decisions.some((d) => d.admitted)) {
      this.log.error({ decisions: decisions.map((d) => `${d.target}: ${d.reason}`) }, 'No eligible targets');
      throw new NoEligibleTargetsError(decisions);
    }

    const ledger = new ReplicationLedger();
    const limit = createLimiter(this.maxConcurrentTransfers);

    await Promise.all(assessments.map((a) => this.runLane(a, items, ledger, limit, signal)));

    const usage: Record<string, BucketUsage> = {};
    for (const assessment of assessments) {
      if (assessment.usage) {
        usage[assessment.connected.target.name] = assessment.usage;
      }
    }

    return {
      ledger: ledger.seal(),
      decisions,
      usage,
      items,
      pendingBytes,
      durationMs: this.now() - startedAt,
    };
  }

  /**
   * Measure occupied size and run the capacity check for one target
   */
  async assess(connected: ConnectedTarget, pendingBytes: number): Promise<TargetAssessment> {
    const { target, client } = connected;

    if (!client) {
      return { connected, decision: this.guard.unavailable(target, pendingBytes, connected.error) };
    }

    const usage = await measureUsage(client, target.bucket);
    if (usage.degraded) {
      this.log.warn(
        { target: target.name, bytes: usage.bytes, error: usage.error },
        'Bucket listing failed, occupied size is a best guess'
      );
    }

    const decision = this.guard.evaluate(target, usage.bytes, pendingBytes, usage.degraded);

    if (decision.admitted && usage.degraded && target.capacity && this.rejectDegradedUsage) {
      return {
        connected,
        usage,
        decision: {
          ...decision,
          admitted: false,
          verdict: 'usage-unknown',
          reason: `occupied size unknown: ${usage.error ?? 'listing failed'}`,
        },
      };
    }

    return { connected, decision, usage };
  }

  private async runLane(
    assessment: TargetAssessment,
    items: readonly UploadItem[],
    ledger: ReplicationLedger,
    limit: Limiter,
    signal?: AbortSignal
  ): Promise<void> {
    const { connected, decision } = assessment;
    const { target, client } = connected;

    if (!decision.admitted || !client) {
      for (const item of items) {
        const outcome: TransferOutcome = decision.verdict === 'unavailable' || !client
          ? { status: 'client-unavailable', target: target.name, item, reason: decision.reason }
          : { status: 'capacity-rejected', target: target.name, item, reason: decision.reason };
        ledger.record(outcome);
        this.emit('transfer:complete', outcome);
      }
      return;
    }

    ledger.track(target.name);
    for (const item of items) {
      const outcome = await limit(() => this.transfer(target, client, item, signal));
      ledger.record(outcome);
      this.emit('transfer:complete', outcome);
    }
  }

  private async transfer(
    target: StorageTarget,
    client: TransferClient,
    item: UploadItem,
    runSignal?: AbortSignal
  ): Promise<TransferOutcome> {
    const controller = new AbortController();
    const timer = this.transferTimeoutMs > 0
      ? setTimeout(
        () => controller.abort(new TransferCancelledError(target.name, item.name, 'timeout')),
        this.transferTimeoutMs
      )
      : undefined;

    const onRunAbort = () => controller.abort(new TransferCancelledError(target.name, item.name, 'aborted'));
    if (runSignal?.aborted) {
      onRunAbort();
    } else {
      runSignal?.addEventListener('abort', onRunAbort, { once: true });
    }

    const startedAt = this.now();
    let attempts = 0;

    try {
      const receipt = await retry(
        async (attempt) => {
          attempts = attempt;
          this.emit('transfer:start', { target: target.name, item, attempt } satisfies TransferStartEvent);

          const tracker = new ProgressTracker(target.name, item.name, item.sizeBytes, {
            sink: (line) => this.emit('progress', { target: target.name, item, line } satisfies TransferProgressEvent),
            intervalMs: this.progressIntervalMs,
            now: this.now,
          });

          const result = await raceAbort(
            client.uploadObject({
              bucket: target.bucket,
              key: item.name,
              localPath: item.path,
              sizeBytes: item.sizeBytes,
              partSizeBytes: this.partSizeBytes,
              maxConcurrentParts: this.maxConcurrentParts,
              onBytesTransferred: (bytes) => tracker.onBytesTransferred(bytes),
              signal: controller.signal,
            }),
            controller.signal
          );
          tracker.finish();
          return result;
        },
        {
          ...this.retryPolicy,
          signal: controller.signal,
          retryIf: (error) => !controller.signal.aborted && !(error instanceof TransferCancelledError),
          onRetry: (error, attempt, delay) => {
            this.log.warn(
              { target: target.name, file: item.name, attempt, delay, error: errorMessage(error) },
              'Transfer failed, retrying'
            );
          },
        }
      );

      const durationMs = this.now() - startedAt;
      this.log.info({ target: target.name, file: item.name, attempts, durationMs }, 'Uploaded');
      return { status: 'succeeded', target: target.name, item, attempts, durationMs, etag: receipt.etag };
    } catch (error) {
      const cancelled = controller.signal.aborted || error instanceof TransferCancelledError;
      const reason = cancelled
        ? `cancelled: ${errorMessage(controller.signal.reason ?? error)}`
        : errorMessage(error);
      this.log.error({ target: target.name, file: item.name, attempts, cancelled, error: reason }, 'Transfer failed');
      return { status: 'transfer-failed', target: target.name, item, reason, cancelled, attempts };
    } finally {
      clearTimeout(timer);
      runSignal?.removeEventListener('abort', onRunAbort);
    }
  }
}

function assertUniqueKeys(items: readonly UploadItem[]): void {
  const seen = new Set<string>();
  for (const item of items) {
    if (seen.has(item.name)) {
      throw new ConfigurationError('items', `${item.name} appears more than once in the batch`);
    }
    seen.add(item.name);
  }
}
