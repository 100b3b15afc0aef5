/**
 * Progress Tracker
 *
 * Rate and ETA accumulator for one (file, target) transfer. Fed by byte counts
 * from the transfer client; renders at most one line per interval.
 */

import { BYTES_PER_MB, formatClock, formatGb } from '@skyrelay/utils';

export type ProgressSink = (line: string) => void;

export interface ProgressSnapshot {
  target: string;
  file: string;
  transferredBytes: number;
  /** Undefined when the expected total is not positive */
  totalBytes?: number;
  percentage?: number;
  elapsedMs: number;
  /** Average MB/s since start */
  speedMBps: number;
  /** Undefined while nothing has been transferred, or without a known total */
  etaSeconds?: number;
}

export interface ProgressTrackerOptions {
  sink: ProgressSink;
  intervalMs?: number;
  now?: () => number;
}

export class ProgressTracker {
  readonly target: string;
  readonly file: string;
  private readonly totalBytes?: number;
  private readonly sink: ProgressSink;
  private readonly intervalMs: number;
  private readonly now: () => number;

  private transferredBytes = 0;
  private readonly startTime: number;
  private lastEmitTime: number;

  constructor(target: string, file: string, totalBytes: number, options: ProgressTrackerOptions) {
    this.target = target;
    this.file = file;
    this.totalBytes = Number.isFinite(totalBytes) && totalBytes > 0 ? totalBytes : undefined;
    this.sink = options.sink;
    this.intervalMs = options.intervalMs ?? 1000;
    this.now = options.now ?? Date.now;
    this.startTime = this.now();
    this.lastEmitTime = this.startTime;
  }

  onBytesTransferred(bytes: number): void {
    if (bytes > 0) {
      this.transferredBytes += bytes;
    }

    const current = this.now();
    if (current - this.lastEmitTime >= this.intervalMs) {
      this.lastEmitTime = current;
      this.sink(this.render());
    }
  }

  /**
   * Emit the final line regardless of the rate limit
   */
  finish(): void {
    this.lastEmitTime = this.now();
    this.sink(this.render());
  }

  snapshot(): ProgressSnapshot {
    const elapsedMs = Math.max(this.now() - this.startTime, 1);
    const bytesPerSecond = this.transferredBytes / (elapsedMs / 1000);

    const snapshot: ProgressSnapshot = {
      target: this.target,
      file: this.file,
      transferredBytes: this.transferredBytes,
      elapsedMs,
      speedMBps: bytesPerSecond / BYTES_PER_MB,
    };

    if (this.totalBytes !== undefined) {
      snapshot.totalBytes = this.totalBytes;
      snapshot.percentage = (this.transferredBytes / this.totalBytes) * 100;
      if (this.transferredBytes > 0) {
        const remaining = Math.max(this.totalBytes - this.transferredBytes, 0);
        snapshot.etaSeconds = remaining / bytesPerSecond;
      }
    }

    return snapshot;
  }

  render(): string {
    const s = this.snapshot();
    const speed = `Speed: ${s.speedMBps.toFixed(2)} MB/s`;
    const eta = `ETA: ${s.etaSeconds === undefined ? 'Unknown' : formatClock(s.etaSeconds)}`;

    if (s.totalBytes === undefined || s.percentage === undefined) {
      return `[${this.target}] ${formatGb(s.transferredBytes)} GB | ${speed} | ${eta}`;
    }

    return `[${this.target}] ${s.percentage.toFixed(1)}% | ` +
      `${formatGb(s.transferredBytes)}/${formatGb(s.totalBytes)} GB | ${speed} | ${eta}`;
  }
}
