/**
 * Replication Types
 */

/**
 * A local file queued for upload. `sizeBytes` is captured once at enumeration.
 */
export interface UploadItem {
  readonly name: string;
  readonly path: string;
  readonly sizeBytes: number;
}

export type CapacityVerdict = 'unconstrained' | 'within-quota' | 'over-quota' | 'unavailable' | 'usage-unknown';

export interface CapacityDecision {
  target: string;
  admitted: boolean;
  verdict: CapacityVerdict;
  reason: string;
  existingBytes: number;
  pendingBytes: number;
  maxBytes?: number;
  marginBytes?: number;
  overageBytes?: number;
  /** The occupied-size figure is a best guess because the bucket listing failed */
  degraded: boolean;
}

interface OutcomeBase {
  target: string;
  item: UploadItem;
}

export interface SucceededOutcome extends OutcomeBase {
  status: 'succeeded';
  attempts: number;
  durationMs: number;
  etag?: string;
}

export interface ClientUnavailableOutcome extends OutcomeBase {
  status: 'client-unavailable';
  reason: string;
}

export interface CapacityRejectedOutcome extends OutcomeBase {
  status: 'capacity-rejected';
  reason: string;
}

export interface TransferFailedOutcome extends OutcomeBase {
  status: 'transfer-failed';
  reason: string;
  cancelled: boolean;
  attempts: number;
}

export type TransferOutcome =
  | SucceededOutcome
  | ClientUnavailableOutcome
  | CapacityRejectedOutcome
  | TransferFailedOutcome;

export type TransferStatus = TransferOutcome['status'];
