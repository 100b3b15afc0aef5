/**
 * Storage Target Types
 */

/**
 * How requests to a target are signed and addressed.
 *
 * - `sigv4`: SigV4 against the configured region
 * - `sigv4-auto-region`: SigV4 with region `auto` and path-style addressing (Cloudflare R2)
 */
export type SigningStyle = 'sigv4' | 'sigv4-auto-region';

export interface TargetCredentials {
  accessKeyId: string;
  secretAccessKey: string;
}

export interface CapacityPolicy {
  maxBytes: number;
}

/**
 * One independent object-storage destination. Immutable for a run.
 */
export interface StorageTarget {
  readonly name: string;
  readonly endpoint: string;
  readonly region: string;
  readonly signing: SigningStyle;
  readonly credentials: TargetCredentials;
  readonly bucket: string;
  readonly capacity?: CapacityPolicy;
  /** Longest presigned URL lifetime the provider accepts */
  readonly linkExpiryCapSeconds?: number;
  /** Base of unsigned object URLs, for buckets that are publicly readable */
  readonly publicUrlBase?: string;
  readonly enabled: boolean;
}
