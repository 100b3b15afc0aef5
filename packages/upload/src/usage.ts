/**
 * Bucket Usage
 *
 * Occupied size of a bucket, summed from a full listing.
 */

import { errorMessage } from '@skyrelay/utils';
import type { TransferClient } from './targets/transferClient.js';

export interface BucketUsage {
  bytes: number;
  objectCount: number;
  /** Listing failed; `bytes` is the sum up to the failure (possibly 0) */
  degraded: boolean;
  error?: string;
}

export async function measureUsage(client: TransferClient, bucket: string): Promise<BucketUsage> {
  let bytes = 0;
  let objectCount = 0;

  try {
    for await (const entry of client.listAllObjects(bucket)) {
      bytes += entry.sizeBytes;
      objectCount++;
    }
    return { bytes, objectCount, degraded: false };
  } catch (error) {
    return { bytes, objectCount, degraded: true, error: errorMessage(error) };
  }
}
