/**
 * Transfer Client Contract
 *
 * The S3 capability set the replication engine consumes. Operations reject on
 * failure; the engine turns rejections into outcome data.
 */

import type { StorageTarget } from '@skyrelay/core';

export type BucketProbe = 'exists' | 'not-found';

export interface ObjectEntry {
  key: string;
  sizeBytes: number;
}

export interface UploadRequest {
  bucket: string;
  key: string;
  localPath: string;
  sizeBytes: number;
  /** Part size for multipart uploads; raised per object to stay within the part limit */
  partSizeBytes: number;
  /** Parts of one upload in flight at once */
  maxConcurrentParts: number;
  onBytesTransferred: (bytes: number) => void;
  signal?: AbortSignal;
}

export interface UploadReceipt {
  etag: string;
}

export interface TransferClient {
  headBucket(bucket: string): Promise<BucketProbe>;
  createBucket(bucket: string): Promise<void>;
  /**
   * Every object in the bucket as one stream. Pagination is internal; an error
   * rejects the iteration and whatever was yielded before it stands.
   */
  listAllObjects(bucket: string): AsyncIterable<ObjectEntry>;
  uploadObject(request: UploadRequest): Promise<UploadReceipt>;
  presignGet(bucket: string, key: string, expirySeconds: number): Promise<string>;
}

export type TransferClientFactory = (target: StorageTarget) => TransferClient;
