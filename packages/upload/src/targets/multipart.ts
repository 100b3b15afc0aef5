/**
 * Multipart Upload
 *
 * Splits a local file into parts and uploads them with bounded concurrency.
 * Parts keep the configured size unless the object would need more than
 * MAX_PARTS of them; then the part size grows in whole MiB.
 */

import { open, type FileHandle } from 'node:fs/promises';
import { createLimiter, createLogger, errorMessage, type Logger } from '@skyrelay/utils';
import type { UploadReceipt } from './transferClient.js';

/** S3 allows at most this many parts per upload */
export const MAX_PARTS = 10_000;

/** S3 rejects parts larger than 5 GiB */
export const MAX_PART_SIZE_BYTES = 5 * 1024 * 1024 * 1024;

const MIB = 1024 * 1024;

export interface PartPlan {
  partNumber: number;
  offset: number;
  length: number;
}

export interface CompletedPart {
  partNumber: number;
  etag: string;
}

export interface PartUpload {
  bucket: string;
  key: string;
  uploadId: string;
  partNumber: number;
  body: Buffer;
  signal: AbortSignal;
}

/**
 * The four calls of an S3 multipart upload
 */
export interface MultipartApi {
  createUpload(bucket: string, key: string, contentType: string): Promise<string>;
  uploadPart(part: PartUpload): Promise<string>;
  completeUpload(bucket: string, key: string, uploadId: string, parts: readonly CompletedPart[]): Promise<string>;
  abortUpload(bucket: string, key: string, uploadId: string): Promise<void>;
}

export interface MultipartUploadOptions {
  bucket: string;
  key: string;
  contentType: string;
  localPath: string;
  sizeBytes: number;
  partSizeBytes: number;
  maxConcurrentParts: number;
  onBytesTransferred: (bytes: number) => void;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Part size for an object: the configured size, or the smallest whole number
 * of MiB that keeps the part count within MAX_PARTS
 */
export function partSizeFor(sizeBytes: number, partSizeBytes: number): number {
  if (Math.ceil(sizeBytes / partSizeBytes) <= MAX_PARTS) {
    return partSizeBytes;
  }

  const grown = Math.ceil(sizeBytes / MAX_PARTS / MIB) * MIB;
  if (grown > MAX_PART_SIZE_BYTES) {
    throw new Error(`Object of ${sizeBytes} bytes is too large for a multipart upload`);
  }
  return grown;
}

export function planParts(sizeBytes: number, partSizeBytes: number): PartPlan[] {
  const parts: PartPlan[] = [];
  for (let offset = 0; offset < sizeBytes; offset += partSizeBytes) {
    parts.push({
      partNumber: parts.length + 1,
      offset,
      length: Math.min(partSizeBytes, sizeBytes - offset),
    });
  }
  return parts.length > 0 ? parts : [{ partNumber: 1, offset: 0, length: 0 }];
}

async function readPart(handle: FileHandle, path: string, part: PartPlan): Promise<Buffer> {
  const buffer = Buffer.alloc(part.length);
  let filled = 0;

  while (filled < part.length) {
    const { bytesRead } = await handle.read(buffer, filled, part.length - filled, part.offset + filled);
    if (bytesRead === 0) {
      throw new Error(`${path} ended at ${part.offset + filled} bytes, expected ${part.offset + part.length}`);
    }
    filled += bytesRead;
  }

  return buffer;
}

/**
 * Upload a file as a multipart upload. On any failure the remaining parts are
 * stopped and the upload is aborted.
 */
export async function uploadInParts(api: MultipartApi, options: MultipartUploadOptions): Promise<UploadReceipt> {
  const { bucket, key, localPath, signal } = options;
  const log = options.logger ?? createLogger({ component: 'multipart' });
  signal?.throwIfAborted();

  const partSize = partSizeFor(options.sizeBytes, options.partSizeBytes);
  const parts = planParts(options.sizeBytes, partSize);
  if (partSize !== options.partSizeBytes) {
    log.debug({ key, partSize, parts: parts.length }, 'Part size raised to stay within the part limit');
  }

  const handle = await open(localPath, 'r');
  const stop = new AbortController();
  const onAbort = () => stop.abort(signal?.reason);
  signal?.addEventListener('abort', onAbort, { once: true });

  let uploadId: string | undefined;
  // First error wins; later parts only fail because they were stopped
  const failures: unknown[] = [];

  try {
    uploadId = await api.createUpload(bucket, key, options.contentType);
    const id = uploadId;
    const limit = createLimiter(options.maxConcurrentParts);

    const settled = await Promise.allSettled(parts.map((part) => limit(async (): Promise<CompletedPart> => {
      try {
        stop.signal.throwIfAborted();
        const body = await readPart(handle, localPath, part);
        stop.signal.throwIfAborted();
        const etag = await api.uploadPart({
          bucket,
          key,
          uploadId: id,
          partNumber: part.partNumber,
          body,
          signal: stop.signal,
        });
        options.onBytesTransferred(part.length);
        return { partNumber: part.partNumber, etag };
      } catch (error) {
        failures.push(stop.signal.aborted ? stop.signal.reason : error);
        stop.abort(error);
        throw error;
      }
    })));

    if (failures.length > 0) {
      throw failures[0];
    }

    const completed = settled.flatMap((result) => (result.status === 'fulfilled' ? [result.value] : []));
    const etag = await api.completeUpload(bucket, key, id, completed);
    return { etag };
  } catch (error) {
    if (uploadId !== undefined) {
      await api.abortUpload(bucket, key, uploadId).catch((abortError: unknown) => {
        log.warn({ key, uploadId, error: errorMessage(abortError) }, 'Could not abort multipart upload');
      });
    }
    throw error;
  } finally {
    signal?.removeEventListener('abort', onAbort);
    await handle.close();
  }
}
