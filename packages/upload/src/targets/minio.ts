/**
 * MinIO Transfer Client
 *
 * S3-compatible transfers through the MinIO client. Works against any
 * provider that speaks SigV4 (R2, Wasabi, Oracle, ImpossibleCloud, MinIO).
 * Multipart parts go through `MultipartApi` so they can run in parallel.
 */

import { Client } from 'minio';
import { createReadStream } from 'node:fs';
import { Transform, pipeline, type Readable } from 'node:stream';
import type { StorageTarget } from '@skyrelay/core';
import { createLogger, errorCode, isNumber, isObject, isString, type Logger } from '@skyrelay/utils';
import { uploadInParts, type MultipartApi } from './multipart.js';
import { S3MultipartApi } from './s3Multipart.js';
import type {
  BucketProbe,
  ObjectEntry,
  TransferClient,
  UploadReceipt,
  UploadRequest,
} from './transferClient.js';

/** S3 rejects multipart parts smaller than this (except the last one) */
export const MIN_PART_SIZE_BYTES = 5 * 1024 * 1024;

export interface MinioConfig {
  endPoint: string;
  port?: number;
  useSSL: boolean;
  accessKey: string;
  secretKey: string;
  region: string;
  pathStyle: boolean;
}

/**
 * The part of the MinIO client this adapter calls
 */
export interface MinioCalls {
  bucketExists(bucket: string): Promise<boolean>;
  makeBucket(bucket: string, region: string): Promise<void>;
  listObjectsV2(bucket: string, prefix: string, recursive: boolean): AsyncIterable<unknown>;
  putObject(
    bucket: string,
    key: string,
    stream: Readable,
    size: number,
    metaData: Record<string, string>
  ): Promise<{ etag: string }>;
  presignedGetObject(bucket: string, key: string, expiry: number): Promise<string>;
}

/**
 * Map a target descriptor onto MinIO client options.
 * This is the only place where signing style matters.
 */
export function toMinioConfig(target: StorageTarget): MinioConfig {
  const url = new URL(target.endpoint);
  const useSSL = url.protocol === 'https:';
  const autoRegion = target.signing === 'sigv4-auto-region';

  return {
    endPoint: url.hostname,
    port: url.port ? parseInt(url.port, 10) : undefined,
    useSSL,
    accessKey: target.credentials.accessKeyId,
    secretKey: target.credentials.secretAccessKey,
    region: autoRegion ? 'auto' : target.region,
    pathStyle: autoRegion,
  };
}

export function createMinioClient(config: MinioConfig): MinioCalls {
  return new Client({
    endPoint: config.endPoint,
    port: config.port,
    useSSL: config.useSSL,
    accessKey: config.accessKey,
    secretKey: config.secretKey,
    region: config.region,
    pathStyle: config.pathStyle,
  });
}

export class MinioTransferClient implements TransferClient {
  private readonly log: Logger;

  constructor(
    private readonly client: MinioCalls,
    private readonly multipart: MultipartApi,
    private readonly region: string,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger({ component: 'minio' });
  }

  async headBucket(bucket: string): Promise<BucketProbe> {
    const exists = await this.client.bucketExists(bucket);
    return exists ? 'exists' : 'not-found';
  }

  async createBucket(bucket: string): Promise<void> {
    await this.client.makeBucket(bucket, this.region);
  }

  async *listAllObjects(bucket: string): AsyncIterable<ObjectEntry> {
    const stream = this.client.listObjectsV2(bucket, '', true);

    try {
      for await (const entry of stream) {
        const item: unknown = entry;
        // Prefix entries carry no name and no size
        if (isObject(item) && isString(item['name']) && isNumber(item['size'])) {
          yield { key: item['name'], sizeBytes: item['size'] };
        }
      }
    } catch (error) {
      if (errorCode(error) === 'NoSuchBucket') {
        return;
      }
      throw error;
    }
  }

  /**
   * Files up to one part go up in a single PUT; larger ones as a multipart
   * upload with `maxConcurrentParts` parts in flight.
   */
  async uploadObject(request: UploadRequest): Promise<UploadReceipt> {
    const partSizeBytes = Math.max(request.partSizeBytes, MIN_PART_SIZE_BYTES);

    if (request.sizeBytes > partSizeBytes) {
      return uploadInParts(this.multipart, {
        ...request,
        contentType: getMimeType(request.key),
        partSizeBytes,
        logger: this.log,
      });
    }

    return this.putSingle(request);
  }

  async presignGet(bucket: string, key: string, expirySeconds: number): Promise<string> {
    return this.client.presignedGetObject(bucket, key, expirySeconds);
  }

  private async putSingle(request: UploadRequest): Promise<UploadReceipt> {
    const { bucket, key, localPath, sizeBytes, onBytesTransferred, signal } = request;
    signal?.throwIfAborted();

    const source = createReadStream(localPath);
    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        onBytesTransferred(chunk.length);
        callback(null, chunk);
      },
    });
    // A read error destroys the counter, which fails putObject
    pipeline(source, counter, () => undefined);

    const onAbort = () => counter.destroy(signal?.reason instanceof Error ? signal.reason : undefined);
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await this.client.putObject(bucket, key, counter, sizeBytes, {
        'Content-Type': getMimeType(key),
      });
      return { etag: result.etag };
    } finally {
      signal?.removeEventListener('abort', onAbort);
      counter.destroy();
    }
  }
}

/**
 * The single construction path for every provider
 */
export function createTransferClient(target: StorageTarget): TransferClient {
  const config = toMinioConfig(target);
  return new MinioTransferClient(createMinioClient(config), S3MultipartApi.forTarget(target), config.region);
}

export function getMimeType(filename: string): string {
  const ext = filename.split('.').pop()?.toLowerCase();
  const mimeTypes: Record<string, string> = {
    'mkv': 'video/x-matroska',
    'mp4': 'video/mp4',
    'zip': 'application/zip',
    'tar': 'application/x-tar',
    'gz': 'application/gzip',
    '7z': 'application/x-7z-compressed',
    'pdf': 'application/pdf',
    'json': 'application/json',
    'txt': 'text/plain',
    'csv': 'text/csv',
    'jpg': 'image/jpeg',
    'jpeg': 'image/jpeg',
    'png': 'image/png',
  };
  return mimeTypes[ext ?? ''] ?? 'application/octet-stream';
}
