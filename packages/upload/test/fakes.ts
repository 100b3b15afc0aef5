import type { StorageTarget, UploadItem } from '@skyrelay/core';
import { gbToBytes, sleep } from '@skyrelay/utils';
import type {
  BucketProbe,
  ObjectEntry,
  TransferClient,
  UploadReceipt,
  UploadRequest,
} from '../src/targets/transferClient.js';

export function makeTarget(name: string, overrides: Partial<StorageTarget> = {}): StorageTarget {
  return {
    name,
    endpoint: `https://${name.toLowerCase()}.storage.test`,
    region: 'us-east-1',
    signing: 'sigv4',
    credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
    bucket: `${name.toLowerCase()}-bucket`,
    enabled: true,
    ...overrides,
  };
}

export function makeItem(name: string, sizeBytes: number): UploadItem {
  return { name, path: `/data/source/${name}`, sizeBytes };
}

export function gb(value: number): number {
  return gbToBytes(value);
}

export interface FakeClientOptions {
  headResult?: BucketProbe | Error;
  createError?: Error;
  /** Fail listing after this many entries */
  listFailAfter?: number;
  uploadDelayMs?: number;
}

/**
 * In-memory S3 stand-in. Buckets map keys to sizes.
 */
export class FakeTransferClient implements TransferClient {
  readonly buckets = new Map<string, Map<string, number>>();
  readonly uploads: string[] = [];
  readonly requests: UploadRequest[] = [];
  readonly presigned: Array<{ key: string; expirySeconds: number }> = [];
  readonly createdBuckets: string[] = [];

  /** Keys whose upload always fails */
  readonly failKeys = new Set<string>();
  /** Keys whose upload fails this many more times before succeeding */
  readonly transientFailures = new Map<string, number>();
  /** Keys whose upload never settles unless aborted */
  readonly hangKeys = new Set<string>();
  readonly failPresignKeys = new Set<string>();

  active = 0;
  maxActive = 0;

  constructor(private readonly options: FakeClientOptions = {}) {}

  seed(bucket: string, key: string, sizeBytes: number): this {
    this.bucket(bucket).set(key, sizeBytes);
    return this;
  }

  async headBucket(bucket: string): Promise<BucketProbe> {
    const result = this.options.headResult ?? 'exists';
    if (result instanceof Error) {
      throw result;
    }
    if (result === 'exists') {
      this.bucket(bucket);
    }
    return result;
  }

  async createBucket(bucket: string): Promise<void> {
    if (this.options.createError) {
      throw this.options.createError;
    }
    this.createdBuckets.push(bucket);
    this.bucket(bucket);
  }

  async *listAllObjects(bucket: string): AsyncIterable<ObjectEntry> {
    const failAfter = this.options.listFailAfter;
    let listed = 0;
    for (const [key, sizeBytes] of this.buckets.get(bucket) ?? []) {
      if (failAfter !== undefined && listed >= failAfter) {
        break;
      }
      listed++;
      yield { key, sizeBytes };
    }
    if (failAfter !== undefined && listed >= failAfter) {
      throw new Error('InternalError: listing interrupted');
    }
  }

  async uploadObject(request: UploadRequest): Promise<UploadReceipt> {
    this.uploads.push(`${request.bucket}/${request.key}`);
    this.requests.push(request);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);

    try {
      if (this.hangKeys.has(request.key)) {
        await new Promise<never>((_resolve, reject) => {
          request.signal?.addEventListener('abort', () => reject(request.signal?.reason), { once: true });
        });
      }
      if (this.options.uploadDelayMs) {
        await sleep(this.options.uploadDelayMs, request.signal);
      }
      if (this.failKeys.has(request.key)) {
        throw new Error(`AccessDenied: cannot write ${request.key}`);
      }
      const remaining = this.transientFailures.get(request.key) ?? 0;
      if (remaining > 0) {
        this.transientFailures.set(request.key, remaining - 1);
        throw new Error('SlowDown: reduce request rate');
      }

      const half = Math.floor(request.sizeBytes / 2);
      request.onBytesTransferred(half);
      request.onBytesTransferred(request.sizeBytes - half);
      this.bucket(request.bucket).set(request.key, request.sizeBytes);
      return { etag: `etag-${request.key}` };
    } finally {
      this.active--;
    }
  }

  async presignGet(bucket: string, key: string, expirySeconds: number): Promise<string> {
    if (this.failPresignKeys.has(key)) {
      throw new Error(`SignatureDoesNotMatch for ${key}`);
    }
    this.presigned.push({ key, expirySeconds });
    return `https://signed.test/${bucket}/${key}?X-Amz-Expires=${expirySeconds}`;
  }

  private bucket(name: string): Map<string, number> {
    let bucket = this.buckets.get(name);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(name, bucket);
    }
    return bucket;
  }
}
