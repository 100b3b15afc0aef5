/**
 * Target Connection
 *
 * Attaches a transfer client to each enabled target and makes sure its bucket
 * exists. A target that fails here stays detached; the others carry on.
 */

import {
  BucketUnavailableError,
  TargetInitializationError,
  type StorageTarget,
} from '@skyrelay/core';
import { createLogger, errorMessage, type Logger } from '@skyrelay/utils';
import type { TransferClient, TransferClientFactory } from './targets/transferClient.js';

export type ConnectionState = 'ready' | 'disabled' | 'init-failed' | 'bucket-unavailable';

export interface ConnectedTarget {
  target: StorageTarget;
  /** Live handle; null unless `state` is `ready` */
  client: TransferClient | null;
  state: ConnectionState;
  error?: string;
  bucketCreated?: boolean;
}

export interface ConnectOptions {
  factory: TransferClientFactory;
  /** Check and create buckets (default true) */
  ensureBuckets?: boolean;
  logger?: Logger;
}

export async function connectTargets(
  targets: readonly StorageTarget[],
  options: ConnectOptions
): Promise<ConnectedTarget[]> {
  const log = options.logger ?? createLogger({ component: 'connect' });
  return Promise.all(targets.map((target) => connectTarget(target, options, log)));
}

async function connectTarget(
  target: StorageTarget,
  options: ConnectOptions,
  log: Logger
): Promise<ConnectedTarget> {
  if (!target.enabled) {
    log.info({ target: target.name }, 'Target disabled, skipping');
    return { target, client: null, state: 'disabled', error: 'disabled' };
  }

  let client: TransferClient;
  try {
    client = options.factory(target);
  } catch (error) {
    const failure = new TargetInitializationError(target.name, errorMessage(error));
    log.error({ target: target.name, code: failure.code }, failure.message);
    return { target, client: null, state: 'init-failed', error: failure.message };
  }

  if (options.ensureBuckets === false) {
    return { target, client, state: 'ready' };
  }

  try {
    const created = await ensureBucket(client, target);
    log.info({ target: target.name, bucket: target.bucket, created }, created ? 'Bucket created' : 'Bucket exists');
    return { target, client, state: 'ready', bucketCreated: created };
  } catch (error) {
    const failure = error instanceof BucketUnavailableError
      ? error
      : new BucketUnavailableError(target.name, target.bucket, errorMessage(error));
    log.error({ target: target.name, bucket: target.bucket, code: failure.code }, failure.message);
    return { target, client: null, state: 'bucket-unavailable', error: failure.message };
  }
}

/**
 * Returns true when the bucket had to be created
 */
export async function ensureBucket(client: TransferClient, target: StorageTarget): Promise<boolean> {
  const probe = await client.headBucket(target.bucket);
  if (probe === 'exists') {
    return false;
  }

  try {
    await client.createBucket(target.bucket);
  } catch (error) {
    throw new BucketUnavailableError(target.name, target.bucket, `create failed: ${errorMessage(error)}`);
  }
  return true;
}
