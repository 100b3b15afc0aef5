/**
 * Link Publisher
 *
 * Turns ledger entries into presigned download URLs. A failed presign drops
 * that one link and leaves the upload's status alone.
 */

import { ConfigurationError, type StorageTarget } from '@skyrelay/core';
import { createLogger, errorMessage, type Logger } from '@skyrelay/utils';
import type { ConnectedTarget } from './connect.js';
import type { ReplicationLedger } from './ledger.js';

/** 7 days, the longest lifetime SigV4 presigning allows */
export const DEFAULT_LINK_EXPIRY_SECONDS = 604800;

export interface PublishedLink {
  fileName: string;
  url: string;
  /** Unsigned URL, for targets with a public URL base */
  publicUrl?: string;
}

export interface LinkFailure {
  fileName: string;
  reason: string;
}

export interface LinkSection {
  target: string;
  endpoint: string;
  bucket: string;
  expirySeconds: number;
  links: PublishedLink[];
  failures: LinkFailure[];
}

/**
 * Requested expiry, clamped to the target's cap when it has one
 */
export function effectiveExpiry(target: StorageTarget, expirySeconds: number): number {
  if (!Number.isInteger(expirySeconds) || expirySeconds <= 0) {
    throw new ConfigurationError('expirySeconds', `must be a positive whole number of seconds, got ${expirySeconds}`);
  }
  const cap = target.linkExpiryCapSeconds;
  return cap !== undefined && cap < expirySeconds ? cap : expirySeconds;
}

export function publicObjectUrl(base: string, key: string): string {
  return `${base.replace(/\/+$/, '')}/${key.split('/').map(encodeURIComponent).join('/')}`;
}

export class LinkPublisher {
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger({ component: 'links' });
  }

  /**
   * One presigned URL per file the ledger records as uploaded to `connected`
   */
  async publish(
    ledger: ReplicationLedger,
    connected: ConnectedTarget,
    expirySeconds: number = DEFAULT_LINK_EXPIRY_SECONDS
  ): Promise<PublishedLink[]> {
    const section = await this.presignAll(
      connected,
      ledger.succeeded(connected.target.name).map((item) => item.name),
      expirySeconds
    );
    return section.links;
  }

  /**
   * A section per target that received at least one file
   */
  async publishAll(
    ledger: ReplicationLedger,
    targets: readonly ConnectedTarget[],
    expirySeconds: number = DEFAULT_LINK_EXPIRY_SECONDS
  ): Promise<LinkSection[]> {
    const withUploads = targets.filter((t) => ledger.succeeded(t.target.name).length > 0);
    return Promise.all(withUploads.map((t) =>
      this.presignAll(t, ledger.succeeded(t.target.name).map((item) => item.name), expirySeconds)
    ));
  }

  /**
   * Presign every object currently in the target's bucket
   */
  async publishBucket(
    connected: ConnectedTarget,
    expirySeconds: number = DEFAULT_LINK_EXPIRY_SECONDS
  ): Promise<LinkSection> {
    const keys: string[] = [];
    const { target, client } = connected;

    if (client) {
      try {
        for await (const entry of client.listAllObjects(target.bucket)) {
          keys.push(entry.key);
        }
      } catch (error) {
        this.log.error(
          { target: target.name, bucket: target.bucket, listed: keys.length, error: errorMessage(error) },
          'Bucket listing failed, publishing what was listed'
        );
      }
    }

    return this.presignAll(connected, keys, expirySeconds);
  }

  private async presignAll(
    connected: ConnectedTarget,
    fileNames: readonly string[],
    expirySeconds: number
  ): Promise<LinkSection> {
    const { target, client } = connected;
    const expiry = effectiveExpiry(target, expirySeconds);
    const section: LinkSection = {
      target: target.name,
      endpoint: target.endpoint,
      bucket: target.bucket,
      expirySeconds: expiry,
      links: [],
      failures: [],
    };

    if (!client) {
      section.failures = fileNames.map((fileName) => ({ fileName, reason: connected.error ?? 'client unavailable' }));
      return section;
    }

    const results = await Promise.allSettled(
      fileNames.map((fileName) => client.presignGet(target.bucket, fileName, expiry))
    );

    results.forEach((result, index) => {
      const fileName = fileNames[index] ?? '';
      if (result.status === 'fulfilled') {
        section.links.push(target.publicUrlBase
          ? { fileName, url: result.value, publicUrl: publicObjectUrl(target.publicUrlBase, fileName) }
          : { fileName, url: result.value });
      } else {
        const reason = errorMessage(result.reason);
        this.log.error({ target: target.name, file: fileName, error: reason }, 'Error generating URL');
        section.failures.push({ fileName, reason });
      }
    });

    return section;
  }
}
