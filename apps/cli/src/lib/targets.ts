/**
 * Target helpers shared by the commands
 */

import ora from 'ora';
import type { StorageTarget } from '@skyrelay/core';
import {
  connectTargets,
  createTransferClient,
  type BucketUsage,
  type ConnectedTarget,
  type LinkSection,
} from '@skyrelay/upload';
import { formatGb } from '@skyrelay/utils';
import { loadTargets } from '../config/index.js';
import { printKeyValue, printWarning } from './output.js';

export async function loadAndConnect(
  targetsFile: string,
  ensureBuckets: boolean
): Promise<ConnectedTarget[]> {
  const targets = await loadTargets(targetsFile, process.env);
  const enabled = targets.filter((t) => t.enabled).length;

  const spinner = ora(`Connecting to ${enabled} target(s)...`).start();
  const connected = await connectTargets(targets, {
    factory: createTransferClient,
    ensureBuckets,
  });

  const ready = connected.filter((c) => c.state === 'ready');
  if (ready.length === 0) {
    spinner.fail('No target could be reached');
  } else {
    spinner.succeed(`Connected to ${ready.length}/${enabled} target(s)`);
  }

  for (const entry of connected) {
    if (entry.state === 'init-failed' || entry.state === 'bucket-unavailable') {
      printWarning(`${entry.target.name}: ${entry.error ?? entry.state}`);
    } else if (entry.bucketCreated) {
      printKeyValue(entry.target.name, `created bucket ${entry.target.bucket}`);
    }
  }

  return connected;
}

export function printUsage(target: StorageTarget, usage: BucketUsage): void {
  printKeyValue('Endpoint', target.endpoint);
  printKeyValue('Bucket', target.bucket);
  printKeyValue('Size', `${formatGb(usage.bytes, 4)} GB (${usage.objectCount} files)`);

  if (target.capacity) {
    const remaining = target.capacity.maxBytes - usage.bytes;
    printKeyValue('Quota', `${formatGb(target.capacity.maxBytes, 4)} GB`);
    printKeyValue(
      'Remaining',
      remaining >= 0 ? `${formatGb(remaining, 4)} GB` : `over by ${formatGb(-remaining, 4)} GB`
    );
  } else {
    printKeyValue('Quota', 'unlimited');
  }

  if (usage.degraded) {
    printWarning(`Listing failed, size is a lower bound: ${usage.error ?? 'unknown error'}`);
  }
}

export function printLinks(sections: readonly LinkSection[]): void {
  for (const section of sections) {
    if (section.links.length === 0 && section.failures.length === 0) {
      continue;
    }
    console.log();
    console.log(`${section.target}:`);
    for (const link of section.links) {
      printKeyValue(link.fileName, link.url);
      if (link.publicUrl) {
        printKeyValue(`${link.fileName} (public)`, link.publicUrl);
      }
    }
    for (const failure of section.failures) {
      printWarning(`No link for ${failure.fileName}: ${failure.reason}`);
    }
  }
}
