/**
 * Command Options
 *
 * Merges command-line flags over the environment configuration.
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '@skyrelay/core';
import { mbToBytes } from '@skyrelay/utils';
import type { CliConfig } from './env.js';

export interface CommandOptions {
  targets?: string;
  report?: string;
  expiry?: string;
  timeout?: string;
  retries?: string;
  strictCapacity?: boolean;
}

export interface RunSettings {
  targetsFile: string;
  reportFile: string;
  expirySeconds: number;
  partSizeBytes: number;
  maxConcurrentParts: number;
  maxConcurrentTransfers: number;
  transferTimeoutMs: number;
  retry: {
    maxAttempts: number;
    initialDelay: number;
  };
  rejectDegradedUsage: boolean;
}

const optionsSchema = z.object({
  expiry: z.coerce.number().int().positive().optional(),
  timeout: z.coerce.number().int().nonnegative().optional(),
  retries: z.coerce.number().int().nonnegative().optional(),
});

export function resolveRunSettings(
  config: CliConfig,
  options: CommandOptions,
  baseDir: string = process.cwd()
): RunSettings {
  const result = optionsSchema.safeParse({
    expiry: options.expiry,
    timeout: options.timeout,
    retries: options.retries,
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(`--${issue?.path.join('.') ?? 'option'}`, issue?.message ?? 'invalid value');
  }

  const flags = result.data;

  return {
    targetsFile: options.targets ? resolve(baseDir, options.targets) : config.targetsFile,
    reportFile: options.report ? resolve(baseDir, options.report) : config.links.reportFile,
    expirySeconds: flags.expiry ?? config.links.expirySeconds,
    partSizeBytes: mbToBytes(config.transfer.partSizeMb),
    maxConcurrentParts: config.transfer.maxConcurrentParts,
    maxConcurrentTransfers: config.transfer.maxConcurrentTransfers,
    transferTimeoutMs: flags.timeout ?? config.transfer.timeoutMs,
    retry: {
      // --retries counts extra attempts
      maxAttempts: flags.retries !== undefined ? flags.retries + 1 : config.transfer.retryAttempts,
      initialDelay: config.transfer.retryDelayMs,
    },
    rejectDegradedUsage: options.strictCapacity ?? config.transfer.strictCapacity,
  };
}
