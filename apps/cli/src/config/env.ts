/**
 * Environment Configuration
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '@skyrelay/core';

const flag = z.enum(['true', 'false', '1', '0']).default('false').transform((v) => v === 'true' || v === '1');

function integer(min: number, fallback: string) {
  return z.string().transform(Number).pipe(z.number().int().min(min)).default(fallback);
}

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Targets file (relative to the working directory)
  SKYRELAY_TARGETS_FILE: z.string().min(1).default('./targets.json'),

  // Transfers
  SKYRELAY_PART_SIZE_MB: integer(5, '8'),
  SKYRELAY_MAX_CONCURRENT_PARTS: integer(1, '10'), // parts of one upload in flight
  SKYRELAY_MAX_CONCURRENT_TRANSFERS: integer(0, '0'), // 0 = no cap across targets
  SKYRELAY_TRANSFER_TIMEOUT_MS: integer(0, '21600000'), // 6 hours, 0 disables
  SKYRELAY_RETRY_ATTEMPTS: integer(1, '1'),
  SKYRELAY_RETRY_DELAY_MS: integer(0, '2000'),
  SKYRELAY_STRICT_CAPACITY: flag,

  // Links
  SKYRELAY_LINK_EXPIRY_SECONDS: integer(1, '604800'), // 7 days
  SKYRELAY_REPORT_FILE: z.string().min(1).default('./presigned_urls.txt'),
});

export interface CliConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  targetsFile: string;
  transfer: {
    partSizeMb: number;
    maxConcurrentParts: number;
    maxConcurrentTransfers: number;
    timeoutMs: number;
    retryAttempts: number;
    retryDelayMs: number;
    strictCapacity: boolean;
  };
  links: {
    expirySeconds: number;
    reportFile: string;
  };
}

/**
 * Validate the environment. Relative paths resolve against `baseDir`.
 */
export function loadConfig(env: NodeJS.ProcessEnv, baseDir: string = process.cwd()): CliConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(issue?.path.join('.') || 'environment', issue?.message ?? 'invalid value');
  }

  const parsed = result.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    targetsFile: resolve(baseDir, parsed.SKYRELAY_TARGETS_FILE),
    transfer: {
      partSizeMb: parsed.SKYRELAY_PART_SIZE_MB,
      maxConcurrentParts: parsed.SKYRELAY_MAX_CONCURRENT_PARTS,
      maxConcurrentTransfers: parsed.SKYRELAY_MAX_CONCURRENT_TRANSFERS,
      timeoutMs: parsed.SKYRELAY_TRANSFER_TIMEOUT_MS,
      retryAttempts: parsed.SKYRELAY_RETRY_ATTEMPTS,
      retryDelayMs: parsed.SKYRELAY_RETRY_DELAY_MS,
      strictCapacity: parsed.SKYRELAY_STRICT_CAPACITY,
    },
    links: {
      expirySeconds: parsed.SKYRELAY_LINK_EXPIRY_SECONDS,
      reportFile: resolve(baseDir, parsed.SKYRELAY_REPORT_FILE),
    },
  };
}
