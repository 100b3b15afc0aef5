/**
 * Targets File
 *
 * JSON list of storage targets. String values may reference environment
 * variables as `${NAME}` so credentials stay out of the file.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError, type StorageTarget } from '@skyrelay/core';
import { errorCode, errorMessage, gbToBytes, isObject, isString } from '@skyrelay/utils';

const targetSchema = z.object({
  name: z.string().min(1),
  endpoint: z.string().url().optional(),
  // Cloudflare R2: endpoint derived from the account id
  r2AccountId: z.string().min(1).optional(),
  // Oracle Cloud: endpoint derived from the namespace and region
  oracleNamespace: z.string().min(1).optional(),
  region: z.string().min(1).optional(),
  signing: z.enum(['sigv4', 'sigv4-auto-region']).optional(),
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
  bucket: z.string().min(1),
  maxSizeGb: z.number().positive().nullable().optional(),
  maxBytes: z.number().int().positive().optional(),
  linkExpiryCapSeconds: z.number().int().positive().optional(),
  // Unsigned object URLs; derived for Oracle Cloud when only `publicUrls` is set
  publicUrls: z.boolean().default(false),
  publicUrlBase: z.string().url().optional(),
  enabled: z.boolean().default(true),
});

export const targetsFileSchema = z.object({
  targets: z.array(targetSchema).min(1),
});

export type TargetEntry = z.infer<typeof targetSchema>;

const ENV_REF = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

function childPath(path: string, key: string | number): string {
  return path ? `${path}.${key}` : String(key);
}

/**
 * Replace `${NAME}` references in every string of a parsed JSON value
 */
export function substituteEnv(value: unknown, env: NodeJS.ProcessEnv, path: string = ''): unknown {
  if (isString(value)) {
    return value.replace(ENV_REF, (_match, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        throw new ConfigurationError(path || 'targets', `environment variable ${name} is not set`);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((entry, index) => substituteEnv(entry, env, childPath(path, index)));
  }
  if (isObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, substituteEnv(entry, env, childPath(path, key))])
    );
  }
  return value;
}

function resolveEndpoint(entry: TargetEntry, region: string, index: number): string {
  if (entry.endpoint) {
    return entry.endpoint;
  }
  if (entry.r2AccountId) {
    return `https://${entry.r2AccountId}.r2.cloudflarestorage.com`;
  }
  if (entry.oracleNamespace) {
    return `https://${entry.oracleNamespace}.compat.objectstorage.${region}.oraclecloud.com`;
  }
  throw new ConfigurationError(`targets.${index}.endpoint`, 'set endpoint, r2AccountId or oracleNamespace');
}

function resolvePublicUrlBase(entry: TargetEntry, region: string, index: number): string | undefined {
  if (entry.publicUrlBase) {
    return entry.publicUrlBase;
  }
  if (!entry.publicUrls) {
    return undefined;
  }
  if (entry.oracleNamespace) {
    return `https://objectstorage.${region}.oraclecloud.com/n/${entry.oracleNamespace}/b/${entry.bucket}/o`;
  }
  throw new ConfigurationError(`targets.${index}.publicUrls`, 'set publicUrlBase, or oracleNamespace to derive it');
}

export function toStorageTarget(entry: TargetEntry, index: number): StorageTarget {
  const autoRegion = entry.signing === 'sigv4-auto-region' || (!entry.signing && entry.r2AccountId !== undefined);
  const region = entry.region ?? (autoRegion ? 'auto' : 'us-east-1');

  // maxSizeGb: null means no limit
  const maxBytes = entry.maxBytes ?? (entry.maxSizeGb ? gbToBytes(entry.maxSizeGb) : undefined);

  return {
    name: entry.name,
    endpoint: resolveEndpoint(entry, region, index),
    region,
    signing: autoRegion ? 'sigv4-auto-region' : 'sigv4',
    credentials: {
      accessKeyId: entry.accessKeyId,
      secretAccessKey: entry.secretAccessKey,
    },
    bucket: entry.bucket,
    capacity: maxBytes !== undefined ? { maxBytes } : undefined,
    linkExpiryCapSeconds: entry.linkExpiryCapSeconds,
    publicUrlBase: resolvePublicUrlBase(entry, region, index),
    enabled: entry.enabled,
  };
}

/**
 * Validate parsed targets JSON and build target descriptors
 */
export function parseTargets(raw: unknown, env: NodeJS.ProcessEnv): StorageTarget[] {
  const result = targetsFileSchema.safeParse(substituteEnv(raw, env));

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(issue?.path.join('.') || 'targets', issue?.message ?? 'invalid value');
  }

  const targets = result.data.targets.map(toStorageTarget);

  const seen = new Set<string>();
  for (const target of targets) {
    if (seen.has(target.name)) {
      throw new ConfigurationError('targets', `duplicate target name ${target.name}`);
    }
    seen.add(target.name);
  }

  return targets;
}

export async function loadTargets(filePath: string, env: NodeJS.ProcessEnv): Promise<StorageTarget[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = errorCode(error) === 'ENOENT' ? 'file not found' : errorMessage(error);
    throw new ConfigurationError('targetsFile', `${filePath}: ${reason}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError('targetsFile', `${filePath}: ${errorMessage(error)}`);
  }

  return parseTargets(raw, env);
}
