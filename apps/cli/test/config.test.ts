import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from '@skyrelay/core';
import { loadConfig } from '../src/config/env.js';
import { resolveRunSettings } from '../src/config/options.js';
import { loadTargets, parseTargets, substituteEnv } from '../src/config/targets.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({}, '/work');

    expect(config).toEqual({
      nodeEnv: 'development',
      logLevel: 'info',
      targetsFile: '/work/targets.json',
      transfer: {
        partSizeMb: 8,
        maxConcurrentParts: 10,
        maxConcurrentTransfers: 0,
        timeoutMs: 21600000,
        retryAttempts: 1,
        retryDelayMs: 2000,
        strictCapacity: false,
      },
      links: {
        expirySeconds: 604800,
        reportFile: '/work/presigned_urls.txt',
      },
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      SKYRELAY_TARGETS_FILE: '/etc/skyrelay/targets.json',
      SKYRELAY_PART_SIZE_MB: '16',
      SKYRELAY_MAX_CONCURRENT_PARTS: '4',
      SKYRELAY_RETRY_ATTEMPTS: '3',
      SKYRELAY_STRICT_CAPACITY: 'true',
    }, '/work');

    expect(config.targetsFile).toBe('/etc/skyrelay/targets.json');
    expect(config.transfer.partSizeMb).toBe(16);
    expect(config.transfer.maxConcurrentParts).toBe(4);
    expect(config.transfer.retryAttempts).toBe(3);
    expect(config.transfer.strictCapacity).toBe(true);
  });

  it('rejects a part size below the multipart minimum', () => {
    expect(() => loadConfig({ SKYRELAY_PART_SIZE_MB: '4' })).toThrow(
      'Invalid configuration for SKYRELAY_PART_SIZE_MB'
    );
  });

  it('needs at least one part in flight', () => {
    expect(() => loadConfig({ SKYRELAY_MAX_CONCURRENT_PARTS: '0' })).toThrow(
      'Invalid configuration for SKYRELAY_MAX_CONCURRENT_PARTS'
    );
  });

  it('rejects non-numeric values', () => {
    expect(() => loadConfig({ SKYRELAY_TRANSFER_TIMEOUT_MS: 'soon' })).toThrow(ConfigurationError);
  });
});

describe('resolveRunSettings', () => {
  const config = loadConfig({}, '/work');

  it('takes the environment when no flags are given', () => {
    expect(resolveRunSettings(config, {}, '/elsewhere')).toEqual({
      targetsFile: '/work/targets.json',
      reportFile: '/work/presigned_urls.txt',
      expirySeconds: 604800,
      partSizeBytes: 8388608,
      maxConcurrentParts: 10,
      maxConcurrentTransfers: 0,
      transferTimeoutMs: 21600000,
      retry: { maxAttempts: 1, initialDelay: 2000 },
      rejectDegradedUsage: false,
    });
  });

  it('lets flags win', () => {
    const settings = resolveRunSettings(config, {
      targets: 'custom.json',
      expiry: '3600',
      timeout: '0',
      retries: '2',
      strictCapacity: true,
    }, '/elsewhere');

    expect(settings.targetsFile).toBe('/elsewhere/custom.json');
    expect(settings.expirySeconds).toBe(3600);
    expect(settings.transferTimeoutMs).toBe(0);
    expect(settings.retry.maxAttempts).toBe(3);
    expect(settings.rejectDegradedUsage).toBe(true);
  });

  it('rejects a bad expiry', () => {
    expect(() => resolveRunSettings(config, { expiry: '-5' })).toThrow('Invalid configuration for --expiry');
  });
});

describe('parseTargets', () => {
  const env = { WASABI_KEY: 'test-key', WASABI_SECRET: 'test-secret' };

  it('builds descriptors with quotas in binary gigabytes', () => {
    const [target] = parseTargets({
      targets: [{
        name: 'Wasabi',
        endpoint: 'https://s3.ap-northeast-1.wasabisys.com',
        region: 'ap-northeast-1',
        accessKeyId: '${WASABI_KEY}',
        secretAccessKey: '${WASABI_SECRET}',
        bucket: 'media',
        maxSizeGb: 9.5,
      }],
    }, env);

    expect(target).toEqual({
      name: 'Wasabi',
      endpoint: 'https://s3.ap-northeast-1.wasabisys.com',
      region: 'ap-northeast-1',
      signing: 'sigv4',
      credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
      bucket: 'media',
      capacity: { maxBytes: 10200547328 },
      linkExpiryCapSeconds: undefined,
      enabled: true,
    });
  });

  it('derives the R2 endpoint and signs with region auto', () => {
    const [target] = parseTargets({
      targets: [{
        name: 'R2',
        r2AccountId: 'acct123',
        accessKeyId: 'test-key',
        secretAccessKey: 'test-secret',
        bucket: 'media',
        maxSizeGb: null,
      }],
    }, {});

    expect(target?.endpoint).toBe('https://acct123.r2.cloudflarestorage.com');
    expect(target?.signing).toBe('sigv4-auto-region');
    expect(target?.region).toBe('auto');
    expect(target?.capacity).toBeUndefined();
  });

  it('derives the Oracle endpoint from namespace and region', () => {
    const [target] = parseTargets({
      targets: [{
        name: 'Oracle',
        oracleNamespace: 'tenancy',
        region: 'ap-hyderabad-1',
        accessKeyId: 'test-key',
        secretAccessKey: 'test-secret',
        bucket: 'media',
        maxBytes: 1000,
        enabled: false,
      }],
    }, {});

    expect(target?.endpoint).toBe('https://tenancy.compat.objectstorage.ap-hyderabad-1.oraclecloud.com');
    expect(target?.capacity).toEqual({ maxBytes: 1000 });
    expect(target?.enabled).toBe(false);
  });

  it('derives Oracle public object URLs when asked to', () => {
    const [target] = parseTargets({
      targets: [{
        name: 'Oracle',
        oracleNamespace: 'tenancy',
        region: 'ap-hyderabad-1',
        accessKeyId: 'test-key',
        secretAccessKey: 'test-secret',
        bucket: 'media',
        publicUrls: true,
      }],
    }, {});

    expect(target?.publicUrlBase).toBe('https://objectstorage.ap-hyderabad-1.oraclecloud.com/n/tenancy/b/media/o');
  });

  it('needs a base for public URLs outside Oracle', () => {
    expect(() => parseTargets({
      targets: [{
        name: 'A',
        endpoint: 'https://a.test',
        accessKeyId: 'k',
        secretAccessKey: 's',
        bucket: 'b',
        publicUrls: true,
      }],
    }, {})).toThrow('Invalid configuration for targets.0.publicUrls: set publicUrlBase, or oracleNamespace to derive it');
  });

  it('requires some way to reach the target', () => {
    expect(() => parseTargets({
      targets: [{ name: 'X', accessKeyId: 'k', secretAccessKey: 's', bucket: 'b' }],
    }, {})).toThrow('Invalid configuration for targets.0.endpoint: set endpoint, r2AccountId or oracleNamespace');
  });

  it('rejects duplicate names', () => {
    const entry = { name: 'A', endpoint: 'https://a.test', accessKeyId: 'k', secretAccessKey: 's', bucket: 'b' };

    expect(() => parseTargets({ targets: [entry, entry] }, {})).toThrow('duplicate target name A');
  });

  it('reports the field that failed validation', () => {
    expect(() => parseTargets({
      targets: [{ name: 'A', endpoint: 'https://a.test', accessKeyId: 'k', secretAccessKey: 's' }],
    }, {})).toThrow('Invalid configuration for targets.0.bucket');
  });
});

describe('substituteEnv', () => {
  it('replaces references inside strings and nested values', () => {
    expect(substituteEnv({ a: ['x-${V}-y', 3], b: { c: '${V}' } }, { V: 'v' })).toEqual({
      a: ['x-v-y', 3],
      b: { c: 'v' },
    });
  });

  it('fails on an unset variable', () => {
    expect(() => substituteEnv({ targets: [{ key: '${MISSING}' }] }, {})).toThrow(
      'Invalid configuration for targets.0.key: environment variable MISSING is not set'
    );
  });
});

describe('loadTargets', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'skyrelay-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads and parses a targets file', async () => {
    const file = join(dir, 'targets.json');
    await writeFile(file, JSON.stringify({
      targets: [{ name: 'A', endpoint: 'https://a.test', accessKeyId: 'k', secretAccessKey: 's', bucket: 'b' }],
    }));

    const targets = await loadTargets(file, {});

    expect(targets.map((t) => t.name)).toEqual(['A']);
  });

  it('names a missing file', async () => {
    const file = join(dir, 'missing.json');

    await expect(loadTargets(file, {})).rejects.toThrow(`${file}: file not found`);
  });

  it('rejects malformed JSON', async () => {
    const file = join(dir, 'broken.json');
    await writeFile(file, '{ targets: ');

    await expect(loadTargets(file, {})).rejects.toBeInstanceOf(ConfigurationError);
  });
});
