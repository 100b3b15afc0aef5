import { describe, it, expect } from 'vitest';
import { toS3ClientConfig } from '../src/targets/s3Multipart.js';
import { makeTarget } from './fakes.js';

describe('toS3ClientConfig', () => {
  it('signs with region auto and path-style addressing for auto-region providers', () => {
    const config = toS3ClientConfig(
      makeTarget('R2', { endpoint: 'https://acct.r2.cloudflarestorage.com', signing: 'sigv4-auto-region' })
    );

    expect(config).toEqual({
      endpoint: 'https://acct.r2.cloudflarestorage.com',
      region: 'auto',
      forcePathStyle: true,
      credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
      requestChecksumCalculation: 'WHEN_REQUIRED',
      responseChecksumValidation: 'WHEN_REQUIRED',
    });
  });

  it('keeps the target region for plain SigV4', () => {
    const config = toS3ClientConfig(makeTarget('Wasabi', { region: 'ap-northeast-1' }));

    expect(config.region).toBe('ap-northeast-1');
    expect(config.forcePathStyle).toBe(false);
  });
});
