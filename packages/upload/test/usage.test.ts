import { describe, it, expect } from 'vitest';
import { measureUsage } from '../src/usage.js';
import { FakeTransferClient } from './fakes.js';

describe('measureUsage', () => {
  it('sums every object in the bucket', async () => {
    const client = new FakeTransferClient().seed('b', 'x', 100).seed('b', 'y', 23);

    expect(await measureUsage(client, 'b')).toEqual({ bytes: 123, objectCount: 2, degraded: false });
  });

  it('reports an empty or missing bucket as zero', async () => {
    expect(await measureUsage(new FakeTransferClient(), 'none')).toEqual({ bytes: 0, objectCount: 0, degraded: false });
  });

  it('keeps the partial sum when listing fails', async () => {
    const client = new FakeTransferClient({ listFailAfter: 1 }).seed('b', 'x', 100).seed('b', 'y', 23);

    expect(await measureUsage(client, 'b')).toEqual({
      bytes: 100,
      objectCount: 1,
      degraded: true,
      error: 'InternalError: listing interrupted',
    });
  });
});
