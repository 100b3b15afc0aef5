import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { safeWriteFile } from '../src/file.js';

describe('safeWriteFile', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('creates missing folders and replaces existing content', async () => {
    dir = await mkdtemp(join(tmpdir(), 'skyrelay-file-'));
    const file = join(dir, 'reports', 'links.txt');

    await safeWriteFile(file, 'first run\n');
    await safeWriteFile(file, 'second run\n');

    expect(await readFile(file, 'utf8')).toBe('second run\n');
  });
});
