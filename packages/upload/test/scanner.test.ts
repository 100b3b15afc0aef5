import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, symlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SourceDirectoryError } from '@skyrelay/core';
import { scanSourceDirectory, totalBytes } from '../src/scanner.js';

describe('scanSourceDirectory', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'skyrelay-scan-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('lists top-level files with their sizes and skips folders', async () => {
    await writeFile(join(dir, 'a.bin'), Buffer.alloc(3));
    await writeFile(join(dir, 'b.bin'), Buffer.alloc(5));
    await mkdir(join(dir, 'nested'));
    await writeFile(join(dir, 'nested', 'c.bin'), Buffer.alloc(7));

    const items = await scanSourceDirectory(dir);
    const sorted = [...items].sort((x, y) => x.name.localeCompare(y.name));

    expect(sorted).toEqual([
      { name: 'a.bin', path: join(dir, 'a.bin'), sizeBytes: 3 },
      { name: 'b.bin', path: join(dir, 'b.bin'), sizeBytes: 5 },
    ]);
    expect(totalBytes(items)).toBe(8);
  });

  it('follows symlinks and ignores dangling ones', async () => {
    await writeFile(join(dir, 'real.bin'), Buffer.alloc(4));
    await symlink(join(dir, 'real.bin'), join(dir, 'link.bin'));
    await symlink(join(dir, 'missing.bin'), join(dir, 'broken.bin'));

    const names = (await scanSourceDirectory(dir)).map((i) => i.name).sort();

    expect(names).toEqual(['link.bin', 'real.bin']);
  });

  it('returns nothing for an empty folder', async () => {
    expect(await scanSourceDirectory(dir)).toEqual([]);
  });

  it('rejects a missing folder', async () => {
    const missing = join(dir, 'nope');

    await expect(scanSourceDirectory(missing)).rejects.toThrow(`Source folder ${missing}: does not exist`);
  });

  it('rejects a file path', async () => {
    const file = join(dir, 'a.bin');
    await writeFile(file, 'x');

    await expect(scanSourceDirectory(file)).rejects.toBeInstanceOf(SourceDirectoryError);
  });
});
