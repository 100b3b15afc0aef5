/**
 * Source Scanner
 *
 * Lists the top-level files of the source folder. Sizes are read once here
 * and the files are expected to stay unchanged for the rest of the run.
 */

import { readdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { SourceDirectoryError, type UploadItem } from '@skyrelay/core';
import { errorCode, errorMessage } from '@skyrelay/utils';

/**
 * Regular files (symlinks followed) in directory order. Subfolders are skipped.
 */
export async function scanSourceDirectory(dir: string): Promise<UploadItem[]> {
  const root = resolve(dir);

  try {
    const info = await stat(root);
    if (!info.isDirectory()) {
      throw new SourceDirectoryError(root, 'not a directory');
    }
  } catch (error) {
    if (error instanceof SourceDirectoryError) {
      throw error;
    }
    const message = errorCode(error) === 'ENOENT' ? 'does not exist' : errorMessage(error);
    throw new SourceDirectoryError(root, message);
  }

  const names = await readdir(root);
  const items: UploadItem[] = [];

  for (const name of names) {
    const path = join(root, name);
    try {
      const info = await stat(path);
      if (info.isFile()) {
        items.push({ name, path, sizeBytes: info.size });
      }
    } catch (error) {
      // Dangling symlink
      if (errorCode(error) !== 'ENOENT') {
        throw error;
      }
    }
  }

  return items;
}

export function totalBytes(items: readonly UploadItem[]): number {
  return items.reduce((sum, item) => sum + item.sizeBytes, 0);
}
