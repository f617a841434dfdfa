/**
 * Durable file replacement
 *
 * Writes go to a temp file beside the target and are flushed to disk. The temp
 * file is then renamed over the target (or hard-linked to it when `exclusive`)
 * and the parent directory is flushed, so after a crash readers see either the
 * old or the new content and never a partial write.
 */

import { link, mkdir, open, rename, rm, stat, unlink } from 'fs/promises';
import { dirname } from 'path';
import { randomUUID } from 'crypto';
import { logger } from './logger.js';

export interface AtomicWriteOptions {
  /** File mode of the written file (default 0o600) */
  mode?: number;
  /** Fail with EEXIST instead of replacing an existing file */
  exclusive?: boolean;
}

export async function writeFileAtomic(path: string, data: string, options: AtomicWriteOptions = {}): Promise<void> {
  const directory = dirname(path);
  await mkdir(directory, { recursive: true });

  // Check path isn't a directory (could happen if misconfigured)
  const existing = await stat(path).catch((error: NodeJS.ErrnoException) => {
    if (error.code === 'ENOENT') return null;
    throw error;
  });
  if (existing && !existing.isFile()) {
    throw new Error(`${path} is a directory, not a file. Remove it and try again.`);
  }

  const tempPath = `${path}.${randomUUID()}.tmp`;
  try {
    const handle = await open(tempPath, 'wx', options.mode ?? 0o600);
    try {
      await handle.writeFile(data, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }

    if (options.exclusive) {
      await link(tempPath, path);
      await unlink(tempPath);
    } else {
      await rename(tempPath, path);
    }
  } catch (error) {
    // Keep the original error; a leftover temp file is only logged
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn({ tempPath, error: cleanupError }, 'Failed to remove temp file');
    });
    throw error;
  }

  await syncDirectory(directory);
}

// The rename is only durable once the directory entry itself is flushed
async function syncDirectory(directory: string): Promise<void> {
  const handle = await open(directory, 'r');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}
