// packages/core/src/deletion/executor.ts — Permanent removal with a per-entry report

import { lstat, readdir, rm, unlink } from 'node:fs/promises';
import { basename, isAbsolute, join, resolve } from 'node:path';
import type { DeletionFailure, DeletionOutcome } from '../types/deletion.js';
import { errorCode, errorMessage } from '../utils/errors.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';

export const NOT_FOUND_REASON = 'not found';
export const OUTSIDE_DIRECTORY_REASON = 'outside target directory';

/**
 * True when `name` can only refer to a direct child of the target directory.
 * Names come from the advisor, so separators and dot segments are refused.
 */
export function isDirectChildName(name: string): boolean {
  if (name.length === 0 || name === '.' || name === '..') return false;
  if (name.includes('/') || name.includes('\\') || name.includes('\0')) return false;
  return !isAbsolute(name) && basename(name) === name;
}

/**
 * Bytes held by `path`: its own size for a file or link, the sum of
 * everything below it for a directory. Links are not followed.
 */
export async function treeSize(path: string): Promise<number> {
  const info = await lstat(path);
  if (!info.isDirectory()) return info.size;
  let total = 0;
  for (const name of await readdir(path)) {
    total += await treeSize(join(path, name));
  }
  return total;
}

/**
 * Delete each named entry of `directory`. Entries are independent: a failure
 * is recorded and the next entry is attempted. Sizes come from an lstat taken
 * right before removal, not from the earlier snapshot. Directories are
 * removed recursively and count the bytes of their contents.
 */
export async function executeDeletions(
  filenames: readonly string[],
  directory: string,
  options: { logger?: Logger } = {},
): Promise<DeletionOutcome> {
  const log = options.logger ?? createSilentLogger();
  const root = resolve(directory);
  const deleted: string[] = [];
  const failed: DeletionFailure[] = [];
  let bytesFreed = 0;

  for (const filename of new Set(filenames)) {
    if (!isDirectChildName(filename)) {
      failed.push({ filename, reason: OUTSIDE_DIRECTORY_REASON });
      continue;
    }

    const target = join(root, filename);
    let size: number;
    let isDirectory: boolean;
    try {
      const info = await lstat(target);
      isDirectory = info.isDirectory();
      size = isDirectory ? await treeSize(target) : info.size;
    } catch (err) {
      failed.push({ filename, reason: errorCode(err) === 'ENOENT' ? NOT_FOUND_REASON : errorMessage(err) });
      continue;
    }

    try {
      if (isDirectory) {
        await rm(target, { recursive: true });
      } else {
        await unlink(target);
      }
      deleted.push(filename);
      bytesFreed += size;
      log.debug(`Deleted ${target} (${size} bytes)`);
    } catch (err) {
      const code = errorCode(err);
      // Removed by someone else between lstat and unlink
      failed.push({ filename, reason: code === 'ENOENT' ? NOT_FOUND_REASON : errorMessage(err) });
      log.warn(`Failed to delete ${filename}: ${errorMessage(err)}`);
    }
  }

  return { deleted, failed, bytesFreed };
}
