// packages/core/src/snapshot/snapshot-builder.ts — One-level directory snapshot

import { lstat, readdir, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import type { Ignore } from 'ignore';
import { isExcluded } from '../config/ignore.js';
import type { EntryRecord, ScanWarning, Snapshot } from '../types/entry.js';
import { DirectoryUnavailableError, errorCode, errorMessage } from '../utils/errors.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';

export interface BuildSnapshotOptions {
  /** Entries matching this filter are left out. */
  exclude?: Ignore;
  /** Entry names always left out (the session's own suggestion dump). */
  skipNames?: readonly string[];
  logger?: Logger;
}

/**
 * List the direct entries of `directory` with their metadata.
 *
 * Entries whose metadata cannot be read are skipped and returned as warnings.
 * A directory that cannot be listed at all throws DirectoryUnavailableError.
 * Records come back sorted by name; nothing downstream relies on it.
 */
export async function buildSnapshot(
  directory: string,
  options: BuildSnapshotOptions = {},
): Promise<Snapshot> {
  const root = resolve(directory);
  const log = options.logger ?? createSilentLogger();
  const skip = new Set(options.skipNames ?? []);

  const names = await listDirectory(root);
  const records: EntryRecord[] = [];
  const warnings: ScanWarning[] = [];

  for (const name of names.sort(compareNames)) {
    if (skip.has(name)) continue;
    const absolutePath = join(root, name);
    try {
      // lstat: a symlink is reported as itself, never followed out of the directory
      const info = await lstat(absolutePath);
      const isDirectory = info.isDirectory();
      if (options.exclude && isExcluded(options.exclude, name, isDirectory)) {
        log.debug(`Excluded ${name}`);
        continue;
      }
      records.push({
        name,
        absolutePath,
        sizeBytes: info.size,
        modifiedAt: info.mtime,
        extension: extname(name).toLowerCase(),
        isDirectory,
      });
    } catch (err) {
      const message = errorMessage(err);
      log.warn(`Could not access ${name}: ${message}`);
      warnings.push({ name, message });
    }
  }

  return { directory: root, records, warnings };
}

async function listDirectory(root: string): Promise<string[]> {
  try {
    const info = await stat(root);
    if (!info.isDirectory()) {
      throw new DirectoryUnavailableError(`Not a directory: ${root}`, root, 'ENOTDIR');
    }
    return await readdir(root);
  } catch (err) {
    if (err instanceof DirectoryUnavailableError) throw err;
    const code = errorCode(err);
    const message = code === 'ENOENT' ? `Directory not found: ${root}` : `Cannot read directory ${root}: ${errorMessage(err)}`;
    throw new DirectoryUnavailableError(message, root, code);
  }
}

function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
