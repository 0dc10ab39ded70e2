// packages/core/src/suppression/suppression-store.ts — Durable "keep forever" list backed by a JSON file

import { copyFile, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { AddResult, SuppressionEntry, SuppressionInspection } from '../types/suppression.js';
import { DEFAULT_KEEP_REASON } from '../utils/constants.js';
import { SuppressionWriteError, errorCode, errorMessage } from '../utils/errors.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';

const keptFileSchema = z
  .object({
    filename: z.string().min(1),
    marked_date: z.string().optional(),
    reason: z.string().optional(),
  })
  .passthrough();

const suppressionDocumentSchema = z
  .object({
    kept_files: z.array(keptFileSchema).default([]),
    metadata: z.object({ last_updated: z.string().optional() }).passthrough().default({}),
  })
  .passthrough();

type SuppressionDocument = z.output<typeof suppressionDocumentSchema>;

type ReadResult =
  | { state: 'missing' }
  | { state: 'ok'; document: SuppressionDocument }
  | { state: 'corrupt'; message: string };

export interface SuppressionStoreOptions {
  logger?: Logger;
  /** Clock used for `marked_date` and `last_updated`. */
  now?: () => Date;
}

/**
 * File layout:
 *
 * ```json
 * { "kept_files": [{ "filename": "a.pdf", "marked_date": "...", "reason": "..." }],
 *   "metadata": { "last_updated": "..." } }
 * ```
 *
 * Reads are permissive: a missing file is an empty set, an unreadable or
 * malformed one logs a warning and is treated as empty. Every `add` rewrites
 * the whole file through a temp file + rename, so an interrupted write leaves
 * the previous version in place.
 */
export class SuppressionStore {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    readonly filePath: string,
    options: SuppressionStoreOptions = {},
  ) {
    this.log = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
  }

  /** Suppressed filenames. Never throws. */
  async load(): Promise<Set<string>> {
    const entries = await this.entries();
    return new Set(entries.map((entry) => entry.filename));
  }

  async entries(): Promise<SuppressionEntry[]> {
    const result = await this.read();
    if (result.state === 'corrupt') {
      this.log.warn(`Could not load kept files from ${this.filePath}: ${result.message}`);
      return [];
    }
    if (result.state === 'missing') return [];
    return result.document.kept_files.map((item) => ({
      filename: item.filename,
      markedAt: item.marked_date ?? '',
      reason: item.reason ?? '',
    }));
  }

  /**
   * Record `filename` as kept. Idempotent: an already-kept name is left
   * untouched and nothing is written. Throws SuppressionWriteError when the
   * file cannot be saved.
   */
  async add(filename: string, reason: string = DEFAULT_KEEP_REASON): Promise<AddResult> {
    const result = await this.read();
    let document: SuppressionDocument;
    if (result.state === 'ok') {
      document = result.document;
    } else {
      if (result.state === 'corrupt') {
        this.log.warn(`Kept files at ${this.filePath} are unreadable (${result.message}); starting a new list`);
        await this.backupCorrupt();
      }
      document = { kept_files: [], metadata: {} };
    }

    if (document.kept_files.some((item) => item.filename === filename)) {
      return { filename, added: false };
    }

    const timestamp = this.now().toISOString();
    await this.write({
      ...document,
      kept_files: [...document.kept_files, { filename, marked_date: timestamp, reason }],
      metadata: { ...document.metadata, last_updated: timestamp },
    });
    this.log.debug(`Marked ${filename} as keep`);
    return { filename, added: true };
  }

  /** Describe the backing file without modifying it. */
  async inspect(): Promise<SuppressionInspection> {
    const result = await this.read();
    switch (result.state) {
      case 'missing':
        return { filePath: this.filePath, state: 'missing', count: 0 };
      case 'corrupt':
        return { filePath: this.filePath, state: 'corrupt', count: 0, message: result.message };
      case 'ok':
        return {
          filePath: this.filePath,
          state: 'ok',
          count: result.document.kept_files.length,
          lastUpdated: result.document.metadata.last_updated,
        };
    }
  }

  private async read(): Promise<ReadResult> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return { state: 'missing' };
      return { state: 'corrupt', message: errorMessage(err) };
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (err) {
      return { state: 'corrupt', message: `invalid JSON: ${errorMessage(err)}` };
    }

    const parsed = suppressionDocumentSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      return { state: 'corrupt', message: issues };
    }
    return { state: 'ok', document: parsed.data };
  }

  private async write(document: SuppressionDocument): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
      await rename(tmpPath, this.filePath);
    } catch (err) {
      await this.discard(tmpPath);
      throw new SuppressionWriteError(
        `Could not save kept files to ${this.filePath}: ${errorMessage(err)}`,
        this.filePath,
      );
    }
  }

  private async backupCorrupt(): Promise<void> {
    const backupPath = `${this.filePath}.bak`;
    try {
      await copyFile(this.filePath, backupPath);
      this.log.info(`Previous kept files saved to ${backupPath}`);
    } catch (err) {
      this.log.warn(`Failed to back up kept files: ${errorMessage(err)}`);
    }
  }

  private async discard(path: string): Promise<void> {
    try {
      await rm(path, { force: true });
    } catch (err) {
      this.log.debug(`Could not remove ${path}: ${errorMessage(err)}`);
    }
  }
}
