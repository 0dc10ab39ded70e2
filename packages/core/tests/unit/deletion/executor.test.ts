import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  NOT_FOUND_REASON,
  OUTSIDE_DIRECTORY_REASON,
  executeDeletions,
  isDirectChildName,
  treeSize,
} from '../../../src/deletion/executor.js';

const TEST_DIR = join(tmpdir(), `dirsweep-delete-test-${process.pid}-${Date.now()}`);
const TARGET = join(TEST_DIR, 'downloads');

beforeEach(() => {
  mkdirSync(TARGET, { recursive: true });
  writeFileSync(join(TARGET, 'a.bin'), Buffer.alloc(300));
  writeFileSync(join(TARGET, 'b.bin'), Buffer.alloc(700));
  writeFileSync(join(TEST_DIR, 'outside.txt'), 'keep me');
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('executeDeletions', () => {
  it('deletes what it can and reports the rest', async () => {
    const outcome = await executeDeletions(['a.bin', 'missing.bin', 'b.bin'], TARGET);
    expect(outcome).toEqual({
      deleted: ['a.bin', 'b.bin'],
      failed: [{ filename: 'missing.bin', reason: NOT_FOUND_REASON }],
      bytesFreed: 1000,
    });
    expect(existsSync(join(TARGET, 'a.bin'))).toBe(false);
    expect(existsSync(join(TARGET, 'b.bin'))).toBe(false);
  });

  it('refuses names that reach outside the directory', async () => {
    const outcome = await executeDeletions(['../outside.txt', join(TEST_DIR, 'outside.txt')], TARGET);
    expect(outcome.deleted).toEqual([]);
    expect(outcome.failed.map((f) => f.reason)).toEqual([OUTSIDE_DIRECTORY_REASON, OUTSIDE_DIRECTORY_REASON]);
    expect(existsSync(join(TEST_DIR, 'outside.txt'))).toBe(true);
  });

  it('removes directories recursively', async () => {
    mkdirSync(join(TARGET, 'old-project', 'src'), { recursive: true });
    writeFileSync(join(TARGET, 'old-project', 'src', 'main.c'), 'int main() {}');
    const outcome = await executeDeletions(['old-project'], TARGET);
    expect(outcome.deleted).toEqual(['old-project']);
    expect(existsSync(join(TARGET, 'old-project'))).toBe(false);
  });

  it('counts the contents of a removed directory as freed', async () => {
    mkdirSync(join(TARGET, 'proj', 'nested'), { recursive: true });
    writeFileSync(join(TARGET, 'proj', 'big.bin'), Buffer.alloc(5 * 1024 * 1024));
    writeFileSync(join(TARGET, 'proj', 'nested', 'small.bin'), Buffer.alloc(1000));

    const outcome = await executeDeletions(['proj', 'a.bin'], TARGET);

    expect(outcome).toEqual({ deleted: ['proj', 'a.bin'], failed: [], bytesFreed: 5 * 1024 * 1024 + 1000 + 300 });
  });

  it('handles each name once', async () => {
    const outcome = await executeDeletions(['a.bin', 'a.bin'], TARGET);
    expect(outcome).toEqual({ deleted: ['a.bin'], failed: [], bytesFreed: 300 });
  });

  it('does nothing for an empty selection', async () => {
    expect(await executeDeletions([], TARGET)).toEqual({ deleted: [], failed: [], bytesFreed: 0 });
  });
});

describe('isDirectChildName', () => {
  it('accepts plain names, including ones with spaces and dots', () => {
    expect(isDirectChildName('report (1).pdf')).toBe(true);
    expect(isDirectChildName('.hidden')).toBe(true);
  });

  it('rejects separators and dot segments', () => {
    expect(isDirectChildName('a/b')).toBe(false);
    expect(isDirectChildName('a\\b')).toBe(false);
    expect(isDirectChildName('..')).toBe(false);
    expect(isDirectChildName('.')).toBe(false);
    expect(isDirectChildName('')).toBe(false);
  });
});

describe('treeSize', () => {
  it('sums files below a directory and takes a file as is', async () => {
    mkdirSync(join(TARGET, 'tree', 'a', 'b'), { recursive: true });
    writeFileSync(join(TARGET, 'tree', 'one.bin'), Buffer.alloc(10));
    writeFileSync(join(TARGET, 'tree', 'a', 'b', 'two.bin'), Buffer.alloc(20));

    expect(await treeSize(join(TARGET, 'tree'))).toBe(30);
    expect(await treeSize(join(TARGET, 'b.bin'))).toBe(700);
  });
});
