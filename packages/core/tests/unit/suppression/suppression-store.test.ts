import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SuppressionStore } from '../../../src/suppression/suppression-store.js';
import { SuppressionWriteError } from '../../../src/utils/errors.js';

const TEST_DIR = join(tmpdir(), `dirsweep-store-test-${process.pid}-${Date.now()}`);
const FILE = join(TEST_DIR, 'state', 'kept_files.json');
const NOW = new Date('2024-05-01T09:30:00.000Z');

function createStore(): SuppressionStore {
  return new SuppressionStore(FILE, { now: () => NOW });
}

function readDocument(): unknown {
  return JSON.parse(readFileSync(FILE, 'utf-8'));
}

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('SuppressionStore', () => {
  it('loads an empty set when the file does not exist', async () => {
    const store = createStore();
    expect(await store.load()).toEqual(new Set());
    expect(existsSync(FILE)).toBe(false);
  });

  it('creates the file and its directory on first add', async () => {
    const store = createStore();
    expect(await store.add('report.pdf')).toEqual({ filename: 'report.pdf', added: true });
    expect(readDocument()).toEqual({
      kept_files: [
        { filename: 'report.pdf', marked_date: '2024-05-01T09:30:00.000Z', reason: 'User explicitly marked as keep' },
      ],
      metadata: { last_updated: '2024-05-01T09:30:00.000Z' },
    });
  });

  it('is idempotent per filename', async () => {
    const store = createStore();
    await store.add('report.pdf');
    const before = readFileSync(FILE, 'utf-8');
    expect(await store.add('report.pdf', 'again')).toEqual({ filename: 'report.pdf', added: false });
    expect(readFileSync(FILE, 'utf-8')).toBe(before);
    expect(await store.load()).toEqual(new Set(['report.pdf']));
  });

  it('appends entries and exposes them in order', async () => {
    const store = createStore();
    await store.add('a.zip');
    await store.add('b.zip', 'tax records');
    const entries = await store.entries();
    expect(entries).toEqual([
      { filename: 'a.zip', markedAt: '2024-05-01T09:30:00.000Z', reason: 'User explicitly marked as keep' },
      { filename: 'b.zip', markedAt: '2024-05-01T09:30:00.000Z', reason: 'tax records' },
    ]);
  });

  it('survives reopening', async () => {
    await createStore().add('a.zip');
    expect(await createStore().load()).toEqual(new Set(['a.zip']));
  });

  it('keeps unknown fields it finds in the file', async () => {
    mkdirSync(join(TEST_DIR, 'state'), { recursive: true });
    writeFileSync(FILE, JSON.stringify({ kept_files: [{ filename: 'x', note: 'manual' }], metadata: {}, owner: 'me' }));
    await createStore().add('y');
    expect(readDocument()).toMatchObject({ owner: 'me', kept_files: [{ filename: 'x', note: 'manual' }, { filename: 'y' }] });
  });

  it('treats a corrupt file as empty when loading and backs it up before rewriting', async () => {
    mkdirSync(join(TEST_DIR, 'state'), { recursive: true });
    writeFileSync(FILE, '{ not json');
    const store = createStore();

    expect(await store.load()).toEqual(new Set());
    const inspection = await store.inspect();
    expect(inspection.state).toBe('corrupt');

    await store.add('fresh.txt');
    expect(readFileSync(`${FILE}.bak`, 'utf-8')).toBe('{ not json');
    expect(await store.load()).toEqual(new Set(['fresh.txt']));
  });

  it('treats a document of the wrong shape as corrupt', async () => {
    mkdirSync(join(TEST_DIR, 'state'), { recursive: true });
    writeFileSync(FILE, JSON.stringify({ kept_files: 'nope' }));
    expect((await createStore().inspect()).state).toBe('corrupt');
  });

  it('reports count and last update', async () => {
    const store = createStore();
    await store.add('a');
    await store.add('b');
    expect(await store.inspect()).toEqual({
      filePath: FILE,
      state: 'ok',
      count: 2,
      lastUpdated: '2024-05-01T09:30:00.000Z',
    });
  });

  it('raises SuppressionWriteError and leaves no temp file when the write fails', async () => {
    // A directory where the file should be makes the final rename fail
    mkdirSync(FILE, { recursive: true });
    writeFileSync(join(FILE, 'occupied'), 'x');
    const store = createStore();
    await expect(store.add('a.txt')).rejects.toThrow(SuppressionWriteError);
    expect(readdirSync(join(TEST_DIR, 'state')).filter((name) => name.endsWith('.tmp'))).toEqual([]);
  });
});
