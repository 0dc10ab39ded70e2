import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { collectChecks } from '../src/commands/doctor.js';

const TEST_DIR = join(tmpdir(), `dirsweep-doctor-test-${process.pid}-${Date.now()}`);
const CONFIG_PATH = join(TEST_DIR, 'config.yml');
const TARGET = join(TEST_DIR, 'downloads');
const KEPT = join(TEST_DIR, 'kept_files.json');

beforeEach(() => {
  mkdirSync(TARGET, { recursive: true });
  writeFileSync(CONFIG_PATH, `directory: ${TARGET}\nsuppressionFile: ${KEPT}\n`, 'utf-8');
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('collectChecks', () => {
  it('passes on a healthy setup', async () => {
    const checks = await collectChecks(
      { config: CONFIG_PATH },
      { env: { OPENAI_API_KEY: 'test-secret' }, nodeVersion: 'v20.11.1' },
    );
    expect(checks.map((c) => [c.name, c.status])).toEqual([
      ['node', 'pass'],
      ['config', 'pass'],
      ['api-key', 'pass'],
      ['directory', 'pass'],
      ['keep-list', 'pass'],
    ]);
  });

  it('fails on an old node, a missing key and a missing directory', async () => {
    rmSync(TARGET, { recursive: true });
    const checks = await collectChecks({ config: CONFIG_PATH }, { env: {}, nodeVersion: 'v18.19.0' });
    const status = Object.fromEntries(checks.map((c) => [c.name, c.status]));
    expect(status).toEqual({ node: 'fail', config: 'pass', 'api-key': 'fail', directory: 'fail', 'keep-list': 'pass' });
  });

  it('warns about a corrupt keep list', async () => {
    writeFileSync(KEPT, 'not json');
    const checks = await collectChecks({ config: CONFIG_PATH }, { env: { OPENAI_API_KEY: 'test-secret' }, nodeVersion: 'v20.0.0' });
    expect(checks.find((c) => c.name === 'keep-list')?.status).toBe('warn');
  });

  it('stops after an invalid config', async () => {
    writeFileSync(CONFIG_PATH, 'directory: 42\nlogLevel: loud\n', 'utf-8');
    const checks = await collectChecks({ config: CONFIG_PATH }, { env: {}, nodeVersion: 'v20.0.0' });
    expect(checks.map((c) => [c.name, c.status])).toEqual([
      ['node', 'pass'],
      ['config', 'fail'],
    ]);
  });
});
