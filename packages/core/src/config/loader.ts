// packages/core/src/config/loader.ts

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ConfigOverrides, SweepConfig } from '../types/config.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { createDefaultConfig, defaultConfigPath } from './defaults.js';
import { validateConfig } from './schema.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged; undefined source values are skipped.
 */
function deepMerge(target: object, source: object): PlainObject {
  const result: PlainObject = Object.fromEntries(Object.entries(target));
  for (const [key, srcVal] of Object.entries(source)) {
    if (srcVal === undefined) continue;
    const tgtVal = result[key];
    result[key] = isPlainObject(srcVal) && isPlainObject(tgtVal) ? deepMerge(tgtVal, srcVal) : srcVal;
  }
  return result;
}

/** Expand a leading `~` to the home directory. */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/') || path.startsWith('~\\')) return join(home, path.slice(2));
  return path;
}

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given. */
  configPath?: string;
  home?: string;
  overrides?: ConfigOverrides;
  skipFile?: boolean;
}

/**
 * Load config with precedence: overrides > config file > defaults.
 *
 * 1. Start with defaults derived from the home directory
 * 2. Merge the YAML config file on top (default ~/.dirsweep/config.yml)
 * 3. Merge programmatic overrides on top
 * 4. Validate, then expand `~` in path settings
 */
export function loadConfig(options: LoadConfigOptions = {}): SweepConfig {
  const home = options.home ?? homedir();
  let merged = deepMerge({}, createDefaultConfig(home));

  if (!options.skipFile) {
    const configPath = resolve(expandHome(options.configPath ?? defaultConfigPath(home), home));
    if (existsSync(configPath)) {
      merged = deepMerge(merged, readConfigFile(configPath));
    } else if (options.configPath !== undefined) {
      throw new ConfigError(`Config file not found: ${configPath}`, 'config');
    }
  }

  if (options.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  const config = validateConfig(merged);
  return {
    ...config,
    directory: resolve(expandHome(config.directory, home)),
    suppressionFile: resolve(expandHome(config.suppressionFile, home)),
  };
}

function readConfigFile(configPath: string): PlainObject {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse ${configPath}: ${errorMessage(err)}`);
  }
  // An empty file parses to null
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${configPath} must contain a YAML mapping`);
  }
  return parsed;
}

/**
 * Write a SweepConfig as YAML, creating the parent directory.
 */
export function writeConfig(config: SweepConfig, configPath: string): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, stringifyYaml(config, { lineWidth: 100 }), 'utf-8');
}

export { deepMerge };
