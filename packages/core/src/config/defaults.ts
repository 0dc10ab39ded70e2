// packages/core/src/config/defaults.ts

import { homedir } from 'node:os';
import { join } from 'node:path';
import type { SweepConfig } from '../types/config.js';
import {
  ARTIFACT_FILENAME,
  CONFIG_DIRNAME,
  CONFIG_FILENAME,
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_SEC,
  SUPPRESSION_FILENAME,
} from '../utils/constants.js';

/** The user directory cleaned when nothing else is configured. */
export function resolveDefaultDirectory(home: string = homedir()): string {
  return join(home, 'Downloads');
}

export function defaultConfigPath(home: string = homedir()): string {
  return join(home, CONFIG_DIRNAME, CONFIG_FILENAME);
}

export function createDefaultConfig(home: string = homedir()): SweepConfig {
  return {
    directory: resolveDefaultDirectory(home),
    suppressionFile: join(home, CONFIG_DIRNAME, SUPPRESSION_FILENAME),
    artifactName: ARTIFACT_FILENAME,
    scan: {
      exclude: [],
    },
    advisory: {
      model: DEFAULT_MODEL,
      baseUrl: DEFAULT_BASE_URL,
      temperature: DEFAULT_TEMPERATURE,
      timeoutSec: DEFAULT_TIMEOUT_SEC,
    },
    logLevel: 'info',
  };
}
