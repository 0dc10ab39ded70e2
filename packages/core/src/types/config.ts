// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

export interface AdvisoryConfig {
  model: string;
  /** OpenAI-compatible API root, e.g. https://api.openai.com/v1 */
  baseUrl: string;
  temperature: number;
  timeoutSec: number;
  maxTokens?: number;
}

export interface ScanConfig {
  /** gitignore-style patterns for entries never sent to the advisor. */
  exclude: string[];
}

export interface SweepConfig {
  configVersion?: number;
  /** Directory to clean. */
  directory: string;
  /** JSON file listing entries the operator chose to keep. */
  suppressionFile: string;
  /** File name of the suggestion dump written into `directory` each session. */
  artifactName: string;
  scan: ScanConfig;
  advisory: AdvisoryConfig;
  logLevel: LogLevel;
}

/** Partial config accepted from the command line or programmatic callers. */
export type ConfigOverrides = {
  directory?: string;
  suppressionFile?: string;
  artifactName?: string;
  scan?: Partial<ScanConfig>;
  advisory?: Partial<AdvisoryConfig>;
  logLevel?: LogLevel;
};
