// packages/cli/src/utils.ts — Shared command plumbing: options, config, logger

import {
  ConfigError,
  DEFAULT_BASE_URL,
  createLogger,
  loadConfig,
  type ConfigOverrides,
  type Logger,
  type SweepConfig,
} from '@dirsweep/core';
import chalk from 'chalk';
import { config as loadDotenv } from 'dotenv';

/** Options every command accepts. */
export interface CommonOptions {
  dir?: string;
  config?: string;
  model?: string;
  verbose?: boolean;
}

export interface Runtime {
  config: SweepConfig;
  logger: Logger;
}

/**
 * Build config overrides from flags and the environment.
 * Flags win over OPENAI_BASE_URL, which wins over the config file.
 */
export function buildOverrides(options: CommonOptions, env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const baseUrl = env.OPENAI_BASE_URL?.trim();
  return {
    directory: options.dir,
    advisory: {
      model: options.model,
      baseUrl: baseUrl ? baseUrl : undefined,
    },
    logLevel: options.verbose ? 'debug' : undefined,
  };
}

/**
 * Load `.env` from the working directory, then the merged config.
 */
export function loadRuntime(options: CommonOptions): Runtime {
  loadDotenv();
  const config = loadConfig({ configPath: options.config, overrides: buildOverrides(options) });
  return { config, logger: createLogger(config.logLevel) };
}

/**
 * The API key, or undefined. A custom endpoint may run without one;
 * the hosted default may not.
 */
export function resolveApiKey(config: SweepConfig, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const apiKey = env.OPENAI_API_KEY?.trim();
  if (apiKey) return apiKey;
  if (config.advisory.baseUrl === DEFAULT_BASE_URL) {
    throw new ConfigError(
      'OPENAI_API_KEY not found in environment variables. Set it in a .env file or export it.',
      'OPENAI_API_KEY',
    );
  }
  return undefined;
}

export function printError(error: unknown): void {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
}
