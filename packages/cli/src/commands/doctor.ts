// packages/cli/src/commands/doctor.ts — Preflight diagnostics for dirsweep

import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';

import {
  DEFAULT_BASE_URL,
  SuppressionStore,
  VERSION,
  createSilentLogger,
  errorMessage,
  loadConfig,
  type SweepConfig,
} from '@dirsweep/core';
import chalk from 'chalk';
import { config as loadDotenv } from 'dotenv';

import { buildOverrides, type CommonOptions } from '../utils.js';

export interface Check {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  message: string;
  fix?: string;
}

export interface DoctorEnvironment {
  env: NodeJS.ProcessEnv;
  nodeVersion: string;
}

/**
 * Run every check without printing. Later checks are skipped when the
 * config cannot be loaded.
 */
export async function collectChecks(
  options: CommonOptions,
  environment: DoctorEnvironment = { env: process.env, nodeVersion: process.version },
): Promise<Check[]> {
  const checks: Check[] = [];

  // 1. Node version
  const major = Number.parseInt(environment.nodeVersion.replace(/^v/, '').split('.')[0] ?? '', 10);
  if (major >= 20) {
    checks.push({ name: 'node', status: 'pass', message: `Node.js ${environment.nodeVersion}` });
  } else {
    checks.push({
      name: 'node',
      status: 'fail',
      message: `Node.js ${environment.nodeVersion}: requires >= 20`,
      fix: 'Install Node.js 20+',
    });
  }

  // 2. Config
  let config: SweepConfig;
  try {
    config = loadConfig({ configPath: options.config, overrides: buildOverrides(options, environment.env) });
    checks.push({ name: 'config', status: 'pass', message: 'Configuration is valid' });
  } catch (error) {
    checks.push({ name: 'config', status: 'fail', message: errorMessage(error), fix: 'dirsweep init --force' });
    return checks;
  }

  // 3. API key
  if (environment.env.OPENAI_API_KEY?.trim()) {
    checks.push({ name: 'api-key', status: 'pass', message: 'OPENAI_API_KEY is set' });
  } else if (config.advisory.baseUrl !== DEFAULT_BASE_URL) {
    checks.push({
      name: 'api-key',
      status: 'warn',
      message: `OPENAI_API_KEY not set; requests to ${config.advisory.baseUrl} go unauthenticated`,
    });
  } else {
    checks.push({
      name: 'api-key',
      status: 'fail',
      message: 'OPENAI_API_KEY not set',
      fix: 'Add OPENAI_API_KEY to .env or export it',
    });
  }

  // 4. Target directory
  try {
    const info = await stat(config.directory);
    if (!info.isDirectory()) {
      checks.push({ name: 'directory', status: 'fail', message: `${config.directory} is not a directory`, fix: 'dirsweep --dir <path>' });
    } else {
      await access(config.directory, constants.R_OK | constants.W_OK);
      checks.push({ name: 'directory', status: 'pass', message: `${config.directory} is readable and writable` });
    }
  } catch (error) {
    checks.push({ name: 'directory', status: 'fail', message: errorMessage(error), fix: 'dirsweep --dir <path>' });
  }

  // 5. Keep list
  const inspection = await new SuppressionStore(config.suppressionFile, { logger: createSilentLogger() }).inspect();
  switch (inspection.state) {
    case 'ok':
      checks.push({ name: 'keep-list', status: 'pass', message: `${inspection.count} file(s) marked as keep` });
      break;
    case 'missing':
      checks.push({ name: 'keep-list', status: 'pass', message: 'No keep list yet; created on first keep' });
      break;
    case 'corrupt':
      checks.push({
        name: 'keep-list',
        status: 'warn',
        message: `${inspection.filePath} is unreadable (${inspection.message ?? 'unknown error'})`,
        fix: 'It will be backed up and reset on the next keep',
      });
      break;
  }

  return checks;
}

export async function doctorCommand(options: CommonOptions): Promise<void> {
  loadDotenv();
  console.error(chalk.cyan(`\n  dirsweep doctor v${VERSION}\n`));

  const checks = await collectChecks(options);

  let hasFailure = false;
  for (const check of checks) {
    const icon = check.status === 'pass'
      ? chalk.green('PASS')
      : check.status === 'warn'
        ? chalk.yellow('WARN')
        : chalk.red('FAIL');
    console.error(`  ${icon} ${check.name}: ${check.message}`);
    if (check.fix) {
      console.error(chalk.dim(`       → ${check.fix}`));
    }
    if (check.status === 'fail') hasFailure = true;
  }

  console.error('');

  const output = {
    version: VERSION,
    checks,
    healthy: !hasFailure,
  };
  console.log(JSON.stringify(output, null, 2));

  if (hasFailure) {
    process.exit(1);
  }
}
