// packages/cli/src/commands/init.ts — Write a starter config file

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { defaultConfigPath, expandHome, loadConfig, writeConfig } from '@dirsweep/core';
import chalk from 'chalk';

import { buildOverrides, printError, type CommonOptions } from '../utils.js';

interface InitOptions extends CommonOptions {
  force?: boolean;
}

export async function initCommand(options: InitOptions): Promise<void> {
  try {
    const configPath = resolve(expandHome(options.config ?? defaultConfigPath()));

    if (existsSync(configPath) && !options.force) {
      console.error(chalk.red(`Config already exists at ${configPath}. Use --force to overwrite.`));
      process.exit(1);
    }

    // Defaults plus flags only; an existing file is being replaced.
    const config = loadConfig({ skipFile: true, overrides: buildOverrides(options, {}) });
    writeConfig({ ...config, configVersion: 1 }, configPath);

    console.log(chalk.green(`\nWrote ${configPath}`));
    console.log(chalk.gray(`  directory: ${config.directory}`));
    console.log(chalk.gray(`  model:     ${config.advisory.model}`));
    console.log(chalk.gray('\nNext: set OPENAI_API_KEY, then run dirsweep'));
  } catch (error) {
    printError(error);
    process.exit(1);
  }
}
