// packages/cli/src/commands/kept.ts — Inspect and extend the keep list outside a session

import { SuppressionStore, SuppressionWriteError } from '@dirsweep/core';
import chalk from 'chalk';

import { loadRuntime, printError, type CommonOptions } from '../utils.js';

interface KeptListOptions extends CommonOptions {
  json?: boolean;
}

interface KeptAddOptions extends CommonOptions {
  reason?: string;
}

// ── dirsweep kept list ──

export async function keptListCommand(options: KeptListOptions): Promise<void> {
  try {
    const { config, logger } = loadRuntime(options);
    const store = new SuppressionStore(config.suppressionFile, { logger: logger.child('keep') });
    const entries = await store.entries();

    if (options.json) {
      console.log(JSON.stringify(entries, null, 2));
      return;
    }

    if (entries.length === 0) {
      console.log(chalk.gray(`No files marked as keep (${config.suppressionFile}).`));
      return;
    }

    console.log(chalk.bold(`${entries.length} file(s) marked as keep:`));
    for (const entry of entries) {
      console.log(`  ${entry.filename}`);
      console.log(chalk.gray(`    ${entry.markedAt} · ${entry.reason}`));
    }
  } catch (error) {
    printError(error);
    process.exit(1);
  }
}

// ── dirsweep kept add ──

export async function keptAddCommand(filenames: string[], options: KeptAddOptions): Promise<void> {
  try {
    const { config, logger } = loadRuntime(options);
    const store = new SuppressionStore(config.suppressionFile, { logger: logger.child('keep') });

    let failed = 0;
    for (const filename of filenames) {
      try {
        const result = await store.add(filename, options.reason);
        if (result.added) {
          console.log(chalk.green(`✅ ${filename} marked as keep`));
        } else {
          console.log(chalk.gray(`   ${filename} was already marked as keep`));
        }
      } catch (error) {
        if (!(error instanceof SuppressionWriteError)) throw error;
        failed++;
        console.error(chalk.red(`   Could not mark ${filename}: ${error.message}`));
      }
    }

    if (failed > 0) process.exit(1);
  } catch (error) {
    printError(error);
    process.exit(1);
  }
}
