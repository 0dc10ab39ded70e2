// packages/cli/src/commands/run.ts — Interactive cleanup sessions, repeated until the operator exits

import {
  EventBus,
  SuppressionStore,
  createAdvisoryClient,
  createExcludeFilter,
  runSession,
} from '@dirsweep/core';
import chalk from 'chalk';

import { InquirerPrompter } from '../prompts.js';
import { printSessionError, renderEvent } from '../render.js';
import { loadRuntime, printError, resolveApiKey, type CommonOptions } from '../utils.js';

export async function runCommand(options: CommonOptions): Promise<void> {
  try {
    const { config, logger } = loadRuntime(options);
    const apiKey = resolveApiKey(config);

    const store = new SuppressionStore(config.suppressionFile, { logger: logger.child('keep') });
    const advisor = createAdvisoryClient(config.advisory, { apiKey, logger: logger.child('advisory') });
    const prompter = new InquirerPrompter();
    const exclude = createExcludeFilter(config.scan.exclude);
    const bus = new EventBus();
    bus.on('event', renderEvent);

    logger.debug(`Directory: ${config.directory}, model: ${config.advisory.model}`);

    let again = true;
    while (again) {
      try {
        await runSession({
          directory: config.directory,
          store,
          advisor,
          prompter,
          bus,
          logger,
          artifactName: config.artifactName,
          exclude,
        });
      } catch (error) {
        if (!printSessionError(error)) throw error;
      }

      console.log(`\n${'='.repeat(70)}`);
      again = await prompter.select(
        'What would you like to do?',
        [
          { name: 'Run cleanup again', value: true },
          { name: 'Exit', value: false },
        ],
        false,
      );
      if (again) console.log(`\n${'='.repeat(70)}\n`);
    }

    console.log(chalk.cyan('\n👋 Goodbye!'));
  } catch (error) {
    printError(error);
    process.exit(1);
  }
}
