// packages/cli/src/program.ts — Command registration

import { VERSION } from '@dirsweep/core';
import { Command } from 'commander';

import { doctorCommand } from './commands/doctor.js';
import { initCommand } from './commands/init.js';
import { keptAddCommand, keptListCommand } from './commands/kept.js';
import { runCommand } from './commands/run.js';

function withCommonOptions(command: Command): Command {
  return command
    .option('-d, --dir <path>', 'Directory to clean (default: ~/Downloads)')
    .option('-c, --config <path>', 'Config file (default: ~/.dirsweep/config.yml)')
    .option('--verbose', 'Enable debug logging');
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('dirsweep')
    .description('Model-assisted cleanup of a cluttered directory, with an explicit confirm before anything is deleted')
    .version(VERSION);

  withCommonOptions(
    program
      .command('run', { isDefault: true })
      .description('Scan, review suggestions, delete what you confirm, mark what to keep'),
  )
    .option('-m, --model <name>', 'Chat model to ask')
    .action(runCommand);

  const kept = program
    .command('kept')
    .description('Manage files marked as keep');

  withCommonOptions(kept.command('list').description('List files marked as keep'))
    .option('--json', 'Print entries as JSON', false)
    .action(keptListCommand);

  withCommonOptions(kept.command('add').description('Mark files as keep so they are never suggested'))
    .argument('<filename...>', 'Names of entries in the target directory')
    .option('-r, --reason <text>', 'Reason recorded with each entry')
    .action(keptAddCommand);

  withCommonOptions(
    program.command('doctor').description('Preflight diagnostics: node, config, API key, directory, keep list'),
  )
    .option('-m, --model <name>', 'Chat model to check config against')
    .action(doctorCommand);

  withCommonOptions(program.command('init').description('Write a starter config file'))
    .option('-m, --model <name>', 'Chat model to record')
    .option('--force', 'Overwrite an existing config file', false)
    .action(initCommand);

  return program;
}
