// packages/cli/src/render.ts — Terminal rendering for session events

import {
  AdvisoryResponseMalformedError,
  AdvisoryUnavailableError,
  CONFIDENCE_MARKERS,
  DirectoryUnavailableError,
  bytesToMb,
  formatMb,
  type Confidence,
  type DeletionOutcome,
  type Suggestion,
  type SuggestionBatch,
  type SweepEvent,
} from '@dirsweep/core';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

const RULE = '='.repeat(70);

const CONFIDENCE_ORDER: Confidence[] = ['high', 'medium', 'low', 'unknown'];

const CONFIDENCE_HEADINGS: Record<Confidence, string> = {
  high: 'HIGH CONFIDENCE:',
  medium: 'MEDIUM CONFIDENCE:',
  low: 'LOW CONFIDENCE (review carefully):',
  unknown: 'UNRATED (review carefully):',
};

let spinner: Ora | null = null;

/** Stop the advisory spinner, if one is running. */
export function stopSpinner(succeeded: boolean, text?: string): void {
  if (!spinner) return;
  if (succeeded) {
    spinner.succeed(text);
  } else {
    spinner.fail(text);
  }
  spinner = null;
}

/** Suggestions bucketed by confidence, in display order, empty buckets dropped. */
export function groupByConfidence(suggestions: readonly Suggestion[]): Array<[Confidence, Suggestion[]]> {
  const groups: Array<[Confidence, Suggestion[]]> = [];
  for (const confidence of CONFIDENCE_ORDER) {
    const items = suggestions.filter((s) => s.confidence === confidence);
    if (items.length > 0) groups.push([confidence, items]);
  }
  return groups;
}

/** Plain-text detail lines for one suggestion. */
export function describeSuggestion(suggestion: Suggestion): string[] {
  const lines = [
    `   • ${suggestion.filename}`,
    `     Reason: ${suggestion.reason}`,
    `     Size: ${formatMb(suggestion.sizeMb)}`,
  ];
  if (suggestion.ageDays !== undefined) lines.push(`     Age: ${suggestion.ageDays} days`);
  return lines;
}

export function printSuggestions(batch: SuggestionBatch, withheld: readonly string[] = []): void {
  const { summary, suggestions } = batch;
  console.log(`\n${RULE}`);
  console.log(chalk.bold('📋 DELETION SUGGESTIONS'));
  console.log(RULE);
  console.log('\n📊 Summary:');
  console.log(`   • Total files scanned: ${summary.totalFilesScanned}`);
  console.log(`   • Files suggested for deletion: ${summary.filesSuggestedForDeletion}`);
  console.log(`   • Space to free: ${formatMb(summary.totalSpaceToFreeMb)}`);
  if (summary.keepRecentDays > 0) {
    console.log(`   • Files newer than ${summary.keepRecentDays} days left alone`);
  }

  if (withheld.length > 0) {
    console.log(
      chalk.yellow(
        `⚠️  ${withheld.length} suggested name(s) were not offered (marked keep, excluded or not in this folder): ${withheld.join(', ')}`,
      ),
    );
  }

  if (suggestions.length === 0) {
    console.log(chalk.green('\n✅ No files suggested for deletion. This folder looks clean!'));
    return;
  }

  console.log(`\n🗑️  Suggested for deletion (${suggestions.length} files):\n`);
  for (const [confidence, items] of groupByConfidence(suggestions)) {
    console.log(`${CONFIDENCE_MARKERS[confidence]} ${CONFIDENCE_HEADINGS[confidence]}`);
    for (const item of items) {
      console.log(describeSuggestion(item).join('\n'));
      console.log();
    }
  }

  console.log(RULE);
  console.log(chalk.yellow('⚠️  Please review these suggestions carefully before deleting any files!'));
  console.log(RULE);
}

export function printDeletionOutcome(outcome: DeletionOutcome): void {
  console.log(`\n${RULE}`);
  console.log(chalk.bold('🗑️  DELETION RESULTS'));
  console.log(RULE);
  console.log(chalk.green(`✅ Successfully deleted: ${outcome.deleted.length} file(s)`));
  console.log(`💾 Space freed: ${formatMb(bytesToMb(outcome.bytesFreed))}`);
  if (outcome.failed.length > 0) {
    console.log(chalk.red(`\n❌ Failed to delete ${outcome.failed.length} file(s):`));
    for (const failure of outcome.failed) {
      console.log(chalk.red(`   • ${failure.filename}: ${failure.reason}`));
    }
  }
  console.log(RULE);
}

/**
 * Render a single session event to the terminal.
 */
export function renderEvent(event: SweepEvent): void {
  switch (event.type) {
    case 'session.started':
      console.log(chalk.cyan(`🔍 Scanning ${event.directory}...`));
      break;

    case 'scan.completed':
      if (event.entries === 0) {
        console.log('No files found in this folder.');
        break;
      }
      console.log(chalk.green(`✅ Found ${event.entries} items`));
      console.log(`📁 Location: ${event.directory}`);
      console.log(`💾 Total size: ${formatMb(bytesToMb(event.totalBytes))}`);
      for (const warning of event.warnings) {
        console.log(chalk.yellow(`Warning: Could not access ${warning.name}: ${warning.message}`));
      }
      break;

    case 'suppression.applied':
      if (event.filteredOut > 0) {
        console.log(`📌 Filtering out ${event.filteredOut} file(s) marked as 'keep'`);
        console.log(`📊 ${event.remaining} file(s) remaining for analysis`);
      }
      if (event.remaining === 0) {
        console.log(chalk.green('\n✅ Everything here is marked as keep. Nothing to analyze.'));
      }
      break;

    case 'advisory.started':
      spinner = ora(`Analyzing ${event.entries} item(s) with ${event.model}...`).start();
      break;

    case 'advisory.completed':
      stopSpinner(true, `Analysis complete (${(event.durationMs / 1000).toFixed(1)}s)`);
      printSuggestions(event.batch, event.withheld);
      break;

    case 'artifact.written':
      console.log(chalk.gray(`\n💾 Suggestions saved to: ${event.path}`));
      break;

    case 'artifact.failed':
      console.log(chalk.yellow(`\nWarning: Could not save suggestions to ${event.path}: ${event.error}`));
      break;

    case 'deletion.skipped':
      if (event.reason === 'nothing-selected') {
        console.log('\nℹ️  No files selected for deletion.');
      } else if (event.reason === 'declined') {
        console.log(chalk.yellow('\n❌ Deletion cancelled.'));
      }
      break;

    case 'deletion.completed':
      printDeletionOutcome(event.outcome);
      break;

    case 'keep.recorded':
      if (event.added.length > 0) {
        console.log(
          chalk.green(`\n✅ Marked ${event.added.length} file(s) as keep. They won't be suggested in future runs.`),
        );
      }
      if (event.alreadyKept.length > 0) {
        console.log(chalk.gray(`   ${event.alreadyKept.length} file(s) were already marked as keep.`));
      }
      for (const failure of event.failures) {
        console.log(chalk.red(`   Could not mark ${failure.filename}: ${failure.reason}`));
      }
      break;

    case 'session.completed':
      console.log(chalk.gray(`\nSession ${event.sessionId} finished in ${(event.durationMs / 1000).toFixed(1)}s`));
      break;
  }
}

/**
 * Print an error that ended a session early. Returns false for errors
 * the session loop does not know how to recover from.
 */
export function printSessionError(error: unknown): boolean {
  stopSpinner(false);
  if (error instanceof DirectoryUnavailableError) {
    console.error(chalk.red(`Error: ${error.message}`));
    return true;
  }
  if (error instanceof AdvisoryUnavailableError) {
    const status = error.statusCode !== undefined ? ` (HTTP ${error.statusCode})` : '';
    console.error(chalk.red(`Error calling the model${status}: ${error.message}`));
    if (error.isAuthError) console.error(chalk.gray('Check OPENAI_API_KEY.'));
    if (error.isRateLimit) console.error(chalk.gray('Rate limited; wait a moment and run again.'));
    return true;
  }
  if (error instanceof AdvisoryResponseMalformedError) {
    console.error(chalk.red(`Error: Failed to parse model response: ${error.message}`));
    for (const issue of error.issues) {
      console.error(chalk.gray(`  - ${issue}`));
    }
    console.error(chalk.gray(`Raw response: ${error.rawPayload}`));
    return true;
  }
  return false;
}
