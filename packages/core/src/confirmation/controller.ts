// packages/core/src/confirmation/controller.ts

import type { Suggestion, SuggestionBatch } from '../types/suggestion.js';
import { REASON_LABEL_MAX } from '../utils/constants.js';
import { truncate } from '../utils/format.js';
import type { PromptChoice, Prompter } from './prompter.js';

export const CONFIDENCE_MARKERS: Record<Suggestion['confidence'], string> = {
  high: '🔴',
  medium: '🟡',
  low: '🟢',
  unknown: '⚪',
};

/** `🔴 setup.dmg (150.50 MB) - Installer already used` */
export function formatChoiceLabel(suggestion: Suggestion): string {
  const marker = CONFIDENCE_MARKERS[suggestion.confidence];
  const reason = truncate(suggestion.reason, REASON_LABEL_MAX);
  return `${marker} ${suggestion.filename} (${suggestion.sizeMb.toFixed(2)} MB) - ${reason}`;
}

/**
 * Collects the operator's decisions over one suggestion batch. Deletion and
 * keep are separate prompts over the same candidates; nothing is preselected
 * and the destructive gate defaults to "no".
 */
export class ConfirmationController {
  constructor(private readonly prompter: Prompter) {}

  async chooseDeletions(batch: SuggestionBatch): Promise<string[]> {
    return this.choose(batch, 'Select files to delete (space to toggle, enter to confirm):');
  }

  /** The confirm-before-destroy gate. Never asks for an empty selection. */
  async confirmDeletion(filenames: readonly string[]): Promise<boolean> {
    if (filenames.length === 0) return false;
    const answer = await this.prompter.confirm(
      `Are you sure you want to delete ${filenames.length} file(s)? This cannot be undone!`,
      false,
    );
    return answer === true;
  }

  async chooseKeeps(batch: SuggestionBatch): Promise<string[]> {
    return this.choose(batch, "Mark files as 'keep' (they won't be suggested again):");
  }

  private async choose(batch: SuggestionBatch, message: string): Promise<string[]> {
    if (batch.suggestions.length === 0) return [];
    const choices: PromptChoice<string>[] = batch.suggestions.map((suggestion) => ({
      name: formatChoiceLabel(suggestion),
      value: suggestion.filename,
      checked: false,
    }));
    const picked = new Set(await this.prompter.checkbox(message, choices));
    // Only names from this batch, once each, in batch order
    return batch.suggestions.map((s) => s.filename).filter((filename) => picked.has(filename));
  }
}
