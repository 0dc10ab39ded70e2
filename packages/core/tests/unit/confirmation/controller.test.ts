import { describe, expect, it } from 'vitest';
import { ConfirmationController, formatChoiceLabel } from '../../../src/confirmation/controller.js';
import { ScriptedPrompter } from '../../../src/confirmation/scripted-prompter.js';
import type { Suggestion, SuggestionBatch } from '../../../src/types/suggestion.js';

function suggestion(filename: string, overrides: Partial<Suggestion> = {}): Suggestion {
  return { filename, reason: 'Old installer', confidence: 'high', sizeMb: 12.5, ...overrides };
}

function batchOf(...suggestions: Suggestion[]): SuggestionBatch {
  return {
    suggestions,
    summary: { totalFilesScanned: 10, filesSuggestedForDeletion: suggestions.length, totalSpaceToFreeMb: 0, keepRecentDays: 0 },
  };
}

describe('formatChoiceLabel', () => {
  it('shows marker, name, size and reason', () => {
    expect(formatChoiceLabel(suggestion('setup.dmg'))).toBe('🔴 setup.dmg (12.50 MB) - Old installer');
  });

  it('uses a neutral marker for unrated suggestions', () => {
    expect(formatChoiceLabel(suggestion('x', { confidence: 'unknown', sizeMb: 0 }))).toBe('⚪ x (0.00 MB) - Old installer');
  });

  it('truncates long reasons to 60 characters', () => {
    const label = formatChoiceLabel(suggestion('a', { reason: 'r'.repeat(80), confidence: 'low' }));
    expect(label).toBe(`🟢 a (12.50 MB) - ${'r'.repeat(57)}...`);
  });
});

describe('ConfirmationController', () => {
  const batch = batchOf(suggestion('a.zip'), suggestion('b.dmg', { confidence: 'medium' }), suggestion('c.tmp'));

  it('offers every suggestion unchecked and returns picks in batch order', async () => {
    const prompter = new ScriptedPrompter({ checkbox: [['c.tmp', 'a.zip']] });
    const picked = await new ConfirmationController(prompter).chooseDeletions(batch);
    expect(picked).toEqual(['a.zip', 'c.tmp']);
    expect(prompter.asked[0]).toEqual({
      kind: 'checkbox',
      message: 'Select files to delete (space to toggle, enter to confirm):',
      choices: [
        '🔴 a.zip (12.50 MB) - Old installer',
        '🟡 b.dmg (12.50 MB) - Old installer',
        '🔴 c.tmp (12.50 MB) - Old installer',
      ],
    });
  });

  it('drops answers that are not in the batch and repeated answers', async () => {
    const prompter = new ScriptedPrompter({ checkbox: [['b.dmg', 'elsewhere.txt', 'b.dmg']] });
    expect(await new ConfirmationController(prompter).chooseKeeps(batch)).toEqual(['b.dmg']);
    expect(prompter.asked[0]?.message).toBe("Mark files as 'keep' (they won't be suggested again):");
  });

  it('does not prompt for an empty batch', async () => {
    const prompter = new ScriptedPrompter();
    expect(await new ConfirmationController(prompter).chooseDeletions(batchOf())).toEqual([]);
    expect(prompter.asked).toEqual([]);
  });

  it('asks the destructive question with a default of no', async () => {
    const prompter = new ScriptedPrompter();
    expect(await new ConfirmationController(prompter).confirmDeletion(['a.zip', 'c.tmp'])).toBe(false);
    expect(prompter.asked[0]).toEqual({
      kind: 'confirm',
      message: 'Are you sure you want to delete 2 file(s)? This cannot be undone!',
      choices: [],
    });
  });

  it('confirms only on an explicit yes', async () => {
    const prompter = new ScriptedPrompter({ confirm: [true] });
    expect(await new ConfirmationController(prompter).confirmDeletion(['a.zip'])).toBe(true);
  });

  it('never asks to confirm an empty selection', async () => {
    const prompter = new ScriptedPrompter({ confirm: [true] });
    expect(await new ConfirmationController(prompter).confirmDeletion([])).toBe(false);
    expect(prompter.asked).toEqual([]);
  });
});
