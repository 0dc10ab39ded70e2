// packages/cli/src/prompts.ts — Interactive prompts backed by inquirer

import type { PromptChoice, Prompter } from '@dirsweep/core';

/** Ctrl+C inside an inquirer prompt rejects with an error of this name. */
function isDismissal(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

async function loadInquirer() {
  const { default: inquirer } = await import('inquirer');
  return inquirer;
}

/**
 * Terminal prompter. A dismissed prompt counts as the negative answer:
 * nothing selected, not confirmed, or the cancel value.
 */
export class InquirerPrompter implements Prompter {
  async checkbox(message: string, choices: PromptChoice<string>[]): Promise<string[]> {
    const inquirer = await loadInquirer();
    try {
      const { selected } = await inquirer.prompt([
        {
          type: 'checkbox',
          name: 'selected',
          message,
          choices: choices.map((choice) => ({
            name: choice.name,
            value: choice.value,
            checked: choice.checked ?? false,
          })),
        },
      ]);
      const answer: unknown = selected;
      return Array.isArray(answer) ? answer.filter((value): value is string => typeof value === 'string') : [];
    } catch (error) {
      if (isDismissal(error)) return [];
      throw error;
    }
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    const inquirer = await loadInquirer();
    try {
      const { confirmed } = await inquirer.prompt([
        { type: 'confirm', name: 'confirmed', message, default: defaultValue },
      ]);
      const answer: unknown = confirmed;
      return answer === true;
    } catch (error) {
      if (isDismissal(error)) return false;
      throw error;
    }
  }

  async select<T>(message: string, choices: PromptChoice<T>[], cancelValue: T): Promise<T> {
    const inquirer = await loadInquirer();
    try {
      // Index values keep T out of inquirer's inference.
      const { index } = await inquirer.prompt([
        {
          type: 'select',
          name: 'index',
          message,
          choices: choices.map((choice, i) => ({ name: choice.name, value: i })),
        },
      ]);
      const answer: unknown = index;
      const picked = typeof answer === 'number' ? choices[answer] : undefined;
      return picked ? picked.value : cancelValue;
    } catch (error) {
      if (isDismissal(error)) return cancelValue;
      throw error;
    }
  }
}
