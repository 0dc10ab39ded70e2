// packages/core/src/confirmation/scripted-prompter.ts — Canned answers for tests and unattended runs

import type { PromptChoice, Prompter } from './prompter.js';

export interface PromptScript {
  /** Answers for successive checkbox prompts (selected values). */
  checkbox?: string[][];
  /** Answers for successive confirm prompts. */
  confirm?: boolean[];
  /** Answers for successive select prompts, as choice indexes. */
  select?: number[];
}

export interface AskedPrompt {
  kind: 'checkbox' | 'confirm' | 'select';
  message: string;
  choices: string[];
}

/**
 * Replays a script. When a queue runs dry the prompt behaves as if dismissed:
 * empty selection, the question's default, or the cancel value.
 */
export class ScriptedPrompter implements Prompter {
  readonly asked: AskedPrompt[] = [];
  private readonly checkboxAnswers: string[][];
  private readonly confirmAnswers: boolean[];
  private readonly selectAnswers: number[];

  constructor(script: PromptScript = {}) {
    this.checkboxAnswers = [...(script.checkbox ?? [])];
    this.confirmAnswers = [...(script.confirm ?? [])];
    this.selectAnswers = [...(script.select ?? [])];
  }

  async checkbox(message: string, choices: PromptChoice<string>[]): Promise<string[]> {
    this.asked.push({ kind: 'checkbox', message, choices: choices.map((c) => c.name) });
    return this.checkboxAnswers.shift() ?? [];
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    this.asked.push({ kind: 'confirm', message, choices: [] });
    return this.confirmAnswers.shift() ?? defaultValue;
  }

  async select<T>(message: string, choices: PromptChoice<T>[], cancelValue: T): Promise<T> {
    this.asked.push({ kind: 'select', message, choices: choices.map((c) => c.name) });
    const index = this.selectAnswers.shift();
    if (index === undefined) return cancelValue;
    const choice = choices[index];
    return choice ? choice.value : cancelValue;
  }
}
