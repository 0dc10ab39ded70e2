// packages/core/src/confirmation/prompter.ts

export interface PromptChoice<T> {
  name: string;
  value: T;
  checked?: boolean;
}

/**
 * Operator input capability. A terminal UI, a web form or a test script can
 * stand behind it. A dismissed prompt must resolve to "nothing selected",
 * `false` or the given cancel value; never to a positive answer.
 */
export interface Prompter {
  /** Present choices, return the selected subset of values. */
  checkbox(message: string, choices: PromptChoice<string>[]): Promise<string[]>;
  /** Yes/no question with an explicit default. */
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
  /** Pick exactly one value. */
  select<T>(message: string, choices: PromptChoice<T>[], cancelValue: T): Promise<T>;
}
