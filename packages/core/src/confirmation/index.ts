// packages/core/src/confirmation/index.ts -- barrel re-export

export { ConfirmationController, formatChoiceLabel, CONFIDENCE_MARKERS } from './controller.js';
export { ScriptedPrompter } from './scripted-prompter.js';
export type { PromptScript, AskedPrompt } from './scripted-prompter.js';
export type { Prompter, PromptChoice } from './prompter.js';
