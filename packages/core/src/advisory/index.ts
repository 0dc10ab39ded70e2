// packages/core/src/advisory/index.ts -- barrel re-export

export { AdvisoryClient, createAdvisoryClient } from './advisory-client.js';
export type { Advisor, AdvisoryClientOptions, AdvisoryResult } from './advisory-client.js';
export { OpenAiChatModel } from './chat-model.js';
export type {
  ChatMessage,
  ChatModel,
  ChatCompletionOptions,
  ChatCompletionResult,
  OpenAiChatModelConfig,
  TokenUsage,
} from './chat-model.js';
export { orderForAdvisory, renderEntryLine, renderEntryList } from './ordering.js';
export { ADVISORY_SYSTEM_PROMPT, buildAdvisoryMessages, buildAdvisoryUserPrompt } from './prompts.js';
export { parseAdvice, parseAdvicePayload, normalizeConfidence } from './response-schema.js';
export type { ParsedAdvice, ParseAdviceOptions } from './response-schema.js';
