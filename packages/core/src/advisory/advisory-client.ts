// packages/core/src/advisory/advisory-client.ts

import type { AdvisoryConfig } from '../types/config.js';
import type { EntryRecord } from '../types/entry.js';
import type { SuggestionBatch } from '../types/suggestion.js';
import {
  AdvisoryResponseMalformedError,
  AdvisoryUnavailableError,
  errorMessage,
} from '../utils/errors.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import { type ChatCompletionResult, type ChatModel, OpenAiChatModel, type TokenUsage } from './chat-model.js';
import { orderForAdvisory } from './ordering.js';
import { buildAdvisoryMessages } from './prompts.js';
import { parseAdvice } from './response-schema.js';

export interface AdvisoryResult {
  batch: SuggestionBatch;
  /** Decoded JSON exactly as the advisor sent it. */
  payload: unknown;
  /** Suggested filenames that match no submitted entry. */
  unmatched: string[];
  usage: TokenUsage;
  durationMs: number;
}

/** What the session runner needs from an advisor. */
export interface Advisor {
  readonly model: string;
  suggest(records: readonly EntryRecord[]): Promise<AdvisoryResult>;
}

export interface AdvisoryClientOptions {
  temperature?: number;
  maxTokens?: number;
  logger?: Logger;
}

/**
 * Sends the whole filtered snapshot to the chat model in one request and
 * turns its answer into a SuggestionBatch.
 *
 * Throws AdvisoryUnavailableError when the model cannot be reached and
 * AdvisoryResponseMalformedError (with the raw text) when its answer does not
 * parse. Neither is retried.
 */
export class AdvisoryClient implements Advisor {
  private readonly log: Logger;

  constructor(
    private readonly chat: ChatModel,
    private readonly options: AdvisoryClientOptions = {},
  ) {
    this.log = options.logger ?? createSilentLogger();
  }

  get model(): string {
    return this.chat.model;
  }

  async suggest(records: readonly EntryRecord[]): Promise<AdvisoryResult> {
    const messages = buildAdvisoryMessages(orderForAdvisory(records));
    this.log.debug(`Requesting suggestions for ${records.length} entries from ${this.chat.model}`);

    let completion: ChatCompletionResult;
    try {
      completion = await this.chat.complete(messages, {
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
        jsonMode: true,
      });
    } catch (err) {
      if (err instanceof AdvisoryUnavailableError) throw err;
      throw new AdvisoryUnavailableError(`Advisory call failed: ${errorMessage(err)}`, undefined, this.chat.model);
    }

    const parsed = parseAdvice(completion.text, { scannedCount: records.length });
    if (!parsed.ok) {
      this.log.debug(`Unparsable advisory response: ${completion.text}`);
      throw new AdvisoryResponseMalformedError(parsed.error, parsed.raw, parsed.issues);
    }

    const known = new Set(records.map((record) => record.name));
    const unmatched = parsed.batch.suggestions
      .map((suggestion) => suggestion.filename)
      .filter((filename) => !known.has(filename));
    if (unmatched.length > 0) {
      this.log.warn(`Advisor suggested ${unmatched.length} name(s) not in the scanned directory`);
    }

    return {
      batch: parsed.batch,
      payload: parsed.payload,
      unmatched,
      usage: completion.usage,
      durationMs: completion.durationMs,
    };
  }
}

/** Build the default OpenAI-backed advisor from config. */
export function createAdvisoryClient(
  config: AdvisoryConfig,
  options: { apiKey?: string; fetchImpl?: typeof fetch; logger?: Logger } = {},
): AdvisoryClient {
  const chat = new OpenAiChatModel({
    model: config.model,
    baseUrl: config.baseUrl,
    apiKey: options.apiKey,
    timeoutSec: config.timeoutSec,
    fetchImpl: options.fetchImpl,
    logger: options.logger,
  });
  return new AdvisoryClient(chat, {
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    logger: options.logger,
  });
}
