// packages/core/src/advisory/chat-model.ts — OpenAI-compatible chat completions over fetch

import { z } from 'zod';
import { ERROR_BODY_MAX_CHARS } from '../utils/constants.js';
import { AdvisoryUnavailableError, errorMessage } from '../utils/errors.js';
import { truncate } from '../utils/format.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ChatCompletionOptions {
  temperature?: number;
  maxTokens?: number;
  /** Ask the service for a JSON object response. */
  jsonMode?: boolean;
}

export interface ChatCompletionResult {
  text: string;
  model: string;
  usage: TokenUsage;
  finishReason: string;
  durationMs: number;
}

/** Anything that can answer a chat prompt. The advisory client only needs this. */
export interface ChatModel {
  readonly model: string;
  complete(messages: ChatMessage[], options?: ChatCompletionOptions): Promise<ChatCompletionResult>;
}

export interface OpenAiChatModelConfig {
  model: string;
  baseUrl: string;
  apiKey?: string;
  /** Total request timeout in seconds. */
  timeoutSec: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

const completionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

/**
 * Client for `POST {baseUrl}/chat/completions`. Works with OpenAI and with
 * any server exposing the same API. No retries: every transport failure,
 * error status or unusable envelope surfaces as AdvisoryUnavailableError.
 */
export class OpenAiChatModel implements ChatModel {
  readonly model: string;
  private readonly endpoint: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;

  constructor(config: OpenAiChatModelConfig) {
    this.model = config.model;
    this.endpoint = `${config.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutSec * 1000;
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.log = config.logger ?? createSilentLogger();
  }

  async complete(messages: ChatMessage[], options: ChatCompletionOptions = {}): Promise<ChatCompletionResult> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages,
    };
    if (options.temperature !== undefined) body.temperature = options.temperature;
    if (options.maxTokens !== undefined) body.max_tokens = options.maxTokens;
    if (options.jsonMode) body.response_format = { type: 'json_object' };

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    const start = Date.now();
    let status: number | undefined;
    let rawText: string;
    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = response.status;
      rawText = await response.text();
      if (!response.ok) {
        throw new AdvisoryUnavailableError(
          `Advisory service responded with ${response.status}: ${truncate(rawText, ERROR_BODY_MAX_CHARS)}`,
          response.status,
          this.model,
        );
      }
    } catch (err) {
      if (err instanceof AdvisoryUnavailableError) throw err;
      const reason = err instanceof Error && err.name === 'TimeoutError'
        ? `timed out after ${this.timeoutMs / 1000}s`
        : errorMessage(err);
      throw new AdvisoryUnavailableError(`Advisory request failed: ${reason}`, status, this.model);
    }

    const durationMs = Date.now() - start;
    this.log.debug(`Advisory response ${status} in ${durationMs}ms (${rawText.length} chars)`);

    let envelope: unknown;
    try {
      envelope = JSON.parse(rawText);
    } catch (err) {
      throw new AdvisoryUnavailableError(`Advisory service returned a non-JSON body: ${errorMessage(err)}`, status, this.model);
    }

    const parsed = completionResponseSchema.safeParse(envelope);
    if (!parsed.success) {
      throw new AdvisoryUnavailableError('Advisory service returned an unexpected response envelope', status, this.model);
    }
    const [choice] = parsed.data.choices;
    const text = choice?.message.content;
    if (typeof text !== 'string' || text.length === 0) {
      throw new AdvisoryUnavailableError('Advisory service returned no message content', status, this.model);
    }

    const usage = parsed.data.usage;
    const inputTokens = usage?.prompt_tokens ?? 0;
    const outputTokens = usage?.completion_tokens ?? 0;
    return {
      text,
      model: parsed.data.model ?? this.model,
      usage: { inputTokens, outputTokens, totalTokens: usage?.total_tokens ?? inputTokens + outputTokens },
      finishReason: choice?.finish_reason ?? 'unknown',
      durationMs,
    };
  }
}
