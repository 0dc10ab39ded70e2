// packages/core/src/advisory/response-schema.ts — Tolerant parsing of the advisor's JSON answer

import { z } from 'zod';
import type { Confidence, Suggestion, SuggestionBatch, SuggestionSummary } from '../types/suggestion.js';
import { errorMessage } from '../utils/errors.js';

/**
 * Only the envelope is strict: a `suggestions` array whose items each name a
 * file. Every other field is read defensively and defaulted.
 */
const wireSuggestionSchema = z
  .object({
    filename: z.string().refine((name) => name.trim().length > 0, { message: 'filename must not be blank' }),
  })
  .passthrough();

const wirePayloadSchema = z
  .object({
    suggestions: z.array(wireSuggestionSchema),
    summary: z.unknown().optional(),
  })
  .passthrough();

type WireSuggestion = z.output<typeof wireSuggestionSchema>;

export type ParsedAdvice =
  | { ok: true; batch: SuggestionBatch; payload: unknown }
  | { ok: false; error: string; raw: string; issues: string[] };

export interface ParseAdviceOptions {
  /** Used for `totalFilesScanned` when the advisor omits its summary. */
  scannedCount?: number;
}

const CONFIDENCE_BY_NAME = new Map<string, Confidence>([
  ['high', 'high'],
  ['medium', 'medium'],
  ['low', 'low'],
]);

const FENCE_PATTERN = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

/** Parse the advisor's raw text. A single surrounding markdown code fence is tolerated. */
export function parseAdvice(raw: string, options: ParseAdviceOptions = {}): ParsedAdvice {
  const trimmed = raw.trim();
  const fenced = FENCE_PATTERN.exec(trimmed);
  const body = fenced?.[1] ?? trimmed;

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (err) {
    return { ok: false, error: `Response is not valid JSON: ${errorMessage(err)}`, raw, issues: [] };
  }
  return parseAdvicePayload(payload, raw, options);
}

/** Validate an already-decoded payload. `raw` is echoed back on failure for diagnostics. */
export function parseAdvicePayload(
  payload: unknown,
  raw: string,
  options: ParseAdviceOptions = {},
): ParsedAdvice {
  const result = wirePayloadSchema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    return { ok: false, error: `Response does not match the suggestion format: ${issues.join('; ')}`, raw, issues };
  }

  const suggestions: Suggestion[] = [];
  const seen = new Set<string>();
  for (const item of result.data.suggestions) {
    // filename is the join key; a repeated name keeps its first judgment
    if (seen.has(item.filename)) continue;
    seen.add(item.filename);
    suggestions.push(toSuggestion(item));
  }

  return {
    ok: true,
    batch: { suggestions, summary: toSummary(result.data.summary, suggestions, options.scannedCount ?? 0) },
    payload,
  };
}

export function normalizeConfidence(value: unknown): Confidence {
  if (typeof value !== 'string') return 'unknown';
  const key = value.trim().toLowerCase();
  return CONFIDENCE_BY_NAME.get(key) ?? 'unknown';
}

function toSuggestion(item: WireSuggestion): Suggestion {
  const reason = item.reason;
  const sizeMb = readNumber(item.size_mb ?? item.sizeMb);
  const ageDays = readNumber(item.age_days ?? item.ageDays);

  const suggestion: Suggestion = {
    filename: item.filename,
    reason: typeof reason === 'string' && reason.trim() ? reason.trim() : 'N/A',
    confidence: normalizeConfidence(item.confidence),
    sizeMb: sizeMb !== undefined && sizeMb >= 0 ? sizeMb : 0,
  };
  if (ageDays !== undefined && ageDays >= 0) {
    suggestion.ageDays = Math.round(ageDays);
  }
  return suggestion;
}

function toSummary(value: unknown, suggestions: Suggestion[], scannedCount: number): SuggestionSummary {
  const fields = isRecord(value) ? value : {};
  const derivedMb = Math.round(suggestions.reduce((sum, s) => sum + s.sizeMb, 0) * 100) / 100;
  return {
    totalFilesScanned: readCount(fields.total_files_scanned ?? fields.totalFilesScanned) ?? scannedCount,
    filesSuggestedForDeletion:
      readCount(fields.files_suggested_for_deletion ?? fields.filesSuggestedForDeletion) ?? suggestions.length,
    totalSpaceToFreeMb: readNumber(fields.total_space_to_free_mb ?? fields.totalSpaceToFreeMb) ?? derivedMb,
    keepRecentDays: readCount(fields.keep_recent_days ?? fields.keepRecentDays) ?? 0,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function readNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function readCount(value: unknown): number | undefined {
  const n = readNumber(value);
  return n !== undefined && n >= 0 ? Math.round(n) : undefined;
}
