// packages/core/src/types/suggestion.ts — Advisory judgment types

/** `unknown` is the bucket for anything the oracle sent that is not high/medium/low. */
export type Confidence = 'high' | 'medium' | 'low' | 'unknown';

export interface Suggestion {
  /** Name the oracle claims to refer to. Untrusted: may not exist in the snapshot. */
  filename: string;
  reason: string;
  confidence: Confidence;
  /** Size as reported by the oracle; may differ from the real size. */
  sizeMb: number;
  ageDays?: number;
}

/** Display-only totals reported by the oracle. Never used for control decisions. */
export interface SuggestionSummary {
  totalFilesScanned: number;
  filesSuggestedForDeletion: number;
  totalSpaceToFreeMb: number;
  keepRecentDays: number;
}

export interface SuggestionBatch {
  suggestions: Suggestion[];
  summary: SuggestionSummary;
}
