// packages/core/src/types/suppression.ts

export interface SuppressionEntry {
  filename: string;
  /** ISO timestamp of when the operator marked the entry. */
  markedAt: string;
  reason: string;
}

export interface AddResult {
  filename: string;
  /** False when the filename was already suppressed (nothing written). */
  added: boolean;
}

export type SuppressionFileState = 'missing' | 'ok' | 'corrupt';

export interface SuppressionInspection {
  filePath: string;
  state: SuppressionFileState;
  count: number;
  lastUpdated?: string;
  message?: string;
}
