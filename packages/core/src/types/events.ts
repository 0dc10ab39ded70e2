// packages/core/src/types/events.ts

import type { DeletionFailure, DeletionOutcome } from './deletion.js';
import type { ScanWarning } from './entry.js';
import type { SuggestionBatch } from './suggestion.js';

/**
 * Session lifecycle events, emitted by the session runner and rendered by the CLI.
 * Type names are dot-separated, `<stage>.<what happened>`.
 */

export interface SessionStartedEvent {
  type: 'session.started';
  sessionId: string;
  directory: string;
  timestamp: string;
}

export interface ScanCompletedEvent {
  type: 'scan.completed';
  directory: string;
  entries: number;
  totalBytes: number;
  warnings: ScanWarning[];
  timestamp: string;
}

export interface SuppressionAppliedEvent {
  type: 'suppression.applied';
  /** Size of the stored suppression set. */
  suppressed: number;
  /** Entries of this snapshot that were removed by it. */
  filteredOut: number;
  remaining: number;
  timestamp: string;
}

export interface AdvisoryStartedEvent {
  type: 'advisory.started';
  model: string;
  entries: number;
  timestamp: string;
}

export interface AdvisoryCompletedEvent {
  type: 'advisory.completed';
  /** Suggestions the operator is offered. */
  batch: SuggestionBatch;
  /** Suggested names dropped because they were not among the analyzed entries. */
  withheld: string[];
  durationMs: number;
  timestamp: string;
}

export interface ArtifactWrittenEvent {
  type: 'artifact.written';
  path: string;
  timestamp: string;
}

export interface ArtifactFailedEvent {
  type: 'artifact.failed';
  path: string;
  error: string;
  timestamp: string;
}

export interface DeletionSkippedEvent {
  type: 'deletion.skipped';
  reason: 'no-suggestions' | 'nothing-selected' | 'declined';
  timestamp: string;
}

export interface DeletionCompletedEvent {
  type: 'deletion.completed';
  outcome: DeletionOutcome;
  timestamp: string;
}

export interface KeepRecordedEvent {
  type: 'keep.recorded';
  added: string[];
  alreadyKept: string[];
  failures: DeletionFailure[];
  timestamp: string;
}

export interface SessionCompletedEvent {
  type: 'session.completed';
  sessionId: string;
  durationMs: number;
  timestamp: string;
}

export type SweepEvent =
  | SessionStartedEvent
  | ScanCompletedEvent
  | SuppressionAppliedEvent
  | AdvisoryStartedEvent
  | AdvisoryCompletedEvent
  | ArtifactWrittenEvent
  | ArtifactFailedEvent
  | DeletionSkippedEvent
  | DeletionCompletedEvent
  | KeepRecordedEvent
  | SessionCompletedEvent;
