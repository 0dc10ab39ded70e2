// packages/core/src/types/index.ts -- barrel re-export

export type { EntryRecord, ScanWarning, Snapshot } from './entry.js';
export type { Confidence, Suggestion, SuggestionSummary, SuggestionBatch } from './suggestion.js';
export type {
  SuppressionEntry,
  AddResult,
  SuppressionFileState,
  SuppressionInspection,
} from './suppression.js';
export type { DeletionFailure, DeletionOutcome } from './deletion.js';
export type { AdvisoryConfig, ScanConfig, SweepConfig, ConfigOverrides } from './config.js';
export type {
  SessionStartedEvent,
  ScanCompletedEvent,
  SuppressionAppliedEvent,
  AdvisoryStartedEvent,
  AdvisoryCompletedEvent,
  ArtifactWrittenEvent,
  ArtifactFailedEvent,
  DeletionSkippedEvent,
  DeletionCompletedEvent,
  KeepRecordedEvent,
  SessionCompletedEvent,
  SweepEvent,
} from './events.js';
