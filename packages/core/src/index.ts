// @dirsweep/core - Advisory directory cleanup pipeline

export const VERSION = '0.1.0';

// Type definitions
export type {
  EntryRecord,
  ScanWarning,
  Snapshot,
  Confidence,
  Suggestion,
  SuggestionSummary,
  SuggestionBatch,
  SuppressionEntry,
  AddResult,
  SuppressionFileState,
  SuppressionInspection,
  DeletionFailure,
  DeletionOutcome,
  AdvisoryConfig,
  ScanConfig,
  SweepConfig,
  ConfigOverrides,
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
} from './types/index.js';

// Utilities
export {
  generateSessionId,
  ConfigError,
  DirectoryUnavailableError,
  AdvisoryUnavailableError,
  AdvisoryResponseMalformedError,
  SuppressionWriteError,
  errorMessage,
  errorCode,
  createLogger,
  createSilentLogger,
  isLogLevel,
  bytesToMb,
  formatMb,
  formatDay,
  truncate,
} from './utils/index.js';
export type { Logger, LogLevel } from './utils/index.js';
export {
  DEFAULT_MODEL,
  DEFAULT_BASE_URL,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_SEC,
  ARTIFACT_FILENAME,
  CONFIG_DIRNAME,
  CONFIG_FILENAME,
  SUPPRESSION_FILENAME,
  DEFAULT_KEEP_REASON,
  BYTES_PER_MB,
  REASON_LABEL_MAX,
} from './utils/constants.js';

// Configuration
export {
  createDefaultConfig,
  defaultConfigPath,
  resolveDefaultDirectory,
  sweepConfigSchema,
  validateConfig,
  loadConfig,
  writeConfig,
  expandHome,
  createExcludeFilter,
  isExcluded,
} from './config/index.js';
export type { SweepConfigInput, LoadConfigOptions } from './config/index.js';

// Snapshot
export { buildSnapshot } from './snapshot/index.js';
export type { BuildSnapshotOptions } from './snapshot/index.js';

// Suppression
export { SuppressionStore, filterSuppressed } from './suppression/index.js';
export type { SuppressionStoreOptions } from './suppression/index.js';

// Advisory
export {
  AdvisoryClient,
  createAdvisoryClient,
  OpenAiChatModel,
  orderForAdvisory,
  renderEntryLine,
  renderEntryList,
  ADVISORY_SYSTEM_PROMPT,
  buildAdvisoryMessages,
  buildAdvisoryUserPrompt,
  parseAdvice,
  parseAdvicePayload,
  normalizeConfidence,
} from './advisory/index.js';
export type {
  Advisor,
  AdvisoryClientOptions,
  AdvisoryResult,
  ChatMessage,
  ChatModel,
  ChatCompletionOptions,
  ChatCompletionResult,
  OpenAiChatModelConfig,
  TokenUsage,
  ParsedAdvice,
  ParseAdviceOptions,
} from './advisory/index.js';

// Confirmation
export {
  ConfirmationController,
  formatChoiceLabel,
  CONFIDENCE_MARKERS,
  ScriptedPrompter,
} from './confirmation/index.js';
export type { Prompter, PromptChoice, PromptScript, AskedPrompt } from './confirmation/index.js';

// Deletion
export {
  executeDeletions,
  isDirectChildName,
  NOT_FOUND_REASON,
  OUTSIDE_DIRECTORY_REASON,
} from './deletion/index.js';

// Engine
export { EventBus, runSession, writeSuggestionArtifact } from './engine/index.js';
export type { SessionDependencies, SessionReport } from './engine/index.js';
