// packages/core/src/utils/constants.ts — Shared magic number constants

/** Default chat model used for advisory calls */
export const DEFAULT_MODEL = 'gpt-4o-mini';

/** Default OpenAI-compatible API base URL */
export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

/** Low temperature keeps suggestions consistent between runs */
export const DEFAULT_TEMPERATURE = 0.3;

/** Default timeout for the advisory call in seconds */
export const DEFAULT_TIMEOUT_SEC = 120;

/** Name of the per-session suggestion dump written into the scanned directory */
export const ARTIFACT_FILENAME = 'cleanup_suggestions.json';

/** Directory under $HOME holding config and the suppression file */
export const CONFIG_DIRNAME = '.dirsweep';

export const CONFIG_FILENAME = 'config.yml';

export const SUPPRESSION_FILENAME = 'kept_files.json';

/** Reason recorded when the operator marks an entry as keep */
export const DEFAULT_KEEP_REASON = 'User explicitly marked as keep';

export const BYTES_PER_MB = 1024 * 1024;

/** Suggestion reasons longer than this are truncated in choice labels */
export const REASON_LABEL_MAX = 60;

/** Max characters of an error response body echoed into error messages */
export const ERROR_BODY_MAX_CHARS = 500;
