// packages/core/src/utils/index.ts -- barrel re-export

export { generateSessionId } from './id.js';
export {
  ConfigError,
  DirectoryUnavailableError,
  AdvisoryUnavailableError,
  AdvisoryResponseMalformedError,
  SuppressionWriteError,
  errorMessage,
  errorCode,
} from './errors.js';
export { createLogger, createSilentLogger, isLogLevel } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { bytesToMb, formatMb, formatDay, truncate } from './format.js';
