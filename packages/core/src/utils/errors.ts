// packages/core/src/utils/errors.ts

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** The target directory is missing, not a directory, or cannot be listed. */
export class DirectoryUnavailableError extends Error {
  constructor(
    message: string,
    public readonly directory: string,
    public readonly code?: string,
  ) {
    super(message);
    this.name = 'DirectoryUnavailableError';
  }
}

/** The advisory service could not be reached or answered with an error. */
export class AdvisoryUnavailableError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly model?: string,
  ) {
    super(message);
    this.name = 'AdvisoryUnavailableError';
  }

  get isRateLimit(): boolean {
    return this.statusCode === 429;
  }

  get isAuthError(): boolean {
    return this.statusCode === 401 || this.statusCode === 403;
  }
}

/** The advisory service answered, but not with a usable suggestion payload. */
export class AdvisoryResponseMalformedError extends Error {
  constructor(
    message: string,
    public readonly rawPayload: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'AdvisoryResponseMalformedError';
  }
}

export class SuppressionWriteError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message);
    this.name = 'SuppressionWriteError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** The `code` of a Node system error (`ENOENT`, `EACCES`, ...), if any. */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
