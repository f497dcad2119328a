export type ErrorCode = 'SOURCE_UNAVAILABLE' | 'INVALID_CALIBRATION' | 'INVALID_CONFIG';

export class QuotawatchError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown; retryable?: boolean }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }
}

/** The usage source timed out, threw, or returned records that failed validation. */
export class SourceUnavailableError extends QuotawatchError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('SOURCE_UNAVAILABLE', `${source}: ${message}`, { cause: options?.cause, retryable: true });
    this.source = source;
  }
}

export class InvalidCalibrationError extends QuotawatchError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CALIBRATION', `Invalid calibration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class ConfigError extends QuotawatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_CONFIG', message, options);
  }
}

export function isQuotawatchError(err: unknown): err is QuotawatchError {
  return err instanceof QuotawatchError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
