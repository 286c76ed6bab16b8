export type ErrorLogErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'INVALID_ARGUMENT'
  | 'INVALID_IDENTITY'
  | 'INVALID_OPERATION'
  | 'STORE_UNAVAILABLE'
  | 'WRITE_FAILED'
  | 'CODEC_ERROR';

export abstract class ErrorLogError extends Error {
  abstract readonly code: ErrorLogErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid construction-time setting. The log is unusable. */
export class ConfigurationError extends ErrorLogError {
  readonly code = 'CONFIGURATION_ERROR';
}

export class InvalidArgumentError extends ErrorLogError {
  readonly code: ErrorLogErrorCode = 'INVALID_ARGUMENT';

  constructor(readonly argument: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class InvalidIdentityError extends InvalidArgumentError {
  readonly code = 'INVALID_IDENTITY';

  constructor(message: string, options?: { cause?: unknown }) {
    super('id', message, options);
  }
}

export class InvalidOperationError extends ErrorLogError {
  readonly code = 'INVALID_OPERATION';
}

/** The backend could not be reached. Callers may retry. */
export class StoreUnavailableError extends ErrorLogError {
  readonly code = 'STORE_UNAVAILABLE';
}

/** The write did not commit; nothing of it is visible. */
export class WriteFailedError extends ErrorLogError {
  readonly code = 'WRITE_FAILED';
}

export class CodecError extends ErrorLogError {
  readonly code = 'CODEC_ERROR';
}

export function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
