import type { ErrorLogCapability } from './error-log.interface';

/** Column widths of the indexed fields. The detail text has no bound. */
export const ERROR_FIELD_LIMITS = {
  applicationName: 60,
  hostName: 30,
  type: 100,
  source: 60,
  message: 500,
  user: 50,
} as const;

export type BoundedErrorField = keyof typeof ERROR_FIELD_LIMITS;

export interface ErrorSummary {
  readonly applicationName: string;
  readonly hostName: string;
  readonly type: string;
  readonly source: string;
  readonly message: string;
  readonly user: string;
  readonly statusCode: number;
  readonly time: Date; // UTC instant
}

export interface ErrorRecord extends ErrorSummary {
  /** Full stack trace and request context; opaque to the store's columns. */
  readonly detail: string;
}

/**
 * A record as returned by the log, paired with the identity it was stored
 * under and the log that owns it.
 */
export class ErrorLogEntry<T extends ErrorSummary = ErrorRecord> {
  constructor(
    readonly log: ErrorLogCapability,
    readonly id: string,
    readonly error: T,
  ) {}

  toJSON() {
    return { id: this.id, log: this.log.name, error: this.error };
  }
}

export function createErrorRecord(fields: Partial<ErrorRecord> & Pick<ErrorRecord, 'message'>): ErrorRecord {
  return Object.freeze({
    applicationName: fields.applicationName ?? '',
    hostName: fields.hostName ?? '',
    type: fields.type ?? '',
    source: fields.source ?? '',
    message: fields.message,
    user: fields.user ?? '',
    statusCode: fields.statusCode ?? 0,
    time: fields.time ?? new Date(),
    detail: fields.detail ?? '',
  });
}
