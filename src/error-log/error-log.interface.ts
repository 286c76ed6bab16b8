import type { ErrorLogEntry, ErrorRecord, ErrorSummary } from './error-record';

export interface ErrorLogCallOptions {
  signal?: AbortSignal;
}

/** What a host error-capture framework needs from an error log. */
export interface ErrorLogCapability {
  readonly name: string;
  log(record: ErrorRecord, options?: ErrorLogCallOptions): Promise<string>;
  getError(id: string, options?: ErrorLogCallOptions): Promise<ErrorLogEntry | null>;
  getErrors(
    pageIndex: number,
    pageSize: number,
    sink?: ErrorLogEntry<ErrorSummary>[] | null,
    options?: ErrorLogCallOptions,
  ): Promise<number>;
}
