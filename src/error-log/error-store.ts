import type { ApplicationNamespace } from './application-namespace';
import type { ErrorSummary } from './error-record';

/** One error as the store persists it: identity, indexed columns, detail blob. */
export interface StoredError {
  /** 32 lowercase hex characters. */
  key: string;
  summary: ErrorSummary;
  detail: string;
}

export interface StoredErrorRow {
  key: string;
  summary: ErrorSummary;
}

export interface ErrorPage {
  rows: StoredErrorRow[];
  total: number;
}

export interface StoreCallOptions {
  signal?: AbortSignal;
}

/**
 * Durable backend of an error log. Implementations acquire a session per
 * call and release it on every exit path.
 *
 * `write` is all-or-nothing and fails with StoreUnavailableError or
 * WriteFailedError; reads fail with StoreUnavailableError.
 */
export interface ErrorStore {
  write(namespace: ApplicationNamespace, error: StoredError, options?: StoreCallOptions): Promise<void>;

  /** The detail blob of the error, or null if the namespace has no such error. */
  readDetail(namespace: ApplicationNamespace, key: string, options?: StoreCallOptions): Promise<string | null>;

  /** `limit` 0 asks for the total only. */
  readPage(
    namespace: ApplicationNamespace,
    offset: number,
    limit: number,
    options?: StoreCallOptions,
  ): Promise<ErrorPage>;

  close(): Promise<void>;
}

export type ErrorStoreFactory = (connectionDescriptor: string, namespace: ApplicationNamespace) => ErrorStore;
