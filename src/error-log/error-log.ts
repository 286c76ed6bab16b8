import { Logger } from '@nestjs/common';
import { ApplicationNamespace } from './application-namespace';
import { newErrorId, parseErrorId, toStorageKey, fromStorageKey } from './error-id';
import { ErrorLogCallOptions, ErrorLogCapability } from './error-log.interface';
import { ConfigurationError, InvalidArgumentError } from './error-log.errors';
import { BoundedErrorField, ERROR_FIELD_LIMITS, ErrorLogEntry, ErrorRecord, ErrorSummary } from './error-record';
import { decodeErrorRecord, encodeErrorRecord } from './error-record.codec';
import { ErrorStore, ErrorStoreFactory } from './error-store';
import { postgresErrorStoreFactory } from './postgres-error.store';

export interface ErrorLogOptions {
  connectionDescriptor: string;
  applicationName?: string | null;
  schemaQualifier?: string | null;
}

/**
 * Application-scoped error log. Every operation reads and writes only the
 * errors of the configured application.
 *
 * The store is built from the connection descriptor on first use; from then
 * on the namespace is frozen.
 */
export class ErrorLog implements ErrorLogCapability {
  readonly name = 'Relational Error Log';

  private readonly logger = new Logger(ErrorLog.name);
  private readonly namespace: ApplicationNamespace;
  private readonly connectionDescriptor: string;
  private backend: ErrorStore | null = null;

  constructor(
    options: ErrorLogOptions,
    private readonly storeFactory: ErrorStoreFactory = postgresErrorStoreFactory(),
  ) {
    const descriptor = options.connectionDescriptor;
    if (typeof descriptor !== 'string' || descriptor.trim().length === 0) {
      throw new ConfigurationError('Connection descriptor is missing for the error log.');
    }
    this.connectionDescriptor = descriptor;
    this.namespace = new ApplicationNamespace(options.applicationName, options.schemaQualifier);
  }

  get applicationName(): string {
    return this.namespace.applicationName;
  }

  get schemaQualifier(): string {
    return this.namespace.schemaQualifier;
  }

  setSchemaQualifier(value: string | null | undefined) {
    this.namespace.setSchemaQualifier(value);
  }

  async log(record: ErrorRecord, options: ErrorLogCallOptions = {}): Promise<string> {
    if (!record) throw new InvalidArgumentError('record', 'Error record is required');

    const id = newErrorId();
    const detail = encodeErrorRecord(record);
    await this.store().write(
      this.namespace,
      { key: toStorageKey(id), summary: this.fitColumns(id, record), detail },
      options,
    );
    return id;
  }

  async getError(id: string, options: ErrorLogCallOptions = {}): Promise<ErrorLogEntry | null> {
    const canonical = parseErrorId(id);
    const detail = await this.store().readDetail(this.namespace, toStorageKey(canonical), options);
    if (!detail) return null;
    return new ErrorLogEntry(this, canonical, decodeErrorRecord(detail));
  }

  /**
   * Appends one page of errors, most recent first, to `sink` and returns the
   * number of errors the application has in total. Without a sink only the
   * total is read.
   */
  async getErrors(
    pageIndex: number,
    pageSize: number,
    sink?: ErrorLogEntry<ErrorSummary>[] | null,
    options: ErrorLogCallOptions = {},
  ): Promise<number> {
    assertCount('pageIndex', pageIndex);
    assertCount('pageSize', pageSize);

    const limit = sink ? pageSize : 0;
    const page = await this.store().readPage(this.namespace, pageIndex * pageSize, limit, options);
    if (sink) {
      for (const row of page.rows) sink.push(new ErrorLogEntry(this, fromStorageKey(row.key), row.summary));
    }
    return page.total;
  }

  async close() {
    if (this.backend) await this.backend.close();
  }

  private store(): ErrorStore {
    if (!this.backend) {
      this.namespace.seal();
      this.backend = this.storeFactory(this.connectionDescriptor, this.namespace);
    }
    return this.backend;
  }

  private fitColumns(id: string, record: ErrorRecord): ErrorSummary {
    const truncated: BoundedErrorField[] = [];
    const fit = (field: BoundedErrorField, value: string) => {
      const max = ERROR_FIELD_LIMITS[field];
      // column widths count code points; never split a surrogate pair
      const chars = Array.from(value);
      if (chars.length <= max) return value;
      truncated.push(field);
      return chars.slice(0, max).join('');
    };
    const summary: ErrorSummary = {
      applicationName: this.namespace.applicationName,
      hostName: fit('hostName', record.hostName),
      type: fit('type', record.type),
      source: fit('source', record.source),
      message: fit('message', record.message),
      user: fit('user', record.user),
      statusCode: record.statusCode,
      time: record.time,
    };
    if (truncated.length > 0) {
      this.logger.warn(`Error ${id}: ${truncated.join(', ')} cut to column width; full values are in the detail document`);
    }
    return summary;
  }
}

function assertCount(argument: string, value: number) {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(argument, `${argument} must be a non-negative integer, got ${value}`);
  }
}
