import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from './error-log.errors';
import { ErrorLogOptions } from './error-log';
import { PostgresStoreSettings } from './postgres-error.store';

export interface ErrorLogConfig {
  options: ErrorLogOptions;
  store: PostgresStoreSettings;
}

/** Reads the error log's settings from the environment and validates them. */
export function loadErrorLogConfig(config: ConfigService): ErrorLogConfig {
  const url = config.get<string>('ERROR_LOG_DATABASE_URL') || config.get<string>('DATABASE_URL');
  if (!url) throw new ConfigurationError('ERROR_LOG_DATABASE_URL (or DATABASE_URL) is not defined');

  const rawTimeout = config.get<string>('ERROR_LOG_STATEMENT_TIMEOUT_MS');
  let statementTimeoutMs: number | undefined;
  if (rawTimeout !== undefined && rawTimeout !== '') {
    statementTimeoutMs = Number(rawTimeout);
    if (!Number.isInteger(statementTimeoutMs) || statementTimeoutMs <= 0) {
      throw new ConfigurationError(`ERROR_LOG_STATEMENT_TIMEOUT_MS must be a positive integer, got "${rawTimeout}"`);
    }
  }

  return {
    options: {
      connectionDescriptor: url,
      applicationName: config.get<string>('ERROR_LOG_APPLICATION') ?? '',
      schemaQualifier: config.get<string>('ERROR_LOG_SCHEMA') ?? '',
    },
    store: {
      statementTimeoutMs,
      migrate: (config.get<string>('ERROR_LOG_AUTO_MIGRATE') ?? 'false').toLowerCase() === 'true',
    },
  };
}
