import { DataSource, DataSourceOptions } from 'typeorm';
import { CreateErrorLog20261019T1000 } from '../migrations/20261019T1000-CreateErrorLog';
import { ErrorStoreFactory } from './error-store';
import { TypeOrmErrorStore } from './typeorm-error.store';

export interface PostgresStoreSettings {
  /** Passed to every pooled connection as `statement_timeout`. */
  statementTimeoutMs?: number;
  /** Run pending migrations when the store first connects. */
  migrate?: boolean;
}

export const ERROR_LOG_MIGRATIONS = [CreateErrorLog20261019T1000];

// SSL unless the database is local
function needsSsl(url: string): boolean {
  try {
    const u = new URL(url);
    return !['localhost', '127.0.0.1', '::1', '[::1]'].includes(u.hostname);
  } catch {
    return false;
  }
}

export function buildPostgresOptions(url: string, schema: string, settings: PostgresStoreSettings = {}): DataSourceOptions {
  const ssl = needsSsl(url);
  const extra: Record<string, unknown> = {};
  if (ssl) extra.ssl = { rejectUnauthorized: false };
  if (settings.statementTimeoutMs) extra.statement_timeout = settings.statementTimeoutMs;
  return {
    type: 'postgres',
    url,
    schema: schema || undefined,
    migrations: ERROR_LOG_MIGRATIONS,
    migrationsRun: settings.migrate ?? false,
    synchronize: false,
    ssl: ssl ? { rejectUnauthorized: false } : false,
    extra,
    logging: ['error'],
  };
}

export function postgresErrorStoreFactory(settings: PostgresStoreSettings = {}): ErrorStoreFactory {
  return (connectionDescriptor, namespace) =>
    new TypeOrmErrorStore(new DataSource(buildPostgresOptions(connectionDescriptor, namespace.schemaQualifier, settings)));
}
