import { Logger } from '@nestjs/common';
import { DataSource, QueryRunner } from 'typeorm';
import { ApplicationNamespace } from './application-namespace';
import { describeCause, StoreUnavailableError, WriteFailedError } from './error-log.errors';
import { ErrorSummary } from './error-record';
import { ErrorPage, ErrorStore, StoreCallOptions, StoredError, StoredErrorRow } from './error-store';

export const ERROR_LOG_TABLE = 'error_log';
export const ERROR_LOG_DETAIL_TABLE = 'error_log_detail';

interface ErrorLogRow {
  error_id: string;
  application: string;
  host: string;
  type: string;
  source: string;
  message: string;
  user_name: string;
  status_code: number | string;
  time_utc: Date | string;
}

/**
 * Error store over a TypeORM DataSource. Indexed columns live in
 * `error_log`; the detail blob lives in `error_log_detail` and is written in
 * the same transaction. Tables are addressed by name (qualified with the
 * namespace's schema) rather than through entity metadata, so one
 * DataSource can serve any schema.
 */
export class TypeOrmErrorStore implements ErrorStore {
  private readonly logger = new Logger(TypeOrmErrorStore.name);
  private initializing: Promise<DataSource> | null = null;

  constructor(private readonly dataSource: DataSource) {}

  async write(ns: ApplicationNamespace, error: StoredError, options: StoreCallOptions = {}): Promise<void> {
    const runner = await this.acquire(options.signal);
    try {
      await runner.startTransaction();
      await this.insertRecord(runner, ns, error);
      await this.insertDetail(runner, ns, error);
      options.signal?.throwIfAborted();
      await runner.commitTransaction();
    } catch (e) {
      await this.rollback(runner);
      throw new WriteFailedError(`Error ${error.key} was not logged: ${describeCause(e)}`, { cause: e });
    } finally {
      await runner.release();
    }
  }

  async readDetail(ns: ApplicationNamespace, key: string, options: StoreCallOptions = {}): Promise<string | null> {
    return this.withSession(options.signal, async (runner) => {
      // scope check first: a key from another application must read as absent
      const owned = await runner.manager
        .createQueryBuilder()
        .select('e.error_id', 'error_id')
        .from(ns.qualify(ERROR_LOG_TABLE), 'e')
        .where('e.application = :application', { application: ns.applicationName })
        .andWhere('e.error_id = :key', { key })
        .getRawOne<{ error_id: string }>();
      if (!owned) return null;

      const row = await runner.manager
        .createQueryBuilder()
        .select('d.detail', 'detail')
        .from(ns.qualify(ERROR_LOG_DETAIL_TABLE), 'd')
        .where('d.error_id = :key', { key })
        .getRawOne<{ detail: string | null }>();
      return row?.detail ?? null;
    });
  }

  async readPage(
    ns: ApplicationNamespace,
    offset: number,
    limit: number,
    options: StoreCallOptions = {},
  ): Promise<ErrorPage> {
    return this.withSession(options.signal, async (runner) => {
      const scoped = () =>
        runner.manager
          .createQueryBuilder()
          .from(ns.qualify(ERROR_LOG_TABLE), 'e')
          .where('e.application = :application', { application: ns.applicationName });

      const counted = await scoped().select('COUNT(*)', 'total').getRawOne<{ total: number | string }>();
      const total = Number(counted?.total ?? 0);
      if (limit === 0 || offset >= total) return { rows: [], total };

      const raw = await scoped()
        .select('e.error_id', 'error_id')
        .addSelect('e.application', 'application')
        .addSelect('e.host', 'host')
        .addSelect('e.type', 'type')
        .addSelect('e.source', 'source')
        .addSelect('e.message', 'message')
        .addSelect('e.user_name', 'user_name')
        .addSelect('e.status_code', 'status_code')
        .addSelect('e.time_utc', 'time_utc')
        .orderBy('e.time_utc', 'DESC')
        .addOrderBy('e.error_id', 'DESC')
        .offset(offset)
        .limit(limit)
        .getRawMany<ErrorLogRow>();
      return { rows: raw.map(toStoredRow), total };
    });
  }

  async close(): Promise<void> {
    this.initializing = null;
    if (this.dataSource.isInitialized) await this.dataSource.destroy();
  }

  protected async insertRecord(runner: QueryRunner, ns: ApplicationNamespace, error: StoredError) {
    const s = error.summary;
    await runner.manager
      .createQueryBuilder()
      .insert()
      .into(ns.qualify(ERROR_LOG_TABLE))
      .values({
        error_id: error.key,
        application: ns.applicationName,
        host: s.hostName,
        type: s.type,
        source: s.source,
        message: s.message,
        user_name: s.user,
        status_code: s.statusCode,
        time_utc: s.time.toISOString(),
      })
      .execute();
  }

  protected async insertDetail(runner: QueryRunner, ns: ApplicationNamespace, error: StoredError) {
    await runner.manager
      .createQueryBuilder()
      .insert()
      .into(ns.qualify(ERROR_LOG_DETAIL_TABLE))
      .values({ error_id: error.key, detail: error.detail })
      .execute();
  }

  private async ready(): Promise<DataSource> {
    if (this.dataSource.isInitialized) return this.dataSource;
    if (!this.initializing) {
      this.initializing = this.dataSource.initialize().catch((e: unknown) => {
        this.initializing = null;
        throw e;
      });
    }
    return this.initializing;
  }

  private async acquire(signal?: AbortSignal): Promise<QueryRunner> {
    let runner: QueryRunner | undefined;
    try {
      signal?.throwIfAborted();
      const ds = await this.ready();
      runner = ds.createQueryRunner();
      await runner.connect();
      return runner;
    } catch (e) {
      if (runner) await runner.release();
      throw new StoreUnavailableError(`Error store is unavailable: ${describeCause(e)}`, { cause: e });
    }
  }

  private async withSession<T>(signal: AbortSignal | undefined, work: (runner: QueryRunner) => Promise<T>): Promise<T> {
    const runner = await this.acquire(signal);
    try {
      const result = await work(runner);
      signal?.throwIfAborted();
      return result;
    } catch (e) {
      throw new StoreUnavailableError(`Error store read failed: ${describeCause(e)}`, { cause: e });
    } finally {
      await runner.release();
    }
  }

  private async rollback(runner: QueryRunner) {
    if (!runner.isTransactionActive) return;
    try {
      await runner.rollbackTransaction();
    } catch (e) {
      this.logger.error(`Rollback failed: ${describeCause(e)}`);
    }
  }
}

function toStoredRow(row: ErrorLogRow): StoredErrorRow {
  const summary: ErrorSummary = {
    applicationName: row.application,
    hostName: row.host,
    type: row.type,
    source: row.source,
    message: row.message,
    user: row.user_name,
    statusCode: Number(row.status_code),
    time: row.time_utc instanceof Date ? row.time_utc : new Date(row.time_utc),
  };
  return { key: row.error_id, summary };
}
