import { DataSource, QueryRunner } from 'typeorm';
import { ApplicationNamespace } from '../src/error-log/application-namespace';
import { ErrorLog } from '../src/error-log/error-log';
import { StoreUnavailableError, WriteFailedError } from '../src/error-log/error-log.errors';
import { ErrorLogEntry, ErrorSummary } from '../src/error-log/error-record';
import { StoredError } from '../src/error-log/error-store';
import { TypeOrmErrorStore } from '../src/error-log/typeorm-error.store';
import { createSqliteDataSource } from './support/sqlite';
import { sampleRecord } from './support/records';

const DESCRIPTOR = 'sqlite::memory:';

/** Fails between the indexed row and the detail row of the same write. */
class FaultyDetailStore extends TypeOrmErrorStore {
  failDetail = false;

  protected async insertDetail(runner: QueryRunner, ns: ApplicationNamespace, error: StoredError) {
    await super.insertDetail(runner, ns, error);
    if (this.failDetail) throw new Error('connection reset while writing detail');
  }
}

/** Cancels the caller's signal once both rows are written, before commit. */
class AbortingStore extends TypeOrmErrorStore {
  constructor(dataSource: DataSource, private readonly controller: AbortController) {
    super(dataSource);
  }

  protected async insertDetail(runner: QueryRunner, ns: ApplicationNamespace, error: StoredError) {
    await super.insertDetail(runner, ns, error);
    this.controller.abort();
  }
}

describe('TypeOrmErrorStore', () => {
  let dataSource: DataSource;

  beforeEach(() => {
    dataSource = createSqliteDataSource();
  });

  afterEach(async () => {
    if (dataSource.isInitialized) await dataSource.destroy();
  });

  const logFor = (store: TypeOrmErrorStore, applicationName = 'shop') =>
    new ErrorLog({ connectionDescriptor: DESCRIPTOR, applicationName }, () => store);

  const countRows = async (table: string) => {
    const [row] = await dataSource.query(`SELECT COUNT(*) AS n FROM ${table}`);
    return Number(row.n);
  };

  it('creates its schema on first use', async () => {
    const log = logFor(new TypeOrmErrorStore(dataSource));
    expect(dataSource.isInitialized).toBe(false);
    expect(await log.getErrors(0, 0)).toBe(0);
    expect(dataSource.isInitialized).toBe(true);
  });

  it('reads back what it wrote', async () => {
    const log = logFor(new TypeOrmErrorStore(dataSource));
    const record = sampleRecord(1, { detail: 'frame\n'.repeat(5000), message: 'quote \' and "double"' });
    const id = await log.log(record);

    const entry = await log.getError(id);
    expect(entry?.id).toBe(id);
    expect(entry?.error).toEqual(record);
  });

  it('keeps the detail in its own table', async () => {
    const log = logFor(new TypeOrmErrorStore(dataSource));
    const id = await log.log(sampleRecord(1));
    const [row] = await dataSource.query('SELECT error_id, detail FROM error_log_detail');
    expect(row.error_id).toBe(id.replace(/-/g, ''));
    expect(JSON.parse(row.detail)).toEqual(expect.objectContaining({ kind: 'error', message: 'failure #1' }));
  });

  it('scopes point reads to the application', async () => {
    const store = new TypeOrmErrorStore(dataSource);
    const shop = logFor(store, 'shop');
    const billing = logFor(store, 'billing');
    const id = await billing.log(sampleRecord(1));

    expect(await shop.getError(id)).toBeNull();
    expect(await billing.getError(id)).not.toBeNull();
  });

  it('pages most recent first and counts per application', async () => {
    const store = new TypeOrmErrorStore(dataSource);
    const shop = logFor(store, 'shop');
    const billing = logFor(store, 'billing');
    for (const minute of [3, 0, 2, 1]) await shop.log(sampleRecord(minute));
    await billing.log(sampleRecord(9));

    const all: ErrorLogEntry<ErrorSummary>[] = [];
    expect(await shop.getErrors(0, 4, all)).toBe(4);
    expect(all.map((e) => e.error.message)).toEqual(['failure #3', 'failure #2', 'failure #1', 'failure #0']);
    expect(all[0].error).toEqual({
      applicationName: 'shop',
      hostName: 'web-01',
      type: 'TypeError',
      source: 'checkout',
      message: 'failure #3',
      user: 'alice',
      statusCode: 500,
      time: new Date(Date.UTC(2026, 9, 19, 8, 3, 0)),
    });

    const second: ErrorLogEntry<ErrorSummary>[] = [];
    expect(await shop.getErrors(1, 3, second)).toBe(4);
    expect(second.map((e) => e.error.message)).toEqual(['failure #0']);

    const beyond: ErrorLogEntry<ErrorSummary>[] = [];
    expect(await shop.getErrors(5, 3, beyond)).toBe(4);
    expect(beyond).toEqual([]);

    expect(await billing.getErrors(0, 10)).toBe(1);
  });

  it('keeps characters outside the basic plane whole in indexed columns', async () => {
    const log = logFor(new TypeOrmErrorStore(dataSource));
    await log.log(sampleRecord(1, { message: 'a'.repeat(499) + '😀' }));
    await log.log(sampleRecord(2, { message: 'b'.repeat(500) + '😀' }));

    const sink: ErrorLogEntry<ErrorSummary>[] = [];
    await log.getErrors(0, 2, sink);
    expect(sink.map((e) => e.error.message)).toEqual(['b'.repeat(500), 'a'.repeat(499) + '😀']);
  });

  it('orders errors logged at the same instant by id', async () => {
    const log = logFor(new TypeOrmErrorStore(dataSource));
    const ids = [await log.log(sampleRecord(5)), await log.log(sampleRecord(5)), await log.log(sampleRecord(5))];

    const sink: ErrorLogEntry<ErrorSummary>[] = [];
    await log.getErrors(0, 3, sink);
    expect(sink.map((e) => e.id)).toEqual([...ids].sort().reverse());
  });

  it('rejects a second error under the same id', async () => {
    const store = new TypeOrmErrorStore(dataSource);
    const ns = new ApplicationNamespace('shop');
    const error: StoredError = { key: 'ef'.repeat(16), summary: sampleRecord(0), detail: '{}' };
    await store.write(ns, error);
    await expect(store.write(ns, error)).rejects.toBeInstanceOf(WriteFailedError);
    expect(await countRows('error_log')).toBe(1);
  });

  it('leaves no trace of a write that fails before commit', async () => {
    const store = new FaultyDetailStore(dataSource);
    const log = logFor(store);
    await log.log(sampleRecord(1));

    store.failDetail = true;
    await expect(log.log(sampleRecord(2))).rejects.toBeInstanceOf(WriteFailedError);

    expect(await log.getErrors(0, 10)).toBe(1);
    expect(await countRows('error_log')).toBe(1);
    expect(await countRows('error_log_detail')).toBe(1);
  });

  it('rolls back a write cancelled before commit', async () => {
    const controller = new AbortController();
    const log = logFor(new AbortingStore(dataSource, controller));

    await expect(log.log(sampleRecord(1), { signal: controller.signal })).rejects.toBeInstanceOf(WriteFailedError);
    expect(await log.getErrors(0, 10)).toBe(0);
  });

  it('does not start work for an already cancelled call', async () => {
    const log = logFor(new TypeOrmErrorStore(dataSource));
    const controller = new AbortController();
    controller.abort();

    await expect(log.log(sampleRecord(1), { signal: controller.signal })).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(log.getErrors(0, 10, [], { signal: controller.signal })).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(await log.getErrors(0, 10)).toBe(0);
  });

  it('closes its data source', async () => {
    const log = logFor(new TypeOrmErrorStore(dataSource));
    await log.getErrors(0, 0);
    await log.close();
    expect(dataSource.isInitialized).toBe(false);
  });

  it('connects again when used after close', async () => {
    const log = logFor(new TypeOrmErrorStore(dataSource));
    await log.getErrors(0, 0);
    await log.close();

    expect(await log.getErrors(0, 0)).toBe(0);
    expect(dataSource.isInitialized).toBe(true);
  });
});
