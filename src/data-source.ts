import 'reflect-metadata';
import { DataSource } from 'typeorm';
import * as dotenv from 'dotenv';
import { ApplicationNamespace } from './error-log/application-namespace';
import { buildPostgresOptions } from './error-log/postgres-error.store';

dotenv.config({ path: process.env.NODE_ENV === 'production' ? '.env' : '.env.local' });
dotenv.config();

const url = process.env.ERROR_LOG_DATABASE_URL || process.env.DATABASE_URL;
if (!url) throw new Error('ERROR_LOG_DATABASE_URL (or DATABASE_URL) not set');

// validates the schema name the same way the log does
const namespace = new ApplicationNamespace(process.env.ERROR_LOG_APPLICATION, process.env.ERROR_LOG_SCHEMA);

const dataSource = new DataSource(buildPostgresOptions(url, namespace.schemaQualifier));

export default dataSource;

// --- CLI runner (minimal) ---
if (require.main === module) {
  const cmd = process.argv[2]; // "migration:run" | "migration:show" | "migration:revert"
  dataSource
    .initialize()
    .then(async () => {
      if (cmd === 'migration:run') {
        await dataSource.runMigrations();
        console.log('Migrations ran.');
      } else if (cmd === 'migration:revert') {
        await dataSource.undoLastMigration();
        console.log('Migration reverted.');
      } else if (cmd === 'migration:show') {
        const hasPending = await dataSource.showMigrations();
        console.log('Pending migrations?', hasPending);
      } else {
        console.log('Usage: npm run migration -- migration:run | migration:show | migration:revert');
      }
      await dataSource.destroy();
    })
    .catch((err: unknown) => {
      console.error('Migration error:', err);
      process.exit(1);
    });
}
