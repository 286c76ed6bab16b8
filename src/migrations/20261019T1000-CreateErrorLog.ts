import { MigrationInterface, QueryRunner, Table, TableForeignKey, TableIndex } from 'typeorm';

function schemaOf(queryRunner: QueryRunner): string | undefined {
  const options = queryRunner.connection.options;
  return 'schema' in options && typeof options.schema === 'string' && options.schema ? options.schema : undefined;
}

export class CreateErrorLog20261019T1000 implements MigrationInterface {
  name = 'CreateErrorLog20261019T1000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    const schema = schemaOf(queryRunner);
    const qualify = (table: string) => (schema ? `${schema}.${table}` : table);
    if (schema) await queryRunner.createSchema(schema, true);

    await queryRunner.createTable(
      new Table({
        name: qualify('error_log'),
        columns: [
          { name: 'error_id', type: 'varchar', length: '32', isPrimary: true },
          { name: 'application', type: 'varchar', length: '60', default: "''" },
          { name: 'host', type: 'varchar', length: '30', default: "''" },
          { name: 'type', type: 'varchar', length: '100', default: "''" },
          { name: 'source', type: 'varchar', length: '60', default: "''" },
          { name: 'message', type: 'varchar', length: '500', default: "''" },
          { name: 'user_name', type: 'varchar', length: '50', default: "''" },
          { name: 'status_code', type: 'integer', default: 0 },
          { name: 'time_utc', type: 'timestamp with time zone' },
        ],
        indices: [
          new TableIndex({ name: 'idx_error_log_application_time', columnNames: ['application', 'time_utc'] }),
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: qualify('error_log_detail'),
        columns: [
          { name: 'error_id', type: 'varchar', length: '32', isPrimary: true },
          { name: 'detail', type: 'text' },
        ],
        foreignKeys: [
          new TableForeignKey({
            name: 'fk_error_log_detail_error',
            columnNames: ['error_id'],
            referencedTableName: qualify('error_log'),
            referencedColumnNames: ['error_id'],
            onDelete: 'CASCADE',
          }),
        ],
      }),
      true,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    const schema = schemaOf(queryRunner);
    const qualify = (table: string) => (schema ? `${schema}.${table}` : table);
    await queryRunner.dropTable(qualify('error_log_detail'), true);
    await queryRunner.dropTable(qualify('error_log'), true);
  }
}
