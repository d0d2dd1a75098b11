import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm';

export class CreateSummaryTables1767225600000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    await queryRunner.createTable(
      new Table({
        name: 'query_cache',
        columns: [
          { name: 'key', type: 'varchar', length: '64', isPrimary: true },
          { name: 'operation', type: 'varchar', length: '100' },
          { name: 'payload', type: 'jsonb' },
          { name: 'expiresAt', type: 'timestamp' },
          { name: 'createdAt', type: 'timestamp', default: 'now()' },
        ],
      }),
      true,
    );

    await queryRunner.createIndex(
      'query_cache',
      new TableIndex({ name: 'IDX_QUERY_CACHE_EXPIRES_AT', columnNames: ['expiresAt'] }),
    );

    await queryRunner.createTable(
      new Table({
        name: 'summary_run',
        columns: [
          {
            name: 'id',
            type: 'uuid',
            isPrimary: true,
            generationStrategy: 'uuid',
            default: 'uuid_generate_v4()',
          },
          { name: 'repository', type: 'varchar', length: '200' },
          { name: 'status', type: 'varchar', length: '20', default: "'running'" },
          { name: 'trigger', type: 'varchar', length: '20', default: "'api'" },
          { name: 'windowStart', type: 'date', isNullable: true },
          { name: 'windowEnd', type: 'date', isNullable: true },
          { name: 'title', type: 'text', isNullable: true },
          { name: 'discussionUrl', type: 'text', isNullable: true },
          { name: 'errorMessage', type: 'text', isNullable: true },
          { name: 'startedAt', type: 'timestamp', default: 'now()' },
          { name: 'updatedAt', type: 'timestamp', default: 'now()' },
        ],
      }),
      true,
    );

    await queryRunner.createIndex(
      'summary_run',
      new TableIndex({ name: 'IDX_SUMMARY_RUN_REPOSITORY', columnNames: ['repository'] }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('summary_run');
    await queryRunner.dropTable('query_cache');
  }
}
