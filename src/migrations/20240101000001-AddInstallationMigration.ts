import { MigrationInterface, QueryRunner, Table, TableColumn, TableIndex } from 'typeorm';

export class AddInstallationMigration implements MigrationInterface {
  name = 'AddInstallationMigration1704067200001';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'installation',
        columns: [
          new TableColumn({
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          }),
          new TableColumn({
            name: 'installationId',
            type: 'bigint',
            isNullable: false,
          }),
          new TableColumn({
            name: 'accountId',
            type: 'bigint',
            isNullable: false,
          }),
          new TableColumn({
            name: 'accountLogin',
            type: 'varchar',
            isNullable: false,
          }),
          new TableColumn({
            name: 'accountType',
            type: 'varchar',
            isNullable: false,
          }),
          new TableColumn({
            name: 'suspendedAt',
            type: 'timestamptz',
            isNullable: true,
          }),
          new TableColumn({
            name: 'permissions',
            type: 'text',
            isNullable: true,
          }),
          new TableColumn({
            name: 'events',
            type: 'text',
            isNullable: true,
          }),
          new TableColumn({
            name: 'createdAt',
            type: 'timestamptz',
            isNullable: false,
            default: 'now()',
          }),
          new TableColumn({
            name: 'updatedAt',
            type: 'timestamptz',
            isNullable: false,
            default: 'now()',
          }),
        ],
        indices: [
          new TableIndex({ columnNames: ['installationId'], isUnique: true }),
          new TableIndex({ columnNames: ['accountId'] }),
          new TableIndex({ columnNames: ['accountLogin'] }),
        ],
      }),
      true,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('installation');
  }
}
