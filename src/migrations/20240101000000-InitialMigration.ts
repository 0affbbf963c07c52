import { MigrationInterface, QueryRunner, Table, TableColumn, TableIndex } from 'typeorm';

const createdAt = () =>
  new TableColumn({
    name: 'createdAt',
    type: 'timestamptz',
    isNullable: false,
    default: 'now()',
  });

export class InitialSchemaMigration implements MigrationInterface {
  name = 'InitialSchemaMigration1704067200000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'repository',
        columns: [
          new TableColumn({
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          }),
          new TableColumn({
            name: 'githubRepoId',
            type: 'bigint',
            isNullable: false,
            isUnique: true,
          }),
          new TableColumn({
            name: 'ownerLogin',
            type: 'varchar',
            isNullable: false,
          }),
          new TableColumn({
            name: 'name',
            type: 'varchar',
            isNullable: false,
          }),
          new TableColumn({
            name: 'fullName',
            type: 'varchar',
            isNullable: false,
          }),
          new TableColumn({
            name: 'defaultBranch',
            type: 'varchar',
            isNullable: false,
            default: "'main'",
          }),
          createdAt(),
        ],
        indices: [
          new TableIndex({ columnNames: ['ownerLogin', 'name'], isUnique: true }),
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'webhook_registration',
        columns: [
          new TableColumn({
            name: 'id',
            type: 'uuid',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'uuid',
            isNullable: false,
          }),
          new TableColumn({
            name: 'repositoryId',
            type: 'integer',
            isNullable: false,
          }),
          new TableColumn({
            name: 'remoteHookId',
            type: 'varchar',
            isNullable: false,
          }),
          new TableColumn({
            name: 'secret',
            type: 'varchar',
            isNullable: false,
          }),
          new TableColumn({
            name: 'url',
            type: 'varchar',
            isNullable: false,
          }),
          new TableColumn({
            name: 'events',
            type: 'text',
            isNullable: false,
          }),
          new TableColumn({
            name: 'active',
            type: 'boolean',
            isNullable: false,
            default: true,
          }),
          createdAt(),
          new TableColumn({
            name: 'updatedAt',
            type: 'timestamptz',
            isNullable: false,
            default: 'now()',
          }),
        ],
        indices: [
          new TableIndex({ columnNames: ['repositoryId'] }),
          new TableIndex({ columnNames: ['repositoryId', 'remoteHookId'], isUnique: true }),
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'stored_credential',
        columns: [
          new TableColumn({
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          }),
          new TableColumn({
            name: 'accountLogin',
            type: 'varchar',
            isNullable: false,
          }),
          new TableColumn({
            name: 'token',
            type: 'text',
            isNullable: false,
          }),
          new TableColumn({
            name: 'tokenType',
            type: 'varchar',
            isNullable: false,
            default: "'oauth'",
          }),
          new TableColumn({
            name: 'scopes',
            type: 'varchar',
            isNullable: true,
          }),
          createdAt(),
        ],
        indices: [new TableIndex({ columnNames: ['accountLogin'] })],
      }),
      true,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('stored_credential');
    await queryRunner.dropTable('webhook_registration');
    await queryRunner.dropTable('repository');
  }
}
