import {
  MigrationInterface,
  QueryRunner,
  Table,
  TableForeignKey,
  TableIndex,
} from 'typeorm';

export class CreateDocumentManagementTables1760000000000
  implements MigrationInterface
{
  name = 'CreateDocumentManagementTables1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('CREATE EXTENSION IF NOT EXISTS "pgcrypto";');

    await queryRunner.createTable(
      new Table({
        name: 'users',
        columns: [
          {
            name: 'id',
            type: 'uuid',
            isPrimary: true,
            default: 'gen_random_uuid()',
          },
          { name: 'email', type: 'varchar', length: '255' },
          { name: 'password_hash', type: 'varchar', length: '255' },
          { name: 'first_name', type: 'varchar', length: '100' },
          { name: 'last_name', type: 'varchar', length: '100' },
          { name: 'is_active', type: 'boolean', default: true },
          { name: 'last_login_at', type: 'timestamptz', isNullable: true },
          { name: 'created_at', type: 'timestamptz', default: 'now()' },
          { name: 'updated_at', type: 'timestamptz', default: 'now()' },
        ],
        indices: [
          new TableIndex({
            name: 'IDX_users_email',
            columnNames: ['email'],
            isUnique: true,
          }),
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'documents',
        columns: [
          { name: 'id', type: 'uuid', isPrimary: true },
          { name: 'title', type: 'varchar', length: '500' },
          { name: 'description', type: 'text', isNullable: true },
          { name: 'owner_id', type: 'uuid' },
          { name: 'current_version_id', type: 'uuid', isNullable: true },
          { name: 'file_type', type: 'varchar', length: '20' },
          { name: 'is_deleted', type: 'boolean', default: false },
          { name: 'deleted_at', type: 'timestamptz', isNullable: true },
          { name: 'created_at', type: 'timestamptz', default: 'now()' },
          { name: 'updated_at', type: 'timestamptz', default: 'now()' },
        ],
        foreignKeys: [
          new TableForeignKey({
            columnNames: ['owner_id'],
            referencedTableName: 'users',
            referencedColumnNames: ['id'],
            onDelete: 'RESTRICT',
          }),
        ],
        indices: [
          new TableIndex({
            name: 'IDX_documents_owner_id',
            columnNames: ['owner_id'],
          }),
          new TableIndex({
            name: 'IDX_documents_created_at',
            columnNames: ['created_at'],
          }),
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'document_versions',
        columns: [
          {
            name: 'id',
            type: 'uuid',
            isPrimary: true,
            default: 'gen_random_uuid()',
          },
          { name: 'document_id', type: 'uuid' },
          { name: 'version_number', type: 'integer' },
          { name: 'blob_key', type: 'varchar', length: '1024' },
          { name: 'file_name', type: 'varchar', length: '255' },
          { name: 'file_size', type: 'bigint' },
          { name: 'mime_type', type: 'varchar', length: '255' },
          { name: 'checksum', type: 'char', length: '64' },
          { name: 'created_by_id', type: 'uuid' },
          { name: 'created_at', type: 'timestamptz', default: 'now()' },
        ],
        uniques: [
          {
            name: 'UQ_document_versions_document_version',
            columnNames: ['document_id', 'version_number'],
          },
        ],
        checks: [
          {
            name: 'CHK_document_versions_version_number',
            expression: '"version_number" > 0',
          },
          {
            name: 'CHK_document_versions_file_size',
            expression: '"file_size" > 0',
          },
        ],
        foreignKeys: [
          new TableForeignKey({
            columnNames: ['document_id'],
            referencedTableName: 'documents',
            referencedColumnNames: ['id'],
            onDelete: 'RESTRICT',
          }),
          new TableForeignKey({
            columnNames: ['created_by_id'],
            referencedTableName: 'users',
            referencedColumnNames: ['id'],
            onDelete: 'RESTRICT',
          }),
        ],
      }),
      true,
    );

    // Added after document_versions exists; the two tables reference each other
    await queryRunner.createForeignKey(
      'documents',
      new TableForeignKey({
        name: 'FK_documents_current_version',
        columnNames: ['current_version_id'],
        referencedTableName: 'document_versions',
        referencedColumnNames: ['id'],
        onDelete: 'SET NULL',
      }),
    );

    await queryRunner.createTable(
      new Table({
        name: 'document_tags',
        columns: [
          {
            name: 'id',
            type: 'uuid',
            isPrimary: true,
            default: 'gen_random_uuid()',
          },
          { name: 'document_id', type: 'uuid' },
          { name: 'tag', type: 'varchar', length: '100' },
        ],
        uniques: [
          {
            name: 'UQ_document_tags_document_tag',
            columnNames: ['document_id', 'tag'],
          },
        ],
        foreignKeys: [
          new TableForeignKey({
            columnNames: ['document_id'],
            referencedTableName: 'documents',
            referencedColumnNames: ['id'],
            onDelete: 'CASCADE',
          }),
        ],
        indices: [
          new TableIndex({
            name: 'IDX_document_tags_tag',
            columnNames: ['tag'],
          }),
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'document_permissions',
        columns: [
          {
            name: 'id',
            type: 'uuid',
            isPrimary: true,
            default: 'gen_random_uuid()',
          },
          { name: 'document_id', type: 'uuid' },
          { name: 'user_id', type: 'uuid' },
          { name: 'role', type: 'varchar', length: '10' },
          { name: 'granted_by_id', type: 'uuid' },
          { name: 'granted_at', type: 'timestamptz', default: 'now()' },
        ],
        uniques: [
          {
            name: 'UQ_document_permissions_document_user',
            columnNames: ['document_id', 'user_id'],
          },
        ],
        checks: [
          {
            name: 'CHK_document_permissions_role',
            expression: `"role" IN ('READ', 'EDIT', 'ADMIN')`,
          },
        ],
        foreignKeys: [
          new TableForeignKey({
            columnNames: ['document_id'],
            referencedTableName: 'documents',
            referencedColumnNames: ['id'],
            onDelete: 'CASCADE',
          }),
          new TableForeignKey({
            columnNames: ['user_id'],
            referencedTableName: 'users',
            referencedColumnNames: ['id'],
            onDelete: 'CASCADE',
          }),
        ],
        indices: [
          new TableIndex({
            name: 'IDX_document_permissions_user_id',
            columnNames: ['user_id'],
          }),
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'activity_logs',
        columns: [
          {
            name: 'id',
            type: 'uuid',
            isPrimary: true,
            default: 'gen_random_uuid()',
          },
          { name: 'actor_id', type: 'uuid', isNullable: true },
          { name: 'document_id', type: 'uuid', isNullable: true },
          { name: 'action', type: 'varchar', length: '50' },
          { name: 'details', type: 'jsonb', default: `'{}'` },
          {
            name: 'ip_address',
            type: 'varchar',
            length: '64',
            isNullable: true,
          },
          {
            name: 'user_agent',
            type: 'varchar',
            length: '255',
            isNullable: true,
          },
          { name: 'created_at', type: 'timestamptz', default: 'now()' },
        ],
        indices: [
          new TableIndex({
            name: 'IDX_activity_logs_document_id_created_at',
            columnNames: ['document_id', 'created_at'],
          }),
          new TableIndex({
            name: 'IDX_activity_logs_actor_id',
            columnNames: ['actor_id'],
          }),
        ],
      }),
      true,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('activity_logs', true);
    await queryRunner.dropTable('document_permissions', true);
    await queryRunner.dropTable('document_tags', true);
    await queryRunner.dropForeignKey('documents', 'FK_documents_current_version');
    await queryRunner.dropTable('document_versions', true);
    await queryRunner.dropTable('documents', true);
    await queryRunner.dropTable('users', true);
  }
}
