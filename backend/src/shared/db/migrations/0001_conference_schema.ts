import { SqliteAdapter } from 'kysely';
import type { ColumnDefinitionBuilder, Kysely } from 'kysely';

import type { RoleTable } from '../schema';
import { ROLE_IDS } from '../../../modules/users/user.types';

// Postgres in every real environment; the in-process test database is SQLite.
function identity(db: Kysely<unknown>) {
  const sqlite = db.getExecutor().adapter instanceof SqliteAdapter;
  return (col: ColumnDefinitionBuilder) =>
    sqlite ? col.primaryKey().autoIncrement() : col.primaryKey().generatedByDefaultAsIdentity();
}

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('role')
    .addColumn('id', 'integer', (col) => col.primaryKey())
    .addColumn('name', 'varchar(32)', (col) => col.notNull().unique())
    .execute();

  await db
    .withTables<{ role: RoleTable }>()
    .insertInto('role')
    .values(Object.entries(ROLE_IDS).map(([name, id]) => ({ id, name })))
    .execute();

  await db.schema
    .createTable('user')
    .addColumn('id', 'integer', identity(db))
    .addColumn('email', 'varchar(255)', (col) => col.notNull().unique())
    .addColumn('password', 'varchar(255)', (col) => col.notNull())
    .addColumn('name', 'varchar(100)', (col) => col.notNull())
    .addColumn('surname', 'varchar(100)', (col) => col.notNull())
    .addColumn('role_id', 'integer', (col) =>
      col.notNull().defaultTo(ROLE_IDS.VISITOR).references('role.id'),
    )
    .execute();

  await db.schema
    .createTable('event')
    .addColumn('id', 'integer', identity(db))
    .addColumn('title', 'varchar(255)', (col) => col.notNull().unique())
    .addColumn('date', 'date', (col) => col.notNull())
    .addColumn('location', 'varchar(255)', (col) => col.notNull())
    .addColumn('description', 'text')
    .execute();

  await db.schema
    .createTable('report')
    .addColumn('id', 'integer', identity(db))
    .addColumn('topic', 'varchar(255)', (col) => col.notNull())
    .addColumn('event_id', 'integer', (col) =>
      col.notNull().references('event.id').onDelete('cascade'),
    )
    .addColumn('speaker_id', 'integer', (col) => col.references('user.id').onDelete('set null'))
    .execute();

  await db.schema
    .createTable('user_has_event')
    .addColumn('user_id', 'integer', (col) =>
      col.notNull().references('user.id').onDelete('cascade'),
    )
    .addColumn('event_id', 'integer', (col) =>
      col.notNull().references('event.id').onDelete('cascade'),
    )
    .addPrimaryKeyConstraint('user_has_event_pk', ['user_id', 'event_id'])
    .execute();

  await db.schema.createIndex('report_event_id_idx').on('report').column('event_id').execute();
  await db.schema
    .createIndex('user_has_event_event_id_idx')
    .on('user_has_event')
    .column('event_id')
    .execute();
  await db.schema.createIndex('user_role_id_idx').on('user').column('role_id').execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('user_has_event').ifExists().execute();
  await db.schema.dropTable('report').ifExists().execute();
  await db.schema.dropTable('event').ifExists().execute();
  await db.schema.dropTable('user').ifExists().execute();
  await db.schema.dropTable('role').ifExists().execute();
}
