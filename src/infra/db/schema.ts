/**
 * Migration helpers for the columns AuditableRepository and SoftDeleteRepository write
 *
 * @example
 * await knex.schema.createTable('transactions', (table) => {
 *   table.increments('id').primary();
 *   table.string('description', 255).notNullable();
 *   addAuditColumns(table);
 *   addSoftDeleteColumns(table);
 * });
 */
import type { Knex } from 'knex';

export function addAuditColumns(table: Knex.CreateTableBuilder): void {
  table.timestamp('created_at').nullable();
  table.timestamp('updated_at').nullable();
  table.string('created_by', 50).nullable();
  table.string('updated_by', 50).nullable();
}

export function addSoftDeleteColumns(table: Knex.CreateTableBuilder, tableName?: string): void {
  table.boolean('deleted').notNullable().defaultTo(false);
  table.timestamp('deleted_at').nullable();
  table.string('deleted_by', 50).nullable();

  table.index(['deleted'], tableName ? `idx_${tableName}_deleted` : undefined);
}
