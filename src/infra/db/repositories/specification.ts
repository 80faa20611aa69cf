import type { Knex } from 'knex';

/**
 * Reusable query criterion: applies where clauses to a query builder
 *
 * @example
 * const byAccount = (accountId: number): Specification => (query) => query.where('account_id', accountId);
 */
export type Specification = (query: Knex.QueryBuilder) => void;

/**
 * Combine specifications with AND
 */
export function allOf(...specifications: Array<Specification | undefined>): Specification {
  return (query) => {
    for (const specification of specifications) {
      specification?.(query);
    }
  };
}

/**
 * Column equality criterion
 */
export function whereEquals(column: string, value: string | number | boolean | Date | null): Specification {
  return (query) => {
    if (value === null) {
      void query.whereNull(column);
    } else {
      void query.where(column, value);
    }
  };
}
