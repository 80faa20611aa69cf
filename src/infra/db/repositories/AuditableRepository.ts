/**
 * Auditable Repository
 * knex-backed repository that fills audit columns on every write.
 *
 * Subclasses map their own columns; audit columns (created_at, updated_at,
 * created_by, updated_by) are handled here.
 */
import type { Knex } from 'knex';
import { securityContextAuditor, type AuditorAware } from '../../../domain/auditing/AuditorAware.js';
import type { AuditableEntity } from '../../../domain/models/AuditableEntity.js';
import type { IRepository } from '../../../domain/repositories/index.js';
import { ResourceNotFoundError } from '../../../shared/errors/ServiceError.js';
import logger from '../../logger/logger.js';
import { toDate, toNumber, toOptionalString, type Row } from './rowValues.js';
import type { Specification } from './specification.js';

/**
 * Entities stored under a numeric primary key; null until first saved
 */
export interface Identifiable {
  id: number | null;
}

export interface RepositoryOptions {
  auditor?: AuditorAware;
  idColumn?: string;
}

export abstract class AuditableRepository<T extends AuditableEntity & Identifiable>
  implements IRepository<T>
{
  protected readonly auditor: AuditorAware;
  protected readonly idColumn: string;

  constructor(
    protected readonly db: Knex,
    protected readonly tableName: string,
    options: RepositoryOptions = {}
  ) {
    this.auditor = options.auditor ?? securityContextAuditor;
    this.idColumn = options.idColumn ?? 'id';
  }

  /**
   * Entity's own columns, without id or audit columns
   */
  protected abstract toRow(entity: T): Row;

  /**
   * Construct an entity from its row; audit state is restored afterwards
   */
  protected abstract fromRow(row: Row): T;

  protected column(name: string): string {
    return `${this.tableName}.${name}`;
  }

  protected query(specification?: Specification): Knex.QueryBuilder {
    const query = this.db(this.tableName).select(`${this.tableName}.*`);
    specification?.(query);
    return query;
  }

  /**
   * Full row for a write: entity columns plus state the base classes manage
   */
  protected toPersistence(entity: T): Row {
    const audit = entity.auditFields();
    return {
      ...this.toRow(entity),
      created_at: audit.createdAt,
      updated_at: audit.updatedAt,
      created_by: audit.createdBy,
      updated_by: audit.updatedBy,
    };
  }

  protected hydrate(row: Row): T {
    const entity = this.fromRow(row);
    entity.id = toNumber(row[this.idColumn]);
    entity.restoreAudit({
      createdAt: toDate(row.created_at),
      updatedAt: toDate(row.updated_at),
      createdBy: toOptionalString(row.created_by),
      updatedBy: toOptionalString(row.updated_by),
    });
    return entity;
  }

  async save(entity: T): Promise<T> {
    const auditor = this.auditor.getCurrentAuditor();

    if (entity.id === null) {
      entity.onCreate(auditor);
      const [insertedId] = await this.db(this.tableName).insert(this.toPersistence(entity));
      entity.id = toNumber(insertedId);
      logger.debug({ table: this.tableName, id: entity.id, auditor }, 'Entity created');
      return entity;
    }

    entity.onUpdate(auditor);
    const updated = await this.db(this.tableName)
      .where(this.idColumn, entity.id)
      .update(this.toPersistence(entity));

    if (updated === 0) {
      throw new ResourceNotFoundError(`${entity.constructor.name} not found with id: ${entity.id}`);
    }

    logger.debug({ table: this.tableName, id: entity.id, auditor }, 'Entity updated');
    return entity;
  }

  async findById(id: number): Promise<T | null> {
    const row: Row | undefined = await this.query().where(this.column(this.idColumn), id).first();
    return row ? this.hydrate(row) : null;
  }

  async findAll(specification?: Specification): Promise<T[]> {
    const rows: Row[] = await this.query(specification).orderBy(this.column(this.idColumn));
    return rows.map((row) => this.hydrate(row));
  }

  async count(specification?: Specification): Promise<number> {
    const query = this.db(this.tableName);
    specification?.(query);
    const result: Row | undefined = await query.count({ count: '*' }).first();
    return toNumber(result?.count);
  }

  async delete(entity: T): Promise<boolean> {
    if (entity.id === null) {
      return false;
    }

    const deleted = await this.db(this.tableName).where(this.idColumn, entity.id).delete();
    if (deleted > 0) {
      logger.warn({ table: this.tableName, id: entity.id }, 'Entity permanently deleted');
    }
    return deleted > 0;
  }
}
