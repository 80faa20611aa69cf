/**
 * Soft Delete Repository
 * Adds "active" queries that exclude soft-deleted rows, and refuses hard deletes.
 */
import type { SoftDeletableEntity } from '../../../domain/models/SoftDeletableEntity.js';
import type { ISoftDeleteRepository, Page, Pageable } from '../../../domain/repositories/index.js';
import { HardDeleteNotAllowedError, InvalidRequestError } from '../../../shared/errors/ServiceError.js';
import logger from '../../logger/logger.js';
import { AuditableRepository, type Identifiable } from './AuditableRepository.js';
import { toBoolean, toDate, toOptionalString, type Row } from './rowValues.js';
import { allOf, type Specification } from './specification.js';

export abstract class SoftDeleteRepository<T extends SoftDeletableEntity & Identifiable>
  extends AuditableRepository<T>
  implements ISoftDeleteRepository<T, Specification>
{
  /**
   * Criterion matching rows that are not soft-deleted
   */
  notDeleted(): Specification {
    return (query) => {
      void query.where(this.column('deleted'), false);
    };
  }

  protected override toPersistence(entity: T): Row {
    const softDelete = entity.softDeleteFields();
    return {
      ...super.toPersistence(entity),
      deleted: softDelete.deleted,
      deleted_at: softDelete.deletedAt,
      deleted_by: softDelete.deletedBy,
    };
  }

  protected override hydrate(row: Row): T {
    const entity = super.hydrate(row);
    entity.restoreSoftDelete({
      deleted: toBoolean(row.deleted),
      deletedAt: toDate(row.deleted_at),
      deletedBy: toOptionalString(row.deleted_by),
    });
    return entity;
  }

  async findAllActive(specification?: Specification): Promise<T[]> {
    return this.findAll(allOf(this.notDeleted(), specification));
  }

  async findAllActivePage(pageable: Pageable, specification?: Specification): Promise<Page<T>> {
    if (!Number.isInteger(pageable.page) || pageable.page < 0) {
      throw new InvalidRequestError('Page index must not be less than zero');
    }
    if (!Number.isInteger(pageable.size) || pageable.size < 1) {
      throw new InvalidRequestError('Page size must not be less than one');
    }

    const criteria = allOf(this.notDeleted(), specification);
    const totalElements = await this.count(criteria);

    const query = this.query(criteria);
    if (pageable.sort && pageable.sort.length > 0) {
      for (const sort of pageable.sort) {
        void query.orderBy(this.column(sort.column), sort.direction ?? 'asc');
      }
    } else {
      void query.orderBy(this.column(this.idColumn));
    }

    const rows: Row[] = await query.limit(pageable.size).offset(pageable.page * pageable.size);

    return {
      content: rows.map((row) => this.hydrate(row)),
      page: pageable.page,
      size: pageable.size,
      totalElements,
      totalPages: Math.ceil(totalElements / pageable.size),
    };
  }

  async findByIdActive(id: number): Promise<T | null> {
    const row: Row | undefined = await this.query(this.notDeleted())
      .where(this.column(this.idColumn), id)
      .first();
    return row ? this.hydrate(row) : null;
  }

  /**
   * First active entity matching the criterion, by id
   */
  async findOneActive(specification: Specification): Promise<T | null> {
    const row: Row | undefined = await this.query(allOf(this.notDeleted(), specification))
      .orderBy(this.column(this.idColumn))
      .first();
    return row ? this.hydrate(row) : null;
  }

  async countActive(specification?: Specification): Promise<number> {
    return this.count(allOf(this.notDeleted(), specification));
  }

  /**
   * Mark deleted and persist; the auditor is recorded when no name is given
   */
  async softDelete(entity: T, deletedBy?: string): Promise<T> {
    entity.markDeleted(deletedBy ?? this.auditor.getCurrentAuditor());
    const saved = await this.save(entity);
    logger.info({ table: this.tableName, id: entity.id, deletedBy: entity.deletedBy }, 'Entity soft deleted');
    return saved;
  }

  async restore(entity: T): Promise<T> {
    entity.restore();
    const saved = await this.save(entity);
    logger.info({ table: this.tableName, id: entity.id }, 'Entity restored from soft delete');
    return saved;
  }

  override async delete(entity: T): Promise<boolean> {
    throw new HardDeleteNotAllowedError(entity.constructor.name);
  }
}
