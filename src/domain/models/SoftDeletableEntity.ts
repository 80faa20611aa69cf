import { AuditableEntity } from './AuditableEntity.js';

export interface SoftDeleteFields {
  deleted: boolean;
  deletedAt: Date | null;
  deletedBy: string | null;
}

/**
 * Entity removed by marking rather than by deleting its row.
 * SoftDeleteRepository refuses hard deletes of these entities.
 */
export abstract class SoftDeletableEntity extends AuditableEntity {
  private _deleted = false;
  private _deletedAt: Date | null = null;
  private _deletedBy: string | null = null;

  get deleted(): boolean {
    return this._deleted;
  }

  get deletedAt(): Date | null {
    return this._deletedAt;
  }

  get deletedBy(): string | null {
    return this._deletedBy;
  }

  markDeleted(deletedBy?: string): void {
    this._deleted = true;
    this._deletedAt = new Date();
    this._deletedBy = deletedBy ?? null;
  }

  restore(): void {
    this._deleted = false;
    this._deletedAt = null;
    this._deletedBy = null;
  }

  restoreSoftDelete(fields: SoftDeleteFields): void {
    this._deleted = fields.deleted;
    this._deletedAt = fields.deletedAt;
    this._deletedBy = fields.deletedBy;
  }

  softDeleteFields(): SoftDeleteFields {
    return {
      deleted: this._deleted,
      deletedAt: this._deletedAt,
      deletedBy: this._deletedBy,
    };
  }
}
