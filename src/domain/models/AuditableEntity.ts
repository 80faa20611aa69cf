/**
 * Auditable Entity
 * Base class for persisted entities that track who created and last modified them.
 * Repositories call onCreate/onUpdate before writing.
 */
export interface AuditFields {
  createdAt: Date | null;
  updatedAt: Date | null;
  createdBy: string | null;
  updatedBy: string | null;
}

export abstract class AuditableEntity {
  private _createdAt: Date | null = null;
  private _updatedAt: Date | null = null;
  private _createdBy: string | null = null;
  private _updatedBy: string | null = null;

  // Getters
  get createdAt(): Date | null {
    return this._createdAt;
  }

  get updatedAt(): Date | null {
    return this._updatedAt;
  }

  get createdBy(): string | null {
    return this._createdBy;
  }

  get updatedBy(): string | null {
    return this._updatedBy;
  }

  /**
   * Lifecycle callback before first insert
   */
  onCreate(auditor?: string): void {
    const now = new Date();
    this._createdAt = now;
    this._updatedAt = now;

    if (auditor) {
      this._createdBy = auditor;
      this._updatedBy = auditor;
    }
  }

  /**
   * Lifecycle callback before each update; creation fields are left alone
   */
  onUpdate(auditor?: string): void {
    this._updatedAt = new Date();

    if (auditor) {
      this._updatedBy = auditor;
    }
  }

  /**
   * Rehydrate audit fields loaded from storage
   */
  restoreAudit(fields: AuditFields): void {
    this._createdAt = fields.createdAt;
    this._updatedAt = fields.updatedAt;
    this._createdBy = fields.createdBy;
    this._updatedBy = fields.updatedBy;
  }

  auditFields(): AuditFields {
    return {
      createdAt: this._createdAt,
      updatedAt: this._updatedAt,
      createdBy: this._createdBy,
      updatedBy: this._updatedBy,
    };
  }
}
