/**
 * Repository contracts
 *
 * These interfaces live in the domain layer because:
 * - Domain layer defines WHAT operations are needed
 * - Infrastructure layer defines HOW they are implemented
 *
 * `C` is the criteria type the implementation filters with.
 */

export interface Sort {
  column: string;
  direction?: 'asc' | 'desc';
}

/**
 * Zero-based page request
 */
export interface Pageable {
  page: number;
  size: number;
  sort?: Sort[];
}

export interface Page<T> {
  content: T[];
  page: number;
  size: number;
  totalElements: number;
  totalPages: number;
}

export interface IRepository<T> {
  /**
   * Insert or update, applying audit callbacks
   */
  save(entity: T): Promise<T>;

  findById(id: number): Promise<T | null>;

  findAll(): Promise<T[]>;

  count(): Promise<number>;

  /**
   * @returns true if a row was removed
   */
  delete(entity: T): Promise<boolean>;
}

export interface ISoftDeleteRepository<T, C> extends IRepository<T> {
  findAllActive(criteria?: C): Promise<T[]>;

  findAllActivePage(pageable: Pageable, criteria?: C): Promise<Page<T>>;

  findByIdActive(id: number): Promise<T | null>;

  findOneActive(criteria: C): Promise<T | null>;

  countActive(criteria?: C): Promise<number>;

  softDelete(entity: T, deletedBy?: string): Promise<T>;

  restore(entity: T): Promise<T>;
}
