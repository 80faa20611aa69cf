/**
 * Service Error Classes
 * Centralized error definitions shared by every service.
 * The API exception handler maps each class to an HTTP status and error type.
 */

export interface ServiceErrorOptions {
  cause?: unknown;
}

/**
 * Base error for all service-related failures (HTTP 500).
 * Extend this class for specific error scenarios.
 */
export class ServiceError extends Error {
  public readonly statusCode: number = 500;

  constructor(message: string, options?: ServiceErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 400 - The request is malformed: bad syntax, missing parameters, wrong structure.
 * Use BusinessError for well-formed requests that break domain rules.
 */
export class InvalidRequestError extends ServiceError {
  public override readonly statusCode: number = 400;
}

/**
 * 404 - The requested resource does not exist
 *
 * @example
 * const transaction = await repository.findByIdActive(id);
 * if (!transaction) throw new ResourceNotFoundError(`Transaction not found with id: ${id}`);
 */
export class ResourceNotFoundError extends ServiceError {
  public override readonly statusCode: number = 404;
}

/**
 * 422 - The request is valid but violates a business rule.
 * The machine-readable code lets clients localize or branch on the failure.
 */
export class BusinessError extends ServiceError {
  public override readonly statusCode: number = 422;

  constructor(
    message: string,
    public readonly code: string,
    options?: ServiceErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * 503 - A call to a downstream service or external API failed.
 * Usually wraps the HTTP client's error as the cause.
 */
export class ClientError extends ServiceError {
  public override readonly statusCode: number = 503;
}

/**
 * 503 - A required dependency (database, downstream service, open circuit) is unavailable.
 * The request may succeed if retried later.
 */
export class ServiceUnavailableError extends ServiceError {
  public override readonly statusCode: number = 503;
}

/**
 * Walk the `cause` chain and return the innermost error, or undefined when there is no cause
 */
export function getRootCause(error: unknown): unknown {
  let current: unknown = error;
  let root: unknown;
  const seen = new Set<unknown>();

  while (current instanceof Error && current.cause !== undefined && !seen.has(current)) {
    seen.add(current);
    root = current.cause;
    current = current.cause;
  }

  return root;
}

/**
 * Raised when a soft-deletable entity reaches a hard delete path
 */
export class HardDeleteNotAllowedError extends ServiceError {
  constructor(public readonly entityName: string) {
    super(`Hard delete not allowed for ${entityName}. Use markDeleted() instead.`);
  }
}
