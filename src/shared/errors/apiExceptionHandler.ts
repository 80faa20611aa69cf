/**
 * Centralized API Exception Handler
 * Converts every error that escapes a route into an ApiErrorResponse.
 *
 * Mapping:
 * - InvalidRequestError             400 INVALID_REQUEST
 * - Zod / schema validation errors  400 VALIDATION_ERROR (with fieldErrors)
 * - ResourceNotFoundError           404 NOT_FOUND
 * - BusinessError                   422 APPLICATION_ERROR (with code)
 * - ClientError                     503 SERVICE_UNAVAILABLE
 * - ServiceUnavailableError         503 SERVICE_UNAVAILABLE
 * - Framework 4xx errors            4xx INVALID_REQUEST
 * - Anything else                   500 INTERNAL_ERROR
 *
 * Services override the defaults by passing their own mappers; the first
 * mapper returning a mapping wins.
 */
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import defaultLogger, { type Logger } from '../../infra/logger/logger.js';
import config from '../../config/env.js';
import {
  ApiErrorType,
  buildApiErrorResponse,
  fieldError,
  type ApiErrorResponse,
  type FieldError,
} from './ApiErrorResponse.js';
import {
  BusinessError,
  ClientError,
  InvalidRequestError,
  ResourceNotFoundError,
  ServiceUnavailableError,
  getRootCause,
} from './ServiceError.js';

/**
 * Resolved HTTP status and body for an error
 */
export interface ErrorMapping {
  statusCode: number;
  body: ApiErrorResponse;
}

/**
 * Service-specific error mapping. Return undefined to fall through to the defaults.
 */
export type ErrorMapper = (error: Error, request: FastifyRequest) => ErrorMapping | undefined;

export interface ApiExceptionHandlerOptions {
  /** Custom mappers consulted before the defaults */
  mappers?: ErrorMapper[];
  /** Expose messages of unexpected errors to clients (default: development and test) */
  exposeInternalMessages?: boolean;
  logger?: Logger;
}

/** Part of the request a schema validation error refers to */
type ValidationContext = 'body' | 'querystring' | 'params' | 'headers';

interface SchemaValidationIssue {
  keyword: string;
  instancePath: string;
  params: Record<string, unknown>;
  message?: string;
}

const INTERNAL_ERROR_MESSAGE = 'An unexpected error occurred';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Read a nested value by path segments, undefined when any segment is missing
 */
function valueAtPath(root: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = root;
  for (const segment of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[String(segment)];
  }
  return current;
}

function requestPart(request: FastifyRequest, context: ValidationContext | undefined): unknown {
  switch (context) {
    case 'querystring':
      return request.query;
    case 'params':
      return request.params;
    case 'headers':
      return request.headers;
    case 'body':
    default:
      return request.body;
  }
}

function validationMessage(count: number): string {
  return `Validation failed for ${count} field${count !== 1 ? 's' : ''}`;
}

/**
 * Format Zod validation issues, resolving rejected values from the request body
 */
function zodFieldErrors(error: ZodError, request: FastifyRequest): FieldError[] {
  return error.issues.map((issue) =>
    fieldError(issue.path.map(String).join('.'), issue.message, valueAtPath(request.body, issue.path))
  );
}

/**
 * Format Fastify (ajv) schema validation issues
 */
function schemaFieldErrors(
  issues: SchemaValidationIssue[],
  context: ValidationContext | undefined,
  request: FastifyRequest
): FieldError[] {
  const part = requestPart(request, context);

  return issues.map((issue) => {
    const path = issue.instancePath.split('/').filter(Boolean);
    const missingProperty = issue.params.missingProperty;
    if (issue.keyword === 'required' && typeof missingProperty === 'string') {
      path.push(missingProperty);
    }
    return fieldError(
      path.join('.'),
      issue.message ?? 'is invalid',
      valueAtPath(part, path)
    );
  });
}

function hasSchemaValidation(error: Error): error is Error & {
  validation: SchemaValidationIssue[];
  validationContext?: ValidationContext;
} {
  return 'validation' in error && Array.isArray(error.validation);
}

function frameworkClientStatus(error: Error): number | undefined {
  if (!('statusCode' in error)) {
    return undefined;
  }
  const statusCode = error.statusCode;
  if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500) {
    return statusCode;
  }
  return undefined;
}

/**
 * Map an error to its default HTTP status and response body
 */
export function mapError(
  error: Error,
  request: FastifyRequest,
  exposeInternalMessages: boolean
): ErrorMapping {
  if (error instanceof InvalidRequestError) {
    return {
      statusCode: 400,
      body: buildApiErrorResponse(ApiErrorType.INVALID_REQUEST, error.message),
    };
  }

  if (error instanceof ResourceNotFoundError) {
    return { statusCode: 404, body: buildApiErrorResponse(ApiErrorType.NOT_FOUND, error.message) };
  }

  if (error instanceof BusinessError) {
    return {
      statusCode: 422,
      body: buildApiErrorResponse(ApiErrorType.APPLICATION_ERROR, error.message, error.code),
    };
  }

  if (error instanceof ClientError || error instanceof ServiceUnavailableError) {
    return {
      statusCode: 503,
      body: buildApiErrorResponse(ApiErrorType.SERVICE_UNAVAILABLE, error.message),
    };
  }

  if (error instanceof ZodError) {
    const fieldErrors = zodFieldErrors(error, request);
    return {
      statusCode: 400,
      body: buildApiErrorResponse(
        ApiErrorType.VALIDATION_ERROR,
        validationMessage(fieldErrors.length),
        undefined,
        fieldErrors
      ),
    };
  }

  if (hasSchemaValidation(error)) {
    const fieldErrors = schemaFieldErrors(error.validation, error.validationContext, request);
    return {
      statusCode: 400,
      body: buildApiErrorResponse(
        ApiErrorType.VALIDATION_ERROR,
        validationMessage(fieldErrors.length),
        undefined,
        fieldErrors
      ),
    };
  }

  const clientStatus = frameworkClientStatus(error);
  if (clientStatus !== undefined) {
    return {
      statusCode: clientStatus,
      body: buildApiErrorResponse(ApiErrorType.INVALID_REQUEST, error.message),
    };
  }

  return {
    statusCode: 500,
    body: buildApiErrorResponse(
      ApiErrorType.INTERNAL_ERROR,
      exposeInternalMessages ? error.message : INTERNAL_ERROR_MESSAGE
    ),
  };
}

/**
 * Build the Fastify error handler
 */
export function createApiExceptionHandler(options: ApiExceptionHandlerOptions = {}) {
  const logger = options.logger ?? defaultLogger;
  const mappers = options.mappers ?? [];
  const exposeInternalMessages =
    options.exposeInternalMessages ??
    (config.NODE_ENV === 'development' || config.NODE_ENV === 'test');

  return function apiExceptionHandler(
    error: FastifyError | Error,
    request: FastifyRequest,
    reply: FastifyReply
  ): void {
    let mapping: ErrorMapping | undefined;
    for (const mapper of mappers) {
      mapping = mapper(error, request);
      if (mapping) break;
    }
    mapping ??= mapError(error, request, exposeInternalMessages);

    const { type, code, fieldErrors } = mapping.body;
    const rootCause = getRootCause(error);
    const logContext = {
      type,
      code,
      exception: error.name,
      rootCause: rootCause instanceof Error ? rootCause.name : undefined,
      fieldCount: fieldErrors?.length,
      url: request.url,
      method: request.method,
      err: error,
    };

    logger.warn(logContext, `Handled exception type: ${type} message: ${error.message}`);

    void reply.status(mapping.statusCode).send(mapping.body);
  };
}

/**
 * Not found handler for undefined routes
 */
export function notFoundHandler(request: FastifyRequest, reply: FastifyReply): void {
  void reply
    .status(404)
    .send(
      buildApiErrorResponse(
        ApiErrorType.NOT_FOUND,
        `Route ${request.method} ${request.url.split('?')[0]} not found`
      )
    );
}

/**
 * Register the exception handler and the not-found handler
 */
export function registerApiExceptionHandler(
  fastify: FastifyInstance,
  options: ApiExceptionHandlerOptions = {}
): void {
  fastify.setErrorHandler(createApiExceptionHandler(options));
  fastify.setNotFoundHandler(notFoundHandler);
}
