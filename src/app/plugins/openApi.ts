/**
 * OpenAPI documentation
 *
 * Registers @fastify/swagger with the shared ApiErrorResponse and FieldError
 * schemas, and documents the standard error responses on every route:
 *
 * - POST                          400
 * - PUT / PATCH                   400, 404
 * - GET / DELETE with path params 404
 * - every method                  500, 503
 *
 * Responses a route declares itself take precedence. Only routes registered
 * after this plugin loads (inside plugins, or after `await`) are documented.
 */
import swagger from '@fastify/swagger';
import type { FastifyInstance, FastifySchema } from 'fastify';
import type { OpenAPIV3 } from 'openapi-types';
import config from '../../config/env.js';
import { ApiErrorType, buildApiErrorResponse } from '../../shared/errors/ApiErrorResponse.js';

export interface OpenApiOptions {
  /** Defaults to SERVICE_NAME */
  title?: string;
  /** Defaults to SERVICE_VERSION */
  version?: string;
  description?: string;
}

export const fieldErrorSchema: OpenAPIV3.SchemaObject = {
  type: 'object',
  required: ['field', 'message'],
  properties: {
    field: { type: 'string', description: 'Path of the invalid field' },
    message: { type: 'string' },
    rejectedValue: { description: 'Value that failed validation' },
  },
};

export const apiErrorResponseSchema: OpenAPIV3.SchemaObject = {
  type: 'object',
  required: ['type', 'message'],
  properties: {
    type: { type: 'string', enum: Object.values(ApiErrorType) },
    message: { type: 'string' },
    code: { type: 'string', description: 'Machine-readable code of an APPLICATION_ERROR' },
    fieldErrors: { type: 'array', items: fieldErrorSchema },
  },
};

const ERROR_RESPONSES: Record<number, { description: string; type: ApiErrorType }> = {
  400: { description: 'Bad Request', type: ApiErrorType.INVALID_REQUEST },
  404: { description: 'Not Found', type: ApiErrorType.NOT_FOUND },
  500: { description: 'Internal Server Error', type: ApiErrorType.INTERNAL_ERROR },
  503: { description: 'Service Unavailable', type: ApiErrorType.SERVICE_UNAVAILABLE },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function hasPathParameters(url: string): boolean {
  return /[:{]/.test(url);
}

/**
 * Error statuses documented for a route
 */
export function standardErrorStatuses(method: string, url: string): number[] {
  const statuses: number[] = [];

  switch (method.toUpperCase()) {
    case 'POST':
      statuses.push(400);
      break;
    case 'PUT':
    case 'PATCH':
      statuses.push(400, 404);
      break;
    case 'GET':
    case 'DELETE':
      // Listing endpoints do not answer 404
      if (hasPathParameters(url)) {
        statuses.push(404);
      }
      break;
  }

  statuses.push(500, 503);
  return statuses;
}

export function errorResponseSchema(status: number): Record<string, unknown> {
  const { description, type } = ERROR_RESPONSES[status] ?? ERROR_RESPONSES[500];
  return {
    ...apiErrorResponseSchema,
    description,
    example: buildApiErrorResponse(type, description),
  };
}

/**
 * Add the standard error responses a route does not declare itself
 */
export function withStandardErrorResponses(
  schema: FastifySchema | undefined,
  methods: string | string[],
  url: string
): FastifySchema {
  const declared = schema?.response;
  const response: Record<string, unknown> = {};

  for (const method of Array.isArray(methods) ? methods : [methods]) {
    for (const status of standardErrorStatuses(method, url)) {
      response[String(status)] = errorResponseSchema(status);
    }
  }

  return {
    ...schema,
    response: { ...response, ...(isRecord(declared) ? declared : {}) },
  };
}

/**
 * Register OpenAPI generation; the document is available from `fastify.swagger()`
 */
export function registerOpenApi(fastify: FastifyInstance, options: OpenApiOptions = {}): void {
  void fastify.register(swagger, {
    openapi: {
      info: {
        title: options.title ?? config.SERVICE_NAME,
        version: options.version ?? config.SERVICE_VERSION,
        description: options.description,
      },
      components: {
        schemas: {
          ApiErrorResponse: apiErrorResponseSchema,
          FieldError: fieldErrorSchema,
        },
      },
    },
    transform: ({ schema, url, route }) => ({
      schema: withStandardErrorResponses(schema, route.method, url),
      url,
    }),
  });
}
