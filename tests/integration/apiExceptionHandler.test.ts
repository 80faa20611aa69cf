import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { createServiceApp } from '../../src/app/server.js';
import { buildApiErrorResponse } from '../../src/shared/errors/ApiErrorResponse.js';
import {
  BusinessError,
  ClientError,
  HardDeleteNotAllowedError,
  InvalidRequestError,
  ResourceNotFoundError,
  ServiceError,
  ServiceUnavailableError,
} from '../../src/shared/errors/ServiceError.js';
import { createLogCapture, LEVEL } from '../helpers/logCapture.js';

class DuplicateBudgetError extends Error {}

const budgetSchema = z.object({
  name: z.string().min(1),
  limit: z.number().positive(),
});

function registerFailingRoutes(app: FastifyInstance): void {
  app.get('/invalid', async () => {
    throw new InvalidRequestError('Unsupported currency: XYZ');
  });
  app.get('/missing', async () => {
    throw new ResourceNotFoundError('Budget not found with id: 7');
  });
  app.get('/business', async () => {
    throw new BusinessError('Budget limit exceeded', 'BUDGET_LIMIT_EXCEEDED');
  });
  app.get('/client', async () => {
    throw new ClientError('Currency service call failed', { cause: new TypeError('fetch failed') });
  });
  app.get('/unavailable', async () => {
    throw new ServiceUnavailableError('Database unavailable');
  });
  app.get('/service', async () => {
    throw new ServiceError('Ledger out of balance');
  });
  app.get('/hard-delete', async () => {
    throw new HardDeleteNotAllowedError('Transaction');
  });
  app.get('/unexpected', async () => {
    throw new Error('Cannot read properties of undefined');
  });
  app.get('/duplicate', async () => {
    throw new DuplicateBudgetError('Budget "Groceries" already exists');
  });
  app.post('/zod', async (request) => budgetSchema.parse(request.body));
  app.post(
    '/schema',
    {
      schema: {
        body: {
          type: 'object',
          required: ['name', 'limit'],
          properties: {
            name: { type: 'string' },
            limit: { type: 'number' },
          },
        },
      },
    },
    async () => ({ ok: true })
  );
  app.get(
    '/query',
    {
      schema: {
        querystring: {
          type: 'object',
          properties: { page: { type: 'integer', minimum: 0 } },
        },
      },
    },
    async () => ({ ok: true })
  );
}

describe('API exception handler', () => {
  const capture = createLogCapture();
  let app: FastifyInstance;

  beforeAll(async () => {
    app = createServiceApp({
      logger: capture.logger,
      security: false,
      exceptionHandler: {
        mappers: [
          (error) =>
            error instanceof DuplicateBudgetError
              ? {
                  statusCode: 409,
                  body: buildApiErrorResponse('APPLICATION_ERROR', error.message, 'DUPLICATE_BUDGET'),
                }
              : undefined,
        ],
      },
    });
    registerFailingRoutes(app);
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('should map InvalidRequestError to 400 INVALID_REQUEST', async () => {
    const response = await app.inject({ method: 'GET', url: '/invalid' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ type: 'INVALID_REQUEST', message: 'Unsupported currency: XYZ' });
  });

  it('should map ResourceNotFoundError to 404 NOT_FOUND', async () => {
    const response = await app.inject({ method: 'GET', url: '/missing' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ type: 'NOT_FOUND', message: 'Budget not found with id: 7' });
  });

  it('should map BusinessError to 422 APPLICATION_ERROR with its code', async () => {
    const response = await app.inject({ method: 'GET', url: '/business' });

    expect(response.statusCode).toBe(422);
    expect(response.json()).toEqual({
      type: 'APPLICATION_ERROR',
      message: 'Budget limit exceeded',
      code: 'BUDGET_LIMIT_EXCEEDED',
    });
  });

  it('should map ClientError and ServiceUnavailableError to 503 SERVICE_UNAVAILABLE', async () => {
    const client = await app.inject({ method: 'GET', url: '/client' });
    const unavailable = await app.inject({ method: 'GET', url: '/unavailable' });

    expect(client.statusCode).toBe(503);
    expect(client.json()).toEqual({ type: 'SERVICE_UNAVAILABLE', message: 'Currency service call failed' });
    expect(unavailable.statusCode).toBe(503);
    expect(unavailable.json()).toEqual({ type: 'SERVICE_UNAVAILABLE', message: 'Database unavailable' });
  });

  it('should map ServiceError and unknown errors to 500 INTERNAL_ERROR', async () => {
    const service = await app.inject({ method: 'GET', url: '/service' });
    const hardDelete = await app.inject({ method: 'GET', url: '/hard-delete' });
    const unexpected = await app.inject({ method: 'GET', url: '/unexpected' });

    expect(service.statusCode).toBe(500);
    expect(service.json()).toEqual({ type: 'INTERNAL_ERROR', message: 'Ledger out of balance' });
    expect(hardDelete.json()).toEqual({
      type: 'INTERNAL_ERROR',
      message: 'Hard delete not allowed for Transaction. Use markDeleted() instead.',
    });
    expect(unexpected.statusCode).toBe(500);
    expect(unexpected.json()).toEqual({
      type: 'INTERNAL_ERROR',
      message: 'Cannot read properties of undefined',
    });
  });

  it('should report zod issues as field errors', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/zod',
      payload: { name: '', limit: -5 },
    });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.type).toBe('VALIDATION_ERROR');
    expect(body.message).toBe('Validation failed for 2 fields');
    expect(body.fieldErrors).toHaveLength(2);
    expect(body.fieldErrors[0]).toMatchObject({ field: 'name', rejectedValue: '' });
    expect(body.fieldErrors[1]).toMatchObject({ field: 'limit', rejectedValue: -5 });
  });

  it('should use the singular form for one invalid field', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/zod',
      payload: { name: 'Groceries', limit: 0 },
    });

    expect(response.json().message).toBe('Validation failed for 1 field');
  });

  it('should report schema validation failures with rejected values', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/schema',
      payload: { limit: 'lots' },
    });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.type).toBe('VALIDATION_ERROR');
    expect(body.message).toBe('Validation failed for 1 field');
    expect(body.fieldErrors[0].field).toBe('name');
    expect(body.fieldErrors[0].rejectedValue).toBeUndefined();
  });

  it('should resolve rejected values from the query string', async () => {
    const response = await app.inject({ method: 'GET', url: '/query?page=-1' });

    expect(response.statusCode).toBe(400);
    expect(response.json().fieldErrors).toEqual([
      { field: 'page', message: 'must be >= 0', rejectedValue: -1 },
    ]);
  });

  it('should keep the status of framework client errors', async () => {
    const badJson = await app.inject({
      method: 'POST',
      url: '/zod',
      headers: { 'content-type': 'application/json' },
      payload: '{"name":',
    });
    const badMediaType = await app.inject({
      method: 'POST',
      url: '/zod',
      headers: { 'content-type': 'text/xml' },
      payload: '<budget/>',
    });

    expect(badJson.statusCode).toBe(400);
    expect(badJson.json().type).toBe('INVALID_REQUEST');
    expect(badMediaType.statusCode).toBe(415);
    expect(badMediaType.json().type).toBe('INVALID_REQUEST');
  });

  it('should answer unknown routes with NOT_FOUND', async () => {
    const response = await app.inject({ method: 'GET', url: '/nowhere?x=1' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ type: 'NOT_FOUND', message: 'Route GET /nowhere not found' });
  });

  it('should consult custom mappers first', async () => {
    const response = await app.inject({ method: 'GET', url: '/duplicate' });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toEqual({
      type: 'APPLICATION_ERROR',
      message: 'Budget "Groceries" already exists',
      code: 'DUPLICATE_BUDGET',
    });
  });

  it('should log handled errors at warn with their type and root cause', async () => {
    await app.inject({ method: 'GET', url: '/client' });

    const line = capture.find('Handled exception type: SERVICE_UNAVAILABLE message: Currency service call failed');
    expect(line?.level).toBe(LEVEL.warn);
    expect(line?.exception).toBe('ClientError');
    expect(line?.rootCause).toBe('TypeError');
  });

  it('should log unexpected errors at warn like every handled error', async () => {
    await app.inject({ method: 'GET', url: '/unexpected' });

    const line = capture.find('Handled exception type: INTERNAL_ERROR message: Cannot read properties of undefined');
    expect(line?.level).toBe(LEVEL.warn);
    expect(line?.exception).toBe('Error');
    expect(capture.find('Unhandled exception: Cannot read properties of undefined')).toBeUndefined();
  });
});

describe('API exception handler without internal messages', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = createServiceApp({ security: false, exceptionHandler: { exposeInternalMessages: false } });
    app.get('/unexpected', async () => {
      throw new Error('connection refused: 10.0.0.5:3306');
    });
    app.get('/business', async () => {
      throw new BusinessError('Budget limit exceeded', 'BUDGET_LIMIT_EXCEEDED');
    });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('should hide the message of unexpected errors', async () => {
    const response = await app.inject({ method: 'GET', url: '/unexpected' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ type: 'INTERNAL_ERROR', message: 'An unexpected error occurred' });
  });

  it('should still expose messages of handled errors', async () => {
    const response = await app.inject({ method: 'GET', url: '/business' });

    expect(response.json().message).toBe('Budget limit exceeded');
  });
});
