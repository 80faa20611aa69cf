import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { createServiceApp } from '../../src/app/server.js';
import { registerOpenApi } from '../../src/app/plugins/openApi.js';
import { createLogCapture } from '../helpers/logCapture.js';

interface DocumentedResponse {
  description: string;
}

interface OpenApiDocument {
  info: { title: string; version: string };
  paths: Record<string, Record<string, { responses: Record<string, DocumentedResponse> }>>;
  components: { schemas: Record<string, { properties: Record<string, { type?: string }> }> };
}

function documentOf(app: FastifyInstance): OpenApiDocument {
  return JSON.parse(JSON.stringify(app.swagger()));
}

describe('OpenAPI documentation', () => {
  let app: FastifyInstance;
  let document: OpenApiDocument;

  beforeAll(async () => {
    app = Fastify();
    registerOpenApi(app, { title: 'Budget API', version: '1.4.0' });

    await app.register(async (instance) => {
      instance.get('/budgets', async () => []);
      instance.post('/budgets', async () => ({ id: 1 }));
      instance.get('/budgets/:id', async () => ({ id: 1 }));
      instance.put('/budgets/:id', async () => ({ id: 1 }));
      instance.delete('/budgets/:id', async () => null);
      instance.get(
        '/budgets/:id/summary',
        { schema: { response: { 404: { description: 'Budget has no summary', type: 'object' } } } },
        async () => ({})
      );
    });

    await app.ready();
    document = documentOf(app);
  });

  afterAll(async () => {
    await app.close();
  });

  it('should publish the service info', () => {
    expect(document.info).toMatchObject({ title: 'Budget API', version: '1.4.0' });
  });

  it('should register the shared error schemas', () => {
    expect(document.components.schemas.ApiErrorResponse.properties.message.type).toBe('string');
    expect(document.components.schemas.FieldError.properties.field.type).toBe('string');
  });

  it('should document 404 only on routes with path parameters', () => {
    const list = document.paths['/budgets'].get.responses;
    const single = document.paths['/budgets/{id}'].get.responses;

    expect(list).not.toHaveProperty('404');
    expect(list['500'].description).toBe('Internal Server Error');
    expect(list['503'].description).toBe('Service Unavailable');
    expect(single['404'].description).toBe('Not Found');
    expect(document.paths['/budgets/{id}'].delete.responses['404'].description).toBe('Not Found');
  });

  it('should document 400 on writes and 404 on updates', () => {
    const created = document.paths['/budgets'].post.responses;
    const updated = document.paths['/budgets/{id}'].put.responses;

    expect(created['400'].description).toBe('Bad Request');
    expect(created).not.toHaveProperty('404');
    expect(updated['400'].description).toBe('Bad Request');
    expect(updated['404'].description).toBe('Not Found');
  });

  it('should keep a response the route documents itself', () => {
    const responses = document.paths['/budgets/{id}/summary'].get.responses;

    expect(responses['404'].description).toBe('Budget has no summary');
    expect(responses['500'].description).toBe('Internal Server Error');
  });
});

describe('OpenAPI documentation on the service app', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = createServiceApp({
      logger: createLogCapture().logger,
      security: false,
      openApi: { title: 'Ledger API', version: '0.9.0' },
    });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('should document the health route with the standard errors', () => {
    const document = documentOf(app);

    expect(document.info.title).toBe('Ledger API');
    expect(document.paths['/health'].get.responses['503'].description).toBe('Service Unavailable');
  });

  it('should leave the document out when not configured', async () => {
    const plain = createServiceApp({ logger: createLogCapture().logger, security: false });
    await plain.ready();

    expect(plain.hasDecorator('swagger')).toBe(false);
    await plain.close();
  });
});
