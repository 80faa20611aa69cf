import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { randomUUID } from 'crypto';
import { RequestContext, type RequestContextData } from '../../shared/context/RequestContext.js';

/**
 * Correlation ID Header Name
 */
export const CORRELATION_ID_HEADER = 'x-correlation-id';

const CORRELATION_ID_PREFIX = 'req_';

/**
 * Extended FastifyRequest with correlation context
 */
declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
  }
}

const contexts = new WeakMap<FastifyRequest, RequestContextData>();

/**
 * Generate a short correlation ID: `req_` followed by 16 hex characters
 */
export function generateCorrelationId(): string {
  return CORRELATION_ID_PREFIX + randomUUID().replace(/-/g, '').slice(0, 16);
}

function readCorrelationHeader(request: FastifyRequest): string | undefined {
  const header = request.headers[CORRELATION_ID_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Register correlation ID middleware
 * - Reuses the inbound X-Correlation-ID or generates one
 * - Echoes it on the response
 * - Binds it to RequestContext for the whole request, where the logger mixin picks it up
 */
export function registerCorrelationId(fastify: FastifyInstance): void {
  fastify.decorateRequest('correlationId', '');

  fastify.addHook('onRequest', (request: FastifyRequest, reply: FastifyReply, done) => {
    const correlationId = readCorrelationHeader(request) ?? generateCorrelationId();
    const context: RequestContextData = { correlationId };

    request.correlationId = correlationId;
    contexts.set(request, context);

    void reply.header(CORRELATION_ID_HEADER, correlationId);

    RequestContext.run(context, () => {
      done();
    });
  });

  // Body parsing leaves the async context; restore it for handlers
  fastify.addHook('preHandler', (request: FastifyRequest, _reply: FastifyReply, done) => {
    const context = contexts.get(request) ?? { correlationId: request.correlationId };

    RequestContext.run(context, () => {
      done();
    });
  });
}

/**
 * Get correlation ID from request
 * Utility function for use in handlers
 */
export function getCorrelationId(request: FastifyRequest): string {
  return request.correlationId;
}

/**
 * Context bound to the request by the correlation hook, if any
 */
export function getRequestContext(request: FastifyRequest): RequestContextData | undefined {
  return contexts.get(request);
}
