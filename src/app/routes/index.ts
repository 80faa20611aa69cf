import { FastifyInstance } from 'fastify';
import { healthCheckHandler } from './handlers.js';

/**
 * Register the routes every service exposes
 */
export function registerRoutes(fastify: FastifyInstance): void {
  // Health check endpoint (liveness)
  fastify.get('/health', {
    schema: {
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
          },
        },
      },
    },
    handler: healthCheckHandler,
  });
}
