import { FastifyRequest, FastifyReply } from 'fastify';

export interface HealthCheckResponse {
  status: 'UP';
}

/**
 * Health check handler - liveness
 * Always public so load balancers can reach it without a token
 */
export async function healthCheckHandler(
  _request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  const response: HealthCheckResponse = { status: 'UP' };
  await reply.send(response);
}
