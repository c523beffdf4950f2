import type { FastifyInstance } from 'fastify';
import type { HealthResponse } from '../schemas.js';

export function registerHealthRoute(app: FastifyInstance): void {
  app.get<{ Reply: HealthResponse }>('/health', async (_req, reply) => {
    return reply.send({ status: 'ok' });
  });
}
