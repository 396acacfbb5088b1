import type { FastifyInstance } from 'fastify';

/**
 * GET /health: liveness probe. Does not touch the database or the PMS.
 */
export async function healthRoutes(app: FastifyInstance): Promise<void> {
  app.get('/health', async (_request, reply) => {
    return reply.send({ ok: true, timestamp: new Date().toISOString() });
  });
}
