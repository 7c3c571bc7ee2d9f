import type { FastifyInstance } from 'fastify';
import { getDatabase } from '../storage/db.js';

export async function healthRoutes(fastify: FastifyInstance) {
  fastify.get('/health', async (request, reply) => {
    try {
      getDatabase().prepare('SELECT 1').get();
    } catch (error) {
      request.log.error({ err: error }, '[health] Database check failed');
      return reply.status(503).send({
        ok: false,
        ts: new Date().toISOString(),
      });
    }

    return {
      ok: true,
      ts: new Date().toISOString(),
    };
  });
}
