import type { FastifyInstance } from 'fastify';

export async function rootRoutes(fastify: FastifyInstance) {
  fastify.get('/', async () => {
    return {
      ok: true,
      service: 'cinema-orders-api',
    };
  });
}
