import type { FastifyInstance } from 'fastify';
import { rootRoutes } from './root.js';
import { healthRoutes } from './health.js';
import { v1Routes } from './v1/index.js';

export async function registerRoutes(fastify: FastifyInstance) {
  // Root and health stay outside the rate limit
  await fastify.register(rootRoutes);
  await fastify.register(healthRoutes);

  await fastify.register(v1Routes, { prefix: '/v1' });
}
