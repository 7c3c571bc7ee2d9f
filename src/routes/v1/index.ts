import type { FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import { moviesRoutes } from './movies.js';
import { cartRoutes } from './cart.js';
import { ordersRoutes } from './orders.js';
import { paymentsRoutes } from './payments.js';
import { adminRoutes } from './admin.js';

export async function v1Routes(fastify: FastifyInstance) {
  await fastify.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
  });

  await fastify.register(moviesRoutes, { prefix: '/movies' });
  await fastify.register(cartRoutes, { prefix: '/cart' });
  await fastify.register(ordersRoutes, { prefix: '/orders' });
  await fastify.register(paymentsRoutes, { prefix: '/payments' });
  await fastify.register(adminRoutes, { prefix: '/admin' });
}
