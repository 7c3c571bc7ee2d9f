import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { createRequireRole, createVerifyAuth } from '../../auth/verifyAuth.js';

const orderFiltersSchema = z.object({
  userId: z.string().min(1).optional(),
  status: z.enum(['draft', 'awaiting_payment', 'paid', 'payment_failed', 'cancelled', 'refunded']).optional(),
  dateFrom: z.coerce.date().optional(),
  dateTo: z.coerce.date().optional(),
});

const paymentFiltersSchema = z.object({
  userId: z.string().min(1).optional(),
  orderId: z.string().min(1).optional(),
  status: z.enum(['pending', 'succeeded', 'failed', 'refunded', 'duplicate']).optional(),
});

const movieSchema = z.object({
  title: z.string().min(1),
  price: z.number().int().min(0),
  currency: z.string().length(3),
  available: z.boolean().default(true),
});

export async function adminRoutes(fastify: FastifyInstance) {
  const orderService = fastify.orderService;
  const catalog = fastify.catalog;

  fastify.addHook(
    'preHandler',
    createVerifyAuth({
      jwtSecret: fastify.authJwtSecret,
      cookieName: fastify.authCookieName,
    })
  );

  const requireStaff = createRequireRole('moderator', 'admin');
  const requireAdmin = createRequireRole('admin');

  // GET /v1/admin/orders?userId=&status=&dateFrom=&dateTo=
  fastify.get<{ Querystring: unknown }>('/orders', { preHandler: requireStaff }, async (request, reply) => {
    const validationResult = orderFiltersSchema.safeParse(request.query);
    if (!validationResult.success) {
      return reply.status(400).send({
        error: 'Validation failed',
        details: validationResult.error.errors,
      });
    }

    return { orders: orderService.listOrders(validationResult.data) };
  });

  // GET /v1/admin/payments?userId=&orderId=&status=
  fastify.get<{ Querystring: unknown }>('/payments', { preHandler: requireStaff }, async (request, reply) => {
    const validationResult = paymentFiltersSchema.safeParse(request.query);
    if (!validationResult.success) {
      return reply.status(400).send({
        error: 'Validation failed',
        details: validationResult.error.errors,
      });
    }

    return { payments: orderService.listPayments(validationResult.data) };
  });

  // GET /v1/admin/anomalies: orders frozen after a double payment
  fastify.get('/anomalies', { preHandler: requireStaff }, async () => {
    return { orders: orderService.listAnomalies() };
  });

  // POST /v1/admin/orders/:orderId/reconcile
  fastify.post<{ Params: { orderId: string } }>(
    '/orders/:orderId/reconcile',
    { preHandler: requireStaff },
    async (request) => {
      const result = await orderService.reconcileStale(request.params.orderId, { force: true });
      request.log.info({ ...result, by: request.user?.userId }, '[admin] Manual reconciliation');
      return result;
    }
  );

  // POST /v1/admin/orders/:orderId/refund
  fastify.post<{ Params: { orderId: string } }>(
    '/orders/:orderId/refund',
    { preHandler: requireAdmin },
    async (request, reply) => {
      const refund = await orderService.requestRefund(request.params.orderId);
      request.log.info({ ...refund, by: request.user?.userId }, '[admin] Refund requested');
      return reply.status(202).send(refund);
    }
  );

  // GET /v1/admin/movies: the whole catalog, unavailable movies included
  fastify.get('/movies', { preHandler: requireStaff }, async () => {
    return { movies: await catalog.listItems({ includeUnavailable: true }) };
  });

  // PUT /v1/admin/movies/:movieId
  fastify.put<{ Params: { movieId: string }; Body: unknown }>(
    '/movies/:movieId',
    { preHandler: requireAdmin },
    async (request, reply) => {
      const validationResult = movieSchema.safeParse(request.body);
      if (!validationResult.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          details: validationResult.error.errors,
        });
      }

      const { title, price, currency, available } = validationResult.data;
      const movie = await catalog.upsertItem({
        itemId: request.params.movieId,
        title,
        price,
        currency: currency.toLowerCase(),
        available,
      });
      request.log.info({ movieId: movie.itemId, price, available, by: request.user?.userId }, '[admin] Movie saved');
      return movie;
    }
  );
}
