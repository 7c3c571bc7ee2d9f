import type { FastifyInstance } from 'fastify';
import { createVerifyAuth, requireUser } from '../../auth/verifyAuth.js';

export async function ordersRoutes(fastify: FastifyInstance) {
  const orderService = fastify.orderService;

  fastify.addHook(
    'preHandler',
    createVerifyAuth({
      jwtSecret: fastify.authJwtSecret,
      cookieName: fastify.authCookieName,
    })
  );

  // POST /v1/orders: checkout of the current cart
  fastify.post('/', async (request, reply) => {
    const user = requireUser(request);
    const order = await orderService.checkout({ userId: user.userId, email: user.email });
    return reply.status(201).send(order);
  });

  // GET /v1/orders/my
  fastify.get('/my', async (request) => {
    const user = requireUser(request);
    return { orders: orderService.listUserOrders(user.userId) };
  });

  // GET /v1/orders/:orderId
  fastify.get<{ Params: { orderId: string } }>('/:orderId', async (request) => {
    const user = requireUser(request);
    const order = orderService.getOrder(request.params.orderId, user.userId);
    return {
      ...order,
      payments: orderService.getAttempts(order.orderId),
    };
  });

  // POST /v1/orders/:orderId/pay
  fastify.post<{ Params: { orderId: string } }>('/:orderId/pay', async (request, reply) => {
    const user = requireUser(request);
    const handle = await orderService.initiateCharge(request.params.orderId, user.userId);

    // 202: the provider did not answer in time, the client should poll the order
    return reply.status(handle.outcome === 'created' ? 201 : 202).send(handle);
  });

  // POST /v1/orders/:orderId/cancel
  fastify.post<{ Params: { orderId: string } }>('/:orderId/cancel', async (request) => {
    const user = requireUser(request);
    return orderService.cancelOrder(request.params.orderId, user.userId);
  });
}
