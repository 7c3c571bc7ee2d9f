import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { createVerifyAuth, requireUser } from '../../auth/verifyAuth.js';

const addItemSchema = z.object({
  itemId: z.string().min(1),
  quantity: z.number().int().min(1).optional(),
});

const setQuantitySchema = z.object({
  quantity: z.number().int().min(1),
});

export async function cartRoutes(fastify: FastifyInstance) {
  const cartService = fastify.cartService;

  fastify.addHook(
    'preHandler',
    createVerifyAuth({
      jwtSecret: fastify.authJwtSecret,
      cookieName: fastify.authCookieName,
    })
  );

  // GET /v1/cart
  fastify.get('/', async (request) => {
    const user = requireUser(request);
    return cartService.describe(user.userId);
  });

  // POST /v1/cart/items
  fastify.post<{ Body: unknown }>('/items', async (request, reply) => {
    const user = requireUser(request);

    const validationResult = addItemSchema.safeParse(request.body);
    if (!validationResult.success) {
      return reply.status(400).send({
        error: 'Validation failed',
        details: validationResult.error.errors,
      });
    }

    const { itemId, quantity } = validationResult.data;
    await cartService.addItem(user.userId, itemId, quantity);
    return reply.status(201).send(await cartService.describe(user.userId));
  });

  // PATCH /v1/cart/items/:itemId
  fastify.patch<{ Params: { itemId: string }; Body: unknown }>('/items/:itemId', async (request, reply) => {
    const user = requireUser(request);

    const validationResult = setQuantitySchema.safeParse(request.body);
    if (!validationResult.success) {
      return reply.status(400).send({
        error: 'Validation failed',
        details: validationResult.error.errors,
      });
    }

    await cartService.setQuantity(user.userId, request.params.itemId, validationResult.data.quantity);
    return cartService.describe(user.userId);
  });

  // DELETE /v1/cart/items/:itemId
  fastify.delete<{ Params: { itemId: string } }>('/items/:itemId', async (request) => {
    const user = requireUser(request);
    await cartService.removeItem(user.userId, request.params.itemId);
    return cartService.describe(user.userId);
  });

  // DELETE /v1/cart
  fastify.delete('/', async (request, reply) => {
    const user = requireUser(request);
    await cartService.clear(user.userId);
    return reply.status(204).send();
  });
}
