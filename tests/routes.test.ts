import * as crypto from 'crypto';
import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildApp } from '../src/app.js';
import { createToken, type UserRole } from '../src/auth/jwt.js';
import { createStripe } from '../src/integrations/stripe/client.js';
import { closeDatabase } from '../src/storage/db.js';
import { MemoryCatalogStore } from '../src/store/memory-catalog-store.js';
import {
  FakePaymentGateway,
  MOVIES,
  seedMovies,
  setupDatabase,
  testConfig,
  TEST_JWT_SECRET,
  TEST_WEBHOOK_SECRET,
} from './helpers.js';

function bearer(userId: string, role: UserRole = 'user'): { authorization: string } {
  const token = createToken({ userId, email: `${userId}@example.com`, role, secret: TEST_JWT_SECRET });
  return { authorization: `Bearer ${token}` };
}

const stripe = createStripe({ secretKey: 'test-secret', timeoutMs: 1000 });

function signedHeaders(payload: string): Record<string, string> {
  return {
    'content-type': 'application/json',
    'stripe-signature': stripe.webhooks.generateTestHeaderString({ payload, secret: TEST_WEBHOOK_SECRET }),
  };
}

function completedEvent(eventId: string, sessionId: string, attemptId: string): string {
  return JSON.stringify({
    id: eventId,
    object: 'event',
    type: 'checkout.session.completed',
    data: {
      object: {
        id: sessionId,
        object: 'checkout.session',
        status: 'complete',
        payment_status: 'paid',
        payment_intent: 'pi_1',
        client_reference_id: attemptId,
        metadata: { attemptId },
      },
    },
  });
}

describe('HTTP API', () => {
  let app: FastifyInstance;
  let gateway: FakePaymentGateway;

  beforeEach(async () => {
    setupDatabase();
    seedMovies();
    gateway = new FakePaymentGateway();
    app = await buildApp({ config: testConfig(), gateway, stripe, logger: false });
  });

  afterEach(async () => {
    await app.close();
    closeDatabase();
  });

  it('answers on / and /health without authentication', async () => {
    const root = await app.inject({ method: 'GET', url: '/' });
    expect(root.json()).toEqual({ ok: true, service: 'cinema-orders-api' });

    const health = await app.inject({ method: 'GET', url: '/health' });
    expect(health.statusCode).toBe(200);
    expect(health.json()).toMatchObject({ ok: true });
  });

  it('lists available movies publicly', async () => {
    const response = await app.inject({ method: 'GET', url: '/v1/movies' });

    expect(response.statusCode).toBe(200);
    expect(response.json<{ movies: Array<{ itemId: string }> }>().movies.map((movie) => movie.itemId)).toEqual([
      'movie-7',
      'movie-42',
    ]);
  });

  it('rejects requests without a token', async () => {
    const response = await app.inject({ method: 'GET', url: '/v1/cart' });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ error: 'UNAUTHORIZED', message: 'Authentication required' });
  });

  it('accepts the session cookie', async () => {
    const token = createToken({ userId: 'user-1', secret: TEST_JWT_SECRET });

    const response = await app.inject({ method: 'GET', url: '/v1/orders/my', cookies: { cinema_session: token } });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ orders: [] });
  });

  it('takes a movie from cart to a paid order', async () => {
    const headers = bearer('user-1');

    const added = await app.inject({ method: 'POST', url: '/v1/cart/items', headers, payload: { itemId: 'movie-42' } });
    expect(added.statusCode).toBe(201);
    expect(added.json()).toMatchObject({ totalAmount: 999, currency: 'usd' });

    const checkout = await app.inject({ method: 'POST', url: '/v1/orders', headers });
    expect(checkout.statusCode).toBe(201);
    const order = checkout.json<{ orderId: string; status: string; totalAmount: number; userEmail: string }>();
    expect(order).toMatchObject({ status: 'draft', totalAmount: 999, userEmail: 'user-1@example.com' });

    const pay = await app.inject({ method: 'POST', url: `/v1/orders/${order.orderId}/pay`, headers });
    expect(pay.statusCode).toBe(201);
    const handle = pay.json<{ attemptId: string; paymentUrl: string }>();
    expect(handle.paymentUrl).toBe('https://checkout.test/cs_test_1');

    const payload = completedEvent('evt_1', 'cs_test_1', handle.attemptId);
    const webhook = await app.inject({
      method: 'POST',
      url: '/v1/payments/webhook',
      headers: signedHeaders(payload),
      payload,
    });
    expect(webhook.statusCode).toBe(200);
    expect(webhook.json()).toEqual({ ok: true, status: 'applied' });

    const redelivered = await app.inject({
      method: 'POST',
      url: '/v1/payments/webhook',
      headers: signedHeaders(payload),
      payload,
    });
    expect(redelivered.json()).toEqual({ ok: true, status: 'duplicate' });

    const fetched = await app.inject({ method: 'GET', url: `/v1/orders/${order.orderId}`, headers });
    expect(fetched.json()).toMatchObject({ status: 'paid', paymentReference: 'cs_test_1', attemptsUsed: 1 });
    expect(fetched.json<{ payments: Array<{ status: string }> }>().payments.map((payment) => payment.status)).toEqual([
      'succeeded',
    ]);

    const payments = await app.inject({ method: 'GET', url: '/v1/payments/my', headers });
    expect(payments.json<{ payments: unknown[] }>().payments).toHaveLength(1);

    const succeeded = await app.inject({ method: 'GET', url: '/v1/payments/my?status=succeeded', headers });
    expect(succeeded.json<{ payments: Array<{ status: string }> }>().payments.map((payment) => payment.status)).toEqual([
      'succeeded',
    ]);
    const failed = await app.inject({ method: 'GET', url: '/v1/payments/my?status=failed', headers });
    expect(failed.json()).toEqual({ payments: [] });
    const badStatus = await app.inject({ method: 'GET', url: '/v1/payments/my?status=lost', headers });
    expect(badStatus.statusCode).toBe(400);
  });

  it('answers 202 when the charge outcome is unknown', async () => {
    const headers = bearer('user-1');
    gateway.chargeBehavior = 'timeout';
    await app.inject({ method: 'POST', url: '/v1/cart/items', headers, payload: { itemId: 'movie-42' } });
    const order = (await app.inject({ method: 'POST', url: '/v1/orders', headers })).json<{ orderId: string }>();

    const pay = await app.inject({ method: 'POST', url: `/v1/orders/${order.orderId}/pay`, headers });

    expect(pay.statusCode).toBe(202);
    expect(pay.json()).toMatchObject({ outcome: 'unknown', paymentUrl: null });
  });

  it('rejects a webhook with a bad signature', async () => {
    const payload = completedEvent('evt_1', 'cs_test_1', 'attempt-1');

    const response = await app.inject({
      method: 'POST',
      url: '/v1/payments/webhook',
      headers: { ...signedHeaders(payload), 'stripe-signature': 't=1,v1=00' },
      payload,
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'Invalid signature' });
  });

  it('rejects every webhook when no endpoint secret is configured', async () => {
    await app.close();
    app = await buildApp({ config: testConfig({ STRIPE_WEBHOOK_SECRET: '' }), gateway, stripe, logger: false });

    const headers = bearer('user-1');
    await app.inject({ method: 'POST', url: '/v1/cart/items', headers, payload: { itemId: 'movie-42' } });
    const order = (await app.inject({ method: 'POST', url: '/v1/orders', headers })).json<{ orderId: string }>();
    const handle = (await app.inject({ method: 'POST', url: `/v1/orders/${order.orderId}/pay`, headers })).json<{
      attemptId: string;
    }>();

    // Signed with the empty key an unconfigured endpoint would otherwise check against
    const payload = completedEvent('evt_1', 'cs_test_1', handle.attemptId);
    const timestamp = Math.floor(Date.now() / 1000);
    const signature = crypto.createHmac('sha256', '').update(`${timestamp}.${payload}`).digest('hex');
    const response = await app.inject({
      method: 'POST',
      url: '/v1/payments/webhook',
      headers: { 'content-type': 'application/json', 'stripe-signature': `t=${timestamp},v1=${signature}` },
      payload,
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Invalid signature', message: 'Webhook secret is not configured' });
    const fetched = await app.inject({ method: 'GET', url: `/v1/orders/${order.orderId}`, headers });
    expect(fetched.json()).toMatchObject({ status: 'awaiting_payment' });
  });

  it('acknowledges events it does not handle', async () => {
    const payload = JSON.stringify({ id: 'evt_9', object: 'event', type: 'customer.created', data: { object: { id: 'cus_1', object: 'customer' } } });

    const response = await app.inject({
      method: 'POST',
      url: '/v1/payments/webhook',
      headers: signedHeaders(payload),
      payload,
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ ok: true });
  });

  it('maps domain errors to status codes', async () => {
    const headers = bearer('user-1');

    const invalid = await app.inject({
      method: 'POST',
      url: '/v1/cart/items',
      headers,
      payload: { itemId: 'movie-42', quantity: 0 },
    });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json()).toMatchObject({ error: 'Validation failed' });

    const unavailable = await app.inject({ method: 'POST', url: '/v1/cart/items', headers, payload: { itemId: 'movie-99' } });
    expect(unavailable.statusCode).toBe(409);
    expect(unavailable.json()).toEqual({
      error: 'ITEM_UNAVAILABLE',
      message: 'Some movies are no longer available: movie-99',
      details: { itemIds: ['movie-99'] },
    });

    const empty = await app.inject({ method: 'POST', url: '/v1/orders', headers });
    expect(empty.statusCode).toBe(400);
    expect(empty.json()).toEqual({ error: 'EMPTY_CART', message: 'Cart is empty' });

    const missing = await app.inject({ method: 'GET', url: '/v1/movies/movie-404' });
    expect(missing.statusCode).toBe(404);
  });

  it('hides orders of other users', async () => {
    await app.inject({ method: 'POST', url: '/v1/cart/items', headers: bearer('user-1'), payload: { itemId: 'movie-42' } });
    const order = (await app.inject({ method: 'POST', url: '/v1/orders', headers: bearer('user-1') })).json<{
      orderId: string;
    }>();

    const response = await app.inject({ method: 'GET', url: `/v1/orders/${order.orderId}`, headers: bearer('user-2') });

    expect(response.statusCode).toBe(404);
  });

  it('keeps admin routes for staff', async () => {
    const forbidden = await app.inject({ method: 'GET', url: '/v1/admin/orders', headers: bearer('user-1') });
    expect(forbidden.statusCode).toBe(403);

    await app.inject({ method: 'POST', url: '/v1/cart/items', headers: bearer('user-1'), payload: { itemId: 'movie-42' } });
    await app.inject({ method: 'POST', url: '/v1/orders', headers: bearer('user-1') });

    const listed = await app.inject({ method: 'GET', url: '/v1/admin/orders?status=draft', headers: bearer('mod-1', 'moderator') });
    expect(listed.statusCode).toBe(200);
    expect(listed.json<{ orders: Array<{ userId: string }> }>().orders.map((order) => order.userId)).toEqual(['user-1']);

    const badFilter = await app.inject({ method: 'GET', url: '/v1/admin/orders?status=lost', headers: bearer('admin-1', 'admin') });
    expect(badFilter.statusCode).toBe(400);

    const refund = await app.inject({ method: 'POST', url: '/v1/admin/orders/order-1/refund', headers: bearer('mod-1', 'moderator') });
    expect(refund.statusCode).toBe(403);
  });

  it('lets admins add a movie to the catalog', async () => {
    const response = await app.inject({
      method: 'PUT',
      url: '/v1/admin/movies/movie-100',
      headers: bearer('admin-1', 'admin'),
      payload: { title: 'New Release', price: 1999, currency: 'USD' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ itemId: 'movie-100', title: 'New Release', price: 1999, currency: 'usd', available: true });
  });

  it('saves movies through the catalog the app was built with', async () => {
    await app.close();
    app = await buildApp({ config: testConfig(), gateway, stripe, catalog: new MemoryCatalogStore(MOVIES), logger: false });

    await app.inject({
      method: 'PUT',
      url: '/v1/admin/movies/movie-100',
      headers: bearer('admin-1', 'admin'),
      payload: { title: 'New Release', price: 1999, currency: 'usd', available: false },
    });

    const movie = await app.inject({ method: 'GET', url: '/v1/movies/movie-100' });
    expect(movie.statusCode).toBe(200);
    expect(movie.json()).toMatchObject({ itemId: 'movie-100', available: false });
  });

  it('shows staff the unavailable movies too', async () => {
    const response = await app.inject({ method: 'GET', url: '/v1/admin/movies', headers: bearer('mod-1', 'moderator') });

    expect(response.json<{ movies: Array<{ itemId: string }> }>().movies.map((movie) => movie.itemId)).toEqual([
      'movie-7',
      'movie-99',
      'movie-42',
    ]);
  });
});
