import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { createVerifyAuth, requireUser } from '../../auth/verifyAuth.js';
import { toStripeNotification, verifyStripeEvent } from '../../integrations/stripe/webhook.js';

const myPaymentsQuerySchema = z.object({
  status: z.enum(['pending', 'succeeded', 'failed', 'refunded', 'duplicate']).optional(),
});

export async function paymentsRoutes(fastify: FastifyInstance) {
  const orderService = fastify.orderService;
  const stripe = fastify.stripe;
  const webhookSecret: string = fastify.stripeWebhookSecret;
  const toleranceSeconds: number = fastify.stripeWebhookToleranceSeconds;

  const verifyAuth = createVerifyAuth({
    jwtSecret: fastify.authJwtSecret,
    cookieName: fastify.authCookieName,
  });

  // The signature covers the exact bytes Stripe sent, so keep the body as a string here
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  // POST /v1/payments/webhook
  fastify.post<{ Body: string }>('/webhook', async (request, reply) => {
    const signatureHeader = request.headers['stripe-signature'];
    const payload = typeof request.body === 'string' ? request.body : '';

    const verifyResult = verifyStripeEvent(stripe, {
      payload,
      signatureHeader: Array.isArray(signatureHeader) ? signatureHeader[0] : signatureHeader,
      secret: webhookSecret,
      toleranceSeconds,
    });
    if (!verifyResult.valid) {
      if (verifyResult.reason === 'payload') {
        return reply.status(400).send({ error: 'Invalid JSON' });
      }
      request.log.warn({ error: verifyResult.error }, '[webhook] Stripe signature verification failed');
      return reply.status(400).send({
        error: 'Invalid signature',
        message: verifyResult.error,
      });
    }

    const notification = toStripeNotification(verifyResult.event);

    if (notification.kind === 'ignored') {
      request.log.info({ eventId: notification.eventId, eventType: notification.eventType }, '[webhook] Event ignored');
      return reply.status(200).send({ ok: true });
    }

    if (notification.kind === 'refund') {
      const attempt = orderService.findAttemptByPaymentIntent(notification.paymentIntent);
      if (!attempt || !attempt.gatewayReference) {
        request.log.error(
          { eventId: notification.eventId, paymentIntent: notification.paymentIntent },
          '[webhook] Payment attempt not found for refund (alert-level)'
        );
        // 200 so Stripe stops retrying an event we can never apply
        return reply.status(200).send({ ok: true });
      }

      const result = await orderService.handlePaymentCallback({
        gatewayReference: attempt.gatewayReference,
        outcome: 'refunded',
        eventId: notification.eventId,
        attemptId: attempt.attemptId,
      });
      request.log.info({ eventId: notification.eventId, ...result }, '[webhook] Refund notification processed');
      return reply.status(200).send({ ok: true, status: result.status });
    }

    const result = await orderService.handlePaymentCallback({
      gatewayReference: notification.gatewayReference,
      outcome: notification.outcome,
      eventId: notification.eventId,
      attemptId: notification.attemptId,
      paymentIntent: notification.paymentIntent,
    });
    request.log.info({ eventId: notification.eventId, eventType: notification.eventType, ...result }, '[webhook] Payment notification processed');
    return reply.status(200).send({ ok: true, status: result.status });
  });

  // GET /v1/payments/my?status=
  fastify.get<{ Querystring: unknown }>('/my', { preHandler: verifyAuth }, async (request, reply) => {
    const user = requireUser(request);

    const validationResult = myPaymentsQuerySchema.safeParse(request.query);
    if (!validationResult.success) {
      return reply.status(400).send({
        error: 'Validation failed',
        details: validationResult.error.errors,
      });
    }

    return {
      payments: orderService.listPayments({ userId: user.userId, status: validationResult.data.status }),
    };
  });
}
