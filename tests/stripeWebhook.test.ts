import type Stripe from 'stripe';
import { describe, expect, it } from 'vitest';
import { createStripe } from '../src/integrations/stripe/client.js';
import { toStripeNotification, verifyStripeEvent } from '../src/integrations/stripe/webhook.js';

const secret = 'whsec_test';
const stripe = createStripe({ secretKey: 'test-secret', timeoutMs: 1000 });

function sign(payload: string, timestamp?: number): string {
  return stripe.webhooks.generateTestHeaderString({ payload, secret, ...(timestamp ? { timestamp } : {}) });
}

function verified(raw: Record<string, unknown>): Stripe.Event {
  const payload = JSON.stringify(raw);
  const result = verifyStripeEvent(stripe, { payload, signatureHeader: sign(payload), secret, toleranceSeconds: 300 });
  if (!result.valid) {
    throw new Error(result.error);
  }
  return result.event;
}

describe('verifyStripeEvent', () => {
  const payload = JSON.stringify({ id: 'evt_1', object: 'event', type: 'customer.created', data: { object: {} } });

  it('accepts a valid signature and parses the event', () => {
    const result = verifyStripeEvent(stripe, { payload, signatureHeader: sign(payload), secret, toleranceSeconds: 300 });

    expect(result.valid).toBe(true);
    expect(result.valid ? result.event.id : null).toBe('evt_1');
  });

  it('rejects everything when no secret is configured', () => {
    const header = `t=${Math.floor(Date.now() / 1000)},v1=${'0'.repeat(64)}`;

    expect(verifyStripeEvent(stripe, { payload, signatureHeader: header, secret: '', toleranceSeconds: 300 })).toEqual({
      valid: false,
      reason: 'signature',
      error: 'Webhook secret is not configured',
    });
  });

  it('rejects a missing header', () => {
    expect(verifyStripeEvent(stripe, { payload, signatureHeader: undefined, secret, toleranceSeconds: 300 })).toEqual({
      valid: false,
      reason: 'signature',
      error: 'Missing Stripe-Signature header',
    });
  });

  it('rejects a tampered payload', () => {
    const header = sign(payload);

    const result = verifyStripeEvent(stripe, {
      payload: payload.replace('evt_1', 'evt_2'),
      signatureHeader: header,
      secret,
      toleranceSeconds: 300,
    });

    expect(result).toMatchObject({ valid: false, reason: 'signature' });
  });

  it('rejects an old timestamp', () => {
    const header = sign(payload, Math.floor(Date.now() / 1000) - 600);

    const result = verifyStripeEvent(stripe, { payload, signatureHeader: header, secret, toleranceSeconds: 300 });

    expect(result).toMatchObject({ valid: false, reason: 'signature' });
  });

  it('reports a signed body that is not JSON', () => {
    const body = 'not json';

    const result = verifyStripeEvent(stripe, { payload: body, signatureHeader: sign(body), secret, toleranceSeconds: 300 });

    expect(result).toMatchObject({ valid: false, reason: 'payload' });
  });
});

describe('toStripeNotification', () => {
  function sessionEvent(type: string, object: Record<string, unknown>): Stripe.Event {
    return verified({
      id: 'evt_1',
      object: 'event',
      type,
      data: {
        object: {
          id: 'cs_test_1',
          object: 'checkout.session',
          status: 'complete',
          payment_status: 'paid',
          payment_intent: 'pi_1',
          client_reference_id: 'attempt-1',
          metadata: { orderId: 'order-1', attemptId: 'attempt-1' },
          ...object,
        },
      },
    });
  }

  function chargeEvent(object: Record<string, unknown>): Stripe.Event {
    return verified({
      id: 'evt_2',
      object: 'event',
      type: 'charge.refunded',
      data: { object: { id: 'ch_1', object: 'charge', payment_intent: 'pi_1', refunded: true, ...object } },
    });
  }

  it('maps a completed and paid session to success', () => {
    expect(toStripeNotification(sessionEvent('checkout.session.completed', {}))).toEqual({
      kind: 'session',
      eventId: 'evt_1',
      eventType: 'checkout.session.completed',
      gatewayReference: 'cs_test_1',
      outcome: 'succeeded',
      attemptId: 'attempt-1',
      paymentIntent: 'pi_1',
    });
  });

  it('keeps a completed but unpaid session pending', () => {
    const notification = toStripeNotification(
      sessionEvent('checkout.session.completed', { payment_status: 'unpaid', payment_intent: null })
    );

    expect(notification).toMatchObject({ kind: 'session', outcome: 'pending', paymentIntent: null });
  });

  it('maps async results and expiry', () => {
    const outcome = (type: string) => {
      const notification = toStripeNotification(sessionEvent(type, {}));
      return notification.kind === 'session' ? notification.outcome : null;
    };

    expect(outcome('checkout.session.async_payment_succeeded')).toBe('succeeded');
    expect(outcome('checkout.session.async_payment_failed')).toBe('failed');
    expect(outcome('checkout.session.expired')).toBe('failed');
  });

  it('falls back to client_reference_id for the attempt id', () => {
    const notification = toStripeNotification(sessionEvent('checkout.session.completed', { metadata: null }));

    expect(notification).toMatchObject({ kind: 'session', attemptId: 'attempt-1' });
  });

  it('maps charge.refunded to a refund of the payment intent', () => {
    expect(toStripeNotification(chargeEvent({}))).toEqual({
      kind: 'refund',
      eventId: 'evt_2',
      eventType: 'charge.refunded',
      paymentIntent: 'pi_1',
    });
  });

  it('ignores a partial refund and unrelated events', () => {
    expect(toStripeNotification(chargeEvent({ refunded: false })).kind).toBe('ignored');
    expect(
      toStripeNotification(verified({ id: 'evt_4', object: 'event', type: 'customer.created', data: { object: { id: 'cus_1', object: 'customer' } } }))
    ).toEqual({ kind: 'ignored', eventId: 'evt_4', eventType: 'customer.created' });
  });

  it('ignores a session event whose object is not a checkout session', () => {
    const event = verified({ id: 'evt_5', object: 'event', type: 'checkout.session.completed', data: { object: { id: 'x' } } });

    expect(toStripeNotification(event).kind).toBe('ignored');
  });
});
