import Stripe from 'stripe';
import type { PaymentOutcome } from '../../types/order.js';
import { paymentIntentId } from './client.js';

export interface VerifyStripeEventParams {
  payload: string;
  signatureHeader: string | undefined;
  secret: string;
  toleranceSeconds: number;
}

export type VerifyStripeEventResult =
  | { valid: true; event: Stripe.Event }
  | { valid: false; reason: 'signature' | 'payload'; error: string };

/**
 * Checks the `Stripe-Signature` header against the raw body and parses the
 * event. Without an endpoint secret nothing is accepted.
 */
export function verifyStripeEvent(stripe: Stripe, params: VerifyStripeEventParams): VerifyStripeEventResult {
  const { payload, signatureHeader, secret, toleranceSeconds } = params;

  if (!secret) {
    return { valid: false, reason: 'signature', error: 'Webhook secret is not configured' };
  }
  if (!signatureHeader) {
    return { valid: false, reason: 'signature', error: 'Missing Stripe-Signature header' };
  }

  try {
    return { valid: true, event: stripe.webhooks.constructEvent(payload, signatureHeader, secret, toleranceSeconds) };
  } catch (error) {
    if (error instanceof Stripe.errors.StripeSignatureVerificationError) {
      return { valid: false, reason: 'signature', error: error.message };
    }
    if (error instanceof SyntaxError) {
      return { valid: false, reason: 'payload', error: error.message };
    }
    throw error;
  }
}

export type StripeNotification =
  | {
      kind: 'session';
      eventId: string;
      eventType: string;
      gatewayReference: string;
      outcome: PaymentOutcome;
      attemptId?: string;
      paymentIntent: string | null;
    }
  | {
      kind: 'refund';
      eventId: string;
      eventType: string;
      paymentIntent: string;
    }
  | {
      kind: 'ignored';
      eventId: string;
      eventType: string;
    };

const SESSION_OUTCOMES: Record<string, PaymentOutcome | undefined> = {
  'checkout.session.async_payment_succeeded': 'succeeded',
  'checkout.session.async_payment_failed': 'failed',
  'checkout.session.expired': 'failed',
};

function isCheckoutSession(value: unknown): value is Stripe.Checkout.Session {
  return typeof value === 'object' && value !== null && 'object' in value && value.object === 'checkout.session';
}

function isCharge(value: unknown): value is Stripe.Charge {
  return typeof value === 'object' && value !== null && 'object' in value && value.object === 'charge';
}

/**
 * Maps a verified Stripe event to what the order lifecycle cares about.
 */
export function toStripeNotification(event: Pick<Stripe.Event, 'id' | 'type' | 'data'>): StripeNotification {
  const { id: eventId, type: eventType } = event;
  const object: unknown = event.data.object;

  if ((eventType === 'checkout.session.completed' || SESSION_OUTCOMES[eventType]) && isCheckoutSession(object)) {
    let outcome = SESSION_OUTCOMES[eventType];
    if (!outcome) {
      // Delayed payment methods complete the session before the money arrives
      outcome = object.payment_status === 'unpaid' ? 'pending' : 'succeeded';
    }

    const attemptId = object.metadata?.attemptId ?? object.client_reference_id ?? undefined;
    return {
      kind: 'session',
      eventId,
      eventType,
      gatewayReference: object.id,
      outcome,
      ...(attemptId ? { attemptId } : {}),
      paymentIntent: paymentIntentId(object.payment_intent),
    };
  }

  if (eventType === 'charge.refunded' && isCharge(object)) {
    const paymentIntent = paymentIntentId(object.payment_intent);
    // Partial refunds leave the order paid
    if (paymentIntent && object.refunded) {
      return { kind: 'refund', eventId, eventType, paymentIntent };
    }
  }

  return { kind: 'ignored', eventId, eventType };
}
