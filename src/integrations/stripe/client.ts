import Stripe from 'stripe';
import { GatewayRejectedError, GatewayTimeoutError } from '../../errors.js';
import type {
  ChargeHandle,
  ChargeRequest,
  GatewayPaymentStatus,
  PaymentGateway,
  RefundResult,
} from '../payment-gateway.js';

export interface StripeSdkConfig {
  secretKey: string;
  timeoutMs: number;
  /** Replaces the SDK's Node HTTP transport, e.g. `Stripe.createFetchHttpClient(fetchFn)`. */
  httpClient?: Stripe.HttpClient;
}

export interface StripeClientConfig {
  successUrl: string;
  cancelUrl: string;
}

/**
 * SDK instance shared by the payment client and webhook verification.
 * Network retries are off: an unanswered request is reported as unknown and
 * left to reconciliation, which re-sends it with the same idempotency key.
 */
export function createStripe(config: StripeSdkConfig): Stripe {
  return new Stripe(config.secretKey, {
    timeout: config.timeoutMs,
    maxNetworkRetries: 0,
    telemetry: false,
    ...(config.httpClient ? { httpClient: config.httpClient } : {}),
  });
}

export function toPaymentStatus(
  session: Pick<Stripe.Checkout.Session, 'id' | 'status' | 'payment_status' | 'payment_intent'>
): GatewayPaymentStatus {
  const paid = session.payment_status === 'paid' || session.payment_status === 'no_payment_required';
  let outcome: GatewayPaymentStatus['outcome'] = 'pending';
  if (session.status === 'complete' && paid) {
    outcome = 'succeeded';
  } else if (session.status === 'expired') {
    outcome = 'failed';
  }

  return {
    gatewayReference: session.id,
    outcome,
    paymentIntent: paymentIntentId(session.payment_intent),
  };
}

export function paymentIntentId(value: string | Stripe.PaymentIntent | null | undefined): string | null {
  if (!value) {
    return null;
  }
  return typeof value === 'string' ? value : value.id;
}

/**
 * Stripe Checkout. Each attempt is one Checkout Session; its id is the
 * gateway reference.
 */
export class StripeClient implements PaymentGateway {
  private stripe: Stripe;
  private successUrl: string;
  private cancelUrl: string;

  constructor(stripe: Stripe, config: StripeClientConfig) {
    this.stripe = stripe;
    this.successUrl = config.successUrl;
    this.cancelUrl = config.cancelUrl;
  }

  async charge(request: ChargeRequest): Promise<ChargeHandle> {
    const session = await this.call('charge', () =>
      this.stripe.checkout.sessions.create(
        {
          mode: 'payment',
          success_url: this.successUrl,
          cancel_url: this.cancelUrl,
          client_reference_id: request.metadata.attemptId,
          line_items: [
            {
              quantity: 1,
              price_data: {
                currency: request.currency,
                unit_amount: request.amount,
                product_data: { name: request.description },
              },
            },
          ],
          metadata: request.metadata,
          payment_intent_data: { metadata: request.metadata },
        },
        { idempotencyKey: request.idempotencyKey }
      )
    );

    return {
      gatewayReference: session.id,
      paymentUrl: session.url ?? null,
    };
  }

  async retrieve(gatewayReference: string): Promise<GatewayPaymentStatus> {
    const session = await this.call('retrieve', () => this.stripe.checkout.sessions.retrieve(gatewayReference));
    return toPaymentStatus(session);
  }

  async voidCharge(gatewayReference: string): Promise<GatewayPaymentStatus> {
    try {
      const session = await this.call('expire', () => this.stripe.checkout.sessions.expire(gatewayReference));
      return toPaymentStatus(session);
    } catch (error) {
      // Stripe refuses to expire a session that is no longer open; ask what it is instead
      if (error instanceof GatewayRejectedError) {
        return this.retrieve(gatewayReference);
      }
      throw error;
    }
  }

  async refund(paymentIntent: string, idempotencyKey: string): Promise<RefundResult> {
    const refund = await this.call('refund', () =>
      this.stripe.refunds.create({ payment_intent: paymentIntent }, { idempotencyKey })
    );
    return { refundId: refund.id, status: refund.status ?? 'pending' };
  }

  private async call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (!(error instanceof Stripe.errors.StripeError)) {
        throw error;
      }

      const status = error.statusCode;
      const message = `Stripe ${operation} failed: ${error.message}`;

      // Lost connections, 409 (concurrent use of the key), 429 and 5xx say nothing about whether the charge exists
      if (
        error instanceof Stripe.errors.StripeConnectionError ||
        status === undefined ||
        status >= 500 ||
        status === 409 ||
        status === 429
      ) {
        throw new GatewayTimeoutError(message);
      }
      throw new GatewayRejectedError(message, status);
    }
  }
}
