import { pino } from 'pino';
import { closeDatabase, initDatabase } from '../src/storage/db.js';
import { upsertMovie } from '../src/storage/moviesRepo.js';
import { GatewayRejectedError, GatewayTimeoutError } from '../src/errors.js';
import type {
  ChargeHandle,
  ChargeRequest,
  GatewayPaymentStatus,
  PaymentGateway,
  RefundResult,
} from '../src/integrations/payment-gateway.js';
import type { Mailer, TemplateMail } from '../src/integrations/sendgrid/client.js';
import { MemoryCatalogStore } from '../src/store/memory-catalog-store.js';
import type { CatalogItem } from '../src/types/catalog.js';
import { CartService } from '../src/services/cartService.js';
import { OrderService, type OrderServiceConfig } from '../src/services/orderService.js';
import { KeyedMutex } from '../src/utils/keyedMutex.js';
import { type AppConfig, loadConfig } from '../src/config/env.js';

export const silentLogger = pino({ level: 'silent' });

export const TEST_JWT_SECRET = 'test-secret';
export const TEST_WEBHOOK_SECRET = 'whsec_test';

export const MOVIES: CatalogItem[] = [
  { itemId: 'movie-42', title: 'The Answer', price: 999, currency: 'usd', available: true },
  { itemId: 'movie-7', title: 'Seven Bridges', price: 499, currency: 'usd', available: true },
  { itemId: 'movie-99', title: 'Static Summer', price: 599, currency: 'usd', available: false },
];

export const ORDER_CONFIG: OrderServiceConfig = {
  maxPaymentAttempts: 5,
  stalePaymentTimeoutMs: 15 * 60 * 1000,
  reconcileBackoffMs: 60 * 1000,
  reconcileMaxBackoffMs: 60 * 60 * 1000,
};

export function setupDatabase(): void {
  closeDatabase();
  initDatabase(':memory:');
}

export function seedMovies(movies: CatalogItem[] = MOVIES): void {
  for (const movie of movies) {
    upsertMovie({
      movieId: movie.itemId,
      title: movie.title,
      priceCents: movie.price,
      currency: movie.currency,
      available: movie.available,
    });
  }
}

export function testConfig(overrides: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({
    DATABASE_PATH: ':memory:',
    AUTH_JWT_SECRET: TEST_JWT_SECRET,
    STRIPE_WEBHOOK_SECRET: TEST_WEBHOOK_SECRET,
    ...overrides,
  });
}

type Behavior = 'ok' | 'timeout' | 'reject';

/**
 * In-process stand-in for the payment provider. Like Stripe, a repeated
 * idempotency key returns the session created the first time.
 */
export class FakePaymentGateway implements PaymentGateway {
  chargeBehavior: Behavior = 'ok';
  retrieveBehavior: Behavior = 'ok';
  voidBehavior: Behavior = 'ok';
  /** When set, charge() waits for it before answering. */
  chargeGate: Promise<void> | null = null;

  readonly charges: ChargeRequest[] = [];
  readonly refunds: Array<{ paymentIntent: string; idempotencyKey: string }> = [];
  readonly sessions: Map<string, ChargeHandle> = new Map();
  readonly outcomes: Map<string, GatewayPaymentStatus['outcome']> = new Map();

  async charge(request: ChargeRequest): Promise<ChargeHandle> {
    this.charges.push(request);
    if (this.chargeGate) {
      await this.chargeGate;
    }
    this.fail(this.chargeBehavior);

    const existing = this.sessions.get(request.idempotencyKey);
    if (existing) {
      return existing;
    }

    const gatewayReference = `cs_test_${this.sessions.size + 1}`;
    const handle = { gatewayReference, paymentUrl: `https://checkout.test/${gatewayReference}` };
    this.sessions.set(request.idempotencyKey, handle);
    return handle;
  }

  async retrieve(gatewayReference: string): Promise<GatewayPaymentStatus> {
    this.fail(this.retrieveBehavior);
    return this.status(gatewayReference);
  }

  async voidCharge(gatewayReference: string): Promise<GatewayPaymentStatus> {
    this.fail(this.voidBehavior);
    if ((this.outcomes.get(gatewayReference) ?? 'pending') === 'pending') {
      this.outcomes.set(gatewayReference, 'failed');
    }
    return this.status(gatewayReference);
  }

  async refund(paymentIntent: string, idempotencyKey: string): Promise<RefundResult> {
    this.refunds.push({ paymentIntent, idempotencyKey });
    return { refundId: `re_test_${this.refunds.length}`, status: 'pending' };
  }

  private status(gatewayReference: string): GatewayPaymentStatus {
    const outcome = this.outcomes.get(gatewayReference) ?? 'pending';
    return {
      gatewayReference,
      outcome,
      paymentIntent: outcome === 'succeeded' ? `pi_${gatewayReference}` : null,
    };
  }

  private fail(behavior: Behavior): void {
    if (behavior === 'timeout') {
      throw new GatewayTimeoutError('Stripe did not answer in time');
    }
    if (behavior === 'reject') {
      throw new GatewayRejectedError('Your card was declined', 402);
    }
  }
}

export class RecordingMailer implements Mailer {
  readonly sent: TemplateMail[] = [];
  failWith: Error | null = null;

  async sendTemplate(mail: TemplateMail): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push(mail);
  }
}

export interface TestServices {
  catalog: MemoryCatalogStore;
  gateway: FakePaymentGateway;
  cartService: CartService;
  orderService: OrderService;
}

export function createServices(
  options: { config?: Partial<OrderServiceConfig>; now?: () => Date } = {}
): TestServices {
  const catalog = new MemoryCatalogStore(MOVIES);
  const gateway = new FakePaymentGateway();
  const cartLocks = new KeyedMutex();

  return {
    catalog,
    gateway,
    cartService: new CartService(catalog, cartLocks, silentLogger, 'usd'),
    orderService: new OrderService({
      catalog,
      gateway,
      cartLocks,
      log: silentLogger,
      config: { ...ORDER_CONFIG, ...options.config },
      now: options.now,
    }),
  };
}

/** Minutes from the real clock, for pretending time has passed. */
export function minutesFromNow(minutes: number): () => Date {
  return () => new Date(Date.now() + minutes * 60 * 1000);
}
