import type { FastifyBaseLogger } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import type { CatalogStore } from '../store/catalog-store.js';
import type { CatalogItem } from '../types/catalog.js';
import type { ChargeRequest, GatewayPaymentStatus, PaymentGateway } from '../integrations/payment-gateway.js';
import type {
  CallbackResult,
  Order,
  OrderFilters,
  PaymentAttempt,
  PaymentAttemptStatus,
  PaymentCallback,
  PaymentHandle,
  PaymentOutcome,
  ReconcileResult,
} from '../types/order.js';
import { JOB_TYPES, type OrderNotificationPayload, type PaymentAnomalyPayload } from '../types/jobs.js';
import {
  CancellationNotAllowedError,
  ConcurrencyConflictError,
  DoublePaymentDetectedError,
  EmptyCartError,
  GatewayRejectedError,
  GatewayTimeoutError,
  InvalidTransitionError,
  ItemAlreadyOwnedError,
  ItemUnavailableError,
  NotFoundError,
  OrderAlreadyPendingError,
  OrderFrozenError,
  RetryBudgetExhaustedError,
  ValidationError,
} from '../errors.js';
import { KeyedMutex } from '../utils/keyedMutex.js';
import { cartLockKey } from './cartService.js';
import { runInTransaction } from '../storage/db.js';
import * as cartRepo from '../storage/cartRepo.js';
import * as ordersRepo from '../storage/ordersRepo.js';
import * as paymentsRepo from '../storage/paymentsRepo.js';
import * as jobsRepo from '../storage/jobsRepo.js';

export interface OrderServiceConfig {
  maxPaymentAttempts: number;
  stalePaymentTimeoutMs: number;
  reconcileBackoffMs: number;
  reconcileMaxBackoffMs: number;
}

export interface OrderServiceDeps {
  catalog: CatalogStore;
  gateway: PaymentGateway;
  /** Shared with CartService so checkout and cart edits never interleave. */
  cartLocks: KeyedMutex;
  log: FastifyBaseLogger;
  config: OrderServiceConfig;
  now?: () => Date;
}

export interface CheckoutUser {
  userId: string;
  email?: string | null;
}

export function toOrder(row: ordersRepo.OrderRow): Order {
  const items = ordersRepo.getOrderItems(row.order_id).map((item) => ({
    itemId: item.movie_id,
    title: item.title,
    quantity: item.quantity,
    unitPrice: item.unit_price_cents,
    lineTotal: item.unit_price_cents * item.quantity,
  }));

  return {
    orderId: row.order_id,
    userId: row.user_id,
    userEmail: row.user_email,
    status: row.status,
    currency: row.currency,
    totalAmount: row.total_cents,
    items,
    paymentReference: row.payment_reference,
    attemptsUsed: paymentsRepo.countAttempts(row.order_id),
    frozen: row.frozen === 1,
    anomaly: row.anomaly,
    version: row.version,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function toPaymentAttempt(row: paymentsRepo.PaymentAttemptRow): PaymentAttempt {
  return {
    attemptId: row.attempt_id,
    orderId: row.order_id,
    sequence: row.sequence,
    idempotencyKey: row.idempotency_key,
    gatewayReference: row.gateway_reference,
    paymentUrl: row.payment_url,
    paymentIntent: row.payment_intent,
    amount: row.amount_cents,
    currency: row.currency,
    status: row.status,
    reconcileAttempts: row.reconcile_attempts,
    nextCheckAt: row.next_check_at ? new Date(row.next_check_at) : null,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function sameCart(a: cartRepo.CartItemRow[], b: cartRepo.CartItemRow[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((item, index) => item.movie_id === b[index].movie_id && item.quantity === b[index].quantity);
}

/**
 * Order lifecycle: draft -> awaiting_payment -> paid | payment_failed | cancelled,
 * payment_failed -> awaiting_payment while attempts remain, paid -> refunded.
 *
 * Every operation on an order runs under that order's lock, and every status
 * write is a compare-and-set on the order version.
 */
export class OrderService {
  private catalog: CatalogStore;
  private gateway: PaymentGateway;
  private cartLocks: KeyedMutex;
  private orderLocks = new KeyedMutex();
  private log: FastifyBaseLogger;
  private config: OrderServiceConfig;
  private now: () => Date;

  constructor(deps: OrderServiceDeps) {
    this.catalog = deps.catalog;
    this.gateway = deps.gateway;
    this.cartLocks = deps.cartLocks;
    this.log = deps.log;
    this.config = deps.config;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Turns the user's cart into a draft order priced from the catalog. The
   * order insert and the cart clear commit together or not at all.
   */
  async checkout(user: CheckoutUser): Promise<Order> {
    const { userId } = user;

    return this.cartLocks.runExclusive<Order>(cartLockKey(userId), async () => {
      const snapshot = cartRepo.getCartItems(userId);
      if (snapshot.length === 0) {
        throw new EmptyCartError();
      }

      const lines: Array<{ movieId: string; title: string; quantity: number; unitPriceCents: number; currency: string }> = [];
      const unavailable: string[] = [];
      for (const row of snapshot) {
        const item = await this.findCatalogItem(row.movie_id);
        if (!item || !item.available) {
          unavailable.push(row.movie_id);
          continue;
        }
        lines.push({
          movieId: row.movie_id,
          title: item.title,
          quantity: row.quantity,
          unitPriceCents: item.price,
          currency: item.currency,
        });
      }

      if (unavailable.length > 0) {
        throw new ItemUnavailableError(unavailable);
      }

      const currencies = new Set(lines.map((line) => line.currency));
      if (currencies.size > 1) {
        throw new ValidationError('Cart contains movies priced in different currencies', {
          currencies: Array.from(currencies),
        });
      }

      const movieIds = lines.map((line) => line.movieId);
      // The movie may have been paid for in another order after it was put in the cart
      const owned = movieIds.find((movieId) => ordersRepo.userOwnsMovie(userId, movieId));
      if (owned !== undefined) {
        throw new ItemAlreadyOwnedError(owned);
      }

      const open = ordersRepo.findOpenOrderItems(userId, movieIds);
      if (open.length > 0) {
        throw new OrderAlreadyPendingError(
          open[0].order_id,
          open.map((entry) => entry.movie_id)
        );
      }

      const orderId = uuidv4();
      const totalCents = lines.reduce((sum, line) => sum + line.unitPriceCents * line.quantity, 0);

      runInTransaction(() => {
        // Another process may have touched the cart while prices were fetched
        if (!sameCart(snapshot, cartRepo.getCartItems(userId))) {
          throw new ConcurrencyConflictError('Cart changed during checkout, please try again');
        }
        ordersRepo.insertOrder({
          orderId,
          userId,
          userEmail: user.email ?? null,
          currency: lines[0].currency,
          totalCents,
          items: lines,
        });
        cartRepo.clearCart(userId);
      });

      this.log.info({ orderId, userId, totalCents, items: movieIds.length }, '[orders] Checkout created draft order');
      return this.getOrder(orderId);
    });
  }

  /**
   * Starts a payment attempt. The order is never marked paid here; only the
   * provider callback (or reconciliation) does that.
   */
  async initiateCharge(orderId: string, userId?: string): Promise<PaymentHandle> {
    return this.orderLocks.runExclusive<PaymentHandle>(orderId, async () => {
      const order = this.requireOrder(orderId, userId);

      if (order.frozen === 1) {
        throw new OrderFrozenError(orderId);
      }
      if (order.status === 'awaiting_payment') {
        throw new ConcurrencyConflictError(`A payment for order ${orderId} is already in progress`);
      }
      const used = paymentsRepo.countAttempts(orderId);
      const exhausted = used >= this.config.maxPaymentAttempts;
      // An order cancelled by its last failed attempt reports the budget, not the state
      if (exhausted && (order.status === 'payment_failed' || order.status === 'cancelled')) {
        throw new RetryBudgetExhaustedError(orderId, this.config.maxPaymentAttempts);
      }
      if (order.status !== 'draft' && order.status !== 'payment_failed') {
        throw new InvalidTransitionError(orderId, order.status, 'pay');
      }

      const attemptId = uuidv4();
      const sequence = used + 1;
      const idempotencyKey = `${orderId}:${sequence}`;

      runInTransaction(() => {
        if (!ordersRepo.transitionOrder({ orderId, expectedVersion: order.version, status: 'awaiting_payment' })) {
          throw new ConcurrencyConflictError(`Order ${orderId} was modified concurrently`);
        }
        paymentsRepo.createAttempt({
          attemptId,
          orderId,
          sequence,
          idempotencyKey,
          amountCents: order.total_cents,
          currency: order.currency,
        });
      });

      this.log.info({ orderId, attemptId, sequence }, '[orders] Payment attempt started');

      const unknownOutcome: PaymentHandle = {
        orderId,
        attemptId,
        sequence,
        status: 'awaiting_payment',
        outcome: 'unknown',
        gatewayReference: null,
        paymentUrl: null,
      };

      try {
        const handle = await this.gateway.charge(this.chargeRequest(order, attemptId, idempotencyKey));
        paymentsRepo.setGatewayReference({
          attemptId,
          gatewayReference: handle.gatewayReference,
          paymentUrl: handle.paymentUrl,
        });

        return {
          ...unknownOutcome,
          outcome: 'created',
          gatewayReference: handle.gatewayReference,
          paymentUrl: handle.paymentUrl,
        };
      } catch (error) {
        if (error instanceof GatewayRejectedError) {
          this.log.warn({ err: error, orderId, attemptId }, '[orders] Payment provider rejected the charge');
          runInTransaction(() => this.applyOutcome(this.requireAttempt(attemptId), 'failed', null));
          throw error;
        }

        // A timeout is not a decline: leave the attempt pending for reconciliation
        if (error instanceof GatewayTimeoutError) {
          this.log.warn({ err: error, orderId, attemptId }, '[orders] Charge outcome unknown, left for reconciliation');
        } else {
          this.log.error({ err: error, orderId, attemptId }, '[orders] Unexpected error while charging, left for reconciliation');
        }
        return unknownOutcome;
      }
    });
  }

  /**
   * Applies an asynchronous provider notification. Deliveries may be
   * duplicated or reordered; repeating one changes nothing.
   */
  async handlePaymentCallback(callback: PaymentCallback): Promise<CallbackResult> {
    let attempt = paymentsRepo.getAttemptByReference(callback.gatewayReference);
    if (!attempt && callback.attemptId) {
      attempt = paymentsRepo.getAttempt(callback.attemptId);
    }
    if (!attempt) {
      this.log.error(
        { gatewayReference: callback.gatewayReference, attemptId: callback.attemptId },
        '[orders] Payment attempt not found for callback (alert-level)'
      );
      return { status: 'not_found' };
    }

    const { attempt_id: attemptId, order_id: orderId } = attempt;

    return this.orderLocks.runExclusive<CallbackResult>(orderId, async () =>
      runInTransaction<CallbackResult>(() => {
        let current = this.requireAttempt(attemptId);

        if (
          callback.eventId &&
          !paymentsRepo.recordPaymentEvent({
            gatewayEventId: callback.eventId,
            gatewayReference: callback.gatewayReference,
            event: callback.outcome,
          })
        ) {
          this.log.info({ orderId, eventId: callback.eventId }, '[orders] Callback event already processed, skipping');
          return { status: 'duplicate', orderId, orderStatus: this.requireOrder(orderId).status };
        }

        if (!current.gateway_reference) {
          paymentsRepo.setGatewayReference({ attemptId, gatewayReference: callback.gatewayReference, paymentUrl: null });
          current = { ...current, gateway_reference: callback.gatewayReference };
        } else if (current.gateway_reference !== callback.gatewayReference) {
          this.log.warn(
            { orderId, attemptId, expected: current.gateway_reference, received: callback.gatewayReference },
            '[orders] Callback reference does not match the attempt, ignoring'
          );
          return { status: 'ignored', orderId, orderStatus: this.requireOrder(orderId).status };
        }

        return this.applyOutcome(current, callback.outcome, callback.paymentIntent ?? null);
      })
    );
  }

  /**
   * Asks the provider what happened to an order stuck in awaiting_payment.
   * An open session or an unreachable provider only schedules another look,
   * it never fails the order.
   */
  async reconcileStale(orderId: string, options: { force?: boolean } = {}): Promise<ReconcileResult> {
    return this.orderLocks.runExclusive<ReconcileResult>(orderId, async () => {
      const order = this.requireOrder(orderId);
      if (order.status !== 'awaiting_payment' || order.frozen === 1) {
        return { orderId, action: 'skipped', orderStatus: order.status };
      }

      const now = this.now();
      const staleBefore = now.getTime() - this.config.stalePaymentTimeoutMs;
      if (!options.force && new Date(order.updated_at).getTime() > staleBefore) {
        return { orderId, action: 'not_stale', orderStatus: order.status };
      }

      const attempt = paymentsRepo.getPendingAttempt(orderId);
      if (!attempt) {
        this.log.error({ orderId }, '[orders] Order awaits payment but has no pending attempt (alert-level)');
        return { orderId, action: 'unknown', orderStatus: order.status };
      }
      if (!options.force && attempt.next_check_at && new Date(attempt.next_check_at).getTime() > now.getTime()) {
        return { orderId, action: 'backoff', orderStatus: order.status };
      }

      try {
        let reference = attempt.gateway_reference;
        if (!reference) {
          // Same idempotency key: the provider hands back the original session
          const handle = await this.gateway.charge(this.chargeRequest(order, attempt.attempt_id, attempt.idempotency_key));
          paymentsRepo.setGatewayReference({
            attemptId: attempt.attempt_id,
            gatewayReference: handle.gatewayReference,
            paymentUrl: handle.paymentUrl,
          });
          reference = handle.gatewayReference;
        }

        const status = await this.gateway.retrieve(reference);
        if (status.outcome === 'pending') {
          this.scheduleNextCheck(attempt, now);
          return { orderId, action: 'pending', orderStatus: order.status };
        }

        const result = runInTransaction(() =>
          this.applyOutcome(this.requireAttempt(attempt.attempt_id), status.outcome, status.paymentIntent)
        );
        this.log.info({ orderId, outcome: status.outcome, orderStatus: result.orderStatus }, '[orders] Stale payment reconciled');
        return { orderId, action: 'resolved', orderStatus: result.orderStatus };
      } catch (error) {
        if (error instanceof GatewayRejectedError && !attempt.gateway_reference) {
          // The provider refused to create the session, so there is nothing to charge
          const result = runInTransaction(() => this.applyOutcome(this.requireAttempt(attempt.attempt_id), 'failed', null));
          return { orderId, action: 'resolved', orderStatus: result.orderStatus };
        }

        this.log.warn({ err: error, orderId, attemptId: attempt.attempt_id }, '[orders] Reconciliation could not get a payment status');
        this.scheduleNextCheck(attempt, now);
        return { orderId, action: 'unknown', orderStatus: order.status };
      }
    });
  }

  /**
   * Sweep over every order stuck in awaiting_payment. Errors for one order
   * are logged and do not stop the sweep.
   */
  async reconcileStaleOrders(): Promise<ReconcileResult[]> {
    const cutoff = new Date(this.now().getTime() - this.config.stalePaymentTimeoutMs).toISOString();
    const stale = ordersRepo.listStaleAwaitingOrders(cutoff);
    const results: ReconcileResult[] = [];

    for (const order of stale) {
      try {
        results.push(await this.reconcileStale(order.order_id));
      } catch (error) {
        this.log.error({ err: error, orderId: order.order_id }, '[orders] Failed to reconcile order');
      }
    }

    if (stale.length > 0) {
      this.log.info({ checked: stale.length, resolved: results.filter((r) => r.action === 'resolved').length }, '[orders] Reconciliation sweep finished');
    }
    return results;
  }

  /**
   * Cancels an order. Once a charge exists the provider must confirm that no
   * money was taken before the order is cancelled.
   */
  async cancelOrder(orderId: string, userId?: string): Promise<Order> {
    return this.orderLocks.runExclusive<Order>(orderId, async () => {
      const order = this.requireOrder(orderId, userId);
      if (order.frozen === 1) {
        throw new OrderFrozenError(orderId);
      }

      if (order.status === 'draft' || order.status === 'payment_failed') {
        if (!ordersRepo.transitionOrder({ orderId, expectedVersion: order.version, status: 'cancelled' })) {
          throw new ConcurrencyConflictError(`Order ${orderId} was modified concurrently`);
        }
        this.log.info({ orderId, from: order.status }, '[orders] Order cancelled');
        return this.getOrder(orderId);
      }

      if (order.status !== 'awaiting_payment') {
        throw new InvalidTransitionError(orderId, order.status, 'cancel');
      }

      const attempt = paymentsRepo.getPendingAttempt(orderId);
      if (!attempt || !attempt.gateway_reference) {
        throw new CancellationNotAllowedError(orderId, 'the payment outcome is not known yet');
      }

      let status: GatewayPaymentStatus;
      try {
        status = await this.gateway.voidCharge(attempt.gateway_reference);
      } catch (error) {
        if (error instanceof GatewayTimeoutError || error instanceof GatewayRejectedError) {
          this.log.warn({ err: error, orderId }, '[orders] Provider could not confirm the charge was voided');
          throw new CancellationNotAllowedError(orderId, 'the payment provider could not confirm that no charge was made');
        }
        throw error;
      }

      if (status.outcome === 'succeeded') {
        runInTransaction(() => this.applyOutcome(this.requireAttempt(attempt.attempt_id), 'succeeded', status.paymentIntent));
        throw new CancellationNotAllowedError(orderId, 'the order has already been paid');
      }
      if (status.outcome === 'pending') {
        throw new CancellationNotAllowedError(orderId, 'the payment is still in progress');
      }

      runInTransaction(() => {
        paymentsRepo.setAttemptStatus({ attemptId: attempt.attempt_id, status: 'failed' });
        const fresh = this.requireOrder(orderId);
        if (!ordersRepo.transitionOrder({ orderId, expectedVersion: fresh.version, status: 'cancelled' })) {
          throw new ConcurrencyConflictError(`Order ${orderId} was modified concurrently`);
        }
        this.enqueueCancelled(fresh);
      });

      this.log.info({ orderId, attemptId: attempt.attempt_id }, '[orders] Order cancelled after voiding the charge');
      return this.getOrder(orderId);
    });
  }

  /**
   * Asks the provider to refund a paid order. The status changes when the
   * refund notification arrives.
   */
  async requestRefund(orderId: string): Promise<{ orderId: string; refundId: string; status: string }> {
    return this.orderLocks.runExclusive(orderId, async () => {
      const order = this.requireOrder(orderId);
      if (order.frozen === 1) {
        throw new OrderFrozenError(orderId);
      }
      if (order.status !== 'paid') {
        throw new InvalidTransitionError(orderId, order.status, 'refund');
      }

      const attempt = paymentsRepo.getSucceededAttempt(orderId);
      if (!attempt || !attempt.payment_intent) {
        throw new ValidationError(`Order ${orderId} has no captured payment to refund`);
      }

      const refund = await this.gateway.refund(attempt.payment_intent, `refund:${orderId}`);
      this.log.info({ orderId, refundId: refund.refundId }, '[orders] Refund requested');
      return { orderId, refundId: refund.refundId, status: refund.status };
    });
  }

  getOrder(orderId: string, userId?: string): Order {
    return toOrder(this.requireOrder(orderId, userId));
  }

  listUserOrders(userId: string): Order[] {
    return ordersRepo.getOrdersByUser(userId).map(toOrder);
  }

  listOrders(filters: OrderFilters): Order[] {
    return ordersRepo
      .listOrders({
        userId: filters.userId,
        status: filters.status,
        dateFrom: filters.dateFrom?.toISOString(),
        dateTo: filters.dateTo?.toISOString(),
      })
      .map(toOrder);
  }

  listAnomalies(): Order[] {
    return ordersRepo.listFrozenOrders().map(toOrder);
  }

  listPayments(filters: { userId?: string; status?: PaymentAttemptStatus; orderId?: string }): PaymentAttempt[] {
    return paymentsRepo.listPayments(filters).map(toPaymentAttempt);
  }

  getAttempts(orderId: string): PaymentAttempt[] {
    return paymentsRepo.getAttemptsForOrder(orderId).map(toPaymentAttempt);
  }

  /** Refund notifications only carry the payment intent. */
  findAttemptByPaymentIntent(paymentIntent: string): PaymentAttempt | null {
    const row = paymentsRepo.getAttemptByPaymentIntent(paymentIntent);
    return row ? toPaymentAttempt(row) : null;
  }

  /** Must run inside a transaction. */
  private applyOutcome(
    attempt: paymentsRepo.PaymentAttemptRow,
    outcome: PaymentOutcome,
    paymentIntent: string | null
  ): CallbackResult {
    const order = this.requireOrder(attempt.order_id);

    switch (outcome) {
      case 'succeeded':
        return this.applySuccess(order, attempt, paymentIntent);
      case 'failed':
        return this.applyFailure(order, attempt);
      case 'refunded':
        return this.applyRefund(order, attempt);
      case 'pending':
        return { status: 'ignored', orderId: order.order_id, orderStatus: order.status };
    }
  }

  private applySuccess(
    order: ordersRepo.OrderRow,
    attempt: paymentsRepo.PaymentAttemptRow,
    paymentIntent: string | null
  ): CallbackResult {
    const orderId = order.order_id;

    if (attempt.status === 'succeeded' || attempt.status === 'duplicate' || attempt.status === 'refunded') {
      return { status: 'duplicate', orderId, orderStatus: order.status };
    }

    const succeeded = paymentsRepo.getSucceededAttempt(orderId);
    let anomaly: string | null = null;
    if (succeeded && succeeded.attempt_id !== attempt.attempt_id) {
      anomaly = `attempt ${succeeded.attempt_id} had already succeeded`;
    } else if (attempt.status === 'failed') {
      anomaly = 'payment succeeded after the attempt had been marked failed';
    } else if (order.frozen === 1) {
      anomaly = 'order is frozen pending manual review';
    } else if (order.status !== 'awaiting_payment') {
      anomaly = `order was ${order.status} when the payment succeeded`;
    }

    if (anomaly) {
      return this.flagDoublePayment(order, attempt, anomaly, paymentIntent);
    }

    paymentsRepo.setAttemptStatus({ attemptId: attempt.attempt_id, status: 'succeeded', paymentIntent });
    if (
      !ordersRepo.transitionOrder({
        orderId,
        expectedVersion: order.version,
        status: 'paid',
        paymentReference: attempt.gateway_reference ?? undefined,
      })
    ) {
      throw new ConcurrencyConflictError(`Order ${orderId} was modified concurrently`);
    }

    jobsRepo.enqueueJob({
      jobType: JOB_TYPES.orderPaid,
      payload: this.notificationPayload(order),
      dedupeKey: `${JOB_TYPES.orderPaid}:${orderId}`,
    });

    this.log.info({ orderId, attemptId: attempt.attempt_id }, '[orders] Order marked as paid');
    return { status: 'applied', orderId, orderStatus: 'paid' };
  }

  private applyFailure(order: ordersRepo.OrderRow, attempt: paymentsRepo.PaymentAttemptRow): CallbackResult {
    const orderId = order.order_id;

    if (attempt.status === 'failed' || attempt.status === 'duplicate') {
      return { status: 'duplicate', orderId, orderStatus: order.status };
    }
    if (attempt.status !== 'pending') {
      this.log.warn({ orderId, attemptId: attempt.attempt_id, attemptStatus: attempt.status }, '[orders] Failure for a settled attempt ignored');
      return { status: 'ignored', orderId, orderStatus: order.status };
    }

    paymentsRepo.setAttemptStatus({ attemptId: attempt.attempt_id, status: 'failed' });

    if (order.frozen === 1 || order.status !== 'awaiting_payment') {
      return { status: 'applied', orderId, orderStatus: order.status };
    }

    const used = paymentsRepo.countAttempts(orderId);
    const next = used >= this.config.maxPaymentAttempts ? 'cancelled' : 'payment_failed';
    if (!ordersRepo.transitionOrder({ orderId, expectedVersion: order.version, status: next })) {
      throw new ConcurrencyConflictError(`Order ${orderId} was modified concurrently`);
    }

    if (next === 'cancelled') {
      this.enqueueCancelled(order);
    }

    this.log.info({ orderId, attemptId: attempt.attempt_id, attemptsUsed: used, orderStatus: next }, '[orders] Payment attempt failed');
    return { status: 'applied', orderId, orderStatus: next };
  }

  private applyRefund(order: ordersRepo.OrderRow, attempt: paymentsRepo.PaymentAttemptRow): CallbackResult {
    const orderId = order.order_id;

    if (attempt.status === 'refunded') {
      return { status: 'duplicate', orderId, orderStatus: order.status };
    }
    if (attempt.status === 'duplicate') {
      // Manual resolution of a double payment: the extra charge went back
      paymentsRepo.setAttemptStatus({ attemptId: attempt.attempt_id, status: 'refunded' });
      this.log.info({ orderId, attemptId: attempt.attempt_id }, '[orders] Duplicate payment refunded');
      return { status: 'applied', orderId, orderStatus: order.status };
    }
    if (attempt.status !== 'succeeded') {
      this.log.warn({ orderId, attemptId: attempt.attempt_id, attemptStatus: attempt.status }, '[orders] Refund for an unpaid attempt ignored');
      return { status: 'ignored', orderId, orderStatus: order.status };
    }

    paymentsRepo.setAttemptStatus({ attemptId: attempt.attempt_id, status: 'refunded' });
    if (order.status !== 'paid') {
      return { status: 'applied', orderId, orderStatus: order.status };
    }

    if (!ordersRepo.transitionOrder({ orderId, expectedVersion: order.version, status: 'refunded' })) {
      throw new ConcurrencyConflictError(`Order ${orderId} was modified concurrently`);
    }
    jobsRepo.enqueueJob({
      jobType: JOB_TYPES.orderRefunded,
      payload: this.notificationPayload(order),
      dedupeKey: `${JOB_TYPES.orderRefunded}:${orderId}`,
    });

    this.log.info({ orderId, attemptId: attempt.attempt_id }, '[orders] Order refunded');
    return { status: 'applied', orderId, orderStatus: 'refunded' };
  }

  private flagDoublePayment(
    order: ordersRepo.OrderRow,
    attempt: paymentsRepo.PaymentAttemptRow,
    reason: string,
    paymentIntent: string | null
  ): CallbackResult {
    const orderId = order.order_id;

    paymentsRepo.setAttemptStatus({ attemptId: attempt.attempt_id, status: 'duplicate', paymentIntent });
    if (order.frozen !== 1 && !ordersRepo.freezeOrder({ orderId, expectedVersion: order.version, anomaly: reason })) {
      throw new ConcurrencyConflictError(`Order ${orderId} was modified concurrently`);
    }

    const payload: PaymentAnomalyPayload = {
      orderId,
      attemptId: attempt.attempt_id,
      gatewayReference: attempt.gateway_reference,
      reason,
    };
    jobsRepo.enqueueJob({
      jobType: JOB_TYPES.paymentAnomaly,
      payload,
      dedupeKey: `${JOB_TYPES.paymentAnomaly}:${attempt.attempt_id}`,
    });

    this.log.error(
      { err: new DoublePaymentDetectedError(orderId, attempt.attempt_id, reason), orderId, attemptId: attempt.attempt_id },
      '[orders] Double payment detected, order frozen for manual review'
    );
    return { status: 'double_payment_detected', orderId, orderStatus: order.status };
  }

  private scheduleNextCheck(attempt: paymentsRepo.PaymentAttemptRow, now: Date): void {
    const reconcileAttempts = attempt.reconcile_attempts + 1;
    const delay = Math.min(
      this.config.reconcileBackoffMs * 2 ** (reconcileAttempts - 1),
      this.config.reconcileMaxBackoffMs
    );
    paymentsRepo.scheduleReconcile({
      attemptId: attempt.attempt_id,
      reconcileAttempts,
      nextCheckAt: new Date(now.getTime() + delay).toISOString(),
    });
  }

  private chargeRequest(order: ordersRepo.OrderRow, attemptId: string, idempotencyKey: string): ChargeRequest {
    return {
      idempotencyKey,
      amount: order.total_cents,
      currency: order.currency,
      description: `Order ${order.order_id}`,
      metadata: { orderId: order.order_id, attemptId },
    };
  }

  private enqueueCancelled(order: ordersRepo.OrderRow): void {
    jobsRepo.enqueueJob({
      jobType: JOB_TYPES.orderCancelled,
      payload: this.notificationPayload(order),
      dedupeKey: `${JOB_TYPES.orderCancelled}:${order.order_id}`,
    });
  }

  private notificationPayload(order: ordersRepo.OrderRow): OrderNotificationPayload {
    return {
      orderId: order.order_id,
      userId: order.user_id,
      email: order.user_email,
      totalAmount: order.total_cents,
      currency: order.currency,
      titles: ordersRepo.getOrderItems(order.order_id).map((item) => item.title),
    };
  }

  private async findCatalogItem(itemId: string): Promise<CatalogItem | null> {
    try {
      return await this.catalog.getItem(itemId);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return null;
      }
      throw error;
    }
  }

  private requireOrder(orderId: string, userId?: string): ordersRepo.OrderRow {
    const order = ordersRepo.getOrder(orderId);
    // Someone else's order looks exactly like a missing one
    if (!order || (userId !== undefined && order.user_id !== userId)) {
      throw new NotFoundError(`Order ${orderId} not found`);
    }
    return order;
  }

  private requireAttempt(attemptId: string): paymentsRepo.PaymentAttemptRow {
    const attempt = paymentsRepo.getAttempt(attemptId);
    if (!attempt) {
      throw new NotFoundError(`Payment attempt ${attemptId} not found`);
    }
    return attempt;
  }
}
