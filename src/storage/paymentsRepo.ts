import { getDatabase } from './db.js';
import type { PaymentAttemptStatus } from '../types/order.js';

export interface PaymentAttemptRow {
  attempt_id: string;
  order_id: string;
  sequence: number;
  idempotency_key: string;
  gateway_reference: string | null;
  payment_url: string | null;
  payment_intent: string | null;
  amount_cents: number;
  currency: string;
  status: PaymentAttemptStatus;
  reconcile_attempts: number;
  next_check_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface PaymentAttemptWithUserRow extends PaymentAttemptRow {
  user_id: string;
}

export function createAttempt(params: {
  attemptId: string;
  orderId: string;
  sequence: number;
  idempotencyKey: string;
  amountCents: number;
  currency: string;
}): void {
  const db = getDatabase();
  const now = new Date().toISOString();

  db.prepare(`
    INSERT INTO payment_attempts (
      attempt_id, order_id, sequence, idempotency_key,
      gateway_reference, payment_url, payment_intent,
      amount_cents, currency, status, reconcile_attempts, next_check_at,
      created_at, updated_at
    ) VALUES (?, ?, ?, ?, NULL, NULL, NULL, ?, ?, 'pending', 0, NULL, ?, ?)
  `).run(
    params.attemptId,
    params.orderId,
    params.sequence,
    params.idempotencyKey,
    params.amountCents,
    params.currency,
    now,
    now
  );
}

export function getAttempt(attemptId: string): PaymentAttemptRow | null {
  const db = getDatabase();
  const row = db.prepare('SELECT * FROM payment_attempts WHERE attempt_id = ?').get(attemptId) as
    | PaymentAttemptRow
    | undefined;
  return row || null;
}

export function getAttemptByReference(gatewayReference: string): PaymentAttemptRow | null {
  const db = getDatabase();
  const row = db.prepare('SELECT * FROM payment_attempts WHERE gateway_reference = ?').get(gatewayReference) as
    | PaymentAttemptRow
    | undefined;
  return row || null;
}

export function getAttemptByPaymentIntent(paymentIntent: string): PaymentAttemptRow | null {
  const db = getDatabase();
  const row = db.prepare('SELECT * FROM payment_attempts WHERE payment_intent = ?').get(paymentIntent) as
    | PaymentAttemptRow
    | undefined;
  return row || null;
}

export function getAttemptsForOrder(orderId: string): PaymentAttemptRow[] {
  const db = getDatabase();
  return db.prepare('SELECT * FROM payment_attempts WHERE order_id = ? ORDER BY sequence ASC').all(
    orderId
  ) as PaymentAttemptRow[];
}

export function countAttempts(orderId: string): number {
  const db = getDatabase();
  const row = db.prepare('SELECT COUNT(*) AS total FROM payment_attempts WHERE order_id = ?').get(orderId) as {
    total: number;
  };
  return row.total;
}

export function getPendingAttempt(orderId: string): PaymentAttemptRow | null {
  const db = getDatabase();
  const row = db.prepare(`
    SELECT * FROM payment_attempts
    WHERE order_id = ? AND status = 'pending'
    ORDER BY sequence DESC
    LIMIT 1
  `).get(orderId) as PaymentAttemptRow | undefined;
  return row || null;
}

export function getSucceededAttempt(orderId: string): PaymentAttemptRow | null {
  const db = getDatabase();
  const row = db.prepare(`
    SELECT * FROM payment_attempts
    WHERE order_id = ? AND status = 'succeeded'
    LIMIT 1
  `).get(orderId) as PaymentAttemptRow | undefined;
  return row || null;
}

/**
 * Stores the provider handle. Only fills empty fields so a late response
 * never overwrites a reference a callback already attached.
 */
export function setGatewayReference(params: {
  attemptId: string;
  gatewayReference: string;
  paymentUrl: string | null;
}): boolean {
  const db = getDatabase();
  const now = new Date().toISOString();

  const result = db.prepare(`
    UPDATE payment_attempts
    SET gateway_reference = COALESCE(gateway_reference, ?),
        payment_url = COALESCE(payment_url, ?),
        updated_at = ?
    WHERE attempt_id = ?
  `).run(params.gatewayReference, params.paymentUrl, now, params.attemptId);

  return result.changes > 0;
}

export function setAttemptStatus(params: {
  attemptId: string;
  status: PaymentAttemptStatus;
  paymentIntent?: string | null;
}): boolean {
  const db = getDatabase();
  const now = new Date().toISOString();

  const result = db.prepare(`
    UPDATE payment_attempts
    SET status = ?,
        payment_intent = COALESCE(?, payment_intent),
        updated_at = ?
    WHERE attempt_id = ?
  `).run(params.status, params.paymentIntent ?? null, now, params.attemptId);

  return result.changes > 0;
}

export function scheduleReconcile(params: { attemptId: string; reconcileAttempts: number; nextCheckAt: string }): void {
  const db = getDatabase();
  const now = new Date().toISOString();

  db.prepare(`
    UPDATE payment_attempts
    SET reconcile_attempts = ?,
        next_check_at = ?,
        updated_at = ?
    WHERE attempt_id = ?
  `).run(params.reconcileAttempts, params.nextCheckAt, now, params.attemptId);
}

export function listPayments(filters: {
  userId?: string;
  status?: PaymentAttemptStatus;
  orderId?: string;
}): PaymentAttemptWithUserRow[] {
  const db = getDatabase();
  const conditions: string[] = [];
  const values: string[] = [];

  if (filters.userId !== undefined) {
    conditions.push('o.user_id = ?');
    values.push(filters.userId);
  }
  if (filters.status !== undefined) {
    conditions.push('pa.status = ?');
    values.push(filters.status);
  }
  if (filters.orderId !== undefined) {
    conditions.push('pa.order_id = ?');
    values.push(filters.orderId);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  return db.prepare(`
    SELECT pa.*, o.user_id
    FROM payment_attempts pa
    JOIN orders o ON o.order_id = pa.order_id
    ${where}
    ORDER BY pa.created_at DESC
  `).all(...values) as PaymentAttemptWithUserRow[];
}

/**
 * Records a webhook delivery. Returns false if this event id was already
 * recorded.
 */
export function recordPaymentEvent(params: {
  gatewayEventId?: string;
  gatewayReference: string;
  event: string;
}): boolean {
  const db = getDatabase();
  const now = new Date().toISOString();

  try {
    db.prepare(`
      INSERT INTO payment_events (
        gateway_event_id, gateway_reference, event, created_at
      ) VALUES (?, ?, ?, ?)
    `).run(params.gatewayEventId || null, params.gatewayReference, params.event, now);
    return true;
  } catch (error: unknown) {
    if (error instanceof Error && error.message.includes('UNIQUE constraint')) {
      return false;
    }
    throw error;
  }
}
