import { getDatabase } from './db.js';
import { OPEN_ORDER_STATUSES, type OrderStatus } from '../types/order.js';

export interface OrderRow {
  order_id: string;
  user_id: string;
  user_email: string | null;
  status: OrderStatus;
  currency: string;
  total_cents: number;
  payment_reference: string | null;
  frozen: number;
  anomaly: string | null;
  version: number;
  created_at: string;
  updated_at: string;
}

export interface OrderItemRow {
  id: number;
  order_id: string;
  position: number;
  movie_id: string;
  title: string;
  quantity: number;
  unit_price_cents: number;
}

/**
 * Inserts the order in `draft` with its line items. Callers wrap this in a
 * transaction together with the cart clear.
 */
export function insertOrder(params: {
  orderId: string;
  userId: string;
  userEmail: string | null;
  currency: string;
  totalCents: number;
  items: Array<{ movieId: string; title: string; quantity: number; unitPriceCents: number }>;
}): void {
  const db = getDatabase();
  const now = new Date().toISOString();

  db.prepare(`
    INSERT INTO orders (
      order_id, user_id, user_email, status, currency, total_cents,
      payment_reference, frozen, anomaly, version, created_at, updated_at
    ) VALUES (?, ?, ?, 'draft', ?, ?, NULL, 0, NULL, 0, ?, ?)
  `).run(params.orderId, params.userId, params.userEmail, params.currency, params.totalCents, now, now);

  const insertItem = db.prepare(`
    INSERT INTO order_items (order_id, position, movie_id, title, quantity, unit_price_cents)
    VALUES (?, ?, ?, ?, ?, ?)
  `);
  params.items.forEach((item, index) => {
    insertItem.run(params.orderId, index, item.movieId, item.title, item.quantity, item.unitPriceCents);
  });
}

export function getOrder(orderId: string): OrderRow | null {
  const db = getDatabase();
  const row = db.prepare('SELECT * FROM orders WHERE order_id = ?').get(orderId) as OrderRow | undefined;
  return row || null;
}

export function getOrderItems(orderId: string): OrderItemRow[] {
  const db = getDatabase();
  return db.prepare('SELECT * FROM order_items WHERE order_id = ? ORDER BY position ASC').all(orderId) as OrderItemRow[];
}

/**
 * Compare-and-set on `version`. Returns false when another writer got there
 * first.
 */
export function transitionOrder(params: {
  orderId: string;
  expectedVersion: number;
  status: OrderStatus;
  paymentReference?: string;
}): boolean {
  const db = getDatabase();
  const now = new Date().toISOString();

  const result = db.prepare(`
    UPDATE orders
    SET status = ?,
        payment_reference = COALESCE(?, payment_reference),
        version = version + 1,
        updated_at = ?
    WHERE order_id = ? AND version = ?
  `).run(params.status, params.paymentReference ?? null, now, params.orderId, params.expectedVersion);

  return result.changes > 0;
}

export function freezeOrder(params: { orderId: string; expectedVersion: number; anomaly: string }): boolean {
  const db = getDatabase();
  const now = new Date().toISOString();

  const result = db.prepare(`
    UPDATE orders
    SET frozen = 1,
        anomaly = ?,
        version = version + 1,
        updated_at = ?
    WHERE order_id = ? AND version = ?
  `).run(params.anomaly, now, params.orderId, params.expectedVersion);

  return result.changes > 0;
}

export function getOrdersByUser(userId: string): OrderRow[] {
  const db = getDatabase();
  return db.prepare(`
    SELECT * FROM orders
    WHERE user_id = ?
    ORDER BY created_at DESC
    LIMIT 50
  `).all(userId) as OrderRow[];
}

export function listOrders(filters: {
  userId?: string;
  status?: OrderStatus;
  dateFrom?: string;
  dateTo?: string;
}): OrderRow[] {
  const db = getDatabase();
  const conditions: string[] = [];
  const values: string[] = [];

  if (filters.userId !== undefined) {
    conditions.push('user_id = ?');
    values.push(filters.userId);
  }
  if (filters.status !== undefined) {
    conditions.push('status = ?');
    values.push(filters.status);
  }
  if (filters.dateFrom !== undefined) {
    conditions.push('created_at >= ?');
    values.push(filters.dateFrom);
  }
  if (filters.dateTo !== undefined) {
    conditions.push('created_at <= ?');
    values.push(filters.dateTo);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  return db.prepare(`SELECT * FROM orders ${where} ORDER BY created_at DESC`).all(...values) as OrderRow[];
}

/**
 * Movies from `movieIds` that already sit in another open order of the user.
 */
export function findOpenOrderItems(userId: string, movieIds: string[]): Array<{ order_id: string; movie_id: string }> {
  if (movieIds.length === 0) {
    return [];
  }
  const db = getDatabase();
  const placeholders = (values: readonly string[]) => values.map(() => '?').join(', ');
  return db.prepare(`
    SELECT o.order_id, oi.movie_id
    FROM orders o
    JOIN order_items oi ON oi.order_id = o.order_id
    WHERE o.user_id = ?
      AND o.status IN (${placeholders(OPEN_ORDER_STATUSES)})
      AND oi.movie_id IN (${placeholders(movieIds)})
  `).all(userId, ...OPEN_ORDER_STATUSES, ...movieIds) as Array<{ order_id: string; movie_id: string }>;
}

export function userOwnsMovie(userId: string, movieId: string): boolean {
  const db = getDatabase();
  const row = db.prepare(`
    SELECT 1 FROM orders o
    JOIN order_items oi ON oi.order_id = o.order_id
    WHERE o.user_id = ? AND o.status = 'paid' AND oi.movie_id = ?
    LIMIT 1
  `).get(userId, movieId);
  return row !== undefined;
}

export function listStaleAwaitingOrders(updatedBefore: string): OrderRow[] {
  const db = getDatabase();
  return db.prepare(`
    SELECT * FROM orders
    WHERE status = 'awaiting_payment' AND frozen = 0 AND updated_at <= ?
    ORDER BY updated_at ASC
  `).all(updatedBefore) as OrderRow[];
}

export function listFrozenOrders(): OrderRow[] {
  const db = getDatabase();
  return db.prepare('SELECT * FROM orders WHERE frozen = 1 ORDER BY updated_at DESC').all() as OrderRow[];
}
