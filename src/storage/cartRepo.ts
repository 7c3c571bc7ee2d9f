import { getDatabase } from './db.js';

export interface CartItemRow {
  user_id: string;
  movie_id: string;
  quantity: number;
  added_at: string;
}

export function getCartItems(userId: string): CartItemRow[] {
  const db = getDatabase();
  return db.prepare(`
    SELECT * FROM cart_items
    WHERE user_id = ?
    ORDER BY added_at ASC, rowid ASC
  `).all(userId) as CartItemRow[];
}

/**
 * Adds the movie to the cart, or increases its quantity if it is already there.
 */
export function addCartItem(params: { userId: string; movieId: string; quantity: number }): void {
  const db = getDatabase();
  const now = new Date().toISOString();

  db.prepare(`
    INSERT INTO cart_items (user_id, movie_id, quantity, added_at)
    VALUES (?, ?, ?, ?)
    ON CONFLICT (user_id, movie_id) DO UPDATE SET quantity = quantity + excluded.quantity
  `).run(params.userId, params.movieId, params.quantity, now);
}

export function setCartItemQuantity(params: { userId: string; movieId: string; quantity: number }): boolean {
  const db = getDatabase();
  const result = db.prepare(`
    UPDATE cart_items SET quantity = ?
    WHERE user_id = ? AND movie_id = ?
  `).run(params.quantity, params.userId, params.movieId);
  return result.changes > 0;
}

export function removeCartItem(userId: string, movieId: string): boolean {
  const db = getDatabase();
  const result = db.prepare('DELETE FROM cart_items WHERE user_id = ? AND movie_id = ?').run(userId, movieId);
  return result.changes > 0;
}

export function clearCart(userId: string): number {
  const db = getDatabase();
  const result = db.prepare('DELETE FROM cart_items WHERE user_id = ?').run(userId);
  return result.changes;
}
