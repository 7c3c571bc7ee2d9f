import type { FastifyBaseLogger } from 'fastify';
import type { CatalogStore } from '../store/catalog-store.js';
import type { CartItem, CartView } from '../types/cart.js';
import { ItemAlreadyOwnedError, ItemUnavailableError, NotFoundError, ValidationError } from '../errors.js';
import type { KeyedMutex } from '../utils/keyedMutex.js';
import * as cartRepo from '../storage/cartRepo.js';
import * as ordersRepo from '../storage/ordersRepo.js';

export function cartLockKey(userId: string): string {
  return `cart:${userId}`;
}

function assertQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new ValidationError('Quantity must be a positive integer', { quantity });
  }
}

function toCartItem(row: cartRepo.CartItemRow): CartItem {
  return {
    userId: row.user_id,
    itemId: row.movie_id,
    quantity: row.quantity,
    addedAt: new Date(row.added_at),
  };
}

export class CartService {
  constructor(
    private catalog: CatalogStore,
    private locks: KeyedMutex,
    private log: FastifyBaseLogger,
    private defaultCurrency: string
  ) {}

  async addItem(userId: string, itemId: string, quantity = 1): Promise<CartItem[]> {
    assertQuantity(quantity);

    return this.locks.runExclusive(cartLockKey(userId), async () => {
      const item = await this.catalog.getItem(itemId);
      if (!item.available) {
        throw new ItemUnavailableError([itemId]);
      }
      if (ordersRepo.userOwnsMovie(userId, itemId)) {
        throw new ItemAlreadyOwnedError(itemId);
      }

      cartRepo.addCartItem({ userId, movieId: itemId, quantity });
      this.log.info({ userId, itemId, quantity }, '[cart] Item added');
      return this.readSnapshot(userId);
    });
  }

  async removeItem(userId: string, itemId: string): Promise<CartItem[]> {
    return this.locks.runExclusive(cartLockKey(userId), async () => {
      if (!cartRepo.removeCartItem(userId, itemId)) {
        throw new NotFoundError(`Movie ${itemId} is not in your cart`);
      }
      return this.readSnapshot(userId);
    });
  }

  async setQuantity(userId: string, itemId: string, quantity: number): Promise<CartItem[]> {
    assertQuantity(quantity);

    return this.locks.runExclusive(cartLockKey(userId), async () => {
      if (!cartRepo.setCartItemQuantity({ userId, movieId: itemId, quantity })) {
        throw new NotFoundError(`Movie ${itemId} is not in your cart`);
      }
      return this.readSnapshot(userId);
    });
  }

  async snapshot(userId: string): Promise<CartItem[]> {
    return this.locks.runExclusive(cartLockKey(userId), async () => this.readSnapshot(userId));
  }

  async clear(userId: string): Promise<void> {
    await this.locks.runExclusive(cartLockKey(userId), async () => {
      const removed = cartRepo.clearCart(userId);
      this.log.info({ userId, removed }, '[cart] Cart cleared');
    });
  }

  /**
   * Cart with current catalog prices. Items that disappeared from the
   * catalog are shown as unavailable with a zero price.
   */
  async describe(userId: string): Promise<CartView> {
    const items = await this.snapshot(userId);

    const lines = await Promise.all(
      items.map(async (cartItem) => {
        try {
          const item = await this.catalog.getItem(cartItem.itemId);
          return {
            itemId: cartItem.itemId,
            title: item.title,
            quantity: cartItem.quantity,
            unitPrice: item.price,
            lineTotal: item.price * cartItem.quantity,
            available: item.available,
            currency: item.currency,
          };
        } catch (error) {
          if (!(error instanceof NotFoundError)) {
            throw error;
          }
          return {
            itemId: cartItem.itemId,
            title: '',
            quantity: cartItem.quantity,
            unitPrice: 0,
            lineTotal: 0,
            available: false,
            currency: this.defaultCurrency,
          };
        }
      })
    );

    return {
      userId,
      items: lines.map(({ currency: _currency, ...line }) => line),
      currency: lines.find((line) => line.available)?.currency ?? this.defaultCurrency,
      totalAmount: lines.filter((line) => line.available).reduce((sum, line) => sum + line.lineTotal, 0),
    };
  }

  private readSnapshot(userId: string): CartItem[] {
    return cartRepo.getCartItems(userId).map(toCartItem);
  }
}
