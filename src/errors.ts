/**
 * Application errors. The Fastify error handler turns these into
 * `{ error, message, details? }` with `statusCode`.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, statusCode: number, code: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown, code = 'VALIDATION_ERROR') {
    super(message, 400, code, details);
  }
}

export class EmptyCartError extends ValidationError {
  constructor() {
    super('Cart is empty', undefined, 'EMPTY_CART');
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Insufficient permissions') {
    super(message, 403, 'FORBIDDEN');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
  }
}

export class AvailabilityError extends AppError {
  constructor(message: string, details?: unknown, code = 'AVAILABILITY_ERROR') {
    super(message, 409, code, details);
  }
}

export class ItemUnavailableError extends AvailabilityError {
  readonly itemIds: string[];

  constructor(itemIds: string[]) {
    super(`Some movies are no longer available: ${itemIds.join(', ')}`, { itemIds }, 'ITEM_UNAVAILABLE');
    this.itemIds = itemIds;
  }
}

export class ItemAlreadyOwnedError extends AppError {
  constructor(itemId: string) {
    super(`Movie ${itemId} has already been purchased`, 409, 'ITEM_ALREADY_OWNED', { itemId });
  }
}

export class OrderAlreadyPendingError extends AppError {
  constructor(orderId: string, itemIds: string[]) {
    super('You already have an open order with some of these movies', 409, 'ORDER_ALREADY_PENDING', {
      orderId,
      itemIds,
    });
  }
}

export class ConcurrencyConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONCURRENCY_CONFLICT');
  }
}

export class InvalidTransitionError extends AppError {
  constructor(orderId: string, from: string, action: string) {
    super(`Cannot ${action} order ${orderId} in status ${from}`, 409, 'INVALID_TRANSITION', { orderId, status: from });
  }
}

export class RetryBudgetExhaustedError extends AppError {
  constructor(orderId: string, maxAttempts: number) {
    super(`Order ${orderId} has used all ${maxAttempts} payment attempts`, 409, 'RETRY_BUDGET_EXHAUSTED', { orderId });
  }
}

export class OrderFrozenError extends AppError {
  constructor(orderId: string) {
    super(`Order ${orderId} is frozen pending manual review`, 423, 'ORDER_FROZEN', { orderId });
  }
}

export class CancellationNotAllowedError extends AppError {
  constructor(orderId: string, reason: string) {
    super(`Order ${orderId} cannot be cancelled: ${reason}`, 409, 'CANCELLATION_NOT_ALLOWED', { orderId });
  }
}

/** The provider answered and refused the request; no charge exists. */
export class GatewayRejectedError extends AppError {
  readonly providerStatus: number;

  constructor(message: string, providerStatus: number) {
    super(message, 502, 'GATEWAY_REJECTED');
    this.providerStatus = providerStatus;
  }
}

/** No usable answer from the provider (timeout, network, 5xx). The outcome is unknown. */
export class GatewayTimeoutError extends AppError {
  constructor(message: string) {
    super(message, 504, 'GATEWAY_TIMEOUT');
  }
}

/** Two successful payments for one order. Logged and escalated, never auto-resolved. */
export class DoublePaymentDetectedError extends AppError {
  constructor(orderId: string, attemptId: string, reason: string) {
    super(`Double payment detected for order ${orderId} (attempt ${attemptId}): ${reason}`, 409, 'DOUBLE_PAYMENT_DETECTED', {
      orderId,
      attemptId,
    });
  }
}
