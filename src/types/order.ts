export type OrderStatus =
  | 'draft'
  | 'awaiting_payment'
  | 'paid'
  | 'payment_failed'
  | 'cancelled'
  | 'refunded';

/** Orders still in one of these states may be paid or cancelled. */
export const OPEN_ORDER_STATUSES: readonly OrderStatus[] = ['draft', 'awaiting_payment', 'payment_failed'];

export interface OrderLine {
  itemId: string;
  title: string;
  quantity: number;
  /** Price per unit at checkout time, in minor units. */
  unitPrice: number;
  lineTotal: number;
}

export interface Order {
  orderId: string;
  userId: string;
  userEmail: string | null;
  status: OrderStatus;
  currency: string;
  totalAmount: number;
  items: OrderLine[];
  paymentReference: string | null;
  attemptsUsed: number;
  frozen: boolean;
  anomaly: string | null;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export type PaymentAttemptStatus = 'pending' | 'succeeded' | 'failed' | 'refunded' | 'duplicate';

export interface PaymentAttempt {
  attemptId: string;
  orderId: string;
  sequence: number;
  idempotencyKey: string;
  gatewayReference: string | null;
  paymentUrl: string | null;
  paymentIntent: string | null;
  amount: number;
  currency: string;
  status: PaymentAttemptStatus;
  reconcileAttempts: number;
  nextCheckAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type PaymentOutcome = 'succeeded' | 'failed' | 'pending' | 'refunded';

/** Inbound notification from the payment provider. */
export interface PaymentCallback {
  gatewayReference: string;
  outcome: PaymentOutcome;
  eventId?: string;
  /** Attempt id echoed back from the charge metadata. */
  attemptId?: string;
  paymentIntent?: string | null;
}

export type CallbackStatus = 'applied' | 'duplicate' | 'ignored' | 'not_found' | 'double_payment_detected';

export interface CallbackResult {
  status: CallbackStatus;
  orderId?: string;
  orderStatus?: OrderStatus;
}

export interface PaymentHandle {
  orderId: string;
  attemptId: string;
  sequence: number;
  status: OrderStatus;
  /** `unknown` when the provider did not answer in time. */
  outcome: 'created' | 'unknown';
  gatewayReference: string | null;
  paymentUrl: string | null;
}

export type ReconcileAction = 'skipped' | 'not_stale' | 'backoff' | 'resolved' | 'pending' | 'unknown';

export interface ReconcileResult {
  orderId: string;
  action: ReconcileAction;
  orderStatus?: OrderStatus;
}

export interface OrderFilters {
  userId?: string;
  status?: OrderStatus;
  dateFrom?: Date;
  dateTo?: Date;
}
