export const JOB_TYPES = {
  orderPaid: 'order.paid',
  orderCancelled: 'order.cancelled',
  orderRefunded: 'order.refunded',
  paymentAnomaly: 'payment.anomaly',
} as const;

export type JobType = (typeof JOB_TYPES)[keyof typeof JOB_TYPES];

export interface OrderNotificationPayload {
  orderId: string;
  userId: string;
  email: string | null;
  totalAmount: number;
  currency: string;
  titles: string[];
}

export interface PaymentAnomalyPayload {
  orderId: string;
  attemptId: string;
  gatewayReference: string | null;
  reason: string;
}
