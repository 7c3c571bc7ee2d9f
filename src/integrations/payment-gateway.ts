export interface ChargeRequest {
  /** Same key for retries of the same attempt, so a retry cannot charge twice. */
  idempotencyKey: string;
  amount: number;
  currency: string;
  description: string;
  metadata: Record<string, string>;
}

export interface ChargeHandle {
  gatewayReference: string;
  paymentUrl: string | null;
}

export interface GatewayPaymentStatus {
  gatewayReference: string;
  /** `pending` while the customer can still pay. */
  outcome: 'succeeded' | 'failed' | 'pending';
  paymentIntent: string | null;
}

export interface RefundResult {
  refundId: string;
  status: string;
}

/**
 * Payment provider as seen by the order lifecycle.
 *
 * Implementations throw GatewayRejectedError when the provider definitely
 * refused the request, and GatewayTimeoutError when the result is unknown.
 */
export interface PaymentGateway {
  charge(request: ChargeRequest): Promise<ChargeHandle>;
  retrieve(gatewayReference: string): Promise<GatewayPaymentStatus>;
  /** Makes the charge unpayable. Reports `succeeded` if it was already paid. */
  voidCharge(gatewayReference: string): Promise<GatewayPaymentStatus>;
  refund(paymentIntent: string, idempotencyKey: string): Promise<RefundResult>;
}
