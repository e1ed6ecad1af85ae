import type { Money } from '../money';
import type { FailureReason } from '../step-outcome';

export type CheckoutStep =
  | 'catalog'
  | 'shipping_quote'
  | 'currency_conversion'
  | 'payment'
  | 'fraud_check'
  | 'shipment';

export type BackgroundTaskName =
  | 'payment_reversal'
  | 'email_confirmation'
  | 'accounting_event'
  | 'cart_emptying';

export type OrderStatus = 'Completed' | 'CompletedWithWarnings' | 'PaymentFailed' | 'Rejected';

export type OrderReason =
  | 'catalog_miss'
  | 'catalog_unavailable'
  | 'fraud_flagged'
  | FailureReason;

export interface OrderLine {
  productId: string;
  name: string;
  quantity: number;
  unitPrice: Money;
  lineTotal: Money;
}

export interface FraudVerdict {
  flagged: boolean;
  reason?: string;
}

export interface StepSummary {
  step: CheckoutStep;
  outcome: 'succeeded' | 'failed';
  reason?: FailureReason;
}

export interface Order {
  readonly orderId: string;
  readonly status: OrderStatus;
  readonly reason?: OrderReason;
  readonly items: readonly OrderLine[];
  readonly subtotal?: Money;
  readonly shippingCost?: Money;
  readonly total?: Money;
  readonly referenceTotal?: Money;
  readonly converted: boolean;
  readonly warnings: readonly string[];
  readonly transactionId?: string;
  readonly trackingId?: string;
  readonly deadlineExceeded: boolean;
  readonly steps: readonly StepSummary[];
  readonly createdAt: string;
}

export type OrderEventType = 'order.completed' | 'order.rejected' | 'order.payment_failed';

export function resolveOrderEventType(status: OrderStatus): OrderEventType {
  switch (status) {
    case 'Completed':
    case 'CompletedWithWarnings':
      return 'order.completed';
    case 'PaymentFailed':
      return 'order.payment_failed';
    case 'Rejected':
      return 'order.rejected';
  }
}

export function isCompletedStatus(status: OrderStatus): boolean {
  return status === 'Completed' || status === 'CompletedWithWarnings';
}
