import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { fromCents, type CheckoutItem, type Money } from '../../checkout/domain';
import { FAILURE_POLICY, type FailurePolicy } from '../shared/failure-policy';

export const SHIPPING_CURRENCY = 'USD';
export const SHIPPING_BASE_COST_CENTS = 599;
export const SHIPPING_PER_ITEM_COST_CENTS = 150;

export class ShipmentFailedError extends Error {
  constructor(orderId: string) {
    super(`Shipment could not be scheduled for order ${orderId}`);
    this.name = 'ShipmentFailedError';
  }
}

@Injectable()
export class ShippingService {
  constructor(
    @Inject(FAILURE_POLICY)
    private readonly failurePolicy: FailurePolicy,
  ) {}

  quote(items: readonly CheckoutItem[]): Money {
    const units = items.reduce((total, item) => total + item.quantity, 0);
    return fromCents(SHIPPING_CURRENCY, SHIPPING_BASE_COST_CENTS + units * SHIPPING_PER_ITEM_COST_CENTS);
  }

  ship(orderId: string): { trackingId: string } {
    if (this.failurePolicy.shouldFail('ship')) {
      throw new ShipmentFailedError(orderId);
    }

    return { trackingId: `TRK-${randomUUID()}` };
  }
}
