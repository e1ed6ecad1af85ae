import { Injectable } from '@nestjs/common';
import type { OrderEventType } from '../../checkout/domain';

@Injectable()
export class AccountingService {
  private readonly counts = new Map<OrderEventType, number>();

  record(type: OrderEventType): void {
    this.counts.set(type, (this.counts.get(type) ?? 0) + 1);
  }

  summary(): Record<OrderEventType, number> {
    return {
      'order.completed': this.counts.get('order.completed') ?? 0,
      'order.rejected': this.counts.get('order.rejected') ?? 0,
      'order.payment_failed': this.counts.get('order.payment_failed') ?? 0,
    };
  }
}
