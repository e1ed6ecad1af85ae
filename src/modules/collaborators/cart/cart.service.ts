import { Injectable } from '@nestjs/common';
import type { CheckoutItem } from '../../checkout/domain';

export interface Cart {
  userId: string;
  items: CheckoutItem[];
}

@Injectable()
export class CartService {
  private readonly carts = new Map<string, CheckoutItem[]>();

  get(userId: string): Cart {
    return { userId, items: (this.carts.get(userId) ?? []).map((item) => ({ ...item })) };
  }

  addItem(userId: string, item: CheckoutItem): Cart {
    const items = this.carts.get(userId) ?? [];
    const existing = items.find((entry) => entry.productId === item.productId);

    if (existing) {
      existing.quantity += item.quantity;
    } else {
      items.push({ productId: item.productId, quantity: item.quantity });
    }

    this.carts.set(userId, items);
    return this.get(userId);
  }

  empty(userId: string): void {
    this.carts.delete(userId);
  }
}
