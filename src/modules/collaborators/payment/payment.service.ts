import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import type { Money } from '../../checkout/domain';
import { FAILURE_POLICY, type FailurePolicy } from '../shared/failure-policy';

export const DECLINED_TEST_TOKEN = 'declined-card';

export class PaymentDeclinedError extends Error {
  constructor(public readonly orderId: string) {
    super(`Payment declined for order ${orderId}`);
    this.name = 'PaymentDeclinedError';
  }
}

/** Oldest captures are forgotten first; reversing one of them is then a no-op. */
export const MAX_TRACKED_CHARGES = 10_000;

@Injectable()
export class PaymentService {
  // Unreversed transaction ids in capture order.
  private readonly openCharges = new Set<string>();

  constructor(
    @Inject(FAILURE_POLICY)
    private readonly failurePolicy: FailurePolicy,
  ) {}

  charge(input: { orderId: string; amount: Money; paymentToken: string }): { transactionId: string } {
    if (input.paymentToken === DECLINED_TEST_TOKEN || this.failurePolicy.shouldFail('charge')) {
      throw new PaymentDeclinedError(input.orderId);
    }

    const transactionId = `TXN-${randomUUID()}`;
    this.openCharges.add(transactionId);
    for (const oldest of this.openCharges) {
      if (this.openCharges.size <= MAX_TRACKED_CHARGES) {
        break;
      }
      this.openCharges.delete(oldest);
    }
    return { transactionId };
  }

  /** Reversals are always accepted; unknown transactions are recorded as no-ops. */
  reverse(input: { orderId: string; transactionId: string }): { reversalId: string; known: boolean } {
    const known = this.openCharges.delete(input.transactionId);

    return { reversalId: `REV-${randomUUID()}`, known };
  }
}
