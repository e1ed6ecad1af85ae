import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { FraudVerdict, Money } from '../../checkout/domain';
import { FAILURE_POLICY, type FailurePolicy } from '../shared/failure-policy';

@Injectable()
export class FraudDetectionService {
  private readonly amountThreshold: number;

  constructor(
    @Inject(FAILURE_POLICY)
    private readonly failurePolicy: FailurePolicy,
    configService: ConfigService,
  ) {
    this.amountThreshold = configService.get<number>('FRAUD_AMOUNT_THRESHOLD') ?? 5000;
  }

  // The threshold is compared against the raw amount, whatever its currency.
  check(input: { amount: Money }): FraudVerdict {
    if (input.amount.amount > this.amountThreshold) {
      return { flagged: true, reason: 'amount_over_threshold' };
    }

    if (this.failurePolicy.shouldFail('check')) {
      return { flagged: true, reason: 'risk_score' };
    }

    return { flagged: false };
  }
}
