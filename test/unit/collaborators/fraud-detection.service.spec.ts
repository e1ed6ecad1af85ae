import { FraudDetectionService } from '@/modules/collaborators/fraud-detection/fraud-detection.service';
import { FixedFailurePolicy } from '@/modules/collaborators/shared/failure-policy';
import { createConfigStub } from '../../fixtures/checkout/checkout-fakes';

describe('FraudDetectionService', () => {
  const config = createConfigStub({ FRAUD_AMOUNT_THRESHOLD: 100 });

  it('flags amounts above the threshold', () => {
    const service = new FraudDetectionService(new FixedFailurePolicy(false), config);

    expect(service.check({ amount: { currencyCode: 'USD', amount: 100.01 } })).toEqual({
      flagged: true,
      reason: 'amount_over_threshold',
    });
  });

  it('passes amounts at the threshold', () => {
    const service = new FraudDetectionService(new FixedFailurePolicy(false), config);

    expect(service.check({ amount: { currencyCode: 'USD', amount: 100 } })).toEqual({ flagged: false });
  });

  it('flags a random share of orders as risky', () => {
    const service = new FraudDetectionService(new FixedFailurePolicy(new Set(['check'])), config);

    expect(service.check({ amount: { currencyCode: 'USD', amount: 5 } })).toEqual({
      flagged: true,
      reason: 'risk_score',
    });
  });
});
