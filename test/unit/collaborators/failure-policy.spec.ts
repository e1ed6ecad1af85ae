import { FixedFailurePolicy, RandomFailurePolicy } from '@/modules/collaborators/shared/failure-policy';

describe('failure policies', () => {
  it('fails when the random draw lands under the rate', () => {
    expect(new RandomFailurePolicy(0.5, () => 0.4).shouldFail()).toBe(true);
    expect(new RandomFailurePolicy(0.5, () => 0.6).shouldFail()).toBe(false);
  });

  it('never fails with a zero rate', () => {
    expect(new RandomFailurePolicy(0, () => 0).shouldFail()).toBe(false);
  });

  it('fails only the listed operations', () => {
    const policy = new FixedFailurePolicy(new Set(['ship']));

    expect(policy.shouldFail('ship')).toBe(true);
    expect(policy.shouldFail('charge')).toBe(false);
    expect(new FixedFailurePolicy(true).shouldFail('charge')).toBe(true);
  });
});
