import type { FactoryProvider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/**
 * Decides whether a simulated collaborator operation should fail.
 * Injected per collaborator module so tests can pin the behaviour.
 */
export interface FailurePolicy {
  shouldFail(operation: string): boolean;
}

export const FAILURE_POLICY = Symbol('FAILURE_POLICY');

export class RandomFailurePolicy implements FailurePolicy {
  constructor(
    private readonly rate: number,
    private readonly random: () => number = Math.random,
  ) {}

  shouldFail(): boolean {
    return this.rate > 0 && this.random() < this.rate;
  }
}

export class FixedFailurePolicy implements FailurePolicy {
  constructor(private readonly failing: boolean | ReadonlySet<string>) {}

  shouldFail(operation: string): boolean {
    return typeof this.failing === 'boolean' ? this.failing : this.failing.has(operation);
  }
}

export function provideRandomFailurePolicy(rateKey: string): FactoryProvider<FailurePolicy> {
  return {
    provide: FAILURE_POLICY,
    inject: [ConfigService],
    useFactory: (configService: ConfigService) =>
      new RandomFailurePolicy(configService.get<number>(rateKey) ?? 0),
  };
}
