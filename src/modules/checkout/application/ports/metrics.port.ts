import type { BackgroundTaskName, CheckoutStep, OrderStatus } from '../../domain';

export interface MetricsPort {
  incrementCheckout(input: { status: OrderStatus; reason?: string }): void;

  observeCheckoutLatency(input: { status: OrderStatus; seconds: number }): void;

  incrementStepCall(input: {
    step: CheckoutStep | BackgroundTaskName;
    outcome: 'succeeded' | 'failed';
    reason?: string;
  }): void;

  observeStepLatency(input: { step: CheckoutStep | BackgroundTaskName; seconds: number }): void;

  incrementBackgroundTask(input: {
    task: BackgroundTaskName;
    outcome: 'succeeded' | 'failed';
  }): void;
}
