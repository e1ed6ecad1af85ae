import type { MetricsPort } from '@/modules/checkout/application/ports';
import { failure, success } from '@/modules/checkout/domain';
import { BackgroundTaskRunner } from '@/modules/checkout/infrastructure/background/background-task-runner';

function buildRunner() {
  const metrics: jest.Mocked<MetricsPort> = {
    incrementCheckout: jest.fn(),
    observeCheckoutLatency: jest.fn(),
    incrementStepCall: jest.fn(),
    observeStepLatency: jest.fn(),
    incrementBackgroundTask: jest.fn(),
  };

  return { runner: new BackgroundTaskRunner(metrics), metrics };
}

describe('BackgroundTaskRunner', () => {
  it('starts tasks immediately and waits for them on drain', async () => {
    const { runner, metrics } = buildRunner();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const task = jest.fn(async () => {
      await gate;
      return success({ accepted: true });
    });

    runner.enqueue('email_confirmation', task, { orderId: 'order-1' });

    expect(task).toHaveBeenCalledTimes(1);
    await Promise.resolve();
    expect(metrics.incrementBackgroundTask).not.toHaveBeenCalled();

    release();
    await runner.drain();

    expect(metrics.incrementBackgroundTask).toHaveBeenCalledWith({
      task: 'email_confirmation',
      outcome: 'succeeded',
    });
  });

  it('counts failed outcomes', async () => {
    const { runner, metrics } = buildRunner();

    runner.enqueue('accounting_event', async () => failure('timeout', 'accounting timed out'));
    await runner.drain();

    expect(metrics.incrementBackgroundTask).toHaveBeenCalledWith({
      task: 'accounting_event',
      outcome: 'failed',
    });
  });

  it('contains tasks that throw', async () => {
    const { runner, metrics } = buildRunner();

    runner.enqueue('cart_emptying', async () => {
      throw new Error('cart store offline');
    });
    await expect(runner.drain()).resolves.toBeUndefined();

    expect(metrics.incrementBackgroundTask).toHaveBeenCalledWith({
      task: 'cart_emptying',
      outcome: 'failed',
    });
  });

  it('drains pending tasks on application shutdown', async () => {
    const { runner, metrics } = buildRunner();
    const task = jest.fn(async () => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      return success({ reversalId: 'REV-1' });
    });

    runner.enqueue('payment_reversal', task);
    await runner.onApplicationShutdown();

    expect(metrics.incrementBackgroundTask).toHaveBeenCalledWith({
      task: 'payment_reversal',
      outcome: 'succeeded',
    });
  });
});
