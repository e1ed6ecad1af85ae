import { Inject, Injectable, type OnApplicationShutdown } from '@nestjs/common';
import type {
  BackgroundTask,
  BackgroundTasksPort,
} from '../../application/ports/background-tasks.port';
import type { MetricsPort } from '../../application/ports/metrics.port';
import { METRICS_PORT } from '../../application/ports/tokens';
import type { BackgroundTaskName } from '../../domain';
import { createLogger } from '../../../../common/utils/logger';

/**
 * In-process runner for checkout follow-ups. Tasks start immediately; the
 * runner only keeps track of them so shutdown (and tests) can wait.
 */
@Injectable()
export class BackgroundTaskRunner implements BackgroundTasksPort, OnApplicationShutdown {
  private readonly logger = createLogger(BackgroundTaskRunner.name);
  private readonly pending = new Set<Promise<void>>();

  constructor(
    @Inject(METRICS_PORT)
    private readonly metricsPort: MetricsPort,
  ) {}

  enqueue(
    name: BackgroundTaskName,
    task: BackgroundTask,
    meta?: { orderId?: string; requestId?: string },
  ): void {
    const execution = this.execute(name, task, meta);
    this.pending.add(execution);
    void execution.finally(() => this.pending.delete(execution));
  }

  /** Resolves once every task enqueued so far, and any they enqueue, has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.pending.size > 0) {
      this.logger.info('draining_background_tasks', {
        event: 'draining_background_tasks',
        pending: this.pending.size,
      });
    }
    await this.drain();
  }

  private async execute(
    name: BackgroundTaskName,
    task: BackgroundTask,
    meta?: { orderId?: string; requestId?: string },
  ): Promise<void> {
    try {
      const outcome = await task();
      this.metricsPort.incrementBackgroundTask({
        task: name,
        outcome: outcome.ok ? 'succeeded' : 'failed',
      });

      if (!outcome.ok) {
        this.logger.warn('background_task_failed', {
          event: 'background_task_failed',
          task: name,
          reason: outcome.reason,
          errorMessage: outcome.message,
          ...meta,
        });
      }
    } catch (error: unknown) {
      this.metricsPort.incrementBackgroundTask({ task: name, outcome: 'failed' });
      this.logger.error(
        'background_task_crashed',
        error instanceof Error ? error : undefined,
        { event: 'background_task_crashed', task: name, ...meta },
      );
    }
  }
}
