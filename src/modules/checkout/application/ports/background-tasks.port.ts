import type { BackgroundTaskName, StepOutcome } from '../../domain';

export type BackgroundTask = () => Promise<StepOutcome<unknown>>;

/**
 * Fire-and-forget execution. Nothing flows back to the caller once a task
 * is enqueued; outcomes are only logged and counted.
 */
export interface BackgroundTasksPort {
  enqueue(name: BackgroundTaskName, task: BackgroundTask, meta?: { orderId?: string; requestId?: string }): void;
}
