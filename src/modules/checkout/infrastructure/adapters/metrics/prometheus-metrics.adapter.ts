import { Injectable } from '@nestjs/common';
import {
  CHECKOUT_LATENCY_BUCKETS,
  CHECKOUT_METRIC_BACKGROUND_TASKS_TOTAL,
  CHECKOUT_METRIC_LATENCY_SECONDS,
  CHECKOUT_METRIC_ORDERS_TOTAL,
  CHECKOUT_METRIC_STEP_CALLS_TOTAL,
  CHECKOUT_METRIC_STEP_LATENCY_SECONDS,
  STEP_LATENCY_BUCKETS,
} from '../../../../../common/metrics/constants';
import type { MetricsPort } from '../../../application/ports/metrics.port';
import type { BackgroundTaskName, CheckoutStep, OrderStatus } from '../../../domain';

interface Histogram {
  buckets: Map<string, number>;
  sum: Map<string, number>;
  count: Map<string, number>;
}

@Injectable()
export class PrometheusMetricsAdapter implements MetricsPort {
  private readonly orders = new Map<string, number>();
  private readonly stepCalls = new Map<string, number>();
  private readonly backgroundTasks = new Map<string, number>();

  private readonly checkoutLatency = createHistogram();
  private readonly stepLatency = createHistogram();

  incrementCheckout(input: { status: OrderStatus; reason?: string }): void {
    const key = `${sanitizeLabelValue(input.status)}|${sanitizeLabelValue(input.reason ?? 'none')}`;
    this.orders.set(key, (this.orders.get(key) ?? 0) + 1);
  }

  observeCheckoutLatency(input: { status: OrderStatus; seconds: number }): void {
    observe(this.checkoutLatency, sanitizeLabelValue(input.status), input.seconds, CHECKOUT_LATENCY_BUCKETS);
  }

  incrementStepCall(input: {
    step: CheckoutStep | BackgroundTaskName;
    outcome: 'succeeded' | 'failed';
    reason?: string;
  }): void {
    const key = `${sanitizeLabelValue(input.step)}|${input.outcome}|${sanitizeLabelValue(input.reason ?? 'none')}`;
    this.stepCalls.set(key, (this.stepCalls.get(key) ?? 0) + 1);
  }

  observeStepLatency(input: { step: CheckoutStep | BackgroundTaskName; seconds: number }): void {
    observe(this.stepLatency, sanitizeLabelValue(input.step), input.seconds, STEP_LATENCY_BUCKETS);
  }

  incrementBackgroundTask(input: { task: BackgroundTaskName; outcome: 'succeeded' | 'failed' }): void {
    const key = `${sanitizeLabelValue(input.task)}|${input.outcome}`;
    this.backgroundTasks.set(key, (this.backgroundTasks.get(key) ?? 0) + 1);
  }

  renderPrometheus(): string {
    const lines: string[] = [];

    lines.push(`# HELP ${CHECKOUT_METRIC_ORDERS_TOTAL} Total checkouts by final order status.`);
    lines.push(`# TYPE ${CHECKOUT_METRIC_ORDERS_TOTAL} counter`);
    for (const [key, value] of this.orders.entries()) {
      const [status, reason] = key.split('|');
      lines.push(`${CHECKOUT_METRIC_ORDERS_TOTAL}{status="${status}",reason="${reason}"} ${value}`);
    }

    lines.push(`# HELP ${CHECKOUT_METRIC_STEP_CALLS_TOTAL} Total collaborator calls by step and outcome.`);
    lines.push(`# TYPE ${CHECKOUT_METRIC_STEP_CALLS_TOTAL} counter`);
    for (const [key, value] of this.stepCalls.entries()) {
      const [step, outcome, reason] = key.split('|');
      lines.push(
        `${CHECKOUT_METRIC_STEP_CALLS_TOTAL}{step="${step}",outcome="${outcome}",reason="${reason}"} ${value}`,
      );
    }

    lines.push(`# HELP ${CHECKOUT_METRIC_BACKGROUND_TASKS_TOTAL} Background follow-up tasks by outcome.`);
    lines.push(`# TYPE ${CHECKOUT_METRIC_BACKGROUND_TASKS_TOTAL} counter`);
    for (const [key, value] of this.backgroundTasks.entries()) {
      const [task, outcome] = key.split('|');
      lines.push(`${CHECKOUT_METRIC_BACKGROUND_TASKS_TOTAL}{task="${task}",outcome="${outcome}"} ${value}`);
    }

    renderHistogram(
      lines,
      CHECKOUT_METRIC_LATENCY_SECONDS,
      'Checkout latency in seconds.',
      'status',
      this.checkoutLatency,
    );
    renderHistogram(
      lines,
      CHECKOUT_METRIC_STEP_LATENCY_SECONDS,
      'Collaborator step latency in seconds.',
      'step',
      this.stepLatency,
    );

    return `${lines.join('\n')}\n`;
  }
}

function createHistogram(): Histogram {
  return { buckets: new Map(), sum: new Map(), count: new Map() };
}

function observe(
  histogram: Histogram,
  label: string,
  seconds: number,
  bounds: readonly number[],
): void {
  const latency = Number.isFinite(seconds) && seconds >= 0 ? seconds : 0;

  histogram.sum.set(label, (histogram.sum.get(label) ?? 0) + latency);
  histogram.count.set(label, (histogram.count.get(label) ?? 0) + 1);

  for (const bucket of bounds) {
    if (latency <= bucket) {
      const key = `${label}|${bucket}`;
      histogram.buckets.set(key, (histogram.buckets.get(key) ?? 0) + 1);
    }
  }

  const infKey = `${label}|+Inf`;
  histogram.buckets.set(infKey, (histogram.buckets.get(infKey) ?? 0) + 1);
}

function renderHistogram(
  lines: string[],
  name: string,
  help: string,
  labelName: string,
  histogram: Histogram,
): void {
  lines.push(`# HELP ${name} ${help}`);
  lines.push(`# TYPE ${name} histogram`);
  for (const [key, value] of histogram.buckets.entries()) {
    const [label, bucket] = key.split('|');
    lines.push(`${name}_bucket{${labelName}="${label}",le="${bucket}"} ${value}`);
  }
  for (const [label, value] of histogram.sum.entries()) {
    lines.push(`${name}_sum{${labelName}="${label}"} ${value}`);
  }
  for (const [label, value] of histogram.count.entries()) {
    lines.push(`${name}_count{${labelName}="${label}"} ${value}`);
  }
}

function sanitizeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\|/g, '_');
}
