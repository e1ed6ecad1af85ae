import {
  context,
  SpanKind,
  SpanStatusCode,
  trace,
  type Attributes,
  type Context,
  type Tracer,
} from '@opentelemetry/api';
import type { Logger } from '../../../../../common/utils/logger';
import {
  deadlineExceeded,
  failure,
  type BackgroundTaskName,
  type CheckoutStep,
  type CollaboratorName,
  type StepOutcome,
} from '../../../domain';
import type { CollaboratorCallContext } from '../../ports/collaborator-call-context';
import type { MetricsPort } from '../../ports/metrics.port';

export interface StepRunnerDeps {
  tracer: Tracer;
  metrics: MetricsPort;
  logger: Logger;
}

export interface RunStepInput<T> {
  step: CheckoutStep | BackgroundTaskName;
  collaborator: CollaboratorName;
  orderId: string;
  requestId: string;
  parentContext: Context;
  deadline?: AbortSignal;
  attributes?: Attributes;
  call: (callContext: CollaboratorCallContext) => Promise<StepOutcome<T>>;
}

/**
 * Runs one collaborator call inside its own `checkout.<step>` span and
 * always resolves to a StepOutcome. When the deadline has already fired the
 * collaborator is not called at all.
 */
export async function runStep<T>(
  deps: StepRunnerDeps,
  input: RunStepInput<T>,
): Promise<StepOutcome<T>> {
  const startedAt = Date.now();
  const span = deps.tracer.startSpan(
    `checkout.${input.step}`,
    {
      kind: SpanKind.CLIENT,
      attributes: {
        'checkout.step': input.step,
        'checkout.collaborator': input.collaborator,
        'order.id': input.orderId,
        ...input.attributes,
      },
    },
    input.parentContext,
  );
  const spanContext = trace.setSpan(input.parentContext, span);

  let outcome: StepOutcome<T>;
  if (input.deadline?.aborted) {
    outcome = deadlineExceeded(`${input.step} skipped: checkout deadline exceeded`);
  } else {
    try {
      outcome = await context.with(spanContext, () =>
        input.call({
          requestId: input.requestId,
          traceContext: spanContext,
          signal: input.deadline,
        }),
      );
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      outcome = failure('internal_error', err.message);
    }
  }

  const seconds = (Date.now() - startedAt) / 1000;

  if (outcome.ok) {
    span.setAttribute('checkout.step.outcome', 'succeeded');
    deps.logger.collaborator('step_succeeded', {
      event: 'step_succeeded',
      step: input.step,
      collaborator: input.collaborator,
      orderId: input.orderId,
      requestId: input.requestId,
      duration: Math.round(seconds * 1000),
    });
  } else {
    span.setAttributes({
      'checkout.step.outcome': 'failed',
      'checkout.step.reason': outcome.reason,
      'checkout.step.retryable': outcome.retryable,
      ...(outcome.statusCode !== undefined && { 'http.response.status_code': outcome.statusCode }),
    });
    span.setStatus({ code: SpanStatusCode.ERROR, message: outcome.reason });
    deps.logger.warn('step_failed', {
      event: 'step_failed',
      step: input.step,
      collaborator: input.collaborator,
      orderId: input.orderId,
      requestId: input.requestId,
      reason: outcome.reason,
      retryable: outcome.retryable,
      statusCode: outcome.statusCode,
      errorMessage: outcome.message,
    });
  }

  span.end();

  deps.metrics.incrementStepCall({
    step: input.step,
    outcome: outcome.ok ? 'succeeded' : 'failed',
    reason: outcome.ok ? undefined : outcome.reason,
  });
  deps.metrics.observeStepLatency({ step: input.step, seconds });

  return outcome;
}
