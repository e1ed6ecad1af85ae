import { ROOT_CONTEXT, SpanKind, SpanStatusCode, trace } from '@opentelemetry/api';
import { createLogger } from '@/common/utils/logger';
import type { MetricsPort } from '@/modules/checkout/application/ports';
import { runStep, type StepRunnerDeps } from '@/modules/checkout/application/use-cases/checkout';
import { failure, success } from '@/modules/checkout/domain';
import { createTestObservability } from '../../../fixtures/checkout/checkout-fakes';

function buildDeps() {
  const { handle, exporter } = createTestObservability();
  const metrics: jest.Mocked<MetricsPort> = {
    incrementCheckout: jest.fn(),
    observeCheckoutLatency: jest.fn(),
    incrementStepCall: jest.fn(),
    observeStepLatency: jest.fn(),
    incrementBackgroundTask: jest.fn(),
  };
  const deps: StepRunnerDeps = {
    tracer: handle.tracer,
    metrics,
    logger: createLogger('RunStepSpec'),
  };

  return { deps, metrics, exporter };
}

const baseInput = {
  step: 'payment' as const,
  collaborator: 'payment' as const,
  orderId: 'order-1',
  requestId: 'req-1',
  parentContext: ROOT_CONTEXT,
};

describe('runStep', () => {
  it('returns the collaborator outcome inside a client span', async () => {
    const { deps, metrics, exporter } = buildDeps();

    const outcome = await runStep(deps, {
      ...baseInput,
      call: async () => success({ transactionId: 'TXN-1' }),
    });

    expect(outcome).toEqual({ ok: true, value: { transactionId: 'TXN-1' } });
    const [span] = exporter.getFinishedSpans();
    expect(span.name).toBe('checkout.payment');
    expect(span.kind).toBe(SpanKind.CLIENT);
    expect(span.attributes['checkout.step.outcome']).toBe('succeeded');
    expect(span.attributes['order.id']).toBe('order-1');
    expect(metrics.incrementStepCall).toHaveBeenCalledWith({
      step: 'payment',
      outcome: 'succeeded',
      reason: undefined,
    });
    expect(metrics.observeStepLatency).toHaveBeenCalledTimes(1);
  });

  it('hands the step span to the collaborator call', async () => {
    const { deps, exporter } = buildDeps();
    let seenSpanId: string | undefined;

    await runStep(deps, {
      ...baseInput,
      call: async (callContext) => {
        seenSpanId = trace.getSpan(callContext.traceContext)?.spanContext().spanId;
        expect(callContext.requestId).toBe('req-1');
        return success({});
      },
    });

    expect(seenSpanId).toBe(exporter.getFinishedSpans()[0].spanContext().spanId);
  });

  it('marks the span as failed with the failure reason', async () => {
    const { deps, metrics, exporter } = buildDeps();

    const outcome = await runStep(deps, {
      ...baseInput,
      call: async () => failure('declined', 'card declined', { statusCode: 402 }),
    });

    expect(outcome.ok).toBe(false);
    const [span] = exporter.getFinishedSpans();
    expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: 'declined' });
    expect(span.attributes['checkout.step.reason']).toBe('declined');
    expect(span.attributes['http.response.status_code']).toBe(402);
    expect(metrics.incrementStepCall).toHaveBeenCalledWith({
      step: 'payment',
      outcome: 'failed',
      reason: 'declined',
    });
  });

  it('skips the call once the deadline has fired', async () => {
    const { deps } = buildDeps();
    const deadline = new AbortController();
    deadline.abort();
    const call = jest.fn(async () => success({}));

    const outcome = await runStep(deps, { ...baseInput, deadline: deadline.signal, call });

    expect(call).not.toHaveBeenCalled();
    expect(outcome).toEqual({
      ok: false,
      reason: 'deadline_exceeded',
      retryable: false,
      message: 'payment skipped: checkout deadline exceeded',
    });
  });

  it('turns a thrown error into an internal failure', async () => {
    const { deps, exporter } = buildDeps();

    const outcome = await runStep(deps, {
      ...baseInput,
      call: async () => {
        throw new Error('unexpected payload');
      },
    });

    expect(outcome).toEqual({
      ok: false,
      reason: 'internal_error',
      retryable: false,
      message: 'unexpected payload',
    });
    expect(exporter.getFinishedSpans()[0].events.map((event) => event.name)).toEqual(['exception']);
  });
});
