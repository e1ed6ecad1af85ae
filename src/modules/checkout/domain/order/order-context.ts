import type { CheckoutRequest } from '../checkout-request';
import type { CollaboratorName } from '../errors';
import type { Money } from '../money';
import type { FailureReason, StepOutcome } from '../step-outcome';
import type { CheckoutStep, FraudVerdict, OrderLine } from './order.types';

export type FailureKind = 'fatal' | 'tolerable' | 'deadline_exceeded';

export interface StepRecord {
  step: CheckoutStep;
  collaborator: CollaboratorName;
  outcome: 'succeeded' | 'failed';
  reason?: FailureReason;
}

export interface StepFailure {
  step: CheckoutStep;
  collaborator: CollaboratorName;
  kind: FailureKind;
  reason: FailureReason;
  message: string;
  retryable: boolean;
}

/**
 * Per-request accumulator driven by one checkout execution. Never shared
 * across requests and never persisted.
 */
export class OrderContext {
  readonly orderId: string;
  readonly requestId: string;
  readonly createdAt: string;
  readonly request: CheckoutRequest;

  lines: OrderLine[] = [];
  catalogCurrency?: string;
  subtotal?: Money;
  shippingCost?: Money;
  referenceTotal?: Money;
  chargeTotal?: Money;
  converted = false;
  transactionId?: string;
  fraudVerdict?: FraudVerdict;
  trackingId?: string;

  private readonly records: StepRecord[] = [];
  private readonly failures: StepFailure[] = [];

  constructor(input: {
    orderId: string;
    requestId: string;
    createdAt: string;
    request: CheckoutRequest;
  }) {
    this.orderId = input.orderId;
    this.requestId = input.requestId;
    this.createdAt = input.createdAt;
    this.request = input.request;
  }

  recordOutcome(
    step: CheckoutStep,
    collaborator: CollaboratorName,
    outcome: StepOutcome<unknown>,
    severity: Exclude<FailureKind, 'deadline_exceeded'>,
  ): void {
    if (this.hasRecorded(step)) {
      throw new Error(`Step "${step}" already recorded for order ${this.orderId}`);
    }

    if (outcome.ok) {
      this.records.push({ step, collaborator, outcome: 'succeeded' });
      return;
    }

    this.records.push({ step, collaborator, outcome: 'failed', reason: outcome.reason });
    this.failures.push({
      step,
      collaborator,
      kind: outcome.reason === 'deadline_exceeded' ? 'deadline_exceeded' : severity,
      reason: outcome.reason,
      message: outcome.message,
      retryable: outcome.retryable,
    });
  }

  hasRecorded(step: CheckoutStep): boolean {
    return this.records.some((record) => record.step === step);
  }

  failureOf(step: CheckoutStep): StepFailure | undefined {
    return this.failures.find((entry) => entry.step === step);
  }

  get stepRecords(): readonly StepRecord[] {
    return this.records;
  }

  get stepFailures(): readonly StepFailure[] {
    return this.failures;
  }
}
