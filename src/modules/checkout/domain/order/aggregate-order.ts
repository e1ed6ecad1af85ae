import type { Money } from '../money';
import type { OrderContext, StepFailure } from './order-context';
import type { Order, OrderLine, OrderReason, OrderStatus } from './order.types';

interface StatusDecision {
  status: OrderStatus;
  reason?: OrderReason;
}

/**
 * Builds the terminal Order from a checkout context. Pure: the same context
 * always yields the same Order, and the context itself is never modified.
 */
export function aggregateOrder(ctx: OrderContext): Order {
  const warnings = ctx.stepFailures
    .filter((failure) => failure.kind !== 'fatal')
    .map((failure) => describeWarning(failure, ctx));
  const decision = decideStatus(ctx, warnings.length > 0);
  const completed =
    decision.status === 'Completed' || decision.status === 'CompletedWithWarnings';

  const order: Order = {
    orderId: ctx.orderId,
    status: decision.status,
    reason: decision.reason,
    items: ctx.lines.map(copyLine),
    subtotal: copyMoney(ctx.subtotal),
    shippingCost: copyMoney(ctx.shippingCost),
    total: completed ? copyMoney(ctx.chargeTotal) : undefined,
    referenceTotal: copyMoney(ctx.referenceTotal),
    converted: ctx.converted,
    warnings,
    transactionId: ctx.transactionId,
    trackingId: ctx.trackingId,
    deadlineExceeded: ctx.stepFailures.some((failure) => failure.kind === 'deadline_exceeded'),
    steps: ctx.stepRecords.map((record) => ({
      step: record.step,
      outcome: record.outcome,
      ...(record.reason !== undefined && { reason: record.reason }),
    })),
    createdAt: ctx.createdAt,
  };

  return deepFreeze(order);
}

function decideStatus(ctx: OrderContext, hasWarnings: boolean): StatusDecision {
  const payment = ctx.failureOf('payment');
  if (payment && payment.kind !== 'deadline_exceeded') {
    return { status: 'PaymentFailed', reason: payment.reason };
  }

  if (ctx.fraudVerdict?.flagged) {
    return { status: 'Rejected', reason: 'fraud_flagged' };
  }

  const catalog = ctx.failureOf('catalog');
  if (catalog && catalog.kind !== 'deadline_exceeded') {
    return {
      status: 'Rejected',
      reason: catalog.reason === 'not_found' ? 'catalog_miss' : 'catalog_unavailable',
    };
  }

  // Fatal from the point it fired, even after capture: the order was neither screened nor shipped.
  if (ctx.stepFailures.some((failure) => failure.kind === 'deadline_exceeded')) {
    return { status: 'Rejected', reason: 'deadline_exceeded' };
  }

  if (hasWarnings) {
    return { status: 'CompletedWithWarnings' };
  }

  return { status: 'Completed' };
}

function describeWarning(failure: StepFailure, ctx: OrderContext): string {
  if (failure.kind === 'deadline_exceeded') {
    return `${failure.step}: deadline exceeded before completion`;
  }

  switch (failure.step) {
    case 'shipping_quote':
      return `shipping quote unavailable (${failure.reason}); placeholder shipping cost applied`;
    case 'currency_conversion':
      return `currency conversion unavailable (${failure.reason}); charged in ${ctx.chargeTotal?.currencyCode ?? ctx.catalogCurrency ?? 'catalog currency'}`;
    case 'fraud_check':
      return `fraud check unavailable (${failure.reason}); order was not screened`;
    case 'shipment':
      return `shipment failed (${failure.reason}); shipment must be retried out of band`;
    default:
      return `${failure.step} failed (${failure.reason})`;
  }
}

function copyMoney(money: Money | undefined): Money | undefined {
  return money ? { currencyCode: money.currencyCode, amount: money.amount } : undefined;
}

function copyLine(line: OrderLine): OrderLine {
  return {
    productId: line.productId,
    name: line.name,
    quantity: line.quantity,
    unitPrice: { ...line.unitPrice },
    lineTotal: { ...line.lineTotal },
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    Object.values(value).forEach((nested: unknown) => deepFreeze(nested));
    Object.freeze(value);
  }

  return value;
}
