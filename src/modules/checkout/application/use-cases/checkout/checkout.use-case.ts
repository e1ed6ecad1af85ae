import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { context, SpanStatusCode, trace, type Context, type Span, type Tracer } from '@opentelemetry/api';
import { randomUUID } from 'node:crypto';
import {
  OBSERVABILITY_HANDLE,
  type ObservabilityHandle,
} from '../../../../../common/observability';
import { createLogger } from '../../../../../common/utils/logger';
import {
  addMoney,
  aggregateOrder,
  deadlineExceeded,
  failure,
  fromCents,
  isCompletedStatus,
  multiplyMoney,
  OrderContext,
  resolveOrderEventType,
  sumMoney,
  toCents,
  type BackgroundTaskName,
  type CheckoutRequest,
  type CheckoutStep,
  type CollaboratorName,
  type Money,
  type Order,
  type StepOutcome,
} from '../../../domain';
import type { AccountingPort } from '../../ports/accounting.port';
import type { BackgroundTasksPort } from '../../ports/background-tasks.port';
import type { CartPort } from '../../ports/cart.port';
import type { CatalogPort, CatalogProduct } from '../../ports/catalog.port';
import type { CollaboratorCallContext } from '../../ports/collaborator-call-context';
import type { CurrencyPort } from '../../ports/currency.port';
import type { EmailPort } from '../../ports/email.port';
import type { FraudDetectionPort } from '../../ports/fraud-detection.port';
import type { MetricsPort } from '../../ports/metrics.port';
import type { PaymentPort } from '../../ports/payment.port';
import type { ShippingPort } from '../../ports/shipping.port';
import {
  ACCOUNTING_PORT,
  BACKGROUND_TASKS_PORT,
  CART_PORT,
  CATALOG_PORT,
  CURRENCY_PORT,
  EMAIL_PORT,
  FRAUD_DETECTION_PORT,
  METRICS_PORT,
  PAYMENT_PORT,
  SHIPPING_PORT,
} from '../../ports/tokens';
import { CHECKOUT_STEP_SEQUENCE, DEFAULT_CHECKOUT_DEADLINE_MS } from './constants';
import { runStep, type StepRunnerDeps } from './run-step';

type StageVerdict = 'continue' | 'halt';

interface CheckoutRun {
  ctx: OrderContext;
  rootContext: Context;
  deadline: AbortSignal;
}

@Injectable()
export class CheckoutUseCase {
  private readonly logger = createLogger(CheckoutUseCase.name);
  private readonly tracer: Tracer;
  private readonly deadlineMs: number;
  private readonly placeholderShippingCost: number;

  constructor(
    @Inject(CATALOG_PORT)
    private readonly catalogPort: CatalogPort,
    @Inject(SHIPPING_PORT)
    private readonly shippingPort: ShippingPort,
    @Inject(CURRENCY_PORT)
    private readonly currencyPort: CurrencyPort,
    @Inject(PAYMENT_PORT)
    private readonly paymentPort: PaymentPort,
    @Inject(FRAUD_DETECTION_PORT)
    private readonly fraudDetectionPort: FraudDetectionPort,
    @Inject(EMAIL_PORT)
    private readonly emailPort: EmailPort,
    @Inject(ACCOUNTING_PORT)
    private readonly accountingPort: AccountingPort,
    @Inject(CART_PORT)
    private readonly cartPort: CartPort,
    @Inject(METRICS_PORT)
    private readonly metricsPort: MetricsPort,
    @Inject(BACKGROUND_TASKS_PORT)
    private readonly backgroundTasks: BackgroundTasksPort,
    @Inject(OBSERVABILITY_HANDLE)
    observability: ObservabilityHandle,
    configService: ConfigService,
  ) {
    this.tracer = observability.tracer;
    this.deadlineMs =
      configService.get<number>('CHECKOUT_DEADLINE_MS') ?? DEFAULT_CHECKOUT_DEADLINE_MS;
    this.placeholderShippingCost = configService.get<number>('SHIPPING_PLACEHOLDER_COST') ?? 0;
  }

  async execute(
    request: CheckoutRequest,
    meta: { requestId: string; parentContext?: Context },
  ): Promise<Order> {
    const startedAt = Date.now();
    const ctx = new OrderContext({
      orderId: randomUUID(),
      requestId: meta.requestId,
      createdAt: new Date(startedAt).toISOString(),
      request,
    });
    const parentContext = meta.parentContext ?? context.active();
    const rootSpan = this.tracer.startSpan(
      'checkout',
      {
        attributes: {
          'order.id': ctx.orderId,
          'request.id': meta.requestId,
          'checkout.items': request.items.length,
          'checkout.currency': request.currencyCode,
        },
      },
      parentContext,
    );
    const deadline = new AbortController();
    const deadlineTimer = setTimeout(() => deadline.abort(), this.deadlineMs);
    const run: CheckoutRun = {
      ctx,
      rootContext: trace.setSpan(parentContext, rootSpan),
      deadline: deadline.signal,
    };

    try {
      await this.processSteps(run);

      const order = aggregateOrder(ctx);
      this.reportOutcome(order, rootSpan, startedAt, meta.requestId);
      this.dispatchFollowUps(order, run);

      return order;
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      rootSpan.recordException(err);
      rootSpan.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      this.logger.error('checkout_failed_unexpectedly', err, {
        orderId: ctx.orderId,
        requestId: meta.requestId,
      });
      throw error;
    } finally {
      clearTimeout(deadlineTimer);
      rootSpan.end();
    }
  }

  private async processSteps(run: CheckoutRun): Promise<void> {
    const stages: Array<() => Promise<StageVerdict>> = [
      () => this.priceAndQuote(run),
      () => this.convertCurrency(run),
      () => this.chargePayment(run),
      () => this.checkFraud(run),
      () => this.shipOrder(run),
    ];

    for (const stage of stages) {
      if (run.deadline.aborted) {
        this.recordPendingAsDeadlineExceeded(run);
        return;
      }

      if ((await stage()) === 'halt') {
        return;
      }
    }
  }

  private async priceAndQuote(run: CheckoutRun): Promise<StageVerdict> {
    const { ctx } = run;
    const { items, shippingAddress } = ctx.request;
    const productIds = [...new Set(items.map((item) => item.productId))];

    const [lookups, quote] = await Promise.all([
      Promise.all(
        productIds.map((productId) =>
          this.step(run, {
            step: 'catalog',
            collaborator: 'catalog',
            attributes: { 'product.id': productId },
            deadline: run.deadline,
            call: (call) => this.catalogPort.getPrice(productId, call),
          }),
        ),
      ),
      this.step(run, {
        step: 'shipping_quote',
        collaborator: 'shipping',
        deadline: run.deadline,
        call: (call) => this.shippingPort.quote({ address: shippingAddress, items }, call),
      }),
    ]);

    const catalog = combineCatalogLookups(productIds, lookups);
    ctx.recordOutcome('catalog', 'catalog', catalog, 'fatal');

    if (!catalog.ok) {
      ctx.recordOutcome('shipping_quote', 'shipping', quote, 'tolerable');
      if (catalog.reason === 'deadline_exceeded') {
        this.recordPendingAsDeadlineExceeded(run);
      }
      return 'halt';
    }

    const currencyCode = catalog.value.currencyCode;
    ctx.catalogCurrency = currencyCode;
    ctx.lines = items.map((item) => {
      const product = catalog.value.products.get(item.productId);
      if (!product) {
        throw new Error(`Catalog lookup missing for product ${item.productId}`);
      }

      return {
        productId: item.productId,
        name: product.name,
        quantity: item.quantity,
        unitPrice: product.price,
        lineTotal: multiplyMoney(product.price, item.quantity),
      };
    });
    ctx.subtotal = sumMoney(
      currencyCode,
      ctx.lines.map((line) => line.lineTotal),
    );

    const checkedQuote: StepOutcome<Money> =
      quote.ok && quote.value.currencyCode !== currencyCode
        ? failure(
            'currency_mismatch',
            `shipping quoted in ${quote.value.currencyCode}, catalog prices in ${currencyCode}`,
          )
        : quote;
    ctx.recordOutcome('shipping_quote', 'shipping', checkedQuote, 'tolerable');

    ctx.shippingCost = checkedQuote.ok
      ? checkedQuote.value
      : fromCents(currencyCode, toCents(this.placeholderShippingCost));
    ctx.referenceTotal = addMoney(ctx.subtotal, ctx.shippingCost);

    return 'continue';
  }

  private async convertCurrency(run: CheckoutRun): Promise<StageVerdict> {
    const { ctx } = run;
    const referenceTotal = requireMoney(ctx.referenceTotal, 'reference total');
    const toCurrency = ctx.request.currencyCode;

    if (referenceTotal.currencyCode === toCurrency) {
      ctx.chargeTotal = referenceTotal;
      ctx.converted = true;
      return 'continue';
    }

    const outcome = await this.step(run, {
      step: 'currency_conversion',
      collaborator: 'currency',
      deadline: run.deadline,
      attributes: { 'currency.from': referenceTotal.currencyCode, 'currency.to': toCurrency },
      call: (call) => this.currencyPort.convert({ from: referenceTotal, toCurrency }, call),
    });

    const checked: StepOutcome<Money> =
      outcome.ok && outcome.value.currencyCode !== toCurrency
        ? failure(
            'currency_mismatch',
            `conversion returned ${outcome.value.currencyCode}, expected ${toCurrency}`,
          )
        : outcome;
    ctx.recordOutcome('currency_conversion', 'currency', checked, 'tolerable');

    ctx.chargeTotal = checked.ok ? checked.value : referenceTotal;
    ctx.converted = checked.ok;

    return 'continue';
  }

  private async chargePayment(run: CheckoutRun): Promise<StageVerdict> {
    const { ctx } = run;
    const amount = requireMoney(ctx.chargeTotal, 'charge total');

    const outcome = await this.step(run, {
      step: 'payment',
      collaborator: 'payment',
      deadline: run.deadline,
      call: (call) =>
        this.paymentPort.charge(
          { orderId: ctx.orderId, amount, paymentToken: ctx.request.paymentToken },
          call,
        ),
    });
    ctx.recordOutcome('payment', 'payment', outcome, 'fatal');

    if (outcome.ok) {
      ctx.transactionId = outcome.value.transactionId;
      return 'continue';
    }

    if (outcome.reason === 'deadline_exceeded') {
      this.recordPendingAsDeadlineExceeded(run);
    }
    return 'halt';
  }

  private async checkFraud(run: CheckoutRun): Promise<StageVerdict> {
    const { ctx } = run;
    const amount = requireMoney(ctx.chargeTotal, 'charge total');
    const transactionId = ctx.transactionId;
    if (!transactionId) {
      throw new Error('Checkout invariant broken: fraud check without a captured payment');
    }

    const outcome = await this.step(run, {
      step: 'fraud_check',
      collaborator: 'fraud-detection',
      deadline: run.deadline,
      call: (call) =>
        this.fraudDetectionPort.check(
          {
            orderId: ctx.orderId,
            userId: ctx.request.userId,
            amount,
            items: ctx.request.items,
          },
          call,
        ),
    });
    ctx.recordOutcome('fraud_check', 'fraud-detection', outcome, 'tolerable');

    if (!outcome.ok) {
      return 'continue';
    }

    ctx.fraudVerdict = outcome.value;
    if (!outcome.value.flagged) {
      return 'continue';
    }

    this.logger.security('order_flagged_by_fraud_detection', {
      orderId: ctx.orderId,
      requestId: ctx.requestId,
      fraudReason: outcome.value.reason,
    });
    this.enqueueBackground(run, 'payment_reversal', 'payment', (call) =>
      this.paymentPort.reverse({ orderId: ctx.orderId, transactionId, amount }, call),
    );

    return 'halt';
  }

  private async shipOrder(run: CheckoutRun): Promise<StageVerdict> {
    const { ctx } = run;
    const outcome = await this.step(run, {
      step: 'shipment',
      collaborator: 'shipping',
      deadline: run.deadline,
      call: (call) =>
        this.shippingPort.ship(
          {
            orderId: ctx.orderId,
            address: ctx.request.shippingAddress,
            items: ctx.request.items,
          },
          call,
        ),
    });
    ctx.recordOutcome('shipment', 'shipping', outcome, 'tolerable');

    if (outcome.ok) {
      ctx.trackingId = outcome.value.trackingId;
    }

    return 'continue';
  }

  private recordPendingAsDeadlineExceeded(run: CheckoutRun): void {
    const { ctx } = run;
    const conversionNeeded =
      ctx.catalogCurrency === undefined || ctx.catalogCurrency !== ctx.request.currencyCode;

    for (const { step, collaborator } of CHECKOUT_STEP_SEQUENCE) {
      if (ctx.hasRecorded(step) || (step === 'currency_conversion' && !conversionNeeded)) {
        continue;
      }

      ctx.recordOutcome(
        step,
        collaborator,
        deadlineExceeded(`${step} skipped: checkout deadline exceeded`),
        'tolerable',
      );
    }

    this.logger.warn('checkout_deadline_exceeded', {
      event: 'checkout_deadline_exceeded',
      orderId: ctx.orderId,
      requestId: ctx.requestId,
      deadlineMs: this.deadlineMs,
    });
  }

  private reportOutcome(order: Order, rootSpan: Span, startedAt: number, requestId: string): void {
    rootSpan.setAttributes({
      'order.status': order.status,
      'order.warnings': order.warnings.length,
      'order.deadline_exceeded': order.deadlineExceeded,
      ...(order.reason !== undefined && { 'order.reason': order.reason }),
    });
    if (order.reason === 'deadline_exceeded') {
      rootSpan.setStatus({ code: SpanStatusCode.ERROR, message: 'deadline_exceeded' });
    }

    this.metricsPort.incrementCheckout({ status: order.status, reason: order.reason });
    this.metricsPort.observeCheckoutLatency({
      status: order.status,
      seconds: (Date.now() - startedAt) / 1000,
    });

    this.logger.checkout('checkout_finished', {
      event: 'checkout_finished',
      orderId: order.orderId,
      requestId,
      status: order.status,
      reason: order.reason,
      warnings: order.warnings.length,
      total: order.total,
      duration: Date.now() - startedAt,
    });
  }

  private dispatchFollowUps(order: Order, run: CheckoutRun): void {
    const { request, transactionId, chargeTotal } = run.ctx;

    // A deadline after capture leaves money taken for a rejected order.
    if (order.reason === 'deadline_exceeded' && transactionId !== undefined && chargeTotal !== undefined) {
      this.enqueueBackground(run, 'payment_reversal', 'payment', (call) =>
        this.paymentPort.reverse({ orderId: order.orderId, transactionId, amount: chargeTotal }, call),
      );
    }

    if (isCompletedStatus(order.status)) {
      this.enqueueBackground(run, 'email_confirmation', 'email', (call) =>
        this.emailPort.sendOrderConfirmation(
          { userId: request.userId, email: request.email, order },
          call,
        ),
      );
      this.enqueueBackground(run, 'cart_emptying', 'cart', (call) =>
        this.cartPort.emptyCart(request.userId, call),
      );
    }

    this.enqueueBackground(run, 'accounting_event', 'accounting', (call) =>
      this.accountingPort.publish(
        {
          type: resolveOrderEventType(order.status),
          userId: request.userId,
          occurredAt: new Date().toISOString(),
          order,
        },
        call,
      ),
    );
  }

  /** Background calls carry the trace but not the request deadline. */
  private enqueueBackground<T>(
    run: CheckoutRun,
    name: BackgroundTaskName,
    collaborator: CollaboratorName,
    call: (callContext: CollaboratorCallContext) => Promise<StepOutcome<T>>,
  ): void {
    const { orderId, requestId } = run.ctx;

    this.backgroundTasks.enqueue(
      name,
      () =>
        runStep(this.runnerDeps(), {
          step: name,
          collaborator,
          orderId,
          requestId,
          parentContext: run.rootContext,
          call,
        }),
      { orderId, requestId },
    );
  }

  private step<T>(
    run: CheckoutRun,
    input: {
      step: CheckoutStep;
      collaborator: CollaboratorName;
      deadline: AbortSignal;
      attributes?: Record<string, string>;
      call: (callContext: CollaboratorCallContext) => Promise<StepOutcome<T>>;
    },
  ): Promise<StepOutcome<T>> {
    return runStep(this.runnerDeps(), {
      ...input,
      orderId: run.ctx.orderId,
      requestId: run.ctx.requestId,
      parentContext: run.rootContext,
    });
  }

  private runnerDeps(): StepRunnerDeps {
    return { tracer: this.tracer, metrics: this.metricsPort, logger: this.logger };
  }
}

interface PricedCatalog {
  currencyCode: string;
  products: Map<string, CatalogProduct>;
}

/**
 * Joins the per-product lookups into the single catalog outcome. A missing
 * product wins over other failures so the caller sees `catalog_miss`.
 */
function combineCatalogLookups(
  productIds: readonly string[],
  lookups: ReadonlyArray<StepOutcome<CatalogProduct>>,
): StepOutcome<PricedCatalog> {
  const failures = lookups.flatMap((lookup) => (lookup.ok ? [] : [lookup]));
  if (failures.length > 0) {
    return (
      failures.find((entry) => entry.reason === 'not_found') ??
      failures.find((entry) => entry.reason !== 'deadline_exceeded') ??
      failures[0]
    );
  }

  const products = new Map<string, CatalogProduct>();
  const currencies = new Set<string>();
  lookups.forEach((lookup, index) => {
    if (lookup.ok) {
      products.set(productIds[index], lookup.value);
      currencies.add(lookup.value.price.currencyCode);
    }
  });

  const [currencyCode] = [...currencies];
  if (currencies.size !== 1 || !currencyCode) {
    return failure('currency_mismatch', `catalog prices span ${currencies.size} currencies`);
  }

  return { ok: true, value: { currencyCode, products } };
}

function requireMoney(value: Money | undefined, label: string): Money {
  if (!value) {
    throw new Error(`Checkout invariant broken: ${label} missing`);
  }

  return value;
}
