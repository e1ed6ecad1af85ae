import type { ConfigService } from '@nestjs/config';
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import type { ObservabilityHandle } from '@/common/observability';
import type {
  AccountingPort,
  CartPort,
  CatalogPort,
  CatalogProduct,
  CollaboratorCallContext,
  CurrencyPort,
  EmailPort,
  FraudDetectionPort,
  OrderEvent,
  PaymentPort,
  ShippingPort,
} from '@/modules/checkout/application/ports';
import {
  deadlineExceeded,
  failure,
  success,
  type CheckoutRequest,
  type FraudVerdict,
  type Money,
  type StepOutcome,
} from '@/modules/checkout/domain';

type Args<F extends (...args: never[]) => unknown> = Parameters<F>;

export const TEST_PRODUCTS: Record<string, CatalogProduct> = {
  'SKU-1001': { id: 'SKU-1001', name: 'Canvas Tote Bag', price: { currencyCode: 'USD', amount: 10 } },
  'SKU-1002': { id: 'SKU-1002', name: 'Ceramic Mug', price: { currencyCode: 'USD', amount: 2.5 } },
  'SKU-1003': { id: 'SKU-1003', name: 'Linen Napkin', price: { currencyCode: 'EUR', amount: 4 } },
};

export function buildCheckoutRequest(overrides: Partial<CheckoutRequest> = {}): CheckoutRequest {
  return {
    userId: 'user-1',
    items: [{ productId: 'SKU-1001', quantity: 2 }],
    shippingAddress: {
      streetAddress: '1 Test Street',
      city: 'Testville',
      country: 'US',
      zipCode: '00000',
    },
    paymentToken: 'tok-test',
    currencyCode: 'USD',
    email: 'buyer@example.com',
    ...overrides,
  };
}

/**
 * Collaborator fakes that succeed by default: catalog prices from
 * TEST_PRODUCTS, a 5.00 USD shipping quote, a fixed conversion to 23.00.
 */
export function createFakePorts() {
  const catalogPort = {
    getPrice: jest.fn(
      async (
        productId: Args<CatalogPort['getPrice']>[0],
        _call: CollaboratorCallContext,
      ): Promise<StepOutcome<CatalogProduct>> => {
        const product = TEST_PRODUCTS[productId];
        return product
          ? success(product)
          : failure('not_found', `product ${productId} not found`, { statusCode: 404 });
      },
    ),
  } satisfies CatalogPort;

  const shippingPort = {
    quote: jest.fn(
      async (
        _input: Args<ShippingPort['quote']>[0],
        _call: CollaboratorCallContext,
      ): Promise<StepOutcome<Money>> => success({ currencyCode: 'USD', amount: 5 }),
    ),
    ship: jest.fn(
      async (
        _input: Args<ShippingPort['ship']>[0],
        _call: CollaboratorCallContext,
      ): Promise<StepOutcome<{ trackingId: string }>> => success({ trackingId: 'TRK-test' }),
    ),
  } satisfies ShippingPort;

  const currencyPort = {
    convert: jest.fn(
      async (
        input: Args<CurrencyPort['convert']>[0],
        _call: CollaboratorCallContext,
      ): Promise<StepOutcome<Money>> => success({ currencyCode: input.toCurrency, amount: 23 }),
    ),
  } satisfies CurrencyPort;

  const paymentPort = {
    charge: jest.fn(
      async (
        _input: Args<PaymentPort['charge']>[0],
        _call: CollaboratorCallContext,
      ): Promise<StepOutcome<{ transactionId: string }>> => success({ transactionId: 'TXN-test' }),
    ),
    reverse: jest.fn(
      async (
        _input: Args<PaymentPort['reverse']>[0],
        _call: CollaboratorCallContext,
      ): Promise<StepOutcome<{ reversalId: string }>> => success({ reversalId: 'REV-test' }),
    ),
  } satisfies PaymentPort;

  const fraudDetectionPort = {
    check: jest.fn(
      async (
        _input: Args<FraudDetectionPort['check']>[0],
        _call: CollaboratorCallContext,
      ): Promise<StepOutcome<FraudVerdict>> => success({ flagged: false }),
    ),
  } satisfies FraudDetectionPort;

  const emailPort = {
    sendOrderConfirmation: jest.fn(
      async (
        _input: Args<EmailPort['sendOrderConfirmation']>[0],
        _call: CollaboratorCallContext,
      ): Promise<StepOutcome<{ accepted: boolean }>> => success({ accepted: true }),
    ),
  } satisfies EmailPort;

  const accountingPort = {
    publish: jest.fn(
      async (
        _event: OrderEvent,
        _call: CollaboratorCallContext,
      ): Promise<StepOutcome<{ accepted: boolean }>> => success({ accepted: true }),
    ),
  } satisfies AccountingPort;

  const cartPort = {
    emptyCart: jest.fn(
      async (
        _userId: string,
        _call: CollaboratorCallContext,
      ): Promise<StepOutcome<{ emptied: boolean }>> => success({ emptied: true }),
    ),
  } satisfies CartPort;

  return {
    catalogPort,
    shippingPort,
    currencyPort,
    paymentPort,
    fraudDetectionPort,
    emailPort,
    accountingPort,
    cartPort,
  };
}

export type FakePorts = ReturnType<typeof createFakePorts>;

/** Never answers on its own; resolves as deadline_exceeded once the call's signal aborts. */
export function hangUntilAborted<T>(call: CollaboratorCallContext): Promise<StepOutcome<T>> {
  return new Promise((resolve) => {
    const signal = call.signal;
    if (!signal) {
      return;
    }

    if (signal.aborted) {
      resolve(deadlineExceeded());
      return;
    }

    signal.addEventListener('abort', () => resolve(deadlineExceeded()), { once: true });
  });
}

export function createTestObservability(serviceName = 'checkout'): {
  handle: ObservabilityHandle;
  exporter: InMemorySpanExporter;
} {
  const exporter = new InMemorySpanExporter();
  const provider = new BasicTracerProvider();
  provider.addSpanProcessor(new SimpleSpanProcessor(exporter));

  return {
    exporter,
    handle: {
      serviceName,
      resource: {
        serviceName,
        serviceVersion: '1.0.0',
        environment: 'test',
        hostName: 'test-host',
        osType: 'linux',
      },
      tracer: provider.getTracer(serviceName),
      shutdown: () => provider.shutdown(),
    },
  };
}

export function createConfigStub(values: Record<string, unknown>): ConfigService {
  return { get: (key: string) => values[key] } as unknown as ConfigService;
}
