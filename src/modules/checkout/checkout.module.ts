import { Module, type OnModuleInit } from '@nestjs/common';
import { MetricsRegistry } from '../../common/metrics/metrics-registry';
import { CheckoutController } from './controllers/checkout.controller';
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
} from './application/ports/tokens';
import { CheckoutUseCase } from './application/use-cases/checkout';
import {
  AccountingHttpAdapter,
  CartHttpAdapter,
  CatalogHttpAdapter,
  CurrencyHttpAdapter,
  EmailHttpAdapter,
  FraudDetectionHttpAdapter,
  PaymentHttpAdapter,
  ShippingHttpAdapter,
} from './infrastructure/adapters/collaborators-http';
import { PrometheusMetricsAdapter } from './infrastructure/adapters/metrics/prometheus-metrics.adapter';
import { BackgroundTaskRunner } from './infrastructure/background/background-task-runner';

@Module({
  controllers: [CheckoutController],
  providers: [
    CheckoutUseCase,
    CatalogHttpAdapter,
    ShippingHttpAdapter,
    CurrencyHttpAdapter,
    PaymentHttpAdapter,
    FraudDetectionHttpAdapter,
    EmailHttpAdapter,
    AccountingHttpAdapter,
    CartHttpAdapter,
    PrometheusMetricsAdapter,
    BackgroundTaskRunner,
    {
      provide: CATALOG_PORT,
      useExisting: CatalogHttpAdapter,
    },
    {
      provide: SHIPPING_PORT,
      useExisting: ShippingHttpAdapter,
    },
    {
      provide: CURRENCY_PORT,
      useExisting: CurrencyHttpAdapter,
    },
    {
      provide: PAYMENT_PORT,
      useExisting: PaymentHttpAdapter,
    },
    {
      provide: FRAUD_DETECTION_PORT,
      useExisting: FraudDetectionHttpAdapter,
    },
    {
      provide: EMAIL_PORT,
      useExisting: EmailHttpAdapter,
    },
    {
      provide: ACCOUNTING_PORT,
      useExisting: AccountingHttpAdapter,
    },
    {
      provide: CART_PORT,
      useExisting: CartHttpAdapter,
    },
    {
      provide: METRICS_PORT,
      useExisting: PrometheusMetricsAdapter,
    },
    {
      provide: BACKGROUND_TASKS_PORT,
      useExisting: BackgroundTaskRunner,
    },
  ],
})
export class CheckoutModule implements OnModuleInit {
  constructor(
    private readonly registry: MetricsRegistry,
    private readonly metrics: PrometheusMetricsAdapter,
  ) {}

  onModuleInit(): void {
    this.registry.register(this.metrics);
  }
}
