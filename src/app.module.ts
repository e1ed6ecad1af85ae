import { type DynamicModule, Module, type Type } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerModule } from '@nestjs/throttler';
import { validateEnv } from './common/config/env.validation';
import type { ServiceName } from './common/constants/services.constants';
import { ObservabilityModule, type ObservabilityHandle } from './common/observability';
import { CheckoutModule } from './modules/checkout/checkout.module';
import { AccountingModule } from './modules/collaborators/accounting/accounting.module';
import { CartModule } from './modules/collaborators/cart/cart.module';
import { CurrencyModule } from './modules/collaborators/currency/currency.module';
import { EmailModule } from './modules/collaborators/email/email.module';
import { FraudDetectionModule } from './modules/collaborators/fraud-detection/fraud-detection.module';
import { PaymentModule } from './modules/collaborators/payment/payment.module';
import { ProductCatalogModule } from './modules/collaborators/product-catalog/product-catalog.module';
import { ShippingModule } from './modules/collaborators/shipping/shipping.module';
import { HealthModule } from './modules/health/health.module';

export const SERVICE_MODULES: Record<ServiceName, Type> = {
  checkout: CheckoutModule,
  payment: PaymentModule,
  shipping: ShippingModule,
  'product-catalog': ProductCatalogModule,
  cart: CartModule,
  currency: CurrencyModule,
  email: EmailModule,
  accounting: AccountingModule,
  'fraud-detection': FraudDetectionModule,
};

@Module({})
export class AppModule {
  /** One Nest application per service; all of them share the env and health surface. */
  static forService(service: ServiceName, observability: ObservabilityHandle): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          validate: validateEnv,
        }),
        ThrottlerModule.forRootAsync({
          inject: [ConfigService],
          useFactory: (configService: ConfigService) => [
            {
              name: 'default',
              ttl: 60_000,
              limit: configService.get<number>('THROTTLE_LIMIT') ?? 120,
            },
          ],
        }),
        ObservabilityModule.forRoot(observability),
        HealthModule,
        SERVICE_MODULES[service],
      ],
    };
  }
}
