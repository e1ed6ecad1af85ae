export type { AccountingPort, OrderEvent } from './accounting.port';
export type { BackgroundTask, BackgroundTasksPort } from './background-tasks.port';
export type { CartPort } from './cart.port';
export type { CatalogPort, CatalogProduct } from './catalog.port';
export type { CollaboratorCallContext } from './collaborator-call-context';
export type { CurrencyPort } from './currency.port';
export type { EmailPort } from './email.port';
export type { FraudDetectionPort } from './fraud-detection.port';
export type { MetricsPort } from './metrics.port';
export type { PaymentPort } from './payment.port';
export type { ShippingPort } from './shipping.port';
export * from './tokens';
