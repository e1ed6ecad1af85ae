export { AccountingHttpAdapter } from './accounting-http.adapter';
export { CartHttpAdapter } from './cart-http.adapter';
export { CatalogHttpAdapter } from './catalog-http.adapter';
export { CurrencyHttpAdapter } from './currency-http.adapter';
export { EmailHttpAdapter } from './email-http.adapter';
export { FraudDetectionHttpAdapter } from './fraud-detection-http.adapter';
export { PaymentHttpAdapter } from './payment-http.adapter';
export { ShippingHttpAdapter } from './shipping-http.adapter';
