export const SERVICE_NAMES = [
  'checkout',
  'payment',
  'shipping',
  'product-catalog',
  'cart',
  'currency',
  'email',
  'accounting',
  'fraud-detection',
] as const;

export type ServiceName = (typeof SERVICE_NAMES)[number];

export type ServicePortKey =
  | 'CHECKOUT_SERVICE_PORT'
  | 'PAYMENT_SERVICE_PORT'
  | 'SHIPPING_SERVICE_PORT'
  | 'CATALOG_SERVICE_PORT'
  | 'CART_SERVICE_PORT'
  | 'CURRENCY_SERVICE_PORT'
  | 'EMAIL_SERVICE_PORT'
  | 'ACCOUNTING_SERVICE_PORT'
  | 'FRAUD_SERVICE_PORT';

export const SERVICE_PORT_KEYS: Record<ServiceName, ServicePortKey> = {
  checkout: 'CHECKOUT_SERVICE_PORT',
  payment: 'PAYMENT_SERVICE_PORT',
  shipping: 'SHIPPING_SERVICE_PORT',
  'product-catalog': 'CATALOG_SERVICE_PORT',
  cart: 'CART_SERVICE_PORT',
  currency: 'CURRENCY_SERVICE_PORT',
  email: 'EMAIL_SERVICE_PORT',
  accounting: 'ACCOUNTING_SERVICE_PORT',
  'fraud-detection': 'FRAUD_SERVICE_PORT',
};
