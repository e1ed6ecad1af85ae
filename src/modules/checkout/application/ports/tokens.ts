export const CATALOG_PORT = Symbol('CATALOG_PORT');
export const SHIPPING_PORT = Symbol('SHIPPING_PORT');
export const CURRENCY_PORT = Symbol('CURRENCY_PORT');
export const PAYMENT_PORT = Symbol('PAYMENT_PORT');
export const FRAUD_DETECTION_PORT = Symbol('FRAUD_DETECTION_PORT');
export const EMAIL_PORT = Symbol('EMAIL_PORT');
export const ACCOUNTING_PORT = Symbol('ACCOUNTING_PORT');
export const CART_PORT = Symbol('CART_PORT');
export const METRICS_PORT = Symbol('METRICS_PORT');
export const BACKGROUND_TASKS_PORT = Symbol('BACKGROUND_TASKS_PORT');
