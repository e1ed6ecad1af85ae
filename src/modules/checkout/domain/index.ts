export * from './checkout-request';
export * from './errors';
export * from './money';
export * from './order';
export * from './step-outcome';
