import type { CheckoutStep, CollaboratorName } from '../../../domain';

export const DEFAULT_CHECKOUT_DEADLINE_MS = 10_000;

/** Request-path steps in execution order, with the collaborator each one calls. */
export const CHECKOUT_STEP_SEQUENCE: ReadonlyArray<{
  step: CheckoutStep;
  collaborator: CollaboratorName;
}> = [
  { step: 'catalog', collaborator: 'catalog' },
  { step: 'shipping_quote', collaborator: 'shipping' },
  { step: 'currency_conversion', collaborator: 'currency' },
  { step: 'payment', collaborator: 'payment' },
  { step: 'fraud_check', collaborator: 'fraud-detection' },
  { step: 'shipment', collaborator: 'shipping' },
];
