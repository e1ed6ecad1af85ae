import type { CheckoutItem, Money, ShippingAddress, StepOutcome } from '../../domain';
import type { CollaboratorCallContext } from './collaborator-call-context';

export interface ShippingPort {
  quote(
    input: { address: ShippingAddress; items: CheckoutItem[] },
    call: CollaboratorCallContext,
  ): Promise<StepOutcome<Money>>;

  ship(
    input: { orderId: string; address: ShippingAddress; items: CheckoutItem[] },
    call: CollaboratorCallContext,
  ): Promise<StepOutcome<{ trackingId: string }>>;
}
