import type { Money, StepOutcome } from '../../domain';
import type { CollaboratorCallContext } from './collaborator-call-context';

export interface PaymentPort {
  charge(
    input: { orderId: string; amount: Money; paymentToken: string },
    call: CollaboratorCallContext,
  ): Promise<StepOutcome<{ transactionId: string }>>;

  /** Uses its own short timeout; never bound to the checkout deadline. */
  reverse(
    input: { orderId: string; transactionId: string; amount: Money },
    call: CollaboratorCallContext,
  ): Promise<StepOutcome<{ reversalId: string }>>;
}
