import type { CheckoutItem, FraudVerdict, Money, StepOutcome } from '../../domain';
import type { CollaboratorCallContext } from './collaborator-call-context';

export interface FraudDetectionPort {
  check(
    input: { orderId: string; userId: string; amount: Money; items: CheckoutItem[] },
    call: CollaboratorCallContext,
  ): Promise<StepOutcome<FraudVerdict>>;
}
