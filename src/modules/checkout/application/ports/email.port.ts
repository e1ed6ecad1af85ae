import type { Order, StepOutcome } from '../../domain';
import type { CollaboratorCallContext } from './collaborator-call-context';

export interface EmailPort {
  sendOrderConfirmation(
    input: { userId: string; email?: string; order: Order },
    call: CollaboratorCallContext,
  ): Promise<StepOutcome<{ accepted: boolean }>>;
}
