import type { StepOutcome } from '../../domain';
import type { CollaboratorCallContext } from './collaborator-call-context';

export interface CartPort {
  emptyCart(userId: string, call: CollaboratorCallContext): Promise<StepOutcome<{ emptied: boolean }>>;
}
