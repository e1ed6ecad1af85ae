import type { Order, OrderEventType, StepOutcome } from '../../domain';
import type { CollaboratorCallContext } from './collaborator-call-context';

export interface OrderEvent {
  type: OrderEventType;
  userId: string;
  occurredAt: string;
  order: Order;
}

export interface AccountingPort {
  publish(event: OrderEvent, call: CollaboratorCallContext): Promise<StepOutcome<{ accepted: boolean }>>;
}
