import type { Money, StepOutcome } from '../../domain';
import type { CollaboratorCallContext } from './collaborator-call-context';

export interface CurrencyPort {
  convert(
    input: { from: Money; toCurrency: string },
    call: CollaboratorCallContext,
  ): Promise<StepOutcome<Money>>;
}
