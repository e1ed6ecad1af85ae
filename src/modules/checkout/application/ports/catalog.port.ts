import type { Money, StepOutcome } from '../../domain';
import type { CollaboratorCallContext } from './collaborator-call-context';

export interface CatalogProduct {
  id: string;
  name: string;
  price: Money;
}

export interface CatalogPort {
  getPrice(productId: string, call: CollaboratorCallContext): Promise<StepOutcome<CatalogProduct>>;
}
