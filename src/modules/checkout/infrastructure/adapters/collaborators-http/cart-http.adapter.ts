import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { CartPort } from '../../../application/ports/cart.port';
import type { CollaboratorCallContext } from '../../../application/ports/collaborator-call-context';
import type { StepOutcome } from '../../../domain';
import { callCollaborator } from '../shared';

@Injectable()
export class CartHttpAdapter implements CartPort {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('CART_SERVICE_URL') ?? 'http://localhost:8087';
    this.timeoutMs = this.configService.get<number>('CART_TIMEOUT_MS') ?? 1500;
  }

  // 204 arrives as an empty body; any 2xx means the cart is gone.
  emptyCart(userId: string, call: CollaboratorCallContext): Promise<StepOutcome<{ emptied: boolean }>> {
    return callCollaborator({
      collaborator: 'cart',
      baseUrl: this.baseUrl,
      method: 'DELETE',
      path: `/carts/${encodeURIComponent(userId)}`,
      timeoutMs: this.timeoutMs,
      call,
      parse: () => ({ emptied: true }),
    });
  }
}
