import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { CollaboratorCallContext } from '../../../application/ports/collaborator-call-context';
import type { ShippingPort } from '../../../application/ports/shipping.port';
import type { CheckoutItem, Money, ShippingAddress, StepOutcome } from '../../../domain';
import { callCollaborator } from '../shared';
import { parseQuote, parseTracking } from './payload-parsers';

@Injectable()
export class ShippingHttpAdapter implements ShippingPort {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('SHIPPING_SERVICE_URL') ?? 'http://localhost:8085';
    this.timeoutMs = this.configService.get<number>('SHIPPING_TIMEOUT_MS') ?? 2000;
  }

  quote(
    input: { address: ShippingAddress; items: CheckoutItem[] },
    call: CollaboratorCallContext,
  ): Promise<StepOutcome<Money>> {
    return callCollaborator({
      collaborator: 'shipping',
      baseUrl: this.baseUrl,
      method: 'POST',
      path: '/quote',
      body: input,
      timeoutMs: this.timeoutMs,
      call,
      parse: parseQuote,
    });
  }

  ship(
    input: { orderId: string; address: ShippingAddress; items: CheckoutItem[] },
    call: CollaboratorCallContext,
  ): Promise<StepOutcome<{ trackingId: string }>> {
    return callCollaborator({
      collaborator: 'shipping',
      baseUrl: this.baseUrl,
      method: 'POST',
      path: '/ship',
      body: input,
      timeoutMs: this.timeoutMs,
      call,
      parse: parseTracking,
    });
  }
}
