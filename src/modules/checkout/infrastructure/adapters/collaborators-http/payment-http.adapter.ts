import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { CollaboratorCallContext } from '../../../application/ports/collaborator-call-context';
import type { PaymentPort } from '../../../application/ports/payment.port';
import type { Money, StepOutcome } from '../../../domain';
import { callCollaborator } from '../shared';
import { parseReversal, parseTransaction } from './payload-parsers';

@Injectable()
export class PaymentHttpAdapter implements PaymentPort {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly reversalTimeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('PAYMENT_SERVICE_URL') ?? 'http://localhost:8084';
    this.timeoutMs = this.configService.get<number>('PAYMENT_TIMEOUT_MS') ?? 3000;
    this.reversalTimeoutMs = this.configService.get<number>('PAYMENT_REVERSAL_TIMEOUT_MS') ?? 1000;
  }

  charge(
    input: { orderId: string; amount: Money; paymentToken: string },
    call: CollaboratorCallContext,
  ): Promise<StepOutcome<{ transactionId: string }>> {
    return callCollaborator({
      collaborator: 'payment',
      baseUrl: this.baseUrl,
      method: 'POST',
      path: '/charge',
      body: input,
      timeoutMs: this.timeoutMs,
      call,
      parse: parseTransaction,
    });
  }

  reverse(
    input: { orderId: string; transactionId: string; amount: Money },
    call: CollaboratorCallContext,
  ): Promise<StepOutcome<{ reversalId: string }>> {
    return callCollaborator({
      collaborator: 'payment',
      baseUrl: this.baseUrl,
      method: 'POST',
      path: '/reversals',
      body: input,
      timeoutMs: this.reversalTimeoutMs,
      call,
      parse: parseReversal,
    });
  }
}
