import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { CollaboratorCallContext } from '../../../application/ports/collaborator-call-context';
import type { EmailPort } from '../../../application/ports/email.port';
import type { Order, StepOutcome } from '../../../domain';
import { callCollaborator } from '../shared';
import { parseAccepted } from './payload-parsers';

@Injectable()
export class EmailHttpAdapter implements EmailPort {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('EMAIL_SERVICE_URL') ?? 'http://localhost:8089';
    this.timeoutMs = this.configService.get<number>('EMAIL_TIMEOUT_MS') ?? 2000;
  }

  sendOrderConfirmation(
    input: { userId: string; email?: string; order: Order },
    call: CollaboratorCallContext,
  ): Promise<StepOutcome<{ accepted: boolean }>> {
    return callCollaborator({
      collaborator: 'email',
      baseUrl: this.baseUrl,
      method: 'POST',
      path: '/send-order-confirmation',
      body: input,
      timeoutMs: this.timeoutMs,
      call,
      parse: parseAccepted,
    });
  }
}
