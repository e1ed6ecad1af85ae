import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AccountingPort, OrderEvent } from '../../../application/ports/accounting.port';
import type { CollaboratorCallContext } from '../../../application/ports/collaborator-call-context';
import type { StepOutcome } from '../../../domain';
import { callCollaborator } from '../shared';
import { parseAccepted } from './payload-parsers';

@Injectable()
export class AccountingHttpAdapter implements AccountingPort {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('ACCOUNTING_SERVICE_URL') ?? 'http://localhost:8091';
    this.timeoutMs = this.configService.get<number>('ACCOUNTING_TIMEOUT_MS') ?? 2000;
  }

  publish(event: OrderEvent, call: CollaboratorCallContext): Promise<StepOutcome<{ accepted: boolean }>> {
    return callCollaborator({
      collaborator: 'accounting',
      baseUrl: this.baseUrl,
      method: 'POST',
      path: '/orders',
      body: event,
      timeoutMs: this.timeoutMs,
      call,
      parse: parseAccepted,
    });
  }
}
