import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { CollaboratorCallContext } from '../../../application/ports/collaborator-call-context';
import type { CurrencyPort } from '../../../application/ports/currency.port';
import { parseMoney, type Money, type StepOutcome } from '../../../domain';
import { callCollaborator } from '../shared';

@Injectable()
export class CurrencyHttpAdapter implements CurrencyPort {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('CURRENCY_SERVICE_URL') ?? 'http://localhost:8088';
    this.timeoutMs = this.configService.get<number>('CURRENCY_TIMEOUT_MS') ?? 1500;
  }

  convert(
    input: { from: Money; toCurrency: string },
    call: CollaboratorCallContext,
  ): Promise<StepOutcome<Money>> {
    return callCollaborator({
      collaborator: 'currency',
      baseUrl: this.baseUrl,
      method: 'POST',
      path: '/convert',
      body: input,
      timeoutMs: this.timeoutMs,
      call,
      parse: parseMoney,
    });
  }
}
