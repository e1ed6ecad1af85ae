import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { CollaboratorCallContext } from '../../../application/ports/collaborator-call-context';
import type { FraudDetectionPort } from '../../../application/ports/fraud-detection.port';
import type { CheckoutItem, FraudVerdict, Money, StepOutcome } from '../../../domain';
import { callCollaborator } from '../shared';
import { parseFraudVerdict } from './payload-parsers';

@Injectable()
export class FraudDetectionHttpAdapter implements FraudDetectionPort {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('FRAUD_SERVICE_URL') ?? 'http://localhost:8092';
    this.timeoutMs = this.configService.get<number>('FRAUD_TIMEOUT_MS') ?? 2000;
  }

  check(
    input: { orderId: string; userId: string; amount: Money; items: CheckoutItem[] },
    call: CollaboratorCallContext,
  ): Promise<StepOutcome<FraudVerdict>> {
    return callCollaborator({
      collaborator: 'fraud-detection',
      baseUrl: this.baseUrl,
      method: 'POST',
      path: '/check',
      body: input,
      timeoutMs: this.timeoutMs,
      call,
      parse: parseFraudVerdict,
    });
  }
}
