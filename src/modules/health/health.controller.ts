import { Controller, Get, Inject } from '@nestjs/common';
import {
  OBSERVABILITY_HANDLE,
  type ObservabilityHandle,
} from '../../common/observability';
import { createLogger } from '../../common/utils/logger';

@Controller('health')
export class HealthController {
  private readonly logger = createLogger(HealthController.name);

  constructor(
    @Inject(OBSERVABILITY_HANDLE)
    private readonly observability: ObservabilityHandle,
  ) {}

  @Get()
  check(): { status: 'ok'; service: string; timestamp: string } {
    this.logger.http('health_check_request', {
      event: 'health_check_request',
      service: this.observability.serviceName,
    });

    return {
      status: 'ok',
      service: this.observability.serviceName,
      timestamp: new Date().toISOString(),
    };
  }
}
