import { Controller, Get, Header } from '@nestjs/common';
import { MetricsRegistry } from '../../common/metrics/metrics-registry';

@Controller('internal')
export class MetricsController {
  constructor(private readonly registry: MetricsRegistry) {}

  @Get('metrics')
  @Header('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
  render(): string {
    return this.registry.render();
  }
}
