import { type DynamicModule, Global, Module } from '@nestjs/common';
import { MetricsRegistry } from '../metrics/metrics-registry';
import type { ObservabilityHandle } from './init-observability';
import { OBSERVABILITY_HANDLE } from './observability.tokens';

@Global()
@Module({})
export class ObservabilityModule {
  static forRoot(handle: ObservabilityHandle): DynamicModule {
    return {
      module: ObservabilityModule,
      providers: [
        { provide: OBSERVABILITY_HANDLE, useValue: handle },
        { provide: MetricsRegistry, useFactory: () => new MetricsRegistry(handle.resource) },
      ],
      exports: [OBSERVABILITY_HANDLE, MetricsRegistry],
    };
  }
}
