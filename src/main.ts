import 'reflect-metadata';
import type { INestApplication } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { validateEnv, type AppEnv } from './common/config/env.validation';
import {
  SERVICE_NAMES,
  SERVICE_PORT_KEYS,
  type ServiceName,
} from './common/constants/services.constants';
import { configureHttpApp } from './common/http/configure-http-app';
import { initObservability, type ObservabilityHandle } from './common/observability';
import { createLogger, logger } from './common/utils/logger';

interface RunningService {
  service: ServiceName;
  app: INestApplication;
  observability: ObservabilityHandle;
}

const bootstrapLogger = createLogger('Bootstrap');

async function bootstrap(): Promise<void> {
  const validatedEnv = validateEnv(process.env);
  const services: ServiceName[] =
    validatedEnv.SERVICE === 'all' ? [...SERVICE_NAMES] : [validatedEnv.SERVICE];

  logger.boot(services);

  const running: RunningService[] = [];
  for (const service of services) {
    running.push(await startService(service, validatedEnv));
  }

  const stop = (signal: NodeJS.Signals): void => {
    bootstrapLogger.info('shutdown_requested', { event: 'shutdown_requested', signal });
    stopServices(running)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        bootstrapLogger.error(
          'Failed to stop services cleanly',
          error instanceof Error ? error : undefined,
        );
        process.exit(1);
      });
  };

  process.once('SIGTERM', stop);
  process.once('SIGINT', stop);
}

async function startService(service: ServiceName, env: AppEnv): Promise<RunningService> {
  const observability = initObservability(service, {
    exporter: env.OTEL_TRACES_EXPORTER,
    otlpEndpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT,
    serviceVersion: env.SERVICE_VERSION,
    environment: env.NODE_ENV,
  });

  const nestLogLevel = env.LOG_LEVEL === 'info' ? 'log' : env.LOG_LEVEL;
  const app = await NestFactory.create(AppModule.forService(service, observability), {
    logger: [nestLogLevel, 'warn', 'error'],
  });

  configureHttpApp(app, observability.tracer);

  const port = env[SERVICE_PORT_KEYS[service]];
  await app.listen(port);

  bootstrapLogger.info('service_listening', { event: 'service_listening', service, port });

  return { service, app, observability };
}

// Closing the app drains background follow-ups before spans are flushed.
async function stopServices(running: readonly RunningService[]): Promise<void> {
  for (const { service, app, observability } of [...running].reverse()) {
    await app.close();
    await observability.shutdown();
    bootstrapLogger.info('service_stopped', { event: 'service_stopped', service });
  }
}

bootstrap().catch((error: unknown) => {
  bootstrapLogger.error(
    'Failed to bootstrap services',
    error instanceof Error ? error : undefined,
  );
  process.exit(1);
});
