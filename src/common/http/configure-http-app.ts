import { BadRequestException, type INestApplication, ValidationPipe } from '@nestjs/common';
import type { Tracer } from '@opentelemetry/api';
import { json } from 'express';
import helmet from 'helmet';
import { INVALID_PAYLOAD_MESSAGE } from '../constants/error-messages.constants';
import { HttpExceptionFilter } from '../filters/http-exception.filter';
import { payloadErrorMiddleware } from '../middleware/payload-error.middleware';
import { requestIdMiddleware } from '../middleware/request-id.middleware';
import { createTraceContextMiddleware } from '../middleware/trace-context.middleware';

/** Middleware, validation and error shape shared by every service process. */
export function configureHttpApp(app: INestApplication, tracer: Tracer): void {
  app.use(helmet());
  app.use(requestIdMiddleware);
  app.use(createTraceContextMiddleware(tracer));
  app.use(json({ limit: '1mb' }));
  app.use(payloadErrorMiddleware);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: () => new BadRequestException(INVALID_PAYLOAD_MESSAGE),
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());
}
