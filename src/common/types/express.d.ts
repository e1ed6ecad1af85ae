import 'express';
import type { Context } from '@opentelemetry/api';

declare module 'express-serve-static-core' {
  interface Request {
    requestId?: string;
    traceContext?: Context;
  }
}
