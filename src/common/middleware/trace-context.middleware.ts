import {
  context,
  propagation,
  SpanKind,
  SpanStatusCode,
  trace,
  type Tracer,
} from '@opentelemetry/api';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Opens one SERVER span per inbound request, continuing any W3C trace
 * carried by the caller, and runs the rest of the pipeline inside it.
 */
export function createTraceContextMiddleware(tracer: Tracer): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const parentContext = propagation.extract(context.active(), req.headers);
    const span = tracer.startSpan(
      `${req.method} ${req.path}`,
      {
        kind: SpanKind.SERVER,
        attributes: {
          'http.request.method': req.method,
          'url.path': req.path,
          ...(req.requestId && { 'request.id': req.requestId }),
        },
      },
      parentContext,
    );
    const activeContext = trace.setSpan(parentContext, span);
    req.traceContext = activeContext;

    // `close` alone covers a client that hangs up before the response is written.
    let ended = false;
    const endSpan = (): void => {
      if (ended) {
        return;
      }
      ended = true;
      span.setAttribute('http.response.status_code', res.statusCode);
      if (!res.writableFinished) {
        span.setAttribute('http.request.aborted', true);
      }
      if (res.statusCode >= 500) {
        span.setStatus({ code: SpanStatusCode.ERROR });
      }
      span.end();
    };
    res.once('finish', endSpan);
    res.once('close', endSpan);

    context.with(activeContext, () => next());
  };
}
