import type { Context } from '@opentelemetry/api';

/**
 * Per-call metadata handed to every collaborator adapter: the trace context
 * to propagate and, on the request path, the checkout deadline signal.
 */
export interface CollaboratorCallContext {
  requestId: string;
  traceContext: Context;
  signal?: AbortSignal;
}
