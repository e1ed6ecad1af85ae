import { propagation } from '@opentelemetry/api';
import type { CollaboratorCallContext } from '../../../application/ports/collaborator-call-context';
import {
  CollaboratorCallError,
  failure,
  success,
  type CollaboratorName,
  type StepFailureOutcome,
  type StepOutcome,
} from '../../../domain';
import { fetchJsonWithTimeout, type JsonResponse } from './http-client';

export interface CollaboratorRequest<T> {
  collaborator: CollaboratorName;
  baseUrl: string;
  method: 'GET' | 'POST' | 'DELETE';
  path: string;
  body?: unknown;
  timeoutMs: number;
  call: CollaboratorCallContext;
  parse: (body: unknown) => T | undefined;
}

/**
 * Single HTTP exchange with a collaborator. Never retries and never throws:
 * every error is turned into a failed StepOutcome here.
 */
export async function callCollaborator<T>(input: CollaboratorRequest<T>): Promise<StepOutcome<T>> {
  try {
    return success(await requestCollaborator(input));
  } catch (error: unknown) {
    return toFailureOutcome(error);
  }
}

async function requestCollaborator<T>(input: CollaboratorRequest<T>): Promise<T> {
  const context = { collaborator: input.collaborator, endpointPath: input.path };
  const headers: Record<string, string> = {
    Accept: 'application/json',
    'x-request-id': input.call.requestId,
  };
  if (input.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }
  propagation.inject(input.call.traceContext, headers);

  let response: JsonResponse;
  try {
    response = await fetchJsonWithTimeout(
      `${input.baseUrl}${input.path}`,
      {
        method: input.method,
        headers,
        ...(input.body !== undefined && { body: JSON.stringify(input.body) }),
      },
      input.timeoutMs,
      input.call.signal,
    );
  } catch (error: unknown) {
    if (error instanceof Error && error.name === 'AbortError') {
      if (input.call.signal?.aborted) {
        throw new CollaboratorCallError(
          `${input.collaborator} call aborted: checkout deadline exceeded`,
          0,
          'deadline',
          undefined,
          context,
        );
      }

      throw new CollaboratorCallError(
        `${input.collaborator} request timeout after ${input.timeoutMs}ms`,
        0,
        'timeout',
        undefined,
        context,
      );
    }

    throw new CollaboratorCallError(
      `${input.collaborator} network error`,
      0,
      'network',
      undefined,
      context,
    );
  }

  if (!response.ok) {
    throw new CollaboratorCallError(
      `${input.collaborator} responded ${response.status}`,
      response.status,
      'http',
      response.body,
      context,
    );
  }

  const parsed = input.parse(response.body);
  if (parsed === undefined) {
    throw new CollaboratorCallError(
      `${input.collaborator} returned an unexpected payload`,
      response.status,
      'invalid_response',
      response.body,
      context,
    );
  }

  return parsed;
}

export function toFailureOutcome(error: unknown): StepFailureOutcome {
  if (!(error instanceof CollaboratorCallError)) {
    return failure('internal_error', error instanceof Error ? error.message : String(error));
  }

  switch (error.errorCode) {
    case 'deadline':
      return failure('deadline_exceeded', error.message);
    case 'timeout':
      return failure('timeout', error.message, { retryable: true });
    case 'network':
      return failure('network_error', error.message, { retryable: true });
    case 'invalid_response':
      return failure('invalid_response', error.message, { statusCode: error.statusCode });
    case 'http':
      return failure(resolveHttpReason(error.statusCode), error.message, {
        retryable: error.statusCode >= 500,
        statusCode: error.statusCode,
      });
  }
}

function resolveHttpReason(statusCode: number): 'not_found' | 'declined' | 'rejected' | 'http_error' {
  if (statusCode === 404) {
    return 'not_found';
  }

  if (statusCode === 402) {
    return 'declined';
  }

  return statusCode >= 400 && statusCode < 500 ? 'rejected' : 'http_error';
}
