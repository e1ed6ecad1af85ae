export type FailureReason =
  | 'timeout'
  | 'deadline_exceeded'
  | 'not_found'
  | 'declined'
  | 'rejected'
  | 'http_error'
  | 'network_error'
  | 'invalid_response'
  | 'currency_mismatch'
  | 'internal_error';

export interface StepSuccess<T> {
  ok: true;
  value: T;
}

export interface StepFailureOutcome {
  ok: false;
  reason: FailureReason;
  retryable: boolean;
  message: string;
  statusCode?: number;
}

/**
 * Result of one collaborator call. `retryable` is informational only:
 * no caller ever retries.
 */
export type StepOutcome<T> = StepSuccess<T> | StepFailureOutcome;

export function success<T>(value: T): StepSuccess<T> {
  return { ok: true, value };
}

export function failure(
  reason: FailureReason,
  message: string,
  options?: { retryable?: boolean; statusCode?: number },
): StepFailureOutcome {
  return {
    ok: false,
    reason,
    retryable: options?.retryable ?? false,
    message,
    ...(options?.statusCode !== undefined && { statusCode: options.statusCode }),
  };
}

export function deadlineExceeded(message = 'checkout deadline exceeded'): StepFailureOutcome {
  return failure('deadline_exceeded', message);
}
