export type CollaboratorName =
  | 'catalog'
  | 'shipping'
  | 'currency'
  | 'payment'
  | 'fraud-detection'
  | 'email'
  | 'accounting'
  | 'cart';

export type CollaboratorErrorCode = 'network' | 'timeout' | 'deadline' | 'http' | 'invalid_response';

export interface CollaboratorErrorContext {
  collaborator: CollaboratorName;
  endpointPath: string;
}

/**
 * Raised inside the HTTP client layer when a collaborator call fails.
 * Never crosses the adapter boundary: adapters turn it into a failed StepOutcome.
 */
export class CollaboratorCallError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: CollaboratorErrorCode,
    public readonly responseBody?: unknown,
    public readonly context?: CollaboratorErrorContext,
  ) {
    super(message);
    this.name = 'CollaboratorCallError';
  }
}
