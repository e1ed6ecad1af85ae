/**
 * User-facing error messages shared by every service.
 */

export const BACKEND_ERROR_MESSAGE = 'Unexpected error while processing the request.';

export const INVALID_PAYLOAD_MESSAGE = 'Invalid payload.';

export const NOT_FOUND_MESSAGE = 'Resource not found.';

export const TOO_MANY_REQUESTS_MESSAGE = 'Too many requests, retry later.';
