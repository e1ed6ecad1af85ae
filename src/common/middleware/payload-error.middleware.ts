import { HttpException } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { INVALID_PAYLOAD_MESSAGE } from '../constants/error-messages.constants';
import { isRecord } from '../utils/object.utils';

/**
 * Body parser failures (`entity.parse.failed`, `entity.too.large`, ...) keep
 * their 4xx status but never their parser text.
 */
export function payloadErrorMiddleware(
  error: unknown,
  _req: Request,
  _res: Response,
  next: NextFunction,
): void {
  if (
    isRecord(error) &&
    typeof error.type === 'string' &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  ) {
    next(new HttpException(INVALID_PAYLOAD_MESSAGE, error.status));
    return;
  }

  next(error);
}
