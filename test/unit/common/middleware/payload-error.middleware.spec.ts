import { HttpException } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { payloadErrorMiddleware } from '@/common/middleware/payload-error.middleware';

function run(error: unknown): jest.Mock {
  const next = jest.fn();
  payloadErrorMiddleware(error, {} as Request, {} as Response, next as NextFunction);
  return next;
}

describe('payloadErrorMiddleware', () => {
  it('replaces a JSON parse error with the generic payload message', () => {
    const parseError = Object.assign(new SyntaxError('Unexpected end of JSON input'), {
      type: 'entity.parse.failed',
      status: 400,
    });

    const forwarded: unknown = run(parseError).mock.calls[0][0];

    expect(forwarded).toBeInstanceOf(HttpException);
    expect(forwarded instanceof HttpException && forwarded.getStatus()).toBe(400);
    expect(forwarded instanceof HttpException && forwarded.getResponse()).toBe('Invalid payload.');
  });

  it('keeps the status of an oversized body', () => {
    const tooLarge = Object.assign(new Error('request entity too large'), {
      type: 'entity.too.large',
      status: 413,
    });

    const forwarded: unknown = run(tooLarge).mock.calls[0][0];

    expect(forwarded instanceof HttpException && forwarded.getStatus()).toBe(413);
  });

  it('passes other errors through untouched', () => {
    const error = new Error('socket hang up');

    expect(run(error)).toHaveBeenCalledWith(error);
  });
});
