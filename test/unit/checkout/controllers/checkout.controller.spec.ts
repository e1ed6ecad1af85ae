import { HttpStatus } from '@nestjs/common';
import { resolveHttpStatus } from '@/modules/checkout/controllers/checkout.controller';

describe('resolveHttpStatus', () => {
  it('answers 200 for completed orders, with or without warnings', () => {
    expect(resolveHttpStatus({ status: 'Completed' })).toBe(HttpStatus.OK);
    expect(resolveHttpStatus({ status: 'CompletedWithWarnings' })).toBe(HttpStatus.OK);
  });

  it('answers 402 for failed payments', () => {
    expect(resolveHttpStatus({ status: 'PaymentFailed', reason: 'declined' })).toBe(
      HttpStatus.PAYMENT_REQUIRED,
    );
  });

  it('answers 504 when the deadline rejected the order', () => {
    expect(resolveHttpStatus({ status: 'Rejected', reason: 'deadline_exceeded' })).toBe(
      HttpStatus.GATEWAY_TIMEOUT,
    );
  });

  it('answers 409 for every other rejection', () => {
    expect(resolveHttpStatus({ status: 'Rejected', reason: 'catalog_miss' })).toBe(HttpStatus.CONFLICT);
    expect(resolveHttpStatus({ status: 'Rejected', reason: 'fraud_flagged' })).toBe(HttpStatus.CONFLICT);
  });
});
