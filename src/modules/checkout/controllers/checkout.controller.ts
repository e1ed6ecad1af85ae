import { Body, Controller, HttpStatus, Post, Req, Res, UseGuards } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import type { Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import { CheckoutUseCase } from '../application/use-cases/checkout';
import type { Order } from '../domain';
import { CheckoutRequestDto } from '../dto/checkout-request.dto';

@Controller('api')
export class CheckoutController {
  constructor(private readonly checkout: CheckoutUseCase) {}

  @Post('checkout')
  @UseGuards(ThrottlerGuard)
  async placeOrder(
    @Body() body: CheckoutRequestDto,
    @Req() request: Request,
    @Res({ passthrough: true }) response: Response,
  ): Promise<Order> {
    const order = await this.checkout.execute(body, {
      requestId: request.requestId ?? randomUUID(),
      parentContext: request.traceContext,
    });

    response.status(resolveHttpStatus(order));
    return order;
  }
}

export function resolveHttpStatus(order: Pick<Order, 'status' | 'reason'>): HttpStatus {
  switch (order.status) {
    case 'Completed':
    case 'CompletedWithWarnings':
      return HttpStatus.OK;
    case 'PaymentFailed':
      return HttpStatus.PAYMENT_REQUIRED;
    case 'Rejected':
      return order.reason === 'deadline_exceeded' ? HttpStatus.GATEWAY_TIMEOUT : HttpStatus.CONFLICT;
  }
}
