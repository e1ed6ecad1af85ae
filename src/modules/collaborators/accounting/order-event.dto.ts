import { IsIn, IsISO8601, IsNotEmpty, IsObject, IsString, MaxLength } from 'class-validator';
import type { OrderEventType } from '../../checkout/domain';

const ORDER_EVENT_TYPES: OrderEventType[] = [
  'order.completed',
  'order.rejected',
  'order.payment_failed',
];

export class OrderEventDto {
  @IsIn(ORDER_EVENT_TYPES)
  type!: OrderEventType;

  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  userId!: string;

  @IsISO8601()
  occurredAt!: string;

  @IsObject()
  order!: Record<string, unknown>;
}
