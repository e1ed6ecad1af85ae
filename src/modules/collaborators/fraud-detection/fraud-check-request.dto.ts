import { Type } from 'class-transformer';
import { IsArray, IsNotEmpty, IsString, MaxLength, ValidateNested } from 'class-validator';
import { CheckoutItemDto } from '../../checkout/dto/checkout-request.dto';
import { MoneyDto } from '../shared/money.dto';

export class FraudCheckRequestDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  orderId!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  userId!: string;

  @ValidateNested()
  @Type(() => MoneyDto)
  amount!: MoneyDto;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CheckoutItemDto)
  items!: CheckoutItemDto[];
}
