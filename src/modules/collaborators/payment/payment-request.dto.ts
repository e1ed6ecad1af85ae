import { Type } from 'class-transformer';
import { IsNotEmpty, IsString, MaxLength, ValidateNested } from 'class-validator';
import { MoneyDto } from '../shared/money.dto';

export class ChargeRequestDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  orderId!: string;

  @ValidateNested()
  @Type(() => MoneyDto)
  amount!: MoneyDto;

  @IsString()
  @IsNotEmpty()
  @MaxLength(256)
  paymentToken!: string;
}

export class ReversalRequestDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  orderId!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  transactionId!: string;

  @ValidateNested()
  @Type(() => MoneyDto)
  amount!: MoneyDto;
}
