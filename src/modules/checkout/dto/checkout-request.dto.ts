import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsEmail,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import type { CheckoutItem, CheckoutRequest, ShippingAddress } from '../domain';

export class CheckoutItemDto implements CheckoutItem {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  productId!: string;

  @IsInt()
  @Min(1)
  @Max(1000)
  quantity!: number;
}

export class ShippingAddressDto implements ShippingAddress {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  streetAddress!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  city!: string;

  @IsOptional()
  @IsString()
  @MaxLength(128)
  state?: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  country!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(32)
  zipCode!: string;
}

export class CheckoutRequestDto implements CheckoutRequest {
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  userId!: string;

  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(100)
  @ValidateNested({ each: true })
  @Type(() => CheckoutItemDto)
  items!: CheckoutItemDto[];

  @ValidateNested()
  @Type(() => ShippingAddressDto)
  shippingAddress!: ShippingAddressDto;

  @IsString()
  @IsNotEmpty()
  @MaxLength(256)
  paymentToken!: string;

  @IsString()
  @Matches(/^[A-Z]{3}$/)
  currencyCode!: string;

  @IsOptional()
  @IsEmail()
  email?: string;
}
