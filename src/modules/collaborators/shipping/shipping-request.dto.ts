import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsNotEmpty,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { CheckoutItemDto, ShippingAddressDto } from '../../checkout/dto/checkout-request.dto';

export class QuoteRequestDto {
  @ValidateNested()
  @Type(() => ShippingAddressDto)
  address!: ShippingAddressDto;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => CheckoutItemDto)
  items!: CheckoutItemDto[];
}

export class ShipRequestDto extends QuoteRequestDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  orderId!: string;
}
