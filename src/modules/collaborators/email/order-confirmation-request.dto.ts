import { IsEmail, IsNotEmpty, IsObject, IsOptional, IsString, MaxLength } from 'class-validator';

export class OrderConfirmationRequestDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  userId!: string;

  @IsOptional()
  @IsEmail()
  email?: string;

  @IsObject()
  order!: Record<string, unknown>;
}
