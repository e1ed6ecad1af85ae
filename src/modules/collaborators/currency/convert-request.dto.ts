import { Type } from 'class-transformer';
import { Matches, ValidateNested } from 'class-validator';
import { MoneyDto } from '../shared/money.dto';

export class ConvertRequestDto {
  @ValidateNested()
  @Type(() => MoneyDto)
  from!: MoneyDto;

  @Matches(/^[A-Z]{3}$/)
  toCurrency!: string;
}
