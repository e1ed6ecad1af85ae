import { IsNumber, Matches, Min } from 'class-validator';
import type { Money } from '../../checkout/domain';

export class MoneyDto implements Money {
  @Matches(/^[A-Z]{3}$/)
  currencyCode!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  amount!: number;
}
