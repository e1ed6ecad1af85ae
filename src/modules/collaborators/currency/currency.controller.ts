import { BadRequestException, Body, Controller, Get, HttpCode, Post } from '@nestjs/common';
import type { Money } from '../../checkout/domain';
import { ConvertRequestDto } from './convert-request.dto';
import { CurrencyService, UnsupportedCurrencyError } from './currency.service';

@Controller()
export class CurrencyController {
  constructor(private readonly currency: CurrencyService) {}

  @Get('currencies')
  list(): { currencyCodes: string[] } {
    return { currencyCodes: this.currency.supportedCurrencies() };
  }

  @Post('convert')
  @HttpCode(200)
  convert(@Body() body: ConvertRequestDto): Money {
    try {
      return this.currency.convert(body.from, body.toCurrency);
    } catch (error: unknown) {
      if (error instanceof UnsupportedCurrencyError) {
        throw new BadRequestException(error.message);
      }

      throw error;
    }
  }
}
