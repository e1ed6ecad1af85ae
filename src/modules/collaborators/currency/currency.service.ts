import { Inject, Injectable, Optional } from '@nestjs/common';
import { isRecord } from '../../../common/utils/object.utils';
import { fromCents, isCurrencyCode, toCents, type Money } from '../../checkout/domain';
import { loadJsonDataFile } from '../shared/data-loader';

export const CURRENCY_RATES_DATA = Symbol('CURRENCY_RATES_DATA');
export const CURRENCY_RATES_FILE = 'data/currency-rates.json';

/** Units of each currency per one unit of the base currency. */
export type CurrencyRates = Record<string, number>;

export class UnsupportedCurrencyError extends Error {
  constructor(public readonly currencyCode: string) {
    super(`Unsupported currency: ${currencyCode}`);
    this.name = 'UnsupportedCurrencyError';
  }
}

@Injectable()
export class CurrencyService {
  private readonly rates: CurrencyRates;

  constructor(
    @Optional()
    @Inject(CURRENCY_RATES_DATA)
    rates?: CurrencyRates,
  ) {
    this.rates = rates ?? parseRates(loadJsonDataFile(CURRENCY_RATES_FILE));
  }

  supportedCurrencies(): string[] {
    return Object.keys(this.rates).sort();
  }

  convert(from: Money, toCurrency: string): Money {
    const fromRate = this.rateOf(from.currencyCode);
    const toRate = this.rateOf(toCurrency);

    if (from.currencyCode === toCurrency) {
      return fromCents(toCurrency, toCents(from.amount));
    }

    return fromCents(toCurrency, Math.round((toCents(from.amount) / fromRate) * toRate));
  }

  private rateOf(currencyCode: string): number {
    const rate = this.rates[currencyCode];
    if (rate === undefined) {
      throw new UnsupportedCurrencyError(currencyCode);
    }

    return rate;
  }
}

export function parseRates(input: unknown): CurrencyRates {
  if (!isRecord(input) || !isRecord(input.rates)) {
    throw new Error(`${CURRENCY_RATES_FILE} must contain a "rates" object`);
  }

  const rates: CurrencyRates = {};
  for (const [code, value] of Object.entries(input.rates)) {
    if (!isCurrencyCode(code) || typeof value !== 'number' || !(value > 0)) {
      throw new Error(`Invalid rate for ${code} in ${CURRENCY_RATES_FILE}`);
    }
    rates[code] = value;
  }

  return rates;
}
