import {
  CurrencyService,
  parseRates,
  UnsupportedCurrencyError,
} from '@/modules/collaborators/currency/currency.service';

describe('CurrencyService', () => {
  const service = new CurrencyService({ USD: 1, EUR: 0.9, JPY: 150 });

  it('converts through the base currency in whole cents', () => {
    expect(service.convert({ currencyCode: 'USD', amount: 10 }, 'EUR')).toEqual({
      currencyCode: 'EUR',
      amount: 9,
    });
    expect(service.convert({ currencyCode: 'EUR', amount: 9 }, 'USD')).toEqual({
      currencyCode: 'USD',
      amount: 10,
    });
  });

  it('converts between two non-base currencies', () => {
    expect(service.convert({ currencyCode: 'EUR', amount: 1.8 }, 'JPY')).toEqual({
      currencyCode: 'JPY',
      amount: 300,
    });
  });

  it('returns the same amount for the same currency', () => {
    expect(service.convert({ currencyCode: 'JPY', amount: 120 }, 'JPY')).toEqual({
      currencyCode: 'JPY',
      amount: 120,
    });
  });

  it('rejects unknown currencies', () => {
    expect(() => service.convert({ currencyCode: 'USD', amount: 1 }, 'XTS')).toThrow(
      UnsupportedCurrencyError,
    );
  });

  it('loads the bundled rate table', () => {
    const bundled = new CurrencyService();

    expect(bundled.supportedCurrencies()).toHaveLength(12);
    expect(bundled.supportedCurrencies()[0]).toBe('AUD');
    expect(bundled.convert({ currencyCode: 'USD', amount: 100 }, 'EUR')).toEqual({
      currencyCode: 'EUR',
      amount: 92,
    });
  });

  it('refuses a rate table with non-positive rates', () => {
    expect(() => parseRates({ rates: { USD: 1, EUR: 0 } })).toThrow(
      'Invalid rate for EUR in data/currency-rates.json',
    );
  });
});
