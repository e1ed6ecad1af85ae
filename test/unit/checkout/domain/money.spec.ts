import {
  addMoney,
  fromCents,
  multiplyMoney,
  parseMoney,
  sumMoney,
  toCents,
} from '@/modules/checkout/domain';

describe('money', () => {
  it('adds amounts in whole cents', () => {
    expect(addMoney({ currencyCode: 'USD', amount: 10.1 }, { currencyCode: 'USD', amount: 0.2 })).toEqual({
      currencyCode: 'USD',
      amount: 10.3,
    });
  });

  it('refuses to add different currencies', () => {
    expect(() =>
      addMoney({ currencyCode: 'USD', amount: 1 }, { currencyCode: 'EUR', amount: 1 }),
    ).toThrow('Cannot add EUR to USD');
  });

  it('multiplies a unit price by a quantity', () => {
    expect(multiplyMoney({ currencyCode: 'USD', amount: 19.99 }, 3)).toEqual({
      currencyCode: 'USD',
      amount: 59.97,
    });
  });

  it('sums to zero when there is nothing to sum', () => {
    expect(sumMoney('GBP', [])).toEqual({ currencyCode: 'GBP', amount: 0 });
  });

  it('converts between amounts and cents', () => {
    expect(toCents(12.5)).toBe(1250);
    expect(fromCents('JPY', 1250)).toEqual({ currencyCode: 'JPY', amount: 12.5 });
  });

  describe('parseMoney', () => {
    it('accepts numeric strings and rounds to cents', () => {
      expect(parseMoney({ currencyCode: 'EUR', amount: '3.456' })).toEqual({
        currencyCode: 'EUR',
        amount: 3.46,
      });
    });

    it('rejects negative amounts', () => {
      expect(parseMoney({ currencyCode: 'EUR', amount: -1 })).toBeUndefined();
    });

    it('rejects malformed currency codes', () => {
      expect(parseMoney({ currencyCode: 'usd', amount: 1 })).toBeUndefined();
    });

    it('rejects payloads that are not objects', () => {
      expect(parseMoney('12.00 USD')).toBeUndefined();
      expect(parseMoney(null)).toBeUndefined();
    });
  });
});
