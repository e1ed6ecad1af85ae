import { isRecord } from '../../../../common/utils/object.utils';

export interface Money {
  currencyCode: string;
  amount: number;
}

const CURRENCY_CODE_PATTERN = /^[A-Z]{3}$/;

export function isCurrencyCode(value: unknown): value is string {
  return typeof value === 'string' && CURRENCY_CODE_PATTERN.test(value);
}

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(currencyCode: string, cents: number): Money {
  return { currencyCode, amount: cents / 100 };
}

export function zeroMoney(currencyCode: string): Money {
  return { currencyCode, amount: 0 };
}

export function addMoney(left: Money, right: Money): Money {
  if (left.currencyCode !== right.currencyCode) {
    throw new Error(`Cannot add ${right.currencyCode} to ${left.currencyCode}`);
  }

  return fromCents(left.currencyCode, toCents(left.amount) + toCents(right.amount));
}

export function multiplyMoney(money: Money, factor: number): Money {
  return fromCents(money.currencyCode, toCents(money.amount) * factor);
}

export function sumMoney(currencyCode: string, values: readonly Money[]): Money {
  return values.reduce<Money>((total, value) => addMoney(total, value), zeroMoney(currencyCode));
}

/**
 * Reads a `{ currencyCode, amount }` payload coming from a collaborator.
 * Amounts are rounded to cents; negative or non-finite amounts are rejected.
 */
export function parseMoney(input: unknown): Money | undefined {
  if (!isRecord(input)) {
    return undefined;
  }

  const { currencyCode, amount } = input;
  if (!isCurrencyCode(currencyCode)) {
    return undefined;
  }

  const numeric = typeof amount === 'string' ? Number(amount) : amount;
  if (typeof numeric !== 'number' || !Number.isFinite(numeric) || numeric < 0) {
    return undefined;
  }

  return fromCents(currencyCode, toCents(numeric));
}
