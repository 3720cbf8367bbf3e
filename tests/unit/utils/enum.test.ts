import { isEnumValue, parseEnumValue } from '../../../src/utils/enum';
import { CurrencyKind, parseCurrencyKind } from '../../../src/services/currency/currency.types';
import { ApiError } from '../../../src/middlewares/errorHandler';

describe('enum helpers', () => {
  it('should parse a member value', () => {
    expect(parseEnumValue(CurrencyKind, 'paid', 'currency kind')).toBe(CurrencyKind.PAID);
    expect(parseCurrencyKind('free')).toBe(CurrencyKind.FREE);
  });

  it('should reject values by exact match only', () => {
    expect(() => parseCurrencyKind('PAID')).toThrow(ApiError);
    expect(() => parseCurrencyKind('PAID')).toThrow('invalid currency kind: PAID');
  });

  it('should guard unknown input', () => {
    expect(isEnumValue(CurrencyKind, 'free')).toBe(true);
    expect(isEnumValue(CurrencyKind, 3)).toBe(false);
    expect(isEnumValue(CurrencyKind, undefined)).toBe(false);
  });
});
