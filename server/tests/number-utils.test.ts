import { parseDigits, toNullableInteger } from '../number-utils';

describe('parseDigits', () => {
  it('should strip currency and spaces from a price', () => {
    expect(parseDigits('49 900 zł')).toBe(49900);
  });

  it('should strip unit and thousands separators from a mileage', () => {
    expect(parseDigits(' 123 456 km ')).toBe(123456);
    expect(parseDigits('45,000 mi')).toBe(45000);
  });

  it('should drop every non-digit, including decimal marks', () => {
    expect(parseDigits('1.234,56 PLN')).toBe(123456);
  });

  it('should return null when no digits remain', () => {
    expect(parseDigits('Zapytaj o cenę')).toBeNull();
    expect(parseDigits('')).toBeNull();
    expect(parseDigits(null)).toBeNull();
    expect(parseDigits(undefined)).toBeNull();
  });
});

describe('toNullableInteger', () => {
  it('should keep whole numbers', () => {
    expect(toNullableInteger(49900)).toBe(49900);
    expect(toNullableInteger(0)).toBe(0);
  });

  it('should reject fractional and non-finite numbers', () => {
    expect(toNullableInteger(12.5)).toBeNull();
    expect(toNullableInteger(Number.NaN)).toBeNull();
    expect(toNullableInteger(Number.POSITIVE_INFINITY)).toBeNull();
  });

  it('should parse plain integer text', () => {
    expect(toNullableInteger('15000')).toBe(15000);
    expect(toNullableInteger('  15000 ')).toBe(15000);
    expect(toNullableInteger('15000.0')).toBe(15000);
    expect(toNullableInteger('-3')).toBe(-3);
  });

  it('should turn formatted or blank text into null', () => {
    expect(toNullableInteger('15 000')).toBeNull();
    expect(toNullableInteger('15,000')).toBeNull();
    expect(toNullableInteger('15000.5')).toBeNull();
    expect(toNullableInteger('')).toBeNull();
    expect(toNullableInteger('n/a')).toBeNull();
  });

  it('should turn non-numeric cells into null', () => {
    expect(toNullableInteger(null)).toBeNull();
    expect(toNullableInteger(undefined)).toBeNull();
    expect(toNullableInteger(true)).toBeNull();
    expect(toNullableInteger(new Date('2024-01-01T00:00:00Z'))).toBeNull();
  });
});
