import { inRange, isPositive, isValidDateString } from '../validation';

describe('isValidDateString', () => {
  test('accepts real calendar dates', () => {
    expect(isValidDateString('2026-10-19')).toBe(true);
    expect(isValidDateString('2024-02-29')).toBe(true);
  });

  test('rejects impossible dates and other shapes', () => {
    expect(isValidDateString('2026-02-29')).toBe(false);
    expect(isValidDateString('2026-13-01')).toBe(false);
    expect(isValidDateString('2026-1-5')).toBe(false);
    expect(isValidDateString('19/10/2026')).toBe(false);
  });
});

describe('inRange / isPositive', () => {
  test('includes both bounds', () => {
    expect(inRange(30, 30, 200)).toBe(true);
    expect(inRange(200, 30, 200)).toBe(true);
    expect(inRange(200.1, 30, 200)).toBe(false);
  });

  test('rejects missing and non-finite values', () => {
    expect(inRange(null, 0, 1)).toBe(false);
    expect(inRange(NaN, 0, 1)).toBe(false);
    expect(isPositive(undefined)).toBe(false);
    expect(isPositive(0)).toBe(false);
    expect(isPositive(0.1)).toBe(true);
  });
});
