import { describe, it, expect } from 'vitest';
import { formatNumber, formatValue } from '../src/format';

describe('formatValue', () => {
  it('renders integral values without a decimal point', () => {
    expect(formatValue(10)).toBe('10');
    expect(formatValue(10.0)).toBe('10');
    expect(formatValue(-3)).toBe('-3');
    expect(formatValue(0)).toBe('0');
  });

  it('prints very large integers in full', () => {
    expect(formatValue(1e21)).toBe('1000000000000000000000');
    expect(formatValue(-2e21)).toBe('-2000000000000000000000');
  });

  it('keeps at most two decimals and trims trailing zeros', () => {
    expect(formatValue(0.5)).toBe('0.5');
    expect(formatValue(3.14)).toBe('3.14');
    expect(formatValue(3.14159)).toBe('3.14');
    expect(formatValue(-2.5)).toBe('-2.5');
    expect(formatValue(10.1)).toBe('10.1');
  });

  it('drops the decimal point when rounding leaves none', () => {
    expect(formatValue(2.999)).toBe('3');
    expect(formatValue(-0.001)).toBe('0');
  });
});

describe('formatNumber', () => {
  it('formats fractional geometry compactly', () => {
    expect(formatNumber(472 / 3)).toBe('157.33');
    expect(formatNumber(14)).toBe('14');
    expect(formatNumber(0.1 + 0.2)).toBe('0.3');
    expect(formatNumber(-0)).toBe('0');
  });
});
