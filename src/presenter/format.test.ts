import { describe, expect, it } from 'vitest';
import { formatCurrency, formatPercent } from './format';

describe('formatCurrency', () => {
  it('groups thousands and keeps two decimals', () => {
    expect(formatCurrency(1234.5)).toBe('$1,234.50');
    expect(formatCurrency(1234567.891)).toBe('$1,234,567.89');
    expect(formatCurrency(0.02)).toBe('$0.02');
  });
});

describe('formatPercent', () => {
  it('rounds to one decimal place', () => {
    expect(formatPercent((10 / 15) * 100)).toBe('66.7%');
    expect(formatPercent((5 / 15) * 100)).toBe('33.3%');
    expect(formatPercent(100)).toBe('100.0%');
  });
});
