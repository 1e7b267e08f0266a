import { describe, it, expect } from 'vitest';
import { fiscalYearLabel, formatCompact, formatSignedPct, padRight } from '../src/output/format-utils.js';

describe('formatCompact', () => {
  it('uses T/B/M/K suffixes with one decimal', () => {
    expect(formatCompact(2_500_000_000_000)).toBe('$2.5T');
    expect(formatCompact(3_498_272_000)).toBe('$3.5B');
    expect(formatCompact(192_340_000)).toBe('$192.3M');
    expect(formatCompact(5_000)).toBe('$5.0K');
  });

  it('keeps two decimals below a thousand', () => {
    expect(formatCompact(4.22)).toBe('$4.22');
    expect(formatCompact(0)).toBe('$0.00');
  });

  it('puts the sign before the prefix', () => {
    expect(formatCompact(-62_800_000)).toBe('-$62.8M');
  });

  it('supports custom prefix and suffix', () => {
    expect(formatCompact(45_200_000, '')).toBe('45.2M');
    expect(formatCompact(12.5, '', '%')).toBe('12.50%');
  });

  it('renders N/A for absent values', () => {
    expect(formatCompact(null)).toBe('N/A');
    expect(formatCompact(undefined)).toBe('N/A');
    expect(formatCompact(Number.NaN)).toBe('N/A');
  });
});

describe('formatSignedPct', () => {
  it('always carries a sign', () => {
    expect(formatSignedPct(9.3)).toBe('+9.3%');
    expect(formatSignedPct(-4)).toBe('-4.0%');
    expect(formatSignedPct(0)).toBe('+0.0%');
  });
});

describe('fiscalYearLabel', () => {
  it('labels by period-end year', () => {
    expect(fiscalYearLabel('2024-12-31')).toBe('FY2024');
  });
});

describe('padRight', () => {
  it('ignores ANSI escapes when padding', () => {
    expect(padRight('\x1b[36mabc\x1b[0m', 5)).toBe('\x1b[36mabc\x1b[0m  ');
    expect(padRight('abcdef', 3)).toBe('abcdef');
  });
});
