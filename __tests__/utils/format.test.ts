import { describe, expect, it } from 'vitest';
import {
  formatDifference,
  formatHoverLabel,
  formatRounded,
  formatTick,
  formatValue,
} from 'src/utils/format';

describe('number formatting', () => {
  it('keeps three significant digits for hover values', () => {
    expect(formatValue(1234.5)).toBe('1,230');
    expect(formatValue(0.123456)).toBe('0.123');
  });

  it('uses the locale separators', () => {
    expect(formatRounded(12345.6, 'en-US')).toBe('12,346');
    expect(formatTick(2500.5)).toBe('2,500.5');
  });

  it('signs positive differences', () => {
    expect(formatDifference(120.4)).toBe('+120');
    expect(formatDifference(-75)).toBe('-75');
    expect(formatDifference(0)).toBe('0');
  });

  it('builds hover labels with an optional unit', () => {
    expect(formatHoverLabel('2030', 42, 'GWh')).toBe('2030: 42 GWh');
    expect(formatHoverLabel('2030', 42, undefined)).toBe('2030: 42');
  });
});
