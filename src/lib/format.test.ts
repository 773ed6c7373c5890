import { describe, expect, it } from 'vitest';
import { fileStamp, formatInt, formatMoney, formatPct, reportDate } from './format';

describe('Formatting', () => {
  it('groups thousands and keeps the sign', () => {
    expect(formatInt(-5241)).toBe('-5,241');
    expect(formatInt(2590)).toBe('2,590');
  });

  it('prints one decimal or N/A', () => {
    expect(formatPct(37.607)).toBe('37.6%');
    expect(formatPct(null)).toBe('N/A');
  });

  it('applies the currency label only at render time', () => {
    expect(formatMoney(17.93)).toBe('pkr17.93M');
  });

  it('formats report and file timestamps in local time', () => {
    const d = new Date(2025, 0, 3, 14, 7);
    expect(reportDate(d)).toBe('03-Jan-2025 14:07');
    expect(fileStamp(d)).toBe('20250103_1407');
  });
});
