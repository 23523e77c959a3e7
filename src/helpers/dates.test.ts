import { describe, it, expect } from 'vitest';
import { isIsoDate, measurementYear, parseIsoDate } from './dates';

describe('dates', () => {
  it('reads the measurement year', () => {
    expect(measurementYear('2025-09-30')).toBe(2025);
  });

  it('rejects impossible dates', () => {
    expect(() => parseIsoDate('current_date', '2025-02-30')).toThrow(/current_date/);
    expect(() => parseIsoDate('current_date', '09/30/2025')).toThrow(/YYYY-MM-DD/);
  });

  it('recognizes ISO dates', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2023-02-29')).toBe(false);
    expect(isIsoDate(20240930)).toBe(false);
  });
});
