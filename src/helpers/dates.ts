/**
 * Measurement date helpers. Dates are YYYY-MM-DD strings interpreted as UTC.
 */

import { ConfigurationError } from '../errors';
import type { IsoDate } from '../types/valuation';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a YYYY-MM-DD string, rejecting impossible calendar dates.
 */
export function parseIsoDate(field: string, value: string): Date {
  const match = ISO_DATE.exec(value);
  if (!match) {
    throw new ConfigurationError(field, value, 'must be a date formatted YYYY-MM-DD');
  }
  const date = new Date(value + 'T00:00:00Z');
  if (
    Number.isNaN(date.getTime()) ||
    date.getUTCFullYear() !== Number(match[1]) ||
    date.getUTCMonth() + 1 !== Number(match[2]) ||
    date.getUTCDate() !== Number(match[3])
  ) {
    throw new ConfigurationError(field, value, 'is not a valid calendar date');
  }
  return date;
}

export function isIsoDate(value: unknown): value is IsoDate {
  if (typeof value !== 'string') return false;
  try {
    parseIsoDate('date', value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Year of the measurement date; the vintage of amounts arising in that period.
 */
export function measurementYear(date: IsoDate): number {
  return parseIsoDate('date', date).getUTCFullYear();
}
