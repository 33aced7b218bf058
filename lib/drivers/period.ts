import { InvalidPeriodError } from './errors';

/**
 * Period helpers.
 *
 * Persisted periods are `YYYYMM` (monthly) or `YYYY` (annual).
 */

export interface Period {
  year: number;
  month: number | null;
}

export function assertYear(year: number): void {
  if (!Number.isInteger(year) || year < 1000 || year > 9999) {
    throw new InvalidPeriodError(`Invalid year: ${year}`);
  }
}

export function assertMonth(month: number): void {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new InvalidPeriodError(`Invalid month: ${month} (expected 1-12)`);
  }
}

export function formatPeriod(year: number, month: number | null): string {
  assertYear(year);
  if (month === null) return String(year);
  assertMonth(month);
  return `${year}${String(month).padStart(2, '0')}`;
}

export function parsePeriod(period: string): Period {
  const trimmed = period.trim();
  if (!/^\d{4}(\d{2})?$/.test(trimmed)) {
    throw new InvalidPeriodError(`Invalid period: "${period}" (expected YYYY or YYYYMM)`);
  }

  const year = Number(trimmed.slice(0, 4));
  if (trimmed.length === 4) return { year, month: null };

  const month = Number(trimmed.slice(4, 6));
  assertMonth(month);
  return { year, month };
}

export function daysInMonth(year: number, month: number): number {
  // Day 0 of the next month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function hoursInMonth(year: number, month: number): number {
  return daysInMonth(year, month) * 24;
}

export const MONTHS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12] as const;
