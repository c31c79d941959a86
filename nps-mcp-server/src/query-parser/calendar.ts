/**
 * Calendar helpers for period extraction and month scoping.
 *
 * Dates are plain ISO calendar dates (YYYY-MM-DD). No time of day or
 * timezone is involved, so comparisons are lexicographic string compares.
 */

export interface YearMonth {
  year: number;
  month: number;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function isValidMonth(month: number): boolean {
  return Number.isInteger(month) && month >= 1 && month <= 12;
}

/**
 * Last day of the month (28-31), leap years included
 */
export function lastDayOfMonth(year: number, month: number): number {
  // Day 0 of the following month
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function isoDate(year: number, month: number, day: number): string {
  return `${year}-${pad2(month)}-${pad2(day)}`;
}

/**
 * Parse an analysis-month label such as "2025년 09월" or "2025년 9월"
 */
export function parseMonthLabel(label: string | undefined): YearMonth | null {
  if (!label) return null;
  const match = label.match(/(\d{4})년\s*(\d{1,2})월/);
  if (!match) return null;
  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  return isValidMonth(month) ? { year, month } : null;
}

/**
 * "2025-09-14" -> "2025년 09월"
 */
export function monthLabelOf(date: string): string {
  return `${date.slice(0, 4)}년 ${date.slice(5, 7)}월`;
}

export function isWithin(date: string, start: string, end: string): boolean {
  return date >= start && date <= end;
}
