/**
 * Comparison period extraction
 *
 * Four mutually exclusive patterns, tried in order:
 *   1. "12월 대비 1월"          two single months
 *   2. "9~12월 대비 1월"        a month span against a single month
 *   3. "2일 (누적) 대비 5일"     cumulative days inside the analysis month
 *   4. nothing                 undefined
 */

import type { ComparisonPeriods, PeriodPair } from './types.js';
import { isoDate, isValidMonth, lastDayOfMonth, parseMonthLabel } from './calendar.js';

export const MISSING_MONTH_MESSAGE = '분석월을 선택해주세요';

const SINGLE_MONTH_PATTERN = /(?<![~\d])(\d+)월\s*대비\s*(\d+)월/;
const MONTH_SPAN_PATTERN = /(\d+)~(\d+)월\s*대비\s*(\d+)월/;
const DAY_PATTERN = /(\d+)일\s*(?:누적\s*)?대비\s*(\d+)일/;

/**
 * January to March belong to the year after the base year.
 */
export function yearForMonth(month: number, baseYear: number): number {
  return month <= 3 ? baseYear + 1 : baseYear;
}

function fullMonth(year: number, month: number) {
  return {
    start: isoDate(year, month, 1),
    end: isoDate(year, month, lastDayOfMonth(year, month)),
  };
}

function singleMonths(match: RegExpMatchArray, baseYear: number): PeriodPair | undefined {
  const baseMonth = parseInt(match[1], 10);
  const compareMonth = parseInt(match[2], 10);
  if (!isValidMonth(baseMonth) || !isValidMonth(compareMonth)) return undefined;

  return {
    kind: 'range',
    period1: fullMonth(yearForMonth(baseMonth, baseYear), baseMonth),
    period2: fullMonth(yearForMonth(compareMonth, baseYear), compareMonth),
    period1_label: `${baseMonth}월`,
    period2_label: `${compareMonth}월`,
  };
}

function monthSpan(match: RegExpMatchArray, baseYear: number): PeriodPair | undefined {
  const startMonth = parseInt(match[1], 10);
  const endMonth = parseInt(match[2], 10);
  const compareMonth = parseInt(match[3], 10);
  if (![startMonth, endMonth, compareMonth].every(isValidMonth) || startMonth > endMonth) {
    return undefined;
  }

  return {
    kind: 'range',
    period1: {
      start: isoDate(baseYear, startMonth, 1),
      end: isoDate(baseYear, endMonth, lastDayOfMonth(baseYear, endMonth)),
    },
    period2: fullMonth(yearForMonth(compareMonth, baseYear), compareMonth),
    period1_label: `${startMonth}~${endMonth}월`,
    period2_label: `${compareMonth}월`,
  };
}

function cumulativeDays(match: RegExpMatchArray, analysisMonth: string | undefined): ComparisonPeriods | undefined {
  const target = parseMonthLabel(analysisMonth);
  if (!target) {
    return { kind: 'error', message: MISSING_MONTH_MESSAGE };
  }

  const baseDay = parseInt(match[1], 10);
  const compareDay = parseInt(match[2], 10);
  const lastDay = lastDayOfMonth(target.year, target.month);

  // A day the month does not have is a malformed question, not an error
  if (baseDay < 1 || compareDay < 1 || baseDay > lastDay || compareDay > lastDay) {
    return undefined;
  }

  const { year, month } = target;
  return {
    kind: 'range',
    period1: { start: isoDate(year, month, 1), end: isoDate(year, month, baseDay) },
    period2: { start: isoDate(year, month, 1), end: isoDate(year, month, compareDay) },
    period1_label: `${month}월 ${baseDay}일 누적`,
    period2_label: `${month}월 ${compareDay}일 누적`,
  };
}

/**
 * Extract the baseline / comparison windows from a question.
 *
 * @param analysisMonth - "YYYY년 MM월" label; required by the day pattern only
 * @param baseYear - year anchoring month-only expressions
 */
export function extractComparisonPeriods(
  question: string,
  analysisMonth: string | undefined,
  baseYear: number
): ComparisonPeriods | undefined {
  const single = question.match(SINGLE_MONTH_PATTERN);
  if (single) return singleMonths(single, baseYear);

  const span = question.match(MONTH_SPAN_PATTERN);
  if (span) return monthSpan(span, baseYear);

  const days = question.match(DAY_PATTERN);
  if (days) return cumulativeDays(days, analysisMonth);

  return undefined;
}
