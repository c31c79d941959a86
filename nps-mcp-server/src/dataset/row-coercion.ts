/**
 * Raw record -> SurveyRow coercion.
 *
 * Sources hand over header-keyed records exactly as read. Values that
 * cannot be coerced become null rather than failing the load.
 */

import type { DatasetColumnMap } from '../config-loader.js';
import { isoDate, lastDayOfMonth } from '../query-parser/calendar.js';
import type { Score } from '../metrics/nps.js';
import { DatasetSchemaError, REQUIRED_COLUMNS, SURVEY_COLUMNS, type SurveyColumn, type SurveyRow } from './types.js';

export type RawRecord = Record<string, unknown>;

const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

function validDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > lastDayOfMonth(year, month)) return null;
  return isoDate(year, month, day);
}

/**
 * YYYYMMDD (string or number), YYYY-MM-DD[...] or a Date -> ISO date
 */
export function coerceDate(value: unknown): string | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    // pg materialises DATE columns at local midnight
    return isoDate(value.getFullYear(), value.getMonth() + 1, value.getDate());
  }

  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const text = String(value).trim();
  const match = text.match(COMPACT_DATE) ?? text.match(ISO_DATE);
  if (!match) return null;

  return validDate(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10));
}

export function coerceScore(value: unknown): Score {
  let num: number;
  if (typeof value === 'number') {
    num = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    num = Number(value.trim());
  } else {
    return null;
  }
  return Number.isFinite(num) && num >= 0 && num <= 10 ? num : null;
}

function text(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

/**
 * Logical columns present in a header row
 */
export function detectColumns(headers: readonly string[], columnMap: DatasetColumnMap): SurveyColumn[] {
  const present = new Set(headers.map(h => h.trim()));
  return SURVEY_COLUMNS.filter(column => present.has(columnMap[column]));
}

export function assertRequiredColumns(columns: readonly SurveyColumn[], columnMap: DatasetColumnMap): void {
  const missing = REQUIRED_COLUMNS.filter(c => !columns.includes(c)).map(c => columnMap[c]);
  if (missing.length > 0) {
    throw new DatasetSchemaError(`Survey data is missing required columns: ${missing.join(', ')}`, missing);
  }
}

/**
 * Coerce one record; null when the row is flagged as excluded.
 * A record without an exclusion value at all is kept.
 */
export function coerceSurveyRecord(record: RawRecord, columnMap: DatasetColumnMap): SurveyRow | null {
  const excluded = record[columnMap.excluded];
  if (excluded !== undefined && text(excluded).toUpperCase() !== 'N') {
    return null;
  }

  return {
    processed_date: coerceDate(record[columnMap.processed_date]),
    score: coerceScore(record[columnMap.score]),
    agent_id: text(record[columnMap.agent_id]),
    agent_name: text(record[columnMap.agent_name]),
    dealer_name: text(record[columnMap.dealer_name]),
    store_name: text(record[columnMap.store_name]),
    team: text(record[columnMap.team]),
    is_senior: text(record[columnMap.is_senior]).toUpperCase() === 'Y',
  };
}

/**
 * Full record set -> dataset, validating the header first
 */
export function buildDataset(
  headers: readonly string[],
  records: Iterable<RawRecord>,
  columnMap: DatasetColumnMap
): { columns: SurveyColumn[]; rows: SurveyRow[]; excluded: number } {
  const columns = detectColumns(headers, columnMap);
  assertRequiredColumns(columns, columnMap);

  const rows: SurveyRow[] = [];
  let excluded = 0;
  for (const record of records) {
    const row = coerceSurveyRecord(record, columnMap);
    if (row) rows.push(row);
    else excluded++;
  }
  return { columns, rows, excluded };
}
