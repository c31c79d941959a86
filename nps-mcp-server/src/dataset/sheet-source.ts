import { readFile } from 'fs/promises';
import * as XLSX from 'xlsx';
import type { DatasetColumnMap } from '../config-loader.js';
import { logger } from '../../../shared/observability/src/logger.js';
import { buildDataset, type RawRecord } from './row-coercion.js';
import { DatasetSchemaError, type SurveyDataset, type SurveySource } from './types.js';

/**
 * Survey rows from the first worksheet of an .xlsx or .csv export.
 */
export class SpreadsheetSurveySource implements SurveySource {
  readonly name: string;

  constructor(
    private readonly filePath: string,
    private readonly columnMap: DatasetColumnMap
  ) {
    this.name = `sheet:${filePath}`;
  }

  async load(): Promise<SurveyDataset> {
    const workbook = XLSX.read(await readFile(this.filePath), { type: 'buffer' });
    return parseWorkbook(workbook, this.columnMap, this.name);
  }
}

export function parseWorkbook(workbook: XLSX.WorkBook, columnMap: DatasetColumnMap, sourceName = 'workbook'): SurveyDataset {
  const [firstSheet] = workbook.SheetNames;
  const sheet = firstSheet === undefined ? undefined : workbook.Sheets[firstSheet];
  if (!sheet) {
    throw new DatasetSchemaError(`${sourceName} contains no worksheet`);
  }

  const [headerRow = []] = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, blankrows: false });
  const headers = headerRow.map(cell => String(cell ?? '').trim());
  const records = XLSX.utils.sheet_to_json<RawRecord>(sheet, { defval: null });

  const { columns, rows, excluded } = buildDataset(headers, records, columnMap);
  logger.info('Survey dataset loaded', { source: sourceName, rows: rows.length, excluded });

  return { columns, rows };
}
