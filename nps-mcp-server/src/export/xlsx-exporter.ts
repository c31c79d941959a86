import { mkdir, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import * as XLSX from 'xlsx';
import { logger } from '../../../shared/observability/src/logger.js';
import type { CellValue, TableExport } from './table-columns.js';

export const DEFAULT_SHEET_NAME = '분석결과';

const COLUMN_WIDTH = { MIN: 8, MAX: 40 };
const SHEET_NAME_MAX_LENGTH = 31;

/**
 * Width from the header and the first 100 values of each column
 */
function columnWidths(headers: readonly string[], rows: readonly CellValue[][]): Array<{ wch: number }> {
  return headers.map((header, index) => {
    let max = header.length;
    for (const row of rows.slice(0, 100)) {
      max = Math.max(max, String(row[index] ?? '').length);
    }
    return { wch: Math.min(Math.max(max + 2, COLUMN_WIDTH.MIN), COLUMN_WIDTH.MAX) };
  });
}

/**
 * Serialize one table to an in-memory .xlsx workbook
 */
export function exportTableToXlsx(table: TableExport, sheetName: string = DEFAULT_SHEET_NAME): Buffer {
  const workbook = XLSX.utils.book_new();
  const worksheet = XLSX.utils.aoa_to_sheet([table.headers, ...table.rows]);
  worksheet['!cols'] = columnWidths(table.headers, table.rows);
  XLSX.utils.book_append_sheet(workbook, worksheet, sheetName.substring(0, SHEET_NAME_MAX_LENGTH));

  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx', compression: true });
  return buffer;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * nps_agent_20260118_143022.xlsx
 */
export function exportFilename(table: string, now: Date = new Date()): string {
  const timestamp = [
    now.getFullYear(),
    pad2(now.getMonth() + 1),
    pad2(now.getDate()),
    '_',
    pad2(now.getHours()),
    pad2(now.getMinutes()),
    pad2(now.getSeconds()),
  ].join('');
  return `nps_${table}_${timestamp}.xlsx`;
}

export function resolveExportDir(env: NodeJS.ProcessEnv = process.env): string {
  return resolve(process.cwd(), env.EXPORT_DIR || 'exports');
}

export interface WrittenExport {
  file_path: string;
  bytes: number;
  rows: number;
}

export async function writeTableExport(
  table: TableExport,
  tableName: string,
  exportDir: string = resolveExportDir()
): Promise<WrittenExport> {
  await mkdir(exportDir, { recursive: true });

  const buffer = exportTableToXlsx(table);
  const filePath = join(exportDir, exportFilename(tableName));
  await writeFile(filePath, buffer);

  logger.info('Exported result table', { file_path: filePath, bytes: buffer.length, rows: table.rows.length });
  return { file_path: filePath, bytes: buffer.length, rows: table.rows.length };
}
