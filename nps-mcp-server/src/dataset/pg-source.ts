import { executeReadOnlyQuery } from '../db/pool.js';
import type { DatasetColumnMap } from '../config-loader.js';
import { logger } from '../../../shared/observability/src/logger.js';
import { buildDataset } from './row-coercion.js';
import type { SurveyDataset, SurveySource } from './types.js';

/**
 * Survey rows from a PostgreSQL table, read inside a read-only transaction
 * behind the database circuit breaker.
 */
export class PgSurveySource implements SurveySource {
  readonly name: string;

  constructor(
    private readonly table: string,
    private readonly columnMap: DatasetColumnMap
  ) {
    this.name = `postgres:${table}`;
  }

  async load(): Promise<SurveyDataset> {
    const startTime = Date.now();
    // Table name is validated as a plain identifier by the rules schema
    const result = await executeReadOnlyQuery(`SELECT * FROM ${this.table}`);
    const headers = result.fields.map(field => field.name);
    const { columns, rows, excluded } = buildDataset(headers, result.rows, this.columnMap);

    logger.info('Survey dataset loaded', {
      source: this.name,
      rows: rows.length,
      excluded,
      duration_ms: Date.now() - startTime,
    });

    return { columns, rows };
  }
}
