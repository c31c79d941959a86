/**
 * Survey Dataset Types
 */

import type { DatasetColumnMap } from '../config-loader.js';
import type { Score } from '../metrics/nps.js';

/** Logical column names; the physical header for each lives in the rules config. */
export type SurveyColumn = keyof DatasetColumnMap;

/**
 * One respondent record after coercion. Excluded rows never reach here.
 */
export interface SurveyRow {
  /** ISO YYYY-MM-DD; null when the source value could not be read as a date */
  processed_date: string | null;
  /** 0-10; null when the source value was not a usable score */
  score: Score;
  agent_id: string;
  agent_name: string;
  dealer_name: string;
  store_name: string;
  team: string;
  is_senior: boolean;
}

export interface SurveyDataset {
  /** Logical columns the source actually carried */
  columns: SurveyColumn[];
  rows: SurveyRow[];
}

export interface SurveySource {
  readonly name: string;
  load(): Promise<SurveyDataset>;
}

export const SURVEY_COLUMNS: readonly SurveyColumn[] = [
  'processed_date',
  'score',
  'agent_id',
  'agent_name',
  'dealer_name',
  'store_name',
  'team',
  'is_senior',
  'excluded',
];

/** Columns without which no analysis is possible */
export const REQUIRED_COLUMNS: readonly SurveyColumn[] = ['score', 'agent_id'];

export class DatasetSchemaError extends Error {
  constructor(
    message: string,
    public readonly missingColumns: string[] = []
  ) {
    super(message);
    this.name = 'DatasetSchemaError';
  }
}
