/**
 * Scope filtering and dataset overview.
 *
 * Scope (month / team / dealer / store) narrows the rows handed to an
 * analyzer; it is applied by the caller, never by the analyzers themselves.
 */

import { ALL_MONTHS } from "../query-parser/types.js";
import { monthLabelOf } from "../query-parser/calendar.js";
import { nps } from "../metrics/nps.js";
import type { SurveyDataset, SurveyRow } from "./types.js";

export interface DatasetScope {
  analysis_month?: string;
  team?: string;
  dealer_name?: string;
  store_name?: string;
}

export interface DatasetSummary {
  total_rows: number;
  /** null when no row carries a usable date */
  date_range: { start: string; end: string } | null;
  teams: number;
  stores: number;
  agents: number;
  nps: number;
  analysis_months: string[];
}

/** '전체' on any scope field means no filter on it */
function scoped(value: string | undefined): string | undefined {
  return value && value !== ALL_MONTHS ? value : undefined;
}

export function applyScope(dataset: SurveyDataset, scope: DatasetScope): SurveyDataset {
  const month = scoped(scope.analysis_month);
  const team = scoped(scope.team);
  const dealer = scoped(scope.dealer_name);
  const store = scoped(scope.store_name);

  const matches = (row: SurveyRow): boolean => {
    if (month !== undefined && (row.processed_date === null || monthLabelOf(row.processed_date) !== month)) {
      return false;
    }
    if (team !== undefined && row.team !== team) return false;
    if (dealer !== undefined && row.dealer_name !== dealer) return false;
    if (store !== undefined && row.store_name !== store) return false;
    return true;
  };

  return { columns: dataset.columns, rows: dataset.rows.filter(matches) };
}

/**
 * Distinct "YYYY년 MM월" labels, newest first
 */
export function listAnalysisMonths(dataset: SurveyDataset): string[] {
  const months = new Set<string>();
  for (const row of dataset.rows) {
    if (row.processed_date !== null) months.add(monthLabelOf(row.processed_date));
  }
  return [...months].sort().reverse();
}

export function summarizeDataset(dataset: SurveyDataset): DatasetSummary {
  const dates = dataset.rows.flatMap(r => (r.processed_date === null ? [] : [r.processed_date])).sort();

  return {
    total_rows: dataset.rows.length,
    date_range: dates.length > 0 ? { start: dates[0], end: dates[dates.length - 1] } : null,
    teams: new Set(dataset.rows.map(r => r.team)).size,
    stores: new Set(dataset.rows.map(r => r.store_name)).size,
    agents: new Set(dataset.rows.map(r => r.agent_id)).size,
    nps: nps(dataset.rows.map(r => r.score)),
    analysis_months: listAnalysisMonths(dataset),
  };
}
