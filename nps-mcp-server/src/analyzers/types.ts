/**
 * Analyzer Result Types
 *
 * Every numeric column has a `_value` twin holding the number used for
 * filtering and sorting; the plain field is the display string. Display
 * strings are never parsed back.
 */

import type { StatusBand } from './status.js';

export type SummaryValue = string | number;

/** Ordered label -> value mapping */
export type Summary = Record<string, SummaryValue>;

/**
 * Store header plus its ordered agent rows
 */
export interface StoreAgentDetail<Row> {
  store_name: string;
  responses: number;
  agents: Row[];
}

export interface ResultBundle<AgentRow, StoreRow, Detail extends StoreAgentDetail<unknown>> {
  by_agent: AgentRow[];
  by_store: StoreRow[];
  /** Keyed by store name, in first-seen store order */
  store_agent_detail: Record<string, Detail>;
  summary: Summary;
  insights: string[];
}

export interface StatusColumns {
  vs_store_value: number;
  vs_store: string;
  status: StatusBand;
  status_label: string;
}

// ── Simple filter ─────────────────────────────────────────────────────────

export interface SimpleAgentRow {
  team: string;
  dealer_name: string;
  store_name: string;
  agent_id: string;
  agent_name: string;
  responses: number;
  promoters: number;
  detractors: number;
  /** 1 decimal */
  nps_value: number;
  nps: string;
  store_share_value: number;
  store_share: string;
}

export interface SimpleStoreRow {
  team: string;
  dealer_name: string;
  store_name: string;
  responses: number;
  promoters: number;
  detractors: number;
  nps_value: number;
  nps: string;
}

export interface SimpleDetailRow extends StatusColumns {
  agent_id: string;
  agent_name: string;
  responses: number;
  nps_value: number;
  nps: string;
  store_share_value: number;
  store_share: string;
}

export interface SimpleStoreDetail extends StoreAgentDetail<SimpleDetailRow> {
  /** Unrounded store NPS the vs-store deltas are taken against */
  nps_value: number;
  nps: string;
}

export type SimpleFilterResult = ResultBundle<SimpleAgentRow, SimpleStoreRow, SimpleStoreDetail>;

// ── Senior gap ────────────────────────────────────────────────────────────

export interface SeniorMetrics {
  responses: number;
  promoters: number;
  detractors: number;
  senior_responses: number;
  /** 2 decimals */
  nps_value: number;
  nps: string;
  senior_nps_value: number;
  senior_nps: string;
  senior_share_value: number;
  senior_share: string;
}

export interface SeniorAgentRow extends SeniorMetrics {
  team: string;
  dealer_name: string;
  store_name: string;
  agent_id: string;
  agent_name: string;
}

export interface SeniorStoreRow extends SeniorMetrics {
  team: string;
  dealer_name: string;
  store_name: string;
}

export interface SeniorDetailRow extends SeniorMetrics, StatusColumns {
  agent_id: string;
  agent_name: string;
}

export interface SeniorStoreDetail extends StoreAgentDetail<SeniorDetailRow> {
  nps_value: number;
  nps: string;
}

export type SeniorGapResult = ResultBundle<SeniorAgentRow, SeniorStoreRow, SeniorStoreDetail>;

// ── Period comparison ─────────────────────────────────────────────────────

export interface PeriodDelta {
  period1_responses: number;
  period1_nps_value: number;
  period1_nps: string;
  period2_responses: number;
  period2_nps_value: number;
  period2_nps: string;
  /** period2 - period1, signed */
  delta_value: number;
  delta: string;
}

export interface PeriodAgentRow extends PeriodDelta {
  team: string;
  dealer_name: string;
  store_name: string;
  agent_id: string;
  agent_name: string;
}

export interface PeriodStoreRow extends PeriodDelta {
  team: string;
  dealer_name: string;
  store_name: string;
}

export interface PeriodDetailRow extends StatusColumns {
  agent_id: string;
  agent_name: string;
  /** 1 decimal */
  delta_value: number;
  delta: string;
  /** Comparison-period responses */
  responses: number;
  store_share_value: number;
  store_share: string;
}

export interface PeriodStoreDetail extends StoreAgentDetail<PeriodDetailRow> {
  period1_nps_value: number;
  period2_nps_value: number;
  delta_value: number;
  delta: string;
}

export interface PeriodLabels {
  period1_label: string;
  period2_label: string;
}

export interface PeriodComparisonResult
  extends ResultBundle<PeriodAgentRow, PeriodStoreRow, PeriodStoreDetail> {
  /** Absent when the windows could not be determined */
  periods?: PeriodLabels;
}

// ── Dispatch ──────────────────────────────────────────────────────────────

export type AnalysisResult =
  | { analysis_type: 'SIMPLE_FILTER'; bundle: SimpleFilterResult }
  | { analysis_type: 'SENIOR_GAP'; bundle: SeniorGapResult }
  | { analysis_type: 'PERIOD_COMPARISON'; bundle: PeriodComparisonResult };
