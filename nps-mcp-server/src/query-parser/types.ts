/**
 * Question Parser Types
 *
 * A FilterSpec is the structured form of one free-text NPS question. Every
 * analyzer consumes it; optional fields stay undefined when the question did
 * not mention them, which is distinct from an explicit zero.
 */

/**
 * Analysis intents, in classification priority order
 */
export type AnalysisType =
  | 'SIMPLE_FILTER'       // NPS threshold / response count only
  | 'SENIOR_GAP'          // Senior share vs. satisfaction
  | 'PERIOD_COMPARISON'   // NPS change between two windows
  | 'STORE_ANALYSIS'      // Store-level question (no analyzer yet)
  | 'GENERAL';            // Unrecognized

export type NpsComparison = 'below' | 'above';

export type Trend = 'increase' | 'decrease';

/**
 * Senior share threshold
 */
export type SeniorThreshold =
  | { kind: 'avg' }                       // share >= population average
  | { kind: 'below_avg' }                 // share < population average
  | { kind: 'custom'; value: number };    // share >= value

/**
 * Closed calendar-date range, ISO dates (YYYY-MM-DD), both ends inclusive
 */
export interface DateRange {
  start: string;
  end: string;
}

export interface PeriodPair {
  kind: 'range';
  /** Baseline window */
  period1: DateRange;
  /** Comparison window */
  period2: DateRange;
  period1_label: string;
  period2_label: string;
}

/**
 * Returned when a day-range comparison was asked for without the month
 * context it needs. Callers must show the message and not run an analysis.
 */
export interface PeriodError {
  kind: 'error';
  message: string;
}

export type ComparisonPeriods = PeriodPair | PeriodError;

/** Sentinel analysis month meaning "all months". */
export const ALL_MONTHS = '전체';

/**
 * Filter specification - output contract of the parser
 */
export interface FilterSpec {
  team?: string;
  store_name?: string;
  store_code?: string;
  dealer_code?: string;
  dealer_id?: string;
  /** Only ever set through overrides */
  dealer_name?: string;

  /** "YYYY년 MM월" or ALL_MONTHS */
  analysis_month?: string;

  /** Present iff an NPS comparison was asked for */
  nps_target?: number;
  nps_comparison?: NpsComparison;

  senior_threshold?: SeniorThreshold;

  min_responses: number;
  min_responses_period1?: number;
  min_responses_period2?: number;

  trend?: Trend;
  /** Question contains a versus/compare keyword */
  comparison_mode: boolean;
  comparison_periods?: ComparisonPeriods;

  analysis_type: AnalysisType;
}

/**
 * Context the parser cannot read from the question itself
 */
export interface ParseContext {
  analysis_month?: string;
}

export const ANALYSIS_TYPE_LABELS: Record<AnalysisType, string> = {
  SENIOR_GAP: '시니어 GAP 분석',
  PERIOD_COMPARISON: '기간별 비교',
  SIMPLE_FILTER: '단순 필터 분석',
  STORE_ANALYSIS: '매장 분석',
  GENERAL: '일반 분석',
};
