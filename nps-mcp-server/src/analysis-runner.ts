/**
 * Analysis Runner
 *
 * question (+ manual overrides) -> FilterSpec -> scoped rows -> analyzer.
 * Overrides always win over what the parser extracted.
 */

import { z } from "zod";
import { getNpsRules, type NpsRules } from "./config-loader.js";
import { logger } from "../../shared/observability/src/logger.js";
import {
  ALL_MONTHS,
  getFilterSummary,
  parseQuestion,
  type FilterSpec,
} from "./query-parser/index.js";
import {
  analyzePeriodComparison,
  analyzeSeniorGap,
  analyzeSimpleFilter,
  type AnalysisResult,
} from "./analyzers/index.js";
import { applyScope } from "./dataset/scope.js";
import type { SurveyDataset } from "./dataset/types.js";

// ── Overrides ─────────────────────────────────────────────────────────────

const positiveInt = z.number().int().positive();

/** '전체' or null removes whatever the parser extracted for that field */
const scopeName = z.string().min(1).nullable();

const CLEARABLE_SCOPE = ["team", "dealer_name", "store_name"] as const;

export const SeniorThresholdSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("avg") }),
  z.object({ kind: z.literal("below_avg") }),
  z.object({ kind: z.literal("custom"), value: z.number().min(0).max(100) }),
]);

export const FilterOverridesSchema = z
  .object({
    analysis_month: z
      .string()
      .regex(/^(\d{4}년 \d{2}월|전체)$/, "analysis_month must be 'YYYY년 MM월' or '전체'")
      .optional()
      .describe("Analysis month, e.g. '2026년 01월', or '전체' for all months"),
    team: scopeName.optional().describe("Marketing team name, e.g. '인천마케팅팀'; '전체' or null clears it"),
    dealer_name: scopeName.optional(),
    store_name: scopeName.optional(),
    nps_target: z.number().min(-100).max(100).optional(),
    nps_comparison: z.enum(["below", "above"]).optional(),
    senior_threshold: SeniorThresholdSchema.optional(),
    min_responses: positiveInt.optional(),
    min_responses_period1: positiveInt.optional(),
    min_responses_period2: positiveInt.optional(),
    trend: z.enum(["increase", "decrease"]).optional(),
  })
  .strict();

export type FilterOverrides = z.infer<typeof FilterOverridesSchema>;

/**
 * Override values replace parsed ones. A team, dealer or store override of
 * '전체' or null drops that scope field. The period-1 floor doubles as the
 * generic floor, which is what the single-period analyzers read.
 */
export function applyOverrides(spec: FilterSpec, overrides: FilterOverrides): FilterSpec {
  const merged: FilterSpec = { ...spec };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined && value !== null) Object.assign(merged, { [key]: value });
  }

  for (const field of CLEARABLE_SCOPE) {
    const value = overrides[field];
    if (value === null || value === ALL_MONTHS) delete merged[field];
  }

  if (overrides.min_responses_period1 !== undefined) {
    merged.min_responses = overrides.min_responses_period1;
  }
  if (overrides.nps_target !== undefined && merged.nps_comparison === undefined) {
    merged.nps_comparison = "below";
  }

  return merged;
}

// ── Outcomes ──────────────────────────────────────────────────────────────

interface OutcomeBase {
  filters: FilterSpec;
  summary_text: string;
}

export type AnalysisOutcome =
  | (OutcomeBase & { status: "ok"; result: AnalysisResult })
  | (OutcomeBase & { status: "blocked"; message: string })
  | (OutcomeBase & { status: "unsupported"; message: string })
  | (OutcomeBase & { status: "unrecognized"; message: string; examples: string[] });

export const SUPPORTED_QUESTION_EXAMPLES = [
  "NPS 87% 미만인 곳은?",
  "시니어 비중이 높으면서 NPS가 낮은 T크루는?",
  "12월 대비 1월 NPS 상승한 곳은?",
];

/**
 * Resolve the final filters for a question without running anything.
 */
export function resolveFilters(
  question: string,
  overrides: FilterOverrides = {},
  rules: NpsRules = getNpsRules()
): FilterSpec {
  // The override month is context for day-range periods, so parse with it
  const parsed = parseQuestion(question, { analysis_month: overrides.analysis_month }, rules);
  const filters = applyOverrides(parsed, overrides);

  // Month-level comparisons need every month in scope unless a month was chosen
  if (
    filters.analysis_type === "PERIOD_COMPARISON" &&
    !question.includes("일") &&
    overrides.analysis_month === undefined
  ) {
    filters.analysis_month = ALL_MONTHS;
  }

  return filters;
}

function dispatch(
  type: AnalysisResult["analysis_type"],
  scoped: SurveyDataset,
  filters: FilterSpec,
  { defaults }: NpsRules
): AnalysisResult {
  switch (type) {
    case "SIMPLE_FILTER":
      return { analysis_type: type, bundle: analyzeSimpleFilter(scoped.rows, filters, defaults) };
    case "SENIOR_GAP":
      return { analysis_type: type, bundle: analyzeSeniorGap(scoped, filters, defaults) };
    case "PERIOD_COMPARISON":
      return { analysis_type: type, bundle: analyzePeriodComparison(scoped, filters, defaults) };
  }
}

export function runAnalysis(
  question: string,
  dataset: SurveyDataset,
  overrides: FilterOverrides = {},
  rules: NpsRules = getNpsRules()
): AnalysisOutcome {
  const filters = resolveFilters(question, overrides, rules);
  const base: OutcomeBase = { filters, summary_text: getFilterSummary(filters) };

  if (filters.comparison_periods?.kind === "error") {
    return { ...base, status: "blocked", message: filters.comparison_periods.message };
  }

  if (filters.analysis_type === "STORE_ANALYSIS") {
    return {
      ...base,
      status: "unsupported",
      message: "매장별 상세 분석은 다음 버전에서 지원 예정입니다. 현재는 단순 필터, 시니어 GAP, 기간별 비교 분석만 지원됩니다.",
    };
  }
  if (filters.analysis_type === "GENERAL") {
    return {
      ...base,
      status: "unrecognized",
      message: "질문 유형을 인식할 수 없습니다.",
      examples: SUPPORTED_QUESTION_EXAMPLES,
    };
  }

  const scoped = applyScope(dataset, filters);
  const result = dispatch(filters.analysis_type, scoped, filters, rules);

  logger.info("Analysis completed", {
    analysis_type: filters.analysis_type,
    scoped_rows: scoped.rows.length,
    agents: result.bundle.by_agent.length,
    stores: result.bundle.by_store.length,
  });

  return { ...base, status: "ok", result };
}
