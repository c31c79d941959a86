/**
 * NPS Question Parser
 *
 * Turns a free-text (Korean) NPS question into a FilterSpec. Every
 * extractor is an independent keyword/regex pass; none of them throws, and a
 * pattern that does not match leaves its field undefined.
 *
 * DOES NOT touch the dataset - analyzers own all computation.
 */

import { getNpsRules, type NpsRules } from '../config-loader.js';
import { extractComparisonPeriods } from './comparison-periods.js';
import type {
  AnalysisType,
  FilterSpec,
  NpsComparison,
  ParseContext,
  SeniorThreshold,
  Trend,
} from './types.js';

// Unicode word class: Hangul and digits count as word characters
const NON_WORD = '[^\\p{L}\\p{N}_]*';

function includesAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some(kw => text.includes(kw));
}

function alternation(terms: readonly string[]): string {
  return terms.map(t => t.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')).join('|');
}

/**
 * Team: first table entry whose keyword appears in the question
 */
export function extractTeam(question: string, rules: NpsRules = getNpsRules()): string | undefined {
  return rules.teams.find(entry => question.includes(entry.keyword))?.team;
}

/**
 * Store name: first Hangul token ending in 점
 */
export function extractStoreName(question: string): string | undefined {
  return question.match(/([가-힣]+점)/)?.[1];
}

export function extractStoreCode(question: string): string | undefined {
  return question.match(/매장[^\d]*(\d{4})/)?.[1];
}

export function extractDealerCode(question: string): string | undefined {
  const match = question.match(new RegExp(`대리점${NON_WORD}([A-Z0-9]+)`, 'iu'));
  return match ? match[1].toUpperCase() : undefined;
}

export function extractDealerId(question: string): string | undefined {
  return question.match(new RegExp(`대리점${NON_WORD}(D\\d+)`, 'iu'))?.[1];
}

/**
 * NPS target and direction. Expects the lower-cased question.
 *
 * Priority: "nps 90% 미만" > "nps 90% 이상" > bare low/high keyword (default
 * target). No "nps" or no condition -> undefined.
 */
export function extractNpsTarget(
  question: string,
  rules: NpsRules = getNpsRules()
): { target: number; comparison: NpsComparison } | undefined {
  if (!question.includes('nps')) return undefined;

  const below = question.match(new RegExp(`nps[^\\d]*(\\d+)%?[^\\d]*(${alternation(rules.nps.below_terms)})`));
  if (below) {
    return { target: parseInt(below[1], 10), comparison: 'below' };
  }

  const above = question.match(new RegExp(`nps[^\\d]*(\\d+)%?[^\\d]*(${alternation(rules.nps.above_terms)})`));
  if (above) {
    return { target: parseInt(above[1], 10), comparison: 'above' };
  }

  if (includesAny(question, rules.nps.low_keywords)) {
    return { target: rules.defaults.nps_target, comparison: 'below' };
  }
  if (includesAny(question, rules.nps.high_keywords)) {
    return { target: rules.defaults.nps_target, comparison: 'above' };
  }

  return undefined;
}

/**
 * Senior share threshold; only evaluated when the senior token appears.
 * A bare mention defaults to the population average.
 */
export function extractSeniorThreshold(
  question: string,
  rules: NpsRules = getNpsRules()
): SeniorThreshold | undefined {
  const { token, custom_terms, high_keywords, low_keywords } = rules.senior;
  if (!question.includes(token)) return undefined;

  const custom = question.match(
    new RegExp(`${token}[^\\d]*비중[^\\d]*(\\d+)%?[^\\d]*(${alternation(custom_terms)})`)
  );
  if (custom) {
    return { kind: 'custom', value: parseInt(custom[1], 10) };
  }

  if (includesAny(question, high_keywords)) return { kind: 'avg' };
  if (includesAny(question, low_keywords)) return { kind: 'below_avg' };

  return { kind: 'avg' };
}

export function extractMinResponses(question: string, rules: NpsRules = getNpsRules()): number {
  const match = question.match(/응답[^\d]*(\d+)건/);
  return match ? parseInt(match[1], 10) : rules.defaults.min_responses;
}

export function detectTrend(question: string, rules: NpsRules = getNpsRules()): Trend | undefined {
  if (includesAny(question, rules.trend.decrease)) return 'decrease';
  if (includesAny(question, rules.trend.increase)) return 'increase';
  return undefined;
}

export function detectComparisonMode(question: string, rules: NpsRules = getNpsRules()): boolean {
  return includesAny(question, rules.comparison_keywords);
}

// ── Analysis type classification ──────────────────────────────────────────

interface IntentRule {
  intent: AnalysisType;
  matches(question: string, rules: NpsRules): boolean;
}

/**
 * Evaluated top to bottom, first match wins. Order encodes priority.
 */
const INTENT_RULES: readonly IntentRule[] = [
  {
    intent: 'SIMPLE_FILTER',
    matches: (q, rules) =>
      q.includes('nps') && !q.includes(rules.senior.token) && !q.includes('대비') && !q.includes('비교'),
  },
  {
    intent: 'SENIOR_GAP',
    matches: (q, rules) =>
      q.includes(rules.senior.token) &&
      q.includes('nps') &&
      (includesAny(q, rules.senior.gap_intent_keywords) || q.includes('gap') || q.includes('차이')),
  },
  {
    intent: 'PERIOD_COMPARISON',
    matches: q =>
      (q.includes('기간') || q.includes('대비') || q.includes('비교')) &&
      (q.includes('상승') || q.includes('하락')),
  },
  {
    intent: 'STORE_ANALYSIS',
    matches: q => q.includes('매장') || q.includes('대리점'),
  },
];

/**
 * Classify from the raw text only, independent of the extracted fields.
 * Expects the lower-cased question.
 */
export function detectAnalysisType(question: string, rules: NpsRules = getNpsRules()): AnalysisType {
  return INTENT_RULES.find(rule => rule.matches(question, rules))?.intent ?? 'GENERAL';
}

// ── Entry point ───────────────────────────────────────────────────────────

/**
 * Parse a question into a FilterSpec.
 *
 * @param context - analysis month chosen outside the question (needed by
 *   "N일 대비 M일" comparisons)
 */
export function parseQuestion(
  question: string,
  context: ParseContext = {},
  rules: NpsRules = getNpsRules()
): FilterSpec {
  const lower = question.toLowerCase();

  const spec: FilterSpec = {
    min_responses: extractMinResponses(question, rules),
    comparison_mode: detectComparisonMode(lower, rules),
    analysis_type: detectAnalysisType(lower, rules),
  };

  const optional: Partial<FilterSpec> = {
    team: extractTeam(question, rules),
    store_name: extractStoreName(question),
    store_code: extractStoreCode(question),
    dealer_code: extractDealerCode(question),
    dealer_id: extractDealerId(question),
    analysis_month: context.analysis_month,
    trend: detectTrend(question, rules),
    senior_threshold: extractSeniorThreshold(lower, rules),
    comparison_periods: extractComparisonPeriods(question, context.analysis_month, rules.defaults.base_year),
  };

  const npsTarget = extractNpsTarget(lower, rules);
  if (npsTarget) {
    optional.nps_target = npsTarget.target;
    optional.nps_comparison = npsTarget.comparison;
  }

  // Keep absent fields absent rather than present-and-undefined
  for (const [key, value] of Object.entries(optional)) {
    if (value !== undefined) Object.assign(spec, { [key]: value });
  }

  return spec;
}
