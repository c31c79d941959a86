/**
 * Period Comparison Analyzer
 *
 * NPS change between a baseline window (period 1) and a comparison window
 * (period 2), e.g. "12월 대비 1월 NPS 하락한 T크루". Only agents present in
 * both windows are compared.
 */

import { getNpsRules, type AnalysisDefaults } from '../config-loader.js';
import type { DateRange, FilterSpec, PeriodPair, Trend } from '../query-parser/types.js';
import { isoDate, isWithin, lastDayOfMonth } from '../query-parser/calendar.js';
import type { SurveyDataset, SurveyRow } from '../dataset/types.js';
import { formatFixed, formatPercent, formatSignedPercent, mean, nps, roundTo } from '../metrics/nps.js';
import { ascending, descending, groupBy, shareOf, sortBy, statusColumns, type Comparator } from './grouping.js';
import type {
  PeriodAgentRow,
  PeriodComparisonResult,
  PeriodDelta,
  PeriodDetailRow,
  PeriodLabels,
  PeriodStoreDetail,
  PeriodStoreRow,
} from './types.js';

const RELAX_HINT = "💡 분석월 필터를 '전체'로 변경해보세요.";

interface PeriodAggregate {
  key: string;
  team: string;
  dealer_name: string;
  store_name: string;
  agent_id: string;
  agent_name: string;
  responses: number;
  nps_value: number;
}

/**
 * Windows used when the question named none: Sep-Dec of the base year
 * against January of the following year.
 */
export function fallbackPeriods(baseYear: number): PeriodPair {
  return {
    kind: 'range',
    period1: { start: isoDate(baseYear, 9, 1), end: isoDate(baseYear, 12, 31) },
    period2: { start: isoDate(baseYear + 1, 1, 1), end: isoDate(baseYear + 1, 1, lastDayOfMonth(baseYear + 1, 1)) },
    period1_label: '9~12월',
    period2_label: '1월',
  };
}

function rowsWithin(rows: readonly SurveyRow[], range: DateRange): SurveyRow[] {
  return rows.filter(r => r.processed_date !== null && isWithin(r.processed_date, range.start, range.end));
}

function aggregate(rows: readonly SurveyRow[], keyOf: (row: SurveyRow) => readonly string[]): Map<string, PeriodAggregate> {
  const result = new Map<string, PeriodAggregate>();
  for (const [key, group] of groupBy(rows, keyOf)) {
    const first = group[0];
    result.set(key, {
      key,
      team: first.team,
      dealer_name: first.dealer_name,
      store_name: first.store_name,
      agent_id: first.agent_id,
      agent_name: first.agent_name,
      responses: group.length,
      nps_value: nps(group.map(r => r.score)),
    });
  }
  return result;
}

const agentKey = (r: SurveyRow) => [r.agent_id, r.agent_name, r.dealer_name, r.store_name];
const storeKey = (r: SurveyRow) => [r.team, r.dealer_name, r.store_name];

function toDelta(before: PeriodAggregate, after: PeriodAggregate): PeriodDelta {
  const delta = after.nps_value - before.nps_value;
  return {
    period1_responses: before.responses,
    period1_nps_value: before.nps_value,
    period1_nps: formatPercent(before.nps_value),
    period2_responses: after.responses,
    period2_nps_value: after.nps_value,
    period2_nps: formatPercent(after.nps_value),
    delta_value: delta,
    delta: formatSignedPercent(delta),
  };
}

/** Inner join on the aggregate key, in period-1 order */
function join(
  period1: Map<string, PeriodAggregate>,
  period2: Map<string, PeriodAggregate>
): Array<[PeriodAggregate, PeriodAggregate]> {
  const pairs: Array<[PeriodAggregate, PeriodAggregate]> = [];
  for (const [key, before] of period1) {
    const after = period2.get(key);
    if (after) pairs.push([before, after]);
  }
  return pairs;
}

/**
 * Trend, period-2 target and per-period response floors
 */
function keep(row: PeriodDelta, spec: FilterSpec): boolean {
  if (spec.trend === 'decrease' && !(row.delta_value < 0)) return false;
  if (spec.trend === 'increase' && !(row.delta_value > 0)) return false;

  if (spec.nps_target !== undefined) {
    const below = (spec.nps_comparison ?? 'below') === 'below';
    if (below ? row.period2_nps_value >= spec.nps_target : row.period2_nps_value < spec.nps_target) {
      return false;
    }
  }

  const min1 = spec.min_responses_period1 ?? spec.min_responses;
  const min2 = spec.min_responses_period2 ?? spec.min_responses;
  return row.period1_responses >= min1 && row.period2_responses >= min2;
}

function deltaOrder(trend: Trend | undefined): Comparator<PeriodDelta> {
  if (trend === 'decrease') return ascending(r => r.delta_value);
  if (trend === 'increase') return descending(r => r.delta_value);
  return descending(r => Math.abs(r.delta_value));
}

function storeAgentDetail(
  period1Rows: readonly SurveyRow[],
  period2Rows: readonly SurveyRow[],
  agentIds: ReadonlySet<string>,
  bandWidth: number
): Record<string, PeriodStoreDetail> {
  const before = period1Rows.filter(r => agentIds.has(r.agent_id));
  const after = period2Rows.filter(r => agentIds.has(r.agent_id));
  if (before.length === 0 || after.length === 0) return {};

  const afterByStore = groupBy(after, r => [r.store_name]);
  const detail: Record<string, PeriodStoreDetail> = {};

  for (const [storeKeyJson, storeBefore] of groupBy(before, r => [r.store_name])) {
    const storeAfter = afterByStore.get(storeKeyJson);
    if (!storeAfter) continue;

    const storeName = storeBefore[0].store_name;
    const store1 = nps(storeBefore.map(r => r.score));
    const store2 = nps(storeAfter.map(r => r.score));
    const storeDelta = store2 - store1;

    const agentsBefore = aggregate(storeBefore, r => [r.agent_id, r.agent_name]);
    const agents: PeriodDetailRow[] = [];

    for (const [key, agentAfter] of aggregate(storeAfter, r => [r.agent_id, r.agent_name])) {
      const agentBefore = agentsBefore.get(key);
      if (!agentBefore) continue;

      const delta = agentAfter.nps_value - agentBefore.nps_value;
      const share = shareOf(agentAfter.responses, storeAfter.length);
      agents.push({
        agent_id: agentAfter.agent_id,
        agent_name: agentAfter.agent_name,
        delta_value: roundTo(delta, 1),
        delta: formatSignedPercent(delta),
        responses: agentAfter.responses,
        store_share_value: share,
        store_share: formatPercent(share),
        ...statusColumns(delta - storeDelta, bandWidth),
      });
    }

    if (agents.length === 0) continue;

    detail[storeName] = {
      store_name: storeName,
      responses: storeAfter.length,
      period1_nps_value: store1,
      period2_nps_value: store2,
      delta_value: storeDelta,
      delta: formatSignedPercent(storeDelta),
      agents: sortBy(agents, ascending(a => a.delta_value)),
    };
  }

  return detail;
}

function signedFixed(value: number): string {
  const rounded = roundTo(value, 1);
  return `${rounded >= 0 ? '+' : ''}${rounded.toFixed(1)}`;
}

function generateInsights(agents: readonly PeriodAgentRow[], trend: Trend | undefined, defaults: AnalysisDefaults): string[] {
  if (agents.length === 0) {
    return ['⚠️ 조건을 만족하는 T크루가 없습니다.'];
  }

  const insights: string[] = [];
  const avgChange = mean(agents.map(a => a.delta_value));
  const top = agents[0];
  const beforeAfter = `(${formatPercent(top.period1_nps_value)} → ${formatPercent(top.period2_nps_value)})`;
  const threshold = defaults.large_change_threshold;

  if (trend === 'decrease') {
    insights.push(`📊 총 **${agents.length}명**의 T크루가 NPS 하락했습니다`);
    insights.push(`📉 평균 하락폭: **${formatFixed(Math.abs(avgChange))}%p**`);
    insights.push(`🔴 **${top.agent_name}** T크루: 최대 하락 **${formatFixed(Math.abs(top.delta_value))}%p** ${beforeAfter}`);
    const large = agents.filter(a => a.delta_value <= -threshold).length;
    if (large > 0) insights.push(`⚠️ NPS ${threshold}%p 이상 하락한 T크루가 **${large}명**입니다`);
  } else if (trend === 'increase') {
    insights.push(`📊 총 **${agents.length}명**의 T크루가 NPS 상승했습니다`);
    insights.push(`📈 평균 상승폭: **${formatFixed(avgChange)}%p**`);
    insights.push(`🟢 **${top.agent_name}** T크루: 최대 상승 **${formatFixed(top.delta_value)}%p** ${beforeAfter}`);
    const large = agents.filter(a => a.delta_value >= threshold).length;
    if (large > 0) insights.push(`✨ NPS ${threshold}%p 이상 상승한 T크루가 **${large}명**입니다`);
  } else {
    insights.push(`📊 총 **${agents.length}명**의 T크루 데이터가 있습니다`);
    insights.push(`📊 평균 NPS 변화: **${signedFixed(avgChange)}%p**`);
    insights.push(`🔍 **${top.agent_name}** T크루: 최대 변화 **${signedFixed(top.delta_value)}%p** ${beforeAfter}`);
    const large = agents.filter(a => Math.abs(a.delta_value) >= threshold).length;
    if (large > 0) insights.push(`⚠️ NPS ${threshold}%p 이상 변화한 T크루가 **${large}명**입니다`);
  }

  return insights;
}

function emptyResult(insights: string[], periods?: PeriodLabels): PeriodComparisonResult {
  return {
    by_agent: [],
    by_store: [],
    store_agent_detail: {},
    summary: {
      '조건 만족 T크루': 0,
      '조건 만족 매장': 0,
      '기준 기간': periods?.period1_label ?? 'N/A',
      '비교 기간': periods?.period2_label ?? 'N/A',
      '평균 NPS 증감': 'N/A',
    },
    insights,
    ...(periods ? { periods } : {}),
  };
}

export function analyzePeriodComparison(
  dataset: SurveyDataset,
  spec: FilterSpec,
  defaults: AnalysisDefaults = getNpsRules().defaults
): PeriodComparisonResult {
  if (!dataset.columns.includes('processed_date')) {
    return emptyResult(['⚠️ 처리일 컬럼이 없습니다.']);
  }

  const requested = spec.comparison_periods;
  if (requested?.kind === 'error') {
    return emptyResult([`⚠️ ${requested.message}`]);
  }

  const periods = requested ?? fallbackPeriods(defaults.base_year);
  const labels: PeriodLabels = { period1_label: periods.period1_label, period2_label: periods.period2_label };

  const period1Rows = rowsWithin(dataset.rows, periods.period1);
  const period2Rows = rowsWithin(dataset.rows, periods.period2);

  const agents1 = aggregate(period1Rows, agentKey);
  if (agents1.size === 0) {
    return emptyResult([`⚠️ 기준 기간(${labels.period1_label})에 응답 데이터가 없습니다.`, RELAX_HINT], labels);
  }
  const agents2 = aggregate(period2Rows, agentKey);
  if (agents2.size === 0) {
    return emptyResult([`⚠️ 비교 기간(${labels.period2_label})에 응답 데이터가 없습니다.`, RELAX_HINT], labels);
  }

  const joined = join(agents1, agents2);
  if (joined.length === 0) {
    return emptyResult(['⚠️ 두 기간 모두 데이터가 있는 T크루가 없습니다.', RELAX_HINT], labels);
  }

  const order = deltaOrder(spec.trend);

  const byAgent = sortBy<PeriodAgentRow>(
    joined
      .map(([before, after]) => ({
        team: before.team,
        dealer_name: before.dealer_name,
        store_name: before.store_name,
        agent_id: before.agent_id,
        agent_name: before.agent_name,
        ...toDelta(before, after),
      }))
      .filter(row => keep(row, spec)),
    order
  );

  const byStore = sortBy<PeriodStoreRow>(
    join(aggregate(period1Rows, storeKey), aggregate(period2Rows, storeKey))
      .map(([before, after]) => ({
        team: before.team,
        dealer_name: before.dealer_name,
        store_name: before.store_name,
        ...toDelta(before, after),
      }))
      .filter(row => keep(row, spec)),
    order
  );

  const survivorIds = new Set(byAgent.map(a => a.agent_id));

  return {
    by_agent: byAgent,
    by_store: byStore,
    store_agent_detail: storeAgentDetail(period1Rows, period2Rows, survivorIds, defaults.status_band_width),
    summary: {
      '조건 만족 T크루': byAgent.length,
      '조건 만족 매장': byStore.length,
      '기준 기간': labels.period1_label,
      '비교 기간': labels.period2_label,
      '평균 NPS 증감': byAgent.length > 0 ? formatPercent(mean(byAgent.map(a => a.delta_value))) : 'N/A',
    },
    insights: generateInsights(byAgent, spec.trend, defaults),
    periods: labels,
  };
}
