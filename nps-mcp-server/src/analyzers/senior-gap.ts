/**
 * Senior Gap Analyzer
 *
 * Finds agents whose senior-respondent share is elevated while overall and
 * senior satisfaction lag, e.g. "시니어 비중 높고 NPS 낮은 T크루".
 *
 * Pipeline, each stage narrowing the previous one:
 *   1. population baseline (share + NPS) over the whole scoped input
 *   2. senior share threshold against that baseline
 *   3. senior NPS below the mean senior NPS of the stage-2 survivors
 *   4. overall NPS target (default: below the configured target)
 *   5. minimum responses, at least one senior response
 */

import { getNpsRules, type AnalysisDefaults } from '../config-loader.js';
import type { FilterSpec, NpsComparison, SeniorThreshold } from '../query-parser/types.js';
import type { SurveyDataset, SurveyRow } from '../dataset/types.js';
import { formatFixed, formatPercent, mean, nps, tallyScores } from '../metrics/nps.js';
import { ascending, descending, groupBy, sortBy, statusColumns } from './grouping.js';
import type {
  SeniorAgentRow,
  SeniorDetailRow,
  SeniorGapResult,
  SeniorMetrics,
  SeniorStoreDetail,
  SeniorStoreRow,
} from './types.js';

interface Baseline {
  senior_share: number;
  senior_responses: number;
  responses: number;
  nps: number;
}

interface Target {
  value: number;
  comparison: NpsComparison;
}

function seniorMetrics(rows: readonly SurveyRow[]): SeniorMetrics {
  const seniorRows = rows.filter(r => r.is_senior);
  const scores = rows.map(r => r.score);
  const tally = tallyScores(scores);
  const npsValue = nps(scores);
  const seniorNps = nps(seniorRows.map(r => r.score));
  const share = rows.length > 0 ? (seniorRows.length / rows.length) * 100 : 0;

  return {
    responses: rows.length,
    promoters: tally.promoters,
    detractors: tally.detractors,
    senior_responses: seniorRows.length,
    nps_value: npsValue,
    nps: formatPercent(npsValue),
    senior_nps_value: seniorNps,
    senior_nps: formatPercent(seniorNps),
    senior_share_value: share,
    senior_share: formatPercent(share),
  };
}

function computeBaseline(rows: readonly SurveyRow[]): Baseline {
  const seniorResponses = rows.filter(r => r.is_senior).length;
  return {
    senior_share: rows.length > 0 ? (seniorResponses / rows.length) * 100 : 0,
    senior_responses: seniorResponses,
    responses: rows.length,
    nps: nps(rows.map(r => r.score)),
  };
}

function passesShare(share: number, threshold: SeniorThreshold, baseline: Baseline): boolean {
  switch (threshold.kind) {
    case 'avg':
      return share >= baseline.senior_share;
    case 'below_avg':
      return share < baseline.senior_share;
    case 'custom':
      return share >= threshold.value;
  }
}

function passesTarget(value: number, target: Target): boolean {
  return target.comparison === 'below' ? value < target.value : value >= target.value;
}

function resolveTarget(spec: FilterSpec, defaults: AnalysisDefaults): Target {
  if (spec.nps_target === undefined) {
    return { value: defaults.nps_target, comparison: 'below' };
  }
  return { value: spec.nps_target, comparison: spec.nps_comparison ?? 'below' };
}

const bySeniorShareThenNps = [
  descending<SeniorMetrics>(m => m.senior_share_value),
  ascending<SeniorMetrics>(m => m.nps_value),
];

function aggregateAgents(rows: readonly SurveyRow[]): SeniorAgentRow[] {
  return [...groupBy(rows, r => [r.agent_id]).values()].map(group => ({
    team: group[0].team,
    dealer_name: group[0].dealer_name,
    store_name: group[0].store_name,
    agent_id: group[0].agent_id,
    agent_name: group[0].agent_name,
    ...seniorMetrics(group),
  }));
}

function filterAgents(
  agents: readonly SeniorAgentRow[],
  spec: FilterSpec,
  baseline: Baseline,
  target: Target
): SeniorAgentRow[] {
  const threshold: SeniorThreshold = spec.senior_threshold ?? { kind: 'avg' };
  const byShare = agents.filter(a => passesShare(a.senior_share_value, threshold, baseline));

  // Second baseline: mean senior NPS over the share survivors that have seniors
  const withSeniors = byShare.filter(a => a.senior_responses > 0);
  const seniorNpsBaseline = mean(withSeniors.map(a => a.senior_nps_value));

  const survivors = withSeniors
    .filter(a => a.senior_nps_value < seniorNpsBaseline)
    .filter(a => passesTarget(a.nps_value, target))
    .filter(a => a.responses >= spec.min_responses && a.senior_responses >= 1);

  return sortBy<SeniorAgentRow>(survivors, ...bySeniorShareThenNps);
}

function aggregateStores(
  rows: readonly SurveyRow[],
  spec: FilterSpec,
  baseline: Baseline,
  target: Target
): SeniorStoreRow[] {
  const threshold: SeniorThreshold = spec.senior_threshold ?? { kind: 'avg' };

  const stores: SeniorStoreRow[] = [...groupBy(rows, r => [r.team, r.dealer_name, r.store_name]).values()]
    .map(group => ({
      team: group[0].team,
      dealer_name: group[0].dealer_name,
      store_name: group[0].store_name,
      ...seniorMetrics(group),
    }))
    .filter(
      s =>
        passesTarget(s.nps_value, target) &&
        passesShare(s.senior_share_value, threshold, baseline) &&
        s.responses >= spec.min_responses &&
        s.senior_responses >= 1
    );

  return sortBy<SeniorStoreRow>(stores, ...bySeniorShareThenNps);
}

function storeAgentDetail(rows: readonly SurveyRow[], bandWidth: number): Record<string, SeniorStoreDetail> {
  const detail: Record<string, SeniorStoreDetail> = {};

  for (const storeRows of groupBy(rows, r => [r.store_name]).values()) {
    const storeName = storeRows[0].store_name;
    const storeNps = nps(storeRows.map(r => r.score));

    const agents: SeniorDetailRow[] = [...groupBy(storeRows, r => [r.agent_id]).values()].map(group => {
      const metrics = seniorMetrics(group);
      return {
        agent_id: group[0].agent_id,
        agent_name: group[0].agent_name,
        ...metrics,
        ...statusColumns(metrics.nps_value - storeNps, bandWidth),
      };
    });

    detail[storeName] = {
      store_name: storeName,
      responses: storeRows.length,
      nps_value: storeNps,
      nps: formatPercent(storeNps),
      agents: sortBy(agents, ascending(a => a.nps_value)),
    };
  }

  return detail;
}

function generateInsights(
  agents: readonly SeniorAgentRow[],
  baseline: Baseline,
  target: Target,
  defaults: AnalysisDefaults
): string[] {
  if (agents.length === 0) {
    return [
      '⚠️ 조건을 만족하는 T크루가 없습니다.',
      target.comparison === 'below'
        ? `✨ 모든 T크루가 NPS 목표(${target.value}%)를 달성했습니다!`
        : '💡 필터 조건을 완화해보세요!',
    ];
  }

  const insights = [
    `📊 총 **${agents.length}명**의 T크루가 조건을 만족합니다`,
    target.comparison === 'below'
      ? `🎯 NPS 목표 **${target.value}%** 미달 T크루입니다`
      : `🎯 NPS 목표 **${target.value}%** 달성 T크루입니다`,
    `📈 필터 조건Y 비중: **${formatPercent(mean(agents.map(a => a.senior_share_value)))}** (전체 평균: ${formatPercent(baseline.senior_share)})`,
    `📉 평균 NPS: **${formatFixed(mean(agents.map(a => a.nps_value)))}** (전체 평균: ${formatPercent(baseline.nps)})`,
  ];

  const top = agents[0];
  insights.push(
    `🔴 **${top.agent_name}** T크루: 시니어 비중 **${top.senior_share}**, NPS **${top.nps}**, 시니어NPS **${top.senior_nps}**`
  );

  const highShare = agents.filter(a => a.senior_share_value >= defaults.high_senior_share).length;
  if (highShare > 0) {
    insights.push(`⚠️ 시니어 비중 ${defaults.high_senior_share}% 이상인 T크루가 **${highShare}명**입니다`);
  }

  const largeGap = agents.filter(
    a => Math.abs(a.nps_value - a.senior_nps_value) >= defaults.senior_gap_threshold
  ).length;
  if (largeGap > 0) {
    insights.push(
      `⚠️ 시니어 NPS와 전체 NPS 차이가 ${defaults.senior_gap_threshold}% 이상인 T크루가 **${largeGap}명**입니다`
    );
  }

  if (target.comparison === 'below') {
    insights.push('💡 **시니어 고객 응대 개선**이 NPS 목표 달성의 핵심입니다!');
  }

  return insights;
}

function emptyResult(message: string): SeniorGapResult {
  return {
    by_agent: [],
    by_store: [],
    store_agent_detail: {},
    summary: {
      '조건 만족 T크루': 0,
      '조건 만족 매장': 0,
      'NPS 목표': 'N/A',
      '필터 조건Y 시니어 비중': 'N/A',
      '조건 만족 T크루 NPS': 'N/A',
    },
    insights: [message],
  };
}

export function analyzeSeniorGap(
  dataset: SurveyDataset,
  spec: FilterSpec,
  defaults: AnalysisDefaults = getNpsRules().defaults
): SeniorGapResult {
  if (!dataset.columns.includes('is_senior')) {
    return emptyResult('⚠️ 시니어여부 컬럼이 없습니다.');
  }

  const { rows } = dataset;
  const allAgents = aggregateAgents(rows);
  if (allAgents.length === 0) {
    return emptyResult('⚠️ 조건을 만족하는 데이터가 없습니다.');
  }

  const baseline = computeBaseline(rows);
  const target = resolveTarget(spec, defaults);
  const byAgent = filterAgents(allAgents, spec, baseline, target);

  const survivorIds = new Set(byAgent.map(a => a.agent_id));
  const survivorRows = rows.filter(r => survivorIds.has(r.agent_id));
  const byStore = aggregateStores(survivorRows, spec, baseline, target);

  const summary: SeniorGapResult['summary'] = {
    '조건 만족 T크루': byAgent.length,
    '조건 만족 매장': byStore.length,
    'NPS 목표': `${target.value}%`,
    '필터 조건Y 시니어 비중': `${formatPercent(baseline.senior_share)} (${baseline.senior_responses}/${baseline.responses})`,
    // Weighted over the survivors' raw responses, not a mean of agent NPS
    '조건 만족 T크루 NPS': byAgent.length > 0 ? formatPercent(nps(survivorRows.map(r => r.score))) : 'N/A',
  };
  if (spec.analysis_month) {
    summary['분석월'] = spec.analysis_month;
  }

  return {
    by_agent: byAgent,
    by_store: byStore,
    store_agent_detail: storeAgentDetail(survivorRows, defaults.status_band_width),
    summary,
    insights: generateInsights(byAgent, baseline, target, defaults),
  };
}
