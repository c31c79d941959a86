/**
 * Simple Filter Analyzer
 *
 * NPS threshold and response-count filtering only, e.g.
 * "NPS 87% 미만인 곳은?" or "인천 NPS 낮은 매장".
 *
 * Input rows are already scoped (month / team / dealer / store) by the caller.
 */

import { getNpsRules, type AnalysisDefaults } from '../config-loader.js';
import type { FilterSpec, NpsComparison } from '../query-parser/types.js';
import type { SurveyRow } from '../dataset/types.js';
import { formatFixed, formatPercent, mean, npsFromTally, roundTo, tallyScores } from '../metrics/nps.js';
import { ascending, groupBy, hierarchyOrder, shareOf, sortBy, statusColumns, tiedAtMinimum } from './grouping.js';
import type {
  SimpleAgentRow,
  SimpleDetailRow,
  SimpleFilterResult,
  SimpleStoreDetail,
  SimpleStoreRow,
} from './types.js';

const storeKey = (row: Pick<SurveyRow, 'team' | 'dealer_name' | 'store_name'>) =>
  [row.team, row.dealer_name, row.store_name] as const;

/** This analyzer reports NPS at 1 decimal */
function nps1(rows: readonly SurveyRow[]): number {
  return roundTo(npsFromTally(tallyScores(rows.map(r => r.score))), 1);
}

function passesTarget(value: number, spec: FilterSpec): boolean {
  if (spec.nps_target === undefined) return true;
  const comparison: NpsComparison = spec.nps_comparison ?? 'below';
  return comparison === 'below' ? value < spec.nps_target : value >= spec.nps_target;
}

function aggregateAgents(rows: readonly SurveyRow[]): SimpleAgentRow[] {
  const storeTotals = new Map<string, number>();
  for (const [key, group] of groupBy(rows, storeKey)) storeTotals.set(key, group.length);

  const agents: SimpleAgentRow[] = [];
  for (const group of groupBy(rows, r => [...storeKey(r), r.agent_id]).values()) {
    const first = group[0];
    const tally = tallyScores(group.map(r => r.score));
    const value = roundTo(npsFromTally(tally), 1);
    const share = shareOf(tally.total, storeTotals.get(JSON.stringify(storeKey(first))) ?? tally.total);

    agents.push({
      team: first.team,
      dealer_name: first.dealer_name,
      store_name: first.store_name,
      agent_id: first.agent_id,
      agent_name: first.agent_name,
      responses: tally.total,
      promoters: tally.promoters,
      detractors: tally.detractors,
      nps_value: value,
      nps: formatPercent(value),
      store_share_value: share,
      store_share: formatPercent(share),
    });
  }
  return agents;
}

function aggregateStores(rows: readonly SurveyRow[]): SimpleStoreRow[] {
  const stores: SimpleStoreRow[] = [];
  for (const group of groupBy(rows, storeKey).values()) {
    const first = group[0];
    const tally = tallyScores(group.map(r => r.score));
    const value = roundTo(npsFromTally(tally), 1);

    stores.push({
      team: first.team,
      dealer_name: first.dealer_name,
      store_name: first.store_name,
      responses: tally.total,
      promoters: tally.promoters,
      detractors: tally.detractors,
      nps_value: value,
      nps: formatPercent(value),
    });
  }
  return stores;
}

/**
 * Per-store agent breakdown over the whole input, independent of the
 * threshold filters.
 */
function storeAgentDetail(rows: readonly SurveyRow[], bandWidth: number): Record<string, SimpleStoreDetail> {
  const detail: Record<string, SimpleStoreDetail> = {};

  for (const storeRows of groupBy(rows, r => [r.store_name]).values()) {
    const storeName = storeRows[0].store_name;
    const storeNps = npsFromTally(tallyScores(storeRows.map(r => r.score)));

    const agents: SimpleDetailRow[] = [];
    for (const group of groupBy(storeRows, r => [r.agent_id]).values()) {
      const value = nps1(group);
      const share = shareOf(group.length, storeRows.length);
      agents.push({
        agent_id: group[0].agent_id,
        agent_name: group[0].agent_name,
        responses: group.length,
        nps_value: value,
        nps: formatPercent(value),
        store_share_value: share,
        store_share: formatPercent(share),
        ...statusColumns(value - storeNps, bandWidth),
      });
    }

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

function generateInsights(agents: readonly SimpleAgentRow[], stores: readonly SimpleStoreRow[]): string[] {
  const insights: string[] = [];

  if (agents.length > 0) {
    const worst = tiedAtMinimum(agents, a => a.nps_value);
    const [head] = worst;
    insights.push(
      worst.length === 1
        ? `📌 ${head.agent_name} (${head.store_name})의 NPS가 ${head.nps}로 가장 낮습니다.`
        : `📌 ${head.agent_name} (${head.store_name}) 외 ${worst.length - 1}명의 NPS가 ${head.nps}로 가장 낮습니다.`
    );

    const values = agents.map(a => a.nps_value);
    const min = Math.min(...values);
    const max = Math.max(...values);
    insights.push(`📊 NPS 범위: ${formatPercent(min)} ~ ${formatPercent(max)} (편차 ${formatFixed(max - min)}%p)`);
  }

  if (stores.length > 0) {
    const worst = tiedAtMinimum(stores, s => s.nps_value);
    const [head] = worst;
    insights.push(
      worst.length === 1
        ? `🏪 ${head.store_name}의 NPS가 ${head.nps}로 가장 낮습니다.`
        : `🏪 ${head.store_name} 외 ${worst.length - 1}개 매장의 NPS가 ${head.nps}로 가장 낮습니다.`
    );
  }

  return insights;
}

export function analyzeSimpleFilter(
  rows: readonly SurveyRow[],
  spec: FilterSpec,
  defaults: AnalysisDefaults = getNpsRules().defaults
): SimpleFilterResult {
  const minResponses = spec.min_responses_period1 ?? spec.min_responses;

  const byAgent = sortBy<SimpleAgentRow>(
    aggregateAgents(rows).filter(a => a.responses >= minResponses && passesTarget(a.nps_value, spec)),
    ...hierarchyOrder,
    ascending(a => a.nps_value)
  );

  const byStore = sortBy<SimpleStoreRow>(
    aggregateStores(rows).filter(s => s.responses >= minResponses && passesTarget(s.nps_value, spec)),
    ...hierarchyOrder,
    ascending(s => s.nps_value)
  );

  return {
    by_agent: byAgent,
    by_store: byStore,
    store_agent_detail: storeAgentDetail(rows, defaults.status_band_width),
    summary: {
      '담당자 수': byAgent.length,
      '매장 수': byStore.length,
      '평균 NPS': byAgent.length > 0 ? formatPercent(mean(byAgent.map(a => a.nps_value))) : 'N/A',
    },
    insights: generateInsights(byAgent, byStore),
  };
}
