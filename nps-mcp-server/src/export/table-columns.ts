/**
 * Export column layouts for each analyzer's agent and store tables.
 * Percent columns export their display strings.
 */

import type {
  AnalysisResult,
  PeriodAgentRow,
  PeriodLabels,
  PeriodStoreRow,
  SeniorAgentRow,
  SeniorStoreRow,
  SimpleAgentRow,
  SimpleStoreRow,
} from '../analyzers/types.js';

export type CellValue = string | number;

export interface ColumnSpec<Row> {
  header: string;
  value: (row: Row) => CellValue;
}

export type ExportTable = 'agent' | 'store';

export interface TableExport {
  headers: string[];
  rows: CellValue[][];
}

const simpleAgentColumns: ColumnSpec<SimpleAgentRow>[] = [
  { header: '마케팅팀명', value: r => r.team },
  { header: '대리점명', value: r => r.dealer_name },
  { header: '매장명', value: r => r.store_name },
  { header: '담당자', value: r => r.agent_name },
  { header: 'NPS(%)', value: r => r.nps },
  { header: '응답수', value: r => r.responses },
  { header: '매장내 모수 비중(%)', value: r => r.store_share },
];

const simpleStoreColumns: ColumnSpec<SimpleStoreRow>[] = [
  { header: '마케팅팀명', value: r => r.team },
  { header: '대리점명', value: r => r.dealer_name },
  { header: '매장명', value: r => r.store_name },
  { header: 'NPS(%)', value: r => r.nps },
  { header: '응답수', value: r => r.responses },
  { header: '추천수', value: r => r.promoters },
  { header: '비추천수', value: r => r.detractors },
];

const seniorMetricColumns = <Row extends SeniorStoreRow | SeniorAgentRow>(): ColumnSpec<Row>[] => [
  { header: '응답수', value: r => r.responses },
  { header: '추천수', value: r => r.promoters },
  { header: '비추천수', value: r => r.detractors },
  { header: '시니어응답수', value: r => r.senior_responses },
  { header: 'NPS(%)', value: r => r.nps },
  { header: '시니어비중(%)', value: r => r.senior_share },
  { header: '시니어NPS(%)', value: r => r.senior_nps },
];

const seniorAgentColumns: ColumnSpec<SeniorAgentRow>[] = [
  { header: '담당자', value: r => r.agent_name },
  { header: '담당자ID', value: r => r.agent_id },
  { header: '대리점명', value: r => r.dealer_name },
  { header: '매장명', value: r => r.store_name },
  ...seniorMetricColumns<SeniorAgentRow>(),
];

const seniorStoreColumns: ColumnSpec<SeniorStoreRow>[] = [
  { header: '마케팅팀명', value: r => r.team },
  { header: '대리점명', value: r => r.dealer_name },
  { header: '매장명', value: r => r.store_name },
  ...seniorMetricColumns<SeniorStoreRow>(),
];

function periodColumns<Row extends PeriodAgentRow | PeriodStoreRow>(labels: PeriodLabels): ColumnSpec<Row>[] {
  return [
    { header: `${labels.period1_label} NPS`, value: r => r.period1_nps },
    { header: `${labels.period1_label} 응답수`, value: r => r.period1_responses },
    { header: `${labels.period2_label} NPS`, value: r => r.period2_nps },
    { header: `${labels.period2_label} 응답수`, value: r => r.period2_responses },
    { header: 'NPS 증감', value: r => r.delta },
  ];
}

const NO_PERIODS: PeriodLabels = { period1_label: '기준 기간', period2_label: '비교 기간' };

export function tabulate<Row>(rows: readonly Row[], columns: readonly ColumnSpec<Row>[]): TableExport {
  return {
    headers: columns.map(c => c.header),
    rows: rows.map(row => columns.map(c => c.value(row))),
  };
}

/**
 * The agent or store table of a result, laid out for export
 */
export function tableFor(result: AnalysisResult, table: ExportTable): TableExport {
  switch (result.analysis_type) {
    case 'SIMPLE_FILTER':
      return table === 'agent'
        ? tabulate(result.bundle.by_agent, simpleAgentColumns)
        : tabulate(result.bundle.by_store, simpleStoreColumns);
    case 'SENIOR_GAP':
      return table === 'agent'
        ? tabulate(result.bundle.by_agent, seniorAgentColumns)
        : tabulate(result.bundle.by_store, seniorStoreColumns);
    case 'PERIOD_COMPARISON': {
      const labels = result.bundle.periods ?? NO_PERIODS;
      if (table === 'agent') {
        return tabulate<PeriodAgentRow>(result.bundle.by_agent, [
          { header: '담당자', value: r => r.agent_name },
          { header: '담당자ID', value: r => r.agent_id },
          { header: '대리점명', value: r => r.dealer_name },
          { header: '매장명', value: r => r.store_name },
          ...periodColumns<PeriodAgentRow>(labels),
        ]);
      }
      return tabulate<PeriodStoreRow>(result.bundle.by_store, [
        { header: '마케팅팀명', value: r => r.team },
        { header: '대리점명', value: r => r.dealer_name },
        { header: '매장명', value: r => r.store_name },
        ...periodColumns<PeriodStoreRow>(labels),
      ]);
    }
  }
}
