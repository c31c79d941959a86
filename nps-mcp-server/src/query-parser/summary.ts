import { ANALYSIS_TYPE_LABELS, type FilterSpec, type SeniorThreshold } from './types.js';

function describeSeniorThreshold(threshold: SeniorThreshold): string {
  switch (threshold.kind) {
    case 'avg':
      return '평균 이상';
    case 'below_avg':
      return '평균 이하';
    case 'custom':
      return `${threshold.value}% 이상`;
  }
}

/**
 * One-line, pipe-joined description of the active filters, e.g.
 * "분석월: 2026년 01월 | 팀: 인천마케팅팀 | NPS 목표: 87% 미만 | 최소 응답수: 5건 | 분석 유형: 단순 필터 분석"
 */
export function getFilterSummary(spec: FilterSpec): string {
  const parts: string[] = [];

  if (spec.analysis_month) parts.push(`분석월: ${spec.analysis_month}`);
  if (spec.team) parts.push(`팀: ${spec.team}`);

  if (spec.nps_target !== undefined) {
    const direction = spec.nps_comparison === 'above' ? '이상' : '미만';
    parts.push(`NPS 목표: ${spec.nps_target}% ${direction}`);
  }

  if (spec.senior_threshold) {
    parts.push(`시니어 비중: ${describeSeniorThreshold(spec.senior_threshold)}`);
  }

  if (spec.min_responses) parts.push(`최소 응답수: ${spec.min_responses}건`);
  if (spec.store_name) parts.push(`매장: ${spec.store_name}`);

  parts.push(`분석 유형: ${ANALYSIS_TYPE_LABELS[spec.analysis_type]}`);

  return parts.length > 0 ? parts.join(' | ') : '조건 없음';
}
