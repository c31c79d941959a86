/**
 * Status bands for "vs store" deltas.
 *
 *   delta >= w        excellent
 *   0 <= delta < w    good
 *   -w <= delta < 0   caution
 *   delta < -w        needs_improvement
 */

export type StatusBand = 'excellent' | 'good' | 'caution' | 'needs_improvement';

export const STATUS_LABELS: Record<StatusBand, string> = {
  excellent: '🟢 우수',
  good: '🟢 양호',
  caution: '🟠 주의',
  needs_improvement: '🔴 개선필요',
};

export function classifyStatus(delta: number, bandWidth = 5): StatusBand {
  if (delta >= bandWidth) return 'excellent';
  if (delta >= 0) return 'good';
  if (delta >= -bandWidth) return 'caution';
  return 'needs_improvement';
}
