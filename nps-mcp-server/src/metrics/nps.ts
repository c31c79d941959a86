/**
 * NPS metric primitives shared by every analyzer.
 *
 * A score of null is a response whose recommendation value could not be
 * coerced: it counts toward the total but is neither promoter nor detractor.
 */

export type Score = number | null;

export interface ScoreTally {
  total: number;
  promoters: number;
  detractors: number;
}

export function isPromoter(score: Score): boolean {
  return score !== null && score >= 9;
}

export function isDetractor(score: Score): boolean {
  return score !== null && score <= 6;
}

/**
 * Round half away from zero at `digits` decimals. The toPrecision pass
 * absorbs binary noise such as 1.005 * 100 = 100.49999999999999.
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  const shifted = Number((Math.abs(value) * factor).toPrecision(12));
  const rounded = Math.round(shifted) / factor;
  return rounded === 0 ? 0 : Math.sign(value) * rounded;
}

export function tallyScores(scores: Iterable<Score>): ScoreTally {
  const tally: ScoreTally = { total: 0, promoters: 0, detractors: 0 };
  for (const score of scores) {
    tally.total++;
    if (isPromoter(score)) tally.promoters++;
    else if (isDetractor(score)) tally.detractors++;
  }
  return tally;
}

/** NPS from pre-counted buckets, unrounded. 0 when there are no responses. */
export function npsFromTally({ total, promoters, detractors }: ScoreTally): number {
  if (total === 0) return 0;
  return ((promoters - detractors) / total) * 100;
}

/** (promoters - detractors) / total * 100, rounded to 2 decimals; 0 when empty. */
export function nps(scores: Iterable<Score>): number {
  return roundTo(npsFromTally(tallyScores(scores)), 2);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Fixed-point text after half-away-from-zero rounding: 2.25 -> "2.3" */
export function formatFixed(value: number, digits = 1): string {
  return roundTo(value, digits).toFixed(digits);
}

/** "72.5%" */
export function formatPercent(value: number, digits = 1): string {
  return `${formatFixed(value, digits)}%`;
}

/** "+3.0%" for gains, "-2.5%" / "0.0%" otherwise */
export function formatSignedPercent(value: number, digits = 1): string {
  const body = formatPercent(value, digits);
  return value > 0 ? `+${body}` : body;
}
