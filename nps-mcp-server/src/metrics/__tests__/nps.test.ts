import { describe, it, expect } from "vitest";
import {
  isPromoter,
  isDetractor,
  roundTo,
  tallyScores,
  npsFromTally,
  nps,
  mean,
  formatFixed,
  formatPercent,
  formatSignedPercent,
} from "../nps.js";

describe("score buckets", () => {
  it("treats 9 and 10 as promoters", () => {
    expect(isPromoter(9)).toBe(true);
    expect(isPromoter(10)).toBe(true);
    expect(isPromoter(8)).toBe(false);
  });

  it("treats 0 through 6 as detractors", () => {
    expect(isDetractor(0)).toBe(true);
    expect(isDetractor(6)).toBe(true);
    expect(isDetractor(7)).toBe(false);
  });

  it("puts null scores in neither bucket", () => {
    expect(isPromoter(null)).toBe(false);
    expect(isDetractor(null)).toBe(false);
  });
});

describe("roundTo", () => {
  it("rounds halves away from zero", () => {
    expect(roundTo(2.25, 1)).toBe(2.3);
    expect(roundTo(-2.25, 1)).toBe(-2.3);
    expect(roundTo(0.5, 0)).toBe(1);
  });

  it("absorbs binary noise", () => {
    expect(roundTo(1.005, 2)).toBe(1.01);
  });

  it("never returns negative zero", () => {
    expect(Object.is(roundTo(-0.01, 1), 0)).toBe(true);
  });
});

describe("nps", () => {
  it("computes (promoters - detractors) / total", () => {
    // 2 promoters, 1 passive, 1 detractor -> 25
    expect(nps([10, 9, 8, 3])).toBe(25);
  });

  it("counts null scores in the denominator only", () => {
    // 1 promoter out of 3 -> 33.33
    expect(nps([10, null, 7])).toBe(33.33);
  });

  it("is 0 for no responses", () => {
    expect(nps([])).toBe(0);
    expect(npsFromTally({ total: 0, promoters: 0, detractors: 0 })).toBe(0);
  });

  it("tallies buckets", () => {
    expect(tallyScores([10, 9, 7, 6, null])).toEqual({ total: 5, promoters: 2, detractors: 1 });
  });

  it("is -100 when everyone is a detractor", () => {
    expect(nps([0, 1, 6])).toBe(-100);
  });

  it("is 100 when everyone is a promoter", () => {
    expect(nps([9, 10, 10, 9])).toBe(100);
  });

  it("stays within -100 and 100", () => {
    const samples = [[0], [10], [5, 9], [7, 8], [0, 10, 10, 3, 6, 9, 8]];
    for (const scores of samples) {
      const value = nps(scores);
      expect(value).toBeGreaterThanOrEqual(-100);
      expect(value).toBeLessThanOrEqual(100);
    }
  });
});

describe("formatting", () => {
  it("formats fixed-point text", () => {
    expect(formatFixed(2.25)).toBe("2.3");
    expect(formatFixed(80)).toBe("80.0");
  });

  it("formats percentages", () => {
    expect(formatPercent(72.46)).toBe("72.5%");
    expect(formatPercent(-2.5)).toBe("-2.5%");
  });

  it("signs gains only", () => {
    expect(formatSignedPercent(3)).toBe("+3.0%");
    expect(formatSignedPercent(-2.5)).toBe("-2.5%");
    expect(formatSignedPercent(0)).toBe("0.0%");
  });

  it("averages values", () => {
    expect(mean([70, 80, 90])).toBe(80);
    expect(mean([])).toBe(0);
  });
});
