import { describe, it, expect } from "vitest";
import { extractComparisonPeriods, yearForMonth, MISSING_MONTH_MESSAGE } from "../comparison-periods.js";
import { lastDayOfMonth, monthLabelOf, parseMonthLabel } from "../calendar.js";

describe("calendar helpers", () => {
  it("knows month lengths including leap years", () => {
    expect(lastDayOfMonth(2024, 2)).toBe(29);
    expect(lastDayOfMonth(2025, 2)).toBe(28);
    expect(lastDayOfMonth(2025, 12)).toBe(31);
  });

  it("parses analysis month labels", () => {
    expect(parseMonthLabel("2025년 09월")).toEqual({ year: 2025, month: 9 });
    expect(parseMonthLabel("2025년 9월")).toEqual({ year: 2025, month: 9 });
    expect(parseMonthLabel("2025년 13월")).toBeNull();
    expect(parseMonthLabel("전체")).toBeNull();
    expect(parseMonthLabel(undefined)).toBeNull();
  });

  it("labels ISO dates by month", () => {
    expect(monthLabelOf("2025-09-14")).toBe("2025년 09월");
  });
});

describe("yearForMonth", () => {
  it("rolls January to March into the next year", () => {
    expect(yearForMonth(1, 2025)).toBe(2026);
    expect(yearForMonth(3, 2025)).toBe(2026);
    expect(yearForMonth(4, 2025)).toBe(2025);
    expect(yearForMonth(12, 2025)).toBe(2025);
  });
});

describe("extractComparisonPeriods", () => {
  it("reads two single months", () => {
    expect(extractComparisonPeriods("11월 대비 12월 상승", undefined, 2025)).toEqual({
      kind: "range",
      period1: { start: "2025-11-01", end: "2025-11-30" },
      period2: { start: "2025-12-01", end: "2025-12-31" },
      period1_label: "11월",
      period2_label: "12월",
    });
  });

  it("reads a month span against a single month", () => {
    expect(extractComparisonPeriods("9~12월 대비 1월 NPS 상승", undefined, 2025)).toEqual({
      kind: "range",
      period1: { start: "2025-09-01", end: "2025-12-31" },
      period2: { start: "2026-01-01", end: "2026-01-31" },
      period1_label: "9~12월",
      period2_label: "1월",
    });
  });

  it("rejects an inverted span", () => {
    expect(extractComparisonPeriods("12~9월 대비 1월", undefined, 2025)).toBeUndefined();
  });

  it("rejects months out of range", () => {
    expect(extractComparisonPeriods("13월 대비 1월", undefined, 2025)).toBeUndefined();
  });

  it("needs an analysis month for day comparisons", () => {
    expect(extractComparisonPeriods("2일 대비 5일", undefined, 2025)).toEqual({
      kind: "error",
      message: MISSING_MONTH_MESSAGE,
    });
    expect(extractComparisonPeriods("2일 대비 5일", "전체", 2025)).toEqual({
      kind: "error",
      message: MISSING_MONTH_MESSAGE,
    });
  });

  it("treats a day the month does not have as no comparison", () => {
    expect(extractComparisonPeriods("2일 대비 30일", "2026년 02월", 2025)).toBeUndefined();
  });

  it("accepts the cumulative marker between the days", () => {
    const periods = extractComparisonPeriods("10일 누적 대비 20일", "2025년 11월", 2025);
    expect(periods).toMatchObject({
      period1: { start: "2025-11-01", end: "2025-11-10" },
      period2: { start: "2025-11-01", end: "2025-11-20" },
    });
  });

  it("is undefined when no pattern matches", () => {
    expect(extractComparisonPeriods("NPS 하락", undefined, 2025)).toBeUndefined();
  });
});
