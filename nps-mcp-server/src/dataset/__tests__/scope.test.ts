import { describe, it, expect } from "vitest";
import { applyScope, listAnalysisMonths, summarizeDataset } from "../scope.js";
import { dataset, surveyRow, type TestAgent } from "../../__tests__/survey-fixtures.js";

const kim: TestAgent = { id: "A1", name: "김하나", store: "강남점" };
const park: TestAgent = { id: "B1", name: "박세찬", store: "수원역점", dealer: "새솔대리점", team: "수원마케팅팀" };

const survey = dataset([
  surveyRow(kim, 10, { date: "2026-01-03" }),
  surveyRow(kim, 6, { date: "2025-12-20" }),
  surveyRow(park, 9, { date: "2026-01-28" }),
  surveyRow(park, 8, { date: null }),
]);

describe("applyScope", () => {
  it("narrows to an analysis month", () => {
    const scoped = applyScope(survey, { analysis_month: "2026년 01월" });
    expect(scoped.rows.map((r) => r.processed_date)).toEqual(["2026-01-03", "2026-01-28"]);
    expect(scoped.columns).toEqual(survey.columns);
  });

  it("treats the all-months label as no month filter", () => {
    expect(applyScope(survey, { analysis_month: "전체" }).rows).toHaveLength(4);
  });

  it("narrows by team, dealer and store", () => {
    expect(applyScope(survey, { team: "수원마케팅팀" }).rows).toHaveLength(2);
    expect(applyScope(survey, { dealer_name: "한빛대리점" }).rows).toHaveLength(2);
    expect(applyScope(survey, { store_name: "강남점", analysis_month: "2025년 12월" }).rows).toHaveLength(1);
  });
});

describe("dataset overview", () => {
  it("lists months newest first", () => {
    expect(listAnalysisMonths(survey)).toEqual(["2026년 01월", "2025년 12월"]);
  });

  it("summarises the whole dataset", () => {
    expect(summarizeDataset(survey)).toEqual({
      total_rows: 4,
      date_range: { start: "2025-12-20", end: "2026-01-28" },
      teams: 2,
      stores: 2,
      agents: 2,
      nps: 25,
      analysis_months: ["2026년 01월", "2025년 12월"],
    });
  });

  it("has no date range without dates", () => {
    expect(summarizeDataset(dataset([surveyRow(kim, 9, { date: null })])).date_range).toBeNull();
  });
});
