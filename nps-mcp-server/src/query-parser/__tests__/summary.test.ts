import { describe, it, expect } from "vitest";
import { getFilterSummary } from "../summary.js";
import { parseQuestion } from "../parser.js";

describe("getFilterSummary", () => {
  it("describes a parsed simple filter", () => {
    expect(getFilterSummary(parseQuestion("인천 NPS 80% 미만 T크루"))).toBe(
      "팀: 인천마케팅팀 | NPS 목표: 80% 미만 | 최소 응답수: 5건 | 분석 유형: 단순 필터 분석"
    );
  });

  it("includes month, senior share and store in order", () => {
    expect(
      getFilterSummary({
        analysis_month: "2026년 01월",
        nps_target: 90,
        nps_comparison: "above",
        senior_threshold: { kind: "custom", value: 40 },
        min_responses: 3,
        store_name: "강남점",
        comparison_mode: false,
        analysis_type: "SENIOR_GAP",
      })
    ).toBe(
      "분석월: 2026년 01월 | NPS 목표: 90% 이상 | 시니어 비중: 40% 이상 | 최소 응답수: 3건 | 매장: 강남점 | 분석 유형: 시니어 GAP 분석"
    );
  });

  it("renders a zero target", () => {
    expect(
      getFilterSummary({ nps_target: 0, min_responses: 0, comparison_mode: false, analysis_type: "GENERAL" })
    ).toBe("NPS 목표: 0% 미만 | 분석 유형: 일반 분석");
  });
});
