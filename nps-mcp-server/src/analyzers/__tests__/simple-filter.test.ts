import { describe, it, expect } from "vitest";
import { analyzeSimpleFilter } from "../simple-filter.js";
import { filterSpec, responses, TEST_DEFAULTS, type TestAgent } from "../../__tests__/survey-fixtures.js";

const kim: TestAgent = { id: "A1", name: "김하나", store: "강남점" };
const lee: TestAgent = { id: "A2", name: "이두리", store: "강남점" };
const park: TestAgent = { id: "B1", name: "박세찬", store: "역삼점" };
const choi: TestAgent = { id: "B2", name: "최넷", store: "역삼점" };

const rows = [
  ...responses(kim, [10, 10, 9, 3, 8]), // 40.0
  ...responses(lee, [10, 10, 10, 10, 9]), // 100.0
  ...responses(park, [6, 6, 10, 10, 7]), // 0.0
  ...responses(choi, [9, 9]), // 100.0, too few responses
];

describe("analyzeSimpleFilter", () => {
  const belowTarget = filterSpec({ nps_target: 87, nps_comparison: "below" });

  it("keeps agents under the target with enough responses", () => {
    const result = analyzeSimpleFilter(rows, belowTarget, TEST_DEFAULTS);
    expect(result.by_agent.map((a) => [a.agent_id, a.nps_value])).toEqual([
      ["A1", 40],
      ["B1", 0],
    ]);
    expect(result.by_agent[0]).toMatchObject({
      responses: 5,
      promoters: 3,
      detractors: 1,
      nps: "40.0%",
      store_share_value: 50,
      store_share: "50.0%",
    });
    expect(result.by_agent[1].store_share).toBe("71.4%");
  });

  it("aggregates stores with the same filters", () => {
    const result = analyzeSimpleFilter(rows, belowTarget, TEST_DEFAULTS);
    expect(result.by_store.map((s) => [s.store_name, s.responses, s.nps])).toEqual([
      ["강남점", 10, "70.0%"],
      ["역삼점", 7, "28.6%"],
    ]);
  });

  it("summarises the surviving agents", () => {
    const result = analyzeSimpleFilter(rows, belowTarget, TEST_DEFAULTS);
    expect(result.summary).toEqual({ "담당자 수": 2, "매장 수": 2, "평균 NPS": "20.0%" });
    expect(result.insights).toEqual([
      "📌 박세찬 (역삼점)의 NPS가 0.0%로 가장 낮습니다.",
      "📊 NPS 범위: 0.0% ~ 40.0% (편차 40.0%p)",
      "🏪 역삼점의 NPS가 28.6%로 가장 낮습니다.",
    ]);
  });

  it("treats an above target as inclusive", () => {
    const result = analyzeSimpleFilter(rows, filterSpec({ nps_target: 100, nps_comparison: "above" }), TEST_DEFAULTS);
    expect(result.by_agent.map((a) => a.agent_id)).toEqual(["A2"]);
    expect(result.by_store).toEqual([]);
  });

  it("builds the store detail over every input row", () => {
    const result = analyzeSimpleFilter(rows, belowTarget, TEST_DEFAULTS);
    expect(Object.keys(result.store_agent_detail)).toEqual(["강남점", "역삼점"]);

    const gangnam = result.store_agent_detail["강남점"];
    expect(gangnam.responses).toBe(10);
    expect(gangnam.nps).toBe("70.0%");
    expect(gangnam.agents.map((a) => [a.agent_id, a.vs_store, a.status])).toEqual([
      ["A1", "-30.0%", "needs_improvement"],
      ["A2", "30.0%", "excellent"],
    ]);

    const yeoksam = result.store_agent_detail["역삼점"];
    expect(yeoksam.agents.map((a) => [a.agent_id, a.vs_store_value, a.store_share])).toEqual([
      ["B1", -28.6, "71.4%"],
      ["B2", 71.4, "28.6%"],
    ]);
  });

  it("names ties in the insights", () => {
    const x: TestAgent = { id: "X", name: "강나래", store: "강남점" };
    const y: TestAgent = { id: "Y", name: "윤바다", store: "역삼점" };
    const result = analyzeSimpleFilter(
      [...responses(x, [6, 6, 6, 6, 6]), ...responses(y, [0, 1, 2, 3, 4])],
      filterSpec(),
      TEST_DEFAULTS
    );
    expect(result.insights).toEqual([
      "📌 강나래 (강남점) 외 1명의 NPS가 -100.0%로 가장 낮습니다.",
      "📊 NPS 범위: -100.0% ~ -100.0% (편차 0.0%p)",
      "🏪 강남점 외 1개 매장의 NPS가 -100.0%로 가장 낮습니다.",
    ]);
  });

  it("reports N/A when nothing passes", () => {
    const result = analyzeSimpleFilter(rows, filterSpec({ nps_target: 0, nps_comparison: "below" }), TEST_DEFAULTS);
    expect(result.by_agent).toEqual([]);
    expect(result.summary["평균 NPS"]).toBe("N/A");
    expect(result.insights).toEqual([]);
    expect(Object.keys(result.store_agent_detail)).toHaveLength(2);
  });

  it("lists an even split of promoters and detractors at zero", () => {
    const agent: TestAgent = { id: "A", name: "한결", store: "S1" };
    const split = responses(agent, [...Array<number>(10).fill(9), ...Array<number>(10).fill(0)]);

    const result = analyzeSimpleFilter(split, filterSpec(), TEST_DEFAULTS);
    expect(result.by_agent).toHaveLength(1);
    expect(result.by_agent[0]).toMatchObject({
      agent_id: "A",
      store_name: "S1",
      responses: 20,
      promoters: 10,
      detractors: 10,
      nps_value: 0,
      nps: "0.0%",
    });
  });

  it("uses the period-1 floor when one is set", () => {
    const result = analyzeSimpleFilter(rows, filterSpec({ min_responses_period1: 2 }), TEST_DEFAULTS);
    expect(result.by_agent.map((a) => a.agent_id)).toEqual(["A1", "A2", "B1", "B2"]);
  });
});
