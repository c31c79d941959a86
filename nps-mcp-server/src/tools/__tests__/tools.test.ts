import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { getToolDefinitions, handleToolCall } from "../index.js";
import { setDatasetCache } from "../dataset-context.js";
import { SurveyDatasetCache } from "../../dataset/dataset-cache.js";
import type { SurveyDataset } from "../../dataset/types.js";
import { RedisCache } from "../../../../shared/redis/src/index.js";
import { dataset, responses } from "../../__tests__/survey-fixtures.js";
import type { ToolResult } from "../types.js";

const survey = dataset([
  ...responses({ id: "A1", name: "김하나", store: "강남점" }, [10, 10, 9, 3, 8]),
  ...responses({ id: "A2", name: "이두리", store: "강남점" }, [10, 10, 10, 10, 9]),
  ...responses({ id: "B1", name: "박세찬", store: "역삼점" }, [6, 6, 10, 10, 7]),
]);

const source = { name: "fake-survey", load: vi.fn(async () => survey) };

function body(result: ToolResult): Record<string, unknown> {
  return JSON.parse(result.content[0].text);
}

describe("NPS tools", () => {
  const exportDir = fs.mkdtempSync(path.join(os.tmpdir(), "nps-tools-"));

  beforeAll(() => {
    delete process.env.REDIS_URL;
    process.env.EXPORT_DIR = exportDir;
    setDatasetCache(new SurveyDatasetCache(source, new RedisCache<SurveyDataset>("dataset-tools", 60)));
  });

  afterAll(() => {
    setDatasetCache(null);
    delete process.env.EXPORT_DIR;
    fs.rmSync(exportDir, { recursive: true, force: true });
  });

  it("registers every tool", () => {
    expect(getToolDefinitions().map((d) => d.name)).toEqual([
      "parse_nps_question",
      "analyze_nps_question",
      "export_nps_result",
      "get_dataset_summary",
      "refresh_dataset",
    ]);
  });

  it("parses without touching the dataset", async () => {
    const result = await handleToolCall("parse_nps_question", { question: "인천 NPS 80% 미만 T크루" });
    expect(result.isError).toBeUndefined();
    expect(body(result)).toMatchObject({
      filters: { team: "인천마케팅팀", nps_target: 80, analysis_type: "SIMPLE_FILTER" },
      summary_text: "팀: 인천마케팅팀 | NPS 목표: 80% 미만 | 최소 응답수: 5건 | 분석 유형: 단순 필터 분석",
    });
  });

  it("reports validation errors with their path", async () => {
    const result = await handleToolCall("parse_nps_question", { question: "   " });
    expect(result).toEqual({
      content: [{ type: "text", text: "Validation error: question: question cannot be empty" }],
      isError: true,
    });
  });

  it("rejects unknown overrides", async () => {
    const result = await handleToolCall("analyze_nps_question", { question: "NPS 낮은 곳", overrides: { region: "x" } });
    expect(result.isError).toBe(true);
    expect(result.content[0].text).toMatch(/^Validation error: overrides: /);
  });

  it("reports unknown tools", async () => {
    const result = await handleToolCall("drop_tables", {});
    expect(result).toEqual({ content: [{ type: "text", text: "Error: Unknown tool: drop_tables" }], isError: true });
  });

  it("answers a question with truncated tables", async () => {
    const result = await handleToolCall("analyze_nps_question", { question: "NPS 87% 미만 T크루", top_n: 5 });
    const answer = body(result);
    expect(answer).toMatchObject({
      status: "ok",
      analysis_type: "SIMPLE_FILTER",
      agent_total: 2,
      store_total: 2,
      summary: { "담당자 수": 2, "매장 수": 2, "평균 NPS": "20.0%" },
    });
    expect(typeof answer.data_refreshed_at).toBe("string");
  });

  it("returns examples for questions it cannot classify", async () => {
    const answer = body(await handleToolCall("analyze_nps_question", { question: "안녕하세요" }));
    expect(answer.status).toBe("unrecognized");
    expect(answer.examples).toHaveLength(3);
  });

  it("summarises and refreshes the dataset", async () => {
    const summary = body(await handleToolCall("get_dataset_summary", {}));
    expect(summary).toMatchObject({ source: "fake-survey", total_rows: 15, agents: 3, stores: 2 });

    const callsBefore = source.load.mock.calls.length;
    const refreshed = body(await handleToolCall("refresh_dataset", {}));
    expect(refreshed).toMatchObject({ status: "refreshed", total_rows: 15 });
    expect(source.load).toHaveBeenCalledTimes(callsBefore + 1);
  });

  it("exports the store table", async () => {
    const result = await handleToolCall("export_nps_result", { question: "NPS 87% 미만 T크루", table: "store" });
    const exported = body(result);
    expect(exported).toMatchObject({ status: "exported", analysis_type: "SIMPLE_FILTER", table: "store", rows: 2 });
    expect(typeof exported.file_path).toBe("string");
    expect(fs.readdirSync(exportDir)).toHaveLength(1);
  });

  it("refuses to export when no analysis ran", async () => {
    const result = await handleToolCall("export_nps_result", { question: "안녕하세요" });
    expect(result).toEqual({
      content: [{ type: "text", text: "Nothing to export: 질문 유형을 인식할 수 없습니다." }],
      isError: true,
    });
  });
});
