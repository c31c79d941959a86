import { z } from "zod";
import { FilterOverridesSchema, resolveFilters, runAnalysis, type AnalysisOutcome } from "../analysis-runner.js";
import { getFilterSummary } from "../query-parser/index.js";
import type { AnalysisResult, StoreAgentDetail } from "../analyzers/index.js";
import { tableFor, writeTableExport } from "../export/index.js";
import { logger } from "../../../shared/observability/src/logger.js";
import { getDatasetCache } from "./dataset-context.js";
import { jsonResult, type ToolPlugin, type ToolResult } from "./types.js";

// ── Shared input pieces ─────────────────────────────────────────────────────

const question = z.string().trim().min(1, "question cannot be empty");

const OVERRIDES_JSON_SCHEMA = {
  type: "object",
  description:
    "Manual filter corrections; every value given here replaces what was extracted from the question.",
  properties: {
    analysis_month: { type: "string", description: "'YYYY년 MM월' (e.g. '2026년 01월') or '전체' for all months." },
    team: { type: ["string", "null"], description: "Marketing team, e.g. '인천마케팅팀'. '전체' or null drops the team filter." },
    dealer_name: { type: ["string", "null"], description: "'전체' or null drops the dealer filter." },
    store_name: { type: ["string", "null"], description: "Store name, e.g. '부평점'. '전체' or null drops the store filter." },
    nps_target: { type: "number", description: "NPS threshold in percent." },
    nps_comparison: { type: "string", enum: ["below", "above"] },
    senior_threshold: {
      type: "object",
      description: "{kind:'avg'} | {kind:'below_avg'} | {kind:'custom', value}",
      properties: {
        kind: { type: "string", enum: ["avg", "below_avg", "custom"] },
        value: { type: "number" },
      },
      required: ["kind"],
    },
    min_responses: { type: "integer", minimum: 1 },
    min_responses_period1: { type: "integer", minimum: 1 },
    min_responses_period2: { type: "integer", minimum: 1 },
    trend: { type: "string", enum: ["increase", "decrease"] },
  },
} as const;

// ── parse_nps_question ──────────────────────────────────────────────────────

const ParseInputSchema = z.object({
  question,
  overrides: FilterOverridesSchema.optional(),
});

export const parseNpsQuestionPlugin: ToolPlugin = {
  definition: {
    name: "parse_nps_question",
    description:
      "Parse a Korean NPS survey question into structured filters (team, store, NPS target, senior share, " +
      "response floor, trend, comparison periods, analysis type) without running an analysis.",
    inputSchema: {
      type: "object" as const,
      properties: {
        question: { type: "string", description: "Free-text question, e.g. '인천 NPS 87% 미만인 T크루는?'" },
        overrides: OVERRIDES_JSON_SCHEMA,
      },
      required: ["question"],
    },
  },
  async handler(args): Promise<ToolResult> {
    const input = ParseInputSchema.parse(args);
    const filters = resolveFilters(input.question, input.overrides);
    return jsonResult({ filters, summary_text: getFilterSummary(filters) });
  },
};

// ── analyze_nps_question ────────────────────────────────────────────────────

const AnalyzeInputSchema = z.object({
  question,
  overrides: FilterOverridesSchema.optional(),
  top_n: z.number().int().min(5).max(50).optional().default(20),
});

function truncateDetail<Detail extends StoreAgentDetail<unknown>>(
  detail: Record<string, Detail>,
  limit: number
): Record<string, Detail> {
  return Object.fromEntries(Object.entries(detail).slice(0, limit));
}

/** Keep tool responses bounded; totals report what was cut */
function renderResult(result: AnalysisResult, topN: number) {
  const { bundle } = result;
  return {
    analysis_type: result.analysis_type,
    summary: bundle.summary,
    insights: bundle.insights,
    agent_total: bundle.by_agent.length,
    store_total: bundle.by_store.length,
    by_agent: bundle.by_agent.slice(0, topN),
    by_store: bundle.by_store.slice(0, topN),
    store_agent_detail: truncateDetail<StoreAgentDetail<unknown>>(bundle.store_agent_detail, topN),
  };
}

function renderOutcome(outcome: AnalysisOutcome, topN: number) {
  const base = { status: outcome.status, summary_text: outcome.summary_text, filters: outcome.filters };
  switch (outcome.status) {
    case "ok":
      return { ...base, ...renderResult(outcome.result, topN) };
    case "blocked":
    case "unsupported":
      return { ...base, message: outcome.message };
    case "unrecognized":
      return { ...base, message: outcome.message, examples: outcome.examples };
  }
}

export const analyzeNpsQuestionPlugin: ToolPlugin = {
  definition: {
    name: "analyze_nps_question",
    description:
      "Answer a Korean NPS survey question. Detects the analysis type (simple NPS filter, senior-share gap, " +
      "period-over-period comparison) and returns per-agent (T크루) and per-store tables, a store→agent " +
      "breakdown, summary metrics and insights. Use 'overrides' to correct extracted filters.",
    inputSchema: {
      type: "object" as const,
      properties: {
        question: { type: "string", description: "Free-text question, e.g. '12월 대비 1월 NPS 하락한 T크루는?'" },
        overrides: OVERRIDES_JSON_SCHEMA,
        top_n: { type: "integer", minimum: 5, maximum: 50, description: "Rows returned per table (default 20)." },
      },
      required: ["question"],
    },
  },
  async handler(args): Promise<ToolResult> {
    const input = AnalyzeInputSchema.parse(args);
    const { dataset, refreshed_at } = await getDatasetCache().get();

    const outcome = runAnalysis(input.question, dataset, input.overrides);
    if (outcome.status !== "ok") {
      logger.info(`Analysis not run: ${outcome.status}`, { question: input.question });
    }

    return jsonResult({ ...renderOutcome(outcome, input.top_n), data_refreshed_at: refreshed_at });
  },
};

// ── export_nps_result ───────────────────────────────────────────────────────

const ExportInputSchema = z.object({
  question,
  overrides: FilterOverridesSchema.optional(),
  table: z.enum(["agent", "store"]).optional().default("agent"),
});

export const exportNpsResultPlugin: ToolPlugin = {
  definition: {
    name: "export_nps_result",
    description:
      "Run an NPS question and write its agent or store table to an .xlsx file " +
      "(nps_<table>_YYYYMMDD_HHMMSS.xlsx under EXPORT_DIR). Returns the file path.",
    inputSchema: {
      type: "object" as const,
      properties: {
        question: { type: "string" },
        overrides: OVERRIDES_JSON_SCHEMA,
        table: { type: "string", enum: ["agent", "store"], description: "Which table to export (default 'agent')." },
      },
      required: ["question"],
    },
  },
  async handler(args): Promise<ToolResult> {
    const input = ExportInputSchema.parse(args);
    const { dataset } = await getDatasetCache().get();

    const outcome = runAnalysis(input.question, dataset, input.overrides);
    if (outcome.status !== "ok") {
      return {
        content: [{ type: "text", text: `Nothing to export: ${outcome.message}` }],
        isError: true,
      };
    }

    const written = await writeTableExport(tableFor(outcome.result, input.table), input.table);
    return jsonResult({
      status: "exported",
      analysis_type: outcome.result.analysis_type,
      table: input.table,
      ...written,
    });
  },
};
