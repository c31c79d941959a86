import { summarizeDataset } from "../dataset/index.js";
import { getDatasetCache } from "./dataset-context.js";
import { jsonResult, type ToolPlugin, type ToolResult } from "./types.js";

export const getDatasetSummaryPlugin: ToolPlugin = {
  definition: {
    name: "get_dataset_summary",
    description:
      "Overview of the loaded NPS survey data: row count, date span, team/store/agent counts, overall NPS " +
      "and the analysis months available for the 'analysis_month' override.",
    inputSchema: {
      type: "object" as const,
      properties: {},
    },
  },
  async handler(): Promise<ToolResult> {
    const cache = getDatasetCache();
    const { dataset, refreshed_at } = await cache.get();
    return jsonResult({ source: cache.sourceName, refreshed_at, ...summarizeDataset(dataset) });
  },
};

export const refreshDatasetPlugin: ToolPlugin = {
  definition: {
    name: "refresh_dataset",
    description: "Drop the cached survey snapshot and reload it from the source now.",
    inputSchema: {
      type: "object" as const,
      properties: {},
    },
  },
  async handler(): Promise<ToolResult> {
    const cache = getDatasetCache();
    await cache.invalidate();
    const { dataset, refreshed_at } = await cache.get();
    return jsonResult({ status: "refreshed", source: cache.sourceName, refreshed_at, total_rows: dataset.rows.length });
  },
};
