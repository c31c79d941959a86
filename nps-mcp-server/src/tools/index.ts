import { registerPlugins } from "./registry.js";
import {
  parseNpsQuestionPlugin,
  analyzeNpsQuestionPlugin,
  exportNpsResultPlugin,
} from "./nps-analysis.plugin.js";
import { getDatasetSummaryPlugin, refreshDatasetPlugin } from "./dataset.plugin.js";

registerPlugins(
  parseNpsQuestionPlugin,
  analyzeNpsQuestionPlugin,
  exportNpsResultPlugin,
  getDatasetSummaryPlugin,
  refreshDatasetPlugin
);

export { getToolDefinitions, handleToolCall } from "./registry.js";
