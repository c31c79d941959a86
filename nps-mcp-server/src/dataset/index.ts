/**
 * Dataset Module
 *
 * Survey sources, coercion, caching and scoping.
 */

import type { NpsRules } from "../config-loader.js";
import { PgSurveySource } from "./pg-source.js";
import { SpreadsheetSurveySource } from "./sheet-source.js";
import type { SurveySource } from "./types.js";

export * from "./types.js";
export * from "./row-coercion.js";
export * from "./scope.js";
export * from "./dataset-cache.js";
export { PgSurveySource } from "./pg-source.js";
export { SpreadsheetSurveySource, parseWorkbook } from "./sheet-source.js";

/**
 * NPS_DATA_FILE selects a spreadsheet export; otherwise the configured
 * PostgreSQL table is read.
 */
export function createSurveySource(rules: NpsRules, env: NodeJS.ProcessEnv = process.env): SurveySource {
  const filePath = env.NPS_DATA_FILE;
  if (filePath) {
    return new SpreadsheetSurveySource(filePath, rules.dataset.columns);
  }
  return new PgSurveySource(rules.dataset.table, rules.dataset.columns);
}
