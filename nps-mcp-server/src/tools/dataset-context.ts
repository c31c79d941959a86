import { getNpsRules } from "../config-loader.js";
import { createSurveySource, SurveyDatasetCache } from "../dataset/index.js";

let datasetCache: SurveyDatasetCache | null = null;

/** Process-wide dataset snapshot shared by every tool */
export function getDatasetCache(): SurveyDatasetCache {
  if (!datasetCache) {
    const rules = getNpsRules();
    datasetCache = SurveyDatasetCache.create(createSurveySource(rules), rules.defaults.cache_ttl_seconds);
  }
  return datasetCache;
}

/** Swap the shared cache (tests, alternative sources) */
export function setDatasetCache(cache: SurveyDatasetCache | null): void {
  datasetCache = cache;
}
