import { logger } from "../../../shared/observability/src/logger.js";
import { RedisCache } from "../../../shared/redis/src/index.js";
import type { SurveyDataset, SurveySource } from "./types.js";

export interface CachedDataset {
  dataset: SurveyDataset;
  /** ISO timestamp of the load that produced this snapshot */
  refreshed_at: string;
}

/**
 * Time-bounded snapshot of a survey source. Within the TTL every caller
 * sees the same rows; invalidate() forces the next get() to reload.
 * Concurrent misses share one load.
 */
export class SurveyDatasetCache {
  private inflight: Promise<CachedDataset> | null = null;

  constructor(
    private readonly source: SurveySource,
    private readonly cache: RedisCache<SurveyDataset>
  ) {}

  static create(source: SurveySource, ttlSeconds: number): SurveyDatasetCache {
    return new SurveyDatasetCache(source, new RedisCache<SurveyDataset>("dataset", ttlSeconds));
  }

  get sourceName(): string {
    return this.source.name;
  }

  async get(): Promise<CachedDataset> {
    const hit = await this.cache.getWithMeta(this.source.name);
    if (hit) {
      return { dataset: hit.value, refreshed_at: hit.storedAt };
    }

    if (!this.inflight) {
      this.inflight = this.reload().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  async invalidate(): Promise<void> {
    await this.cache.del(this.source.name);
    logger.info("Survey dataset cache invalidated", { source: this.source.name });
  }

  private async reload(): Promise<CachedDataset> {
    const dataset = await this.source.load();
    await this.cache.set(this.source.name, dataset);

    const hit = await this.cache.getWithMeta(this.source.name);
    return { dataset, refreshed_at: hit?.storedAt ?? new Date().toISOString() };
  }
}
