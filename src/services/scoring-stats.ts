import { z } from "zod/v4";
import type { StatsCache } from "../cache/index.js";
import type { Logger } from "../lib/logger.js";
import type { HistoryStore } from "../stores/history-store.js";
import type { ScoringStats } from "../stores/types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const CACHE_PREFIX = "scoring-stats:";
export const STATS_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

const cachedStatsSchema = z.object({
  languageCounts: z.record(z.string(), z.number()),
  totalSuccessful: z.number(),
  p95Id: z.number().nullable(),
  p99Id: z.number().nullable(),
});

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ScoringStatsService {
  /** Stats over passed verifications in the trailing 7 days, cached per community. */
  load(communityId: string): Promise<ScoringStats>;
  invalidate(communityId: string): Promise<void>;
}

export interface ScoringStatsOptions {
  ttlSeconds: number;
  now?: () => number;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Cache failures never fail a load: they are logged and the stats are
 * recomputed from the history store.
 */
export function createScoringStatsService(
  history: HistoryStore,
  cache: StatsCache,
  logger: Logger,
  options: ScoringStatsOptions,
): ScoringStatsService {
  const now = options.now ?? Date.now;

  async function readCached(communityId: string): Promise<ScoringStats | null> {
    try {
      const raw = await cache.get(`${CACHE_PREFIX}${communityId}`);
      if (raw === null) return null;
      const parsed = cachedStatsSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        logger.warn({ communityId }, "Discarding malformed cached scoring stats");
        return null;
      }
      return parsed.data;
    } catch (err: unknown) {
      logger.warn({ err, communityId }, "Failed to read cached scoring stats");
      return null;
    }
  }

  async function writeCached(communityId: string, stats: ScoringStats): Promise<void> {
    try {
      await cache.set(`${CACHE_PREFIX}${communityId}`, JSON.stringify(stats), "EX", options.ttlSeconds);
    } catch (err: unknown) {
      logger.warn({ err, communityId }, "Failed to cache scoring stats");
    }
  }

  return {
    async load(communityId: string): Promise<ScoringStats> {
      const cached = await readCached(communityId);
      if (cached) return cached;

      const stats = await history.scoringStats(communityId, new Date(now() - STATS_WINDOW_MS));
      await writeCached(communityId, stats);
      return stats;
    },

    async invalidate(communityId: string): Promise<void> {
      try {
        await cache.del(`${CACHE_PREFIX}${communityId}`);
      } catch (err: unknown) {
        logger.warn({ err, communityId }, "Failed to invalidate cached scoring stats");
      }
    },
  };
}
