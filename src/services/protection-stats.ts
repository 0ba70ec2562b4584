import type { HistoryStore } from "../stores/history-store.js";
import type { Effectiveness, FeatureRates, LanguageCount, ScoringStats, VerificationOutcome } from "../stores/types.js";
import { STATS_WINDOW_MS } from "./scoring-stats.js";
import type { ScoringStatsService } from "./scoring-stats.js";

const TOP_LANGUAGES = 5;

export interface OutcomeProfile extends FeatureRates {
  topLanguages: LanguageCount[];
}

export interface ProtectionReport {
  windowDays: number;
  effectiveness: Effectiveness;
  failedProfile: OutcomeProfile;
  passedProfile: OutcomeProfile;
  scoringStats: ScoringStats;
}

export interface ProtectionStatsService {
  report(communityId: string): Promise<ProtectionReport>;
  /** Forget successful verifications; the false-positive guard starts over. */
  clearPassedProfile(communityId: string): Promise<number>;
}

export function createProtectionStatsService(
  history: HistoryStore,
  stats: ScoringStatsService,
  now: () => number = Date.now,
): ProtectionStatsService {
  async function profile(
    communityId: string,
    outcome: VerificationOutcome,
    since: Date,
    baseline: ScoringStats,
  ): Promise<OutcomeProfile> {
    const rates = await history.featureRates(communityId, outcome, since, baseline);
    const topLanguages = await history.topLanguages(communityId, outcome, since, TOP_LANGUAGES);
    return { ...rates, topLanguages };
  }

  return {
    async report(communityId: string): Promise<ProtectionReport> {
      const since = new Date(now() - STATS_WINDOW_MS);
      const scoringStats = await history.scoringStats(communityId, since);
      const failedProfile = await profile(communityId, "failed", since, scoringStats);
      const passedProfile = await profile(communityId, "passed", since, scoringStats);
      const attacks = await history.attackSummary(communityId, since);

      return {
        windowDays: STATS_WINDOW_MS / (24 * 60 * 60 * 1000),
        effectiveness: {
          passed: passedProfile.sampleSize,
          failed: failedProfile.sampleSize,
          attacks: attacks.attacks,
          removedDuringAttacks: attacks.removed,
        },
        failedProfile,
        passedProfile,
        scoringStats,
      };
    },

    async clearPassedProfile(communityId: string): Promise<number> {
      const cleared = await history.clearOutcomes(communityId, "passed");
      await stats.invalidate(communityId);
      return cleared;
    },
  };
}
