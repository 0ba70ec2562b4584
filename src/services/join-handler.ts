import type { AccountProfile, MessagingGateway } from "../gateway/types.js";
import type { Logger } from "../lib/logger.js";
import { removeMember } from "../lib/removal.js";
import type { ConfigStore } from "../stores/config-store.js";
import { EMPTY_SCORING_STATS } from "../stores/types.js";
import type { CommunityConfig, ScoringStats } from "../stores/types.js";
import type { AttackDetector } from "./attack-detector.js";
import { scoreAccount } from "./risk-scorer.js";
import type { ScoringStatsService } from "./scoring-stats.js";
import type { VerificationWorkflow } from "./verification.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type JoinOutcome =
  | { action: "ignored"; reason: "not_protected" | "bot" }
  | { action: "mitigated"; removed: boolean }
  | { action: "removed_by_score"; score: number; removed: boolean }
  | { action: "challenged"; score: number }
  | { action: "admitted"; score: number | null };

export interface JoinHandler {
  handleJoin(communityId: string, account: AccountProfile): Promise<JoinOutcome>;
}

export interface JoinHandlerDeps {
  configStore: ConfigStore;
  detector: AttackDetector;
  stats: ScoringStatsService;
  verification: VerificationWorkflow;
  gateway: MessagingGateway;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Attack detector first; a join it does not handle is scored, then either
 * removed, challenged or admitted.
 */
export function createJoinHandler(deps: JoinHandlerDeps): JoinHandler {
  const { configStore, detector, stats, verification, gateway, logger } = deps;

  async function photoCount(userId: number): Promise<number | null> {
    try {
      return await gateway.getProfilePhotoCount(userId);
    } catch (err: unknown) {
      logger.debug({ err, userId }, "Profile photo count unavailable");
      return null;
    }
  }

  async function loadStats(communityId: string): Promise<ScoringStats> {
    try {
      return await stats.load(communityId);
    } catch (err: unknown) {
      logger.warn({ err, communityId }, "Scoring stats unavailable, scoring without history");
      return EMPTY_SCORING_STATS;
    }
  }

  async function screen(config: CommunityConfig, account: AccountProfile): Promise<JoinOutcome> {
    const avatarCount = await photoCount(account.id);
    const assessment = scoreAccount(account, avatarCount, config, await loadStats(config.id));

    logger.info(
      {
        communityId: config.id,
        userId: account.id,
        score: assessment.score,
        threshold: config.scoringThreshold,
        breakdown: assessment.breakdown,
      },
      "Join scored",
    );

    if (config.scoringEnabled && assessment.score >= config.scoringThreshold) {
      const removed = await removeMember(gateway, config.id, account.id, logger);
      return { action: "removed_by_score", score: assessment.score, removed };
    }

    if (config.verificationEnabled) {
      const issued = await verification.issue({
        communityId: config.id,
        account,
        riskScore: assessment.score,
        avatarCount,
      });
      if (issued) {
        return { action: "challenged", score: assessment.score };
      }
    }

    return { action: "admitted", score: assessment.score };
  }

  return {
    async handleJoin(communityId: string, account: AccountProfile): Promise<JoinOutcome> {
      const config = await configStore.get(communityId);
      if (!config) {
        return { action: "ignored", reason: "not_protected" };
      }
      if (account.isBot) {
        return { action: "ignored", reason: "bot" };
      }

      const verdict = await detector.handleJoin(config, { userId: account.id, isPremium: account.isPremium });
      if (!verdict.proceed) {
        return { action: "mitigated", removed: verdict.removed };
      }

      if (!config.scoringEnabled && !config.verificationEnabled) {
        return { action: "admitted", score: null };
      }
      return screen(config, account);
    },
  };
}
