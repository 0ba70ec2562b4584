import type { communityConfigs } from "../db/schema/community-configs.js";
import type { attackSessions } from "../db/schema/attack-sessions.js";
import type { pendingVerifications } from "../db/schema/pending-verifications.js";
import {
  DEFAULT_SCORING_THRESHOLD,
  resolveLanguageDistribution,
  resolveScoringWeights,
} from "../lib/scoring-weights.js";
import type { ScoringWeights } from "../lib/scoring-weights.js";

// ---------------------------------------------------------------------------
// Community configuration
// ---------------------------------------------------------------------------

export type CommunityConfigRow = typeof communityConfigs.$inferSelect;

export interface CommunityConfig {
  id: string;
  title: string;
  /** Joins within `windowSeconds` that switch the community into mitigation. */
  threshold: number;
  windowSeconds: number;
  protectPremium: boolean;
  mitigationActive: boolean;
  verificationEnabled: boolean;
  scoringEnabled: boolean;
  scoringThreshold: number;
  scoringWeights: ScoringWeights;
  /** Expected language shares; need not sum to 1. */
  languageDistribution: Record<string, number>;
  autoAdjustEnabled: boolean;
  /** Sent after a passed challenge; `{username}` is replaced. */
  welcomeMessage: string | null;
}

export interface CommunityConfigPatch {
  title?: string;
  threshold?: number;
  windowSeconds?: number;
  protectPremium?: boolean;
  verificationEnabled?: boolean;
  scoringEnabled?: boolean;
  scoringThreshold?: number;
  scoringWeights?: Partial<ScoringWeights>;
  languageDistribution?: Record<string, number>;
  autoAdjustEnabled?: boolean;
  welcomeMessage?: string | null;
}

function clampInt(value: number, min: number, max: number, fallback: number): number {
  if (!Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, Math.trunc(value)));
}

/**
 * The single merge/validation step between a stored row and the typed
 * configuration every service reads.
 */
export function toCommunityConfig(row: CommunityConfigRow): CommunityConfig {
  return {
    id: row.id,
    title: row.title,
    threshold: clampInt(row.threshold, 1, Number.MAX_SAFE_INTEGER, 10),
    windowSeconds: clampInt(row.windowSeconds, 1, Number.MAX_SAFE_INTEGER, 60),
    protectPremium: row.protectPremium,
    mitigationActive: row.mitigationActive,
    verificationEnabled: row.verificationEnabled,
    scoringEnabled: row.scoringEnabled,
    scoringThreshold: clampInt(row.scoringThreshold, 0, 100, DEFAULT_SCORING_THRESHOLD),
    scoringWeights: resolveScoringWeights(row.scoringWeights),
    languageDistribution: resolveLanguageDistribution(row.languageDistribution),
    autoAdjustEnabled: row.autoAdjustEnabled,
    welcomeMessage: row.welcomeMessage,
  };
}

// ---------------------------------------------------------------------------
// Verification
// ---------------------------------------------------------------------------

export type PendingVerification = typeof pendingVerifications.$inferSelect;

export type VerificationOutcome = "passed" | "failed";
export type ResolutionReason = "correct_answer" | "wrong_answer" | "timeout";

export interface OutcomeRecord {
  communityId: string;
  userId: number;
  outcome: VerificationOutcome;
  reason: ResolutionReason;
  usernamePresent: boolean;
  /** Base language code ("en"), or null when the account had none. */
  languageCode: string | null;
  isPremium: boolean;
  avatarCount: number | null;
  hasExoticScript: boolean;
  hasWeirdName: boolean;
  riskScore: number;
}

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

export interface ScoringStats {
  languageCounts: Record<string, number>;
  totalSuccessful: number;
  p95Id: number | null;
  p99Id: number | null;
}

export const EMPTY_SCORING_STATS: Readonly<ScoringStats> = {
  languageCounts: {},
  totalSuccessful: 0,
  p95Id: null,
  p99Id: null,
};

export interface IdBaseline {
  p95Id: number | null;
  p99Id: number | null;
}

/** Share of a population showing each monitored feature (0..1). */
export interface FeatureRates {
  sampleSize: number;
  noUsername: number;
  exoticScript: number;
  weirdName: number;
  noAvatar: number;
  oneAvatar: number;
  noLanguage: number;
  idAboveP95: number;
  idAboveP99: number;
  premium: number;
  averageRiskScore: number;
}

export interface LanguageCount {
  language: string;
  count: number;
}

export type AttackSession = typeof attackSessions.$inferSelect;

export interface AttackSummary {
  attacks: number;
  removed: number;
}

export interface Effectiveness {
  passed: number;
  failed: number;
  attacks: number;
  removedDuringAttacks: number;
}
