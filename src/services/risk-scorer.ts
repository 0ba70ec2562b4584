import type { AccountProfile } from "../gateway/types.js";
import { checkName, fullDisplayName } from "../lib/name-checks.js";
import type { ScoringWeights } from "../lib/scoring-weights.js";
import { usernameRandomness } from "../lib/username-randomness.js";
import type { ScoringStats } from "../stores/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ScoringContext {
  scoringWeights: ScoringWeights;
  languageDistribution: Readonly<Record<string, number>>;
}

/** Signed contribution of each term; they sum to `raw`. */
export interface ScoreBreakdown {
  premium: number;
  language: number;
  avatar: number;
  usernamePresence: number;
  usernameShape: number;
  weirdName: number;
  exoticScript: number;
  specialChars: number;
  repeatingChars: number;
  accountAge: number;
}

export interface RiskAssessment {
  /** Integer in [0, 100]. */
  score: number;
  raw: number;
  breakdown: ScoreBreakdown;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const EXPECTED_WEIGHT = 0.7;
const EMPIRICAL_WEIGHT = 0.3;
/** Combined shares at or below this count as an unrecognised language. */
const RARE_LANGUAGE_SHARE = 0.01;

const BREAKDOWN_TERMS: readonly (keyof ScoreBreakdown)[] = [
  "premium",
  "language",
  "avatar",
  "usernamePresence",
  "usernameShape",
  "weirdName",
  "exoticScript",
  "specialChars",
  "repeatingChars",
  "accountAge",
];

// ---------------------------------------------------------------------------
// Terms
// ---------------------------------------------------------------------------

/** "en-US" -> "en", "pt_BR" -> "pt". */
export function normalizeLanguage(code: string | null): string | null {
  if (code === null) return null;
  const trimmed = code.trim();
  if (trimmed.length === 0) return null;
  const match = /^[a-zA-Z]{2,3}/.exec(trimmed);
  return (match ? match[0] : trimmed).toLowerCase();
}

export function languageTerm(
  languageCode: string | null,
  weights: Pick<ScoringWeights, "maxLangRisk" | "noLangRisk">,
  distribution: Readonly<Record<string, number>>,
  stats: Pick<ScoringStats, "languageCounts" | "totalSuccessful">,
): number {
  const lang = normalizeLanguage(languageCode);
  if (lang === null) {
    return weights.noLangRisk;
  }

  const totalShares = Object.values(distribution).reduce((sum, share) => sum + share, 0);
  const expected = totalShares > 0 ? (distribution[lang] ?? 0) / totalShares : 0;
  const empirical =
    stats.totalSuccessful > 0 ? (stats.languageCounts[lang] ?? 0) / stats.totalSuccessful : expected;

  const combined = Math.min(1, Math.max(0, EXPECTED_WEIGHT * expected + EMPIRICAL_WEIGHT * empirical));
  if (combined > RARE_LANGUAGE_SHARE) {
    return -Math.floor(combined * weights.maxLangRisk);
  }
  return weights.maxLangRisk;
}

export function avatarTerm(
  photoCount: number | null,
  weights: Pick<ScoringWeights, "noAvatarRisk" | "oneAvatarRisk">,
): number {
  if (photoCount === null) return 0;
  if (photoCount === 0) return weights.noAvatarRisk;
  if (photoCount === 1) return weights.oneAvatarRisk;
  return 0;
}

/** Newer accounts have larger ids; compare against recently verified ones. */
export function accountAgeTerm(
  userId: number,
  stats: Pick<ScoringStats, "p95Id" | "p99Id">,
  maxIdRisk: number,
): number {
  if (stats.p95Id === null || stats.p99Id === null) return 0;
  if (userId > stats.p99Id) return maxIdRisk;
  if (userId > stats.p95Id) return Math.floor(maxIdRisk * 0.5);
  return 0;
}

// ---------------------------------------------------------------------------
// Scorer
// ---------------------------------------------------------------------------

/**
 * Score a joining account. Deterministic for identical inputs; neither the
 * context nor the stats are modified.
 *
 * @param photoCount - Profile photo count, or null when it could not be read.
 */
export function scoreAccount(
  account: AccountProfile,
  photoCount: number | null,
  context: ScoringContext,
  stats: ScoringStats,
): RiskAssessment {
  const w = context.scoringWeights;
  const name = checkName(fullDisplayName(account.firstName, account.lastName));
  const username = account.username?.trim() ?? "";

  const breakdown: ScoreBreakdown = {
    premium: account.isPremium ? w.premiumBonus : 0,
    language: languageTerm(account.languageCode, w, context.languageDistribution, stats),
    avatar: avatarTerm(photoCount, w),
    usernamePresence: username.length === 0 ? w.noUsernameRisk : 0,
    usernameShape: username.length > 0 && usernameRandomness(username).isRandom ? w.randomUsernameRisk : 0,
    weirdName: name.weirdName ? w.weirdNameRisk : 0,
    exoticScript: name.exoticScript ? w.exoticScriptRisk : 0,
    specialChars: name.specialChars ? w.specialCharsRisk : 0,
    repeatingChars: name.repeatingChars ? w.repeatingCharsRisk : 0,
    accountAge: accountAgeTerm(account.id, stats, w.maxIdRisk),
  };

  const raw = BREAKDOWN_TERMS.reduce((sum, term) => sum + breakdown[term], 0);
  return {
    score: Math.min(100, Math.max(0, Math.round(raw))),
    raw,
    breakdown,
  };
}
