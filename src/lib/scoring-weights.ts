import { z } from "zod/v4";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ScoringWeights {
  /** Largest bonus (as a negative term) or penalty for the language tag. */
  maxLangRisk: number;
  noLangRisk: number;
  /** Penalty for ids above the 99th percentile; half of it above the 95th. */
  maxIdRisk: number;
  /** Added for premium accounts; negative lowers risk. */
  premiumBonus: number;
  noAvatarRisk: number;
  oneAvatarRisk: number;
  noUsernameRisk: number;
  weirdNameRisk: number;
  exoticScriptRisk: number;
  randomUsernameRisk: number;
  specialCharsRisk: number;
  repeatingCharsRisk: number;
}

export type WeightKey = keyof ScoringWeights;

// ---------------------------------------------------------------------------
// Defaults and limits
// ---------------------------------------------------------------------------

export const DEFAULT_SCORING_WEIGHTS: Readonly<ScoringWeights> = {
  maxLangRisk: 25,
  noLangRisk: 15,
  maxIdRisk: 20,
  premiumBonus: -20,
  noAvatarRisk: 15,
  oneAvatarRisk: 5,
  noUsernameRisk: 5,
  weirdNameRisk: 10,
  exoticScriptRisk: 25,
  randomUsernameRisk: 15,
  specialCharsRisk: 10,
  repeatingCharsRisk: 10,
};

export const WEIGHT_LIMITS: Readonly<Record<WeightKey, { min: number; max: number }>> = {
  maxLangRisk: { min: 0, max: 50 },
  noLangRisk: { min: 0, max: 25 },
  maxIdRisk: { min: 0, max: 30 },
  premiumBonus: { min: -50, max: 0 },
  noAvatarRisk: { min: 0, max: 30 },
  oneAvatarRisk: { min: 0, max: 15 },
  noUsernameRisk: { min: 0, max: 30 },
  weirdNameRisk: { min: 0, max: 25 },
  exoticScriptRisk: { min: 0, max: 40 },
  randomUsernameRisk: { min: 0, max: 30 },
  specialCharsRisk: { min: 0, max: 30 },
  repeatingCharsRisk: { min: 0, max: 30 },
};

export const WEIGHT_KEYS: readonly WeightKey[] = [
  "maxLangRisk",
  "noLangRisk",
  "maxIdRisk",
  "premiumBonus",
  "noAvatarRisk",
  "oneAvatarRisk",
  "noUsernameRisk",
  "weirdNameRisk",
  "exoticScriptRisk",
  "randomUsernameRisk",
  "specialCharsRisk",
  "repeatingCharsRisk",
];

export const DEFAULT_SCORING_THRESHOLD = 50;
export const DEFAULT_LANGUAGE_DISTRIBUTION: Readonly<Record<string, number>> = { en: 1 };

// ---------------------------------------------------------------------------
// Merge / validation
// ---------------------------------------------------------------------------

const weightValueSchema = z.number();

export function clampWeight(key: WeightKey, value: number): number {
  const { min, max } = WEIGHT_LIMITS[key];
  return Math.min(max, Math.max(min, Math.trunc(value)));
}

/**
 * Build a complete weight set from a loosely typed stored map.
 * Unknown keys are dropped, missing or non-numeric values take the default,
 * and every value is clamped to its limits.
 */
export function resolveScoringWeights(raw: unknown): ScoringWeights {
  const source = new Map<string, unknown>(
    typeof raw === "object" && raw !== null && !Array.isArray(raw) ? Object.entries(raw) : [],
  );

  const weights: ScoringWeights = { ...DEFAULT_SCORING_WEIGHTS };
  for (const key of WEIGHT_KEYS) {
    const parsed = weightValueSchema.safeParse(source.get(key));
    if (parsed.success) {
      weights[key] = clampWeight(key, parsed.data);
    }
  }
  return weights;
}

/**
 * Keep only languages with a positive finite share; fall back to the default
 * distribution when nothing usable remains.
 */
export function resolveLanguageDistribution(raw: unknown): Record<string, number> {
  const result: Record<string, number> = {};
  if (typeof raw === "object" && raw !== null && !Array.isArray(raw)) {
    for (const [lang, share] of Object.entries(raw)) {
      const parsed = weightValueSchema.safeParse(share);
      if (parsed.success && parsed.data > 0) {
        result[lang.toLowerCase()] = parsed.data;
      }
    }
  }
  return Object.keys(result).length > 0 ? result : { ...DEFAULT_LANGUAGE_DISTRIBUTION };
}
