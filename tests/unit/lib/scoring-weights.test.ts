import { describe, it, expect } from "vitest";
import {
  DEFAULT_SCORING_WEIGHTS,
  WEIGHT_KEYS,
  WEIGHT_LIMITS,
  clampWeight,
  resolveLanguageDistribution,
  resolveScoringWeights,
} from "../../../src/lib/scoring-weights.js";

describe("scoring weights", () => {
  it("defaults sit inside their limits", () => {
    for (const key of WEIGHT_KEYS) {
      const { min, max } = WEIGHT_LIMITS[key];
      expect(DEFAULT_SCORING_WEIGHTS[key]).toBeGreaterThanOrEqual(min);
      expect(DEFAULT_SCORING_WEIGHTS[key]).toBeLessThanOrEqual(max);
    }
  });

  it("clampWeight truncates and clamps", () => {
    expect(clampWeight("noAvatarRisk", 7.9)).toBe(7);
    expect(clampWeight("noAvatarRisk", 99)).toBe(30);
    expect(clampWeight("premiumBonus", 10)).toBe(0);
    expect(clampWeight("premiumBonus", -80)).toBe(-50);
  });

  it("resolveScoringWeights fills gaps with defaults", () => {
    const weights = resolveScoringWeights({ maxLangRisk: 100, noLangRisk: "x", noAvatarRisk: 7.9, bogus: 3 });

    expect(weights).toEqual({ ...DEFAULT_SCORING_WEIGHTS, maxLangRisk: 50, noAvatarRisk: 7 });
    expect(weights).not.toHaveProperty("bogus");
  });

  it("resolveScoringWeights accepts non-objects", () => {
    expect(resolveScoringWeights(null)).toEqual(DEFAULT_SCORING_WEIGHTS);
    expect(resolveScoringWeights([1, 2])).toEqual(DEFAULT_SCORING_WEIGHTS);
  });

  it("resolveLanguageDistribution keeps positive shares only", () => {
    expect(resolveLanguageDistribution({ EN: 0.5, ru: 0, de: -1, fr: "x", uk: 0.3 })).toEqual({ en: 0.5, uk: 0.3 });
  });

  it("resolveLanguageDistribution falls back to the default", () => {
    expect(resolveLanguageDistribution({})).toEqual({ en: 1 });
    expect(resolveLanguageDistribution("en")).toEqual({ en: 1 });
  });
});
