import type { Logger } from "../lib/logger.js";
import { WEIGHT_LIMITS } from "../lib/scoring-weights.js";
import type { ScoringWeights, WeightKey } from "../lib/scoring-weights.js";
import type { ConfigStore } from "../stores/config-store.js";
import type { HistoryStore } from "../stores/history-store.js";
import type { FeatureRates } from "../stores/types.js";
import type { NotificationSink } from "./notification.js";
import { STATS_WINDOW_MS } from "./scoring-stats.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Tuning runs each time the 7-day failure count reaches a multiple of this. */
export const TUNE_EVERY_FAILURES = 50;
export const MIN_FAILED_SAMPLES = 30;
export const MIN_PASSED_SAMPLES = 30;
/** A feature this common among failures gets a heavier weight. */
export const FAILED_RATE_TRIGGER = 0.7;
/** ...unless it is also this common among accounts that passed. */
export const PASSED_RATE_GUARD = 0.5;
export const WEIGHT_STEP = 5;
export const THRESHOLD_MARGIN = 10;
export const THRESHOLD_STEP = 5;
export const MIN_SCORING_THRESHOLD = 20;

type RateFeature = Exclude<keyof FeatureRates, "sampleSize" | "averageRiskScore" | "premium">;

interface MonitoredFeature {
  feature: RateFeature;
  weight: WeightKey;
}

const MONITORED: readonly MonitoredFeature[] = [
  { feature: "noUsername", weight: "noUsernameRisk" },
  { feature: "exoticScript", weight: "exoticScriptRisk" },
  { feature: "weirdName", weight: "weirdNameRisk" },
  { feature: "noAvatar", weight: "noAvatarRisk" },
  { feature: "oneAvatar", weight: "oneAvatarRisk" },
  { feature: "noLanguage", weight: "noLangRisk" },
];

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TuneResult =
  | { status: "skipped"; reason: "not_found" | "auto_adjust_disabled" | "insufficient_failures"; failedSamples?: number }
  | { status: "unchanged"; suppressed: string[] }
  | {
      status: "adjusted";
      changes: string[];
      suppressed: string[];
      weights: ScoringWeights;
      threshold: number;
    };

export interface WeightTuner {
  /** Run a tuning pass when the 7-day failure count hits the next multiple. */
  onVerificationFailed(communityId: string): Promise<TuneResult | null>;
  tune(communityId: string): Promise<TuneResult>;
}

export interface WeightTunerDeps {
  configStore: ConfigStore;
  history: HistoryStore;
  notifications: NotificationSink;
  logger: Logger;
  now?: () => number;
}

// ---------------------------------------------------------------------------
// Planning (pure)
// ---------------------------------------------------------------------------

export interface TuningPlan {
  weights: ScoringWeights;
  threshold: number;
  changes: string[];
  suppressed: string[];
}

/** The id feature that applies: the p99 rate when it triggers, else the p95 rate. */
function idFeature(failed: FeatureRates): RateFeature | null {
  if (failed.idAboveP99 > FAILED_RATE_TRIGGER) return "idAboveP99";
  if (failed.idAboveP95 > FAILED_RATE_TRIGGER) return "idAboveP95";
  return null;
}

/**
 * Weights only ever go up here, one step at a time and never past their
 * ceiling; the threshold only ever goes down.
 */
export function planAdjustment(
  weights: ScoringWeights,
  threshold: number,
  failed: FeatureRates,
  passed: FeatureRates,
): TuningPlan {
  const next: ScoringWeights = { ...weights };
  const changes: string[] = [];
  const suppressed: string[] = [];
  const guardActive = passed.sampleSize >= MIN_PASSED_SAMPLES;

  const idRate = idFeature(failed);
  const candidates: MonitoredFeature[] = [...MONITORED];
  if (idRate) {
    candidates.push({ feature: idRate, weight: "maxIdRisk" });
  }

  for (const { feature, weight } of candidates) {
    if (failed[feature] <= FAILED_RATE_TRIGGER) continue;

    if (guardActive && passed[feature] > PASSED_RATE_GUARD) {
      suppressed.push(weight);
      continue;
    }

    const current = next[weight];
    const raised = Math.min(WEIGHT_LIMITS[weight].max, current + WEIGHT_STEP);
    if (raised !== current) {
      next[weight] = raised;
      changes.push(`${weight}: ${String(current)} -> ${String(raised)}`);
    }
  }

  let nextThreshold = threshold;
  const avgScore = failed.averageRiskScore;
  if (avgScore > 0 && avgScore >= threshold - THRESHOLD_MARGIN) {
    nextThreshold = Math.max(threshold - THRESHOLD_STEP, MIN_SCORING_THRESHOLD);
    if (nextThreshold !== threshold) {
      changes.push(`scoringThreshold: ${String(threshold)} -> ${String(nextThreshold)}`);
    }
  }

  return { weights: next, threshold: nextThreshold, changes, suppressed };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createWeightTuner(deps: WeightTunerDeps): WeightTuner {
  const { configStore, history, notifications, logger } = deps;
  const now = deps.now ?? Date.now;

  async function tune(communityId: string): Promise<TuneResult> {
    const config = await configStore.get(communityId);
    if (!config) {
      return { status: "skipped", reason: "not_found" };
    }
    if (!config.autoAdjustEnabled) {
      return { status: "skipped", reason: "auto_adjust_disabled" };
    }

    const since = new Date(now() - STATS_WINDOW_MS);
    const baseline = await history.scoringStats(communityId, since);
    const failed = await history.featureRates(communityId, "failed", since, baseline);
    if (failed.sampleSize < MIN_FAILED_SAMPLES) {
      logger.debug({ communityId, failedSamples: failed.sampleSize }, "Not enough failures to tune weights");
      return { status: "skipped", reason: "insufficient_failures", failedSamples: failed.sampleSize };
    }
    const passed = await history.featureRates(communityId, "passed", since, baseline);

    const plan = planAdjustment(config.scoringWeights, config.scoringThreshold, failed, passed);
    if (plan.suppressed.length > 0) {
      logger.info(
        { communityId, suppressed: plan.suppressed, passedSamples: passed.sampleSize },
        "Weight increase suppressed: feature is common among verified accounts",
      );
    }
    if (plan.changes.length === 0) {
      return { status: "unchanged", suppressed: plan.suppressed };
    }

    await configStore.updateScoring(communityId, { weights: plan.weights, threshold: plan.threshold });
    logger.info({ communityId, changes: plan.changes }, "Scoring weights auto-adjusted");
    await notifications.weightsAdjusted({ communityId, changes: plan.changes });

    return {
      status: "adjusted",
      changes: plan.changes,
      suppressed: plan.suppressed,
      weights: plan.weights,
      threshold: plan.threshold,
    };
  }

  return {
    tune,

    async onVerificationFailed(communityId: string): Promise<TuneResult | null> {
      const failures = await history.countOutcomes(communityId, "failed", new Date(now() - STATS_WINDOW_MS));
      if (failures === 0 || failures % TUNE_EVERY_FAILURES !== 0) {
        return null;
      }
      logger.info({ communityId, failures }, "Failure milestone reached, tuning weights");
      return tune(communityId);
    },
  };
}
