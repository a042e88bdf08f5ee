import { InvalidWeightConfigurationError } from "./errors";
import type { FactorKey } from "./types";

export type ModelConfig = {
  readonly weights: Readonly<Record<FactorKey, number>>;
  readonly normalization: Readonly<{
    /** 5 wins x 3 points */
    maxFormPoints: number;
    tableSize: number;
    maxInjuryImpact: number;
    maxGoalsPerMatch: number;
  }>;
  readonly probability: Readonly<{
    /** sigmoid steepness k in sigmoid(k * D) */
    steepness: number;
    /** draw weight at D = 0 */
    drawBase: number;
    /** spread s of drawBase * exp(-(D / s)^2) */
    drawSpread: number;
  }>;
  readonly scoreline: Readonly<{
    homeAdvantageGoals: number;
    maxGoals: number;
  }>;
  readonly confidence: Readonly<{
    /** margin at or above which confidence is High */
    high: number;
    /** margin at or above which confidence is Medium */
    medium: number;
  }>;
};

export const WEIGHT_SUM_TOLERANCE = 1e-9;

export const CONFIDENCE_THRESHOLDS = Object.freeze({ high: 0.3, medium: 0.15 });

/**
 * Weights are fixed by the model; the remaining constants were calibrated so
 * that two equal sides at a neutral ground give 36% / 29% / 36%, and a
 * home side with nothing else in its favour lands around 45% / 27% / 29%.
 *
 * With these bounds the differential D stays within [-0.9925, 0.9925].
 */
export const DEFAULT_MODEL_CONFIG: ModelConfig = Object.freeze({
  weights: Object.freeze({
    form: 0.25,
    homeAdvantage: 0.15,
    injuries: 0.15,
    leaguePosition: 0.15,
    headToHead: 0.1,
    attack: 0.1,
    defense: 0.1,
  }),
  normalization: Object.freeze({
    maxFormPoints: 15,
    tableSize: 20,
    maxInjuryImpact: 10,
    maxGoalsPerMatch: 4,
  }),
  probability: Object.freeze({
    steepness: 3,
    drawBase: 0.4,
    drawSpread: 0.5,
  }),
  scoreline: Object.freeze({
    homeAdvantageGoals: 0.25,
    maxGoals: 5,
  }),
  confidence: CONFIDENCE_THRESHOLDS,
});

export function weightSum(weights: ModelConfig["weights"]) {
  return Object.values(weights).reduce((acc, w) => acc + w, 0);
}

export function validateModelConfig(config: ModelConfig): ModelConfig {
  const sum = weightSum(config.weights);
  // negated so that NaN fails too
  if (!(Math.abs(sum - 1) <= WEIGHT_SUM_TOLERANCE)) {
    throw new InvalidWeightConfigurationError(sum);
  }
  return config;
}
