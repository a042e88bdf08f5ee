import { DEFAULT_MODEL_CONFIG, validateModelConfig, type ModelConfig } from "./config";
import { differentialScore, weightedContributions } from "./football/factors";
import { confidenceFromMargin, outcomeProbabilities, rankOutcomes } from "./football/probability";
import { estimateScoreline } from "./football/scoreline";
import type { HeadToHead, PredictionResult, TeamProfile } from "./types";

export type Predictor = {
  readonly config: ModelConfig;
  predict(home: TeamProfile, away: TeamProfile, h2h: HeadToHead): PredictionResult;
};

function runPrediction(
  home: TeamProfile,
  away: TeamProfile,
  h2h: HeadToHead,
  config: ModelConfig
): PredictionResult {
  const contributions = weightedContributions(home, away, h2h, config);
  const differential = differentialScore(contributions);

  const probabilities = outcomeProbabilities(differential, config.probability);
  const [[mostLikely, top], [, runnerUp]] = rankOutcomes(probabilities);
  const margin = top - runnerUp;

  const scoreline = estimateScoreline(home, away, config.scoreline);

  return {
    pHome: probabilities.home,
    pDraw: probabilities.draw,
    pAway: probabilities.away,
    predictedHomeGoals: scoreline.predictedHomeGoals,
    predictedAwayGoals: scoreline.predictedAwayGoals,
    confidence: confidenceFromMargin(margin, config.confidence),
    expectedHomeGoals: scoreline.expectedHomeGoals,
    expectedAwayGoals: scoreline.expectedAwayGoals,
    differential,
    contributions,
    margin,
    mostLikely,
  };
}

/**
 * Validates `config` once and returns a pure predictor bound to it.
 * Throws InvalidWeightConfigurationError when the weights do not sum to 1.
 */
export function createPredictor(config: ModelConfig = DEFAULT_MODEL_CONFIG): Predictor {
  validateModelConfig(config);
  return {
    config,
    predict: (home, away, h2h) => runPrediction(home, away, h2h, config),
  };
}

// validated on import: a broken default throws before any prediction
export const defaultPredictor = createPredictor();

export function predict(home: TeamProfile, away: TeamProfile, h2h: HeadToHead): PredictionResult {
  return defaultPredictor.predict(home, away, h2h);
}
