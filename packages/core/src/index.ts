export type * from "./types";
export { InvalidWeightConfigurationError } from "./errors";
export {
  CONFIDENCE_THRESHOLDS,
  DEFAULT_MODEL_CONFIG,
  WEIGHT_SUM_TOLERANCE,
  validateModelConfig,
  weightSum,
  type ModelConfig,
} from "./config";
export {
  clamp,
  differentialScore,
  goalsPerMatch,
  headToHeadEdge,
  homeAdvantageSign,
  normalizeForm,
  normalizeGoalRate,
  normalizeInjuries,
  normalizePosition,
  weightedContributions,
} from "./football/factors";
export {
  compareConfidence,
  confidenceFromMargin,
  drawCurve,
  outcomeProbabilities,
  rankOutcomes,
  sigmoid,
  type OutcomeProbabilities,
} from "./football/probability";
export { estimateScoreline, expectedGoals, formatScoreline, type ScorelineEstimate } from "./football/scoreline";
export { createPredictor, defaultPredictor, predict, type Predictor } from "./predictor";
export {
  buildMatchProfiles,
  buildTeamProfile,
  formPoints,
  injuryImpact,
  type RecentRecord,
  type TeamNews,
  type TeamStatsInput,
} from "./profile";
export {
  HeadToHeadInputSchema,
  PredictMatchInputSchema,
  RecentFormSchema,
  TeamInputSchema,
  predictMatch,
  type MatchPrediction,
  type PredictMatchInput,
  type TeamInput,
} from "./predict";
export {
  presentModelConfig,
  presentPrediction,
  type PresentedModelConfig,
  type PresentedPrediction,
} from "./present";
