import type { ModelConfig } from "./config";
import type { MatchPrediction } from "./predict";
import type { FactorKey } from "./types";

const r3 = (n: number) => Math.round(n * 1000) / 1000;

const pct = (p: number) => `${(p * 100).toFixed(1)}%`;

function mapFactors<T>(c: Readonly<Record<FactorKey, number>>, fn: (v: number) => T): Record<FactorKey, T> {
  return {
    form: fn(c.form),
    homeAdvantage: fn(c.homeAdvantage),
    injuries: fn(c.injuries),
    leaguePosition: fn(c.leaguePosition),
    headToHead: fn(c.headToHead),
    attack: fn(c.attack),
    defense: fn(c.defense),
  };
}

/** JSON-friendly view of a prediction, rounded for display. */
export function presentPrediction(p: MatchPrediction) {
  const { result } = p;

  return {
    homeTeam: p.homeTeam,
    awayTeam: p.awayTeam,
    neutralVenue: p.neutralVenue,
    market: "1x2" as const,
    probabilities: { home: r3(result.pHome), draw: r3(result.pDraw), away: r3(result.pAway) },
    display: { home: pct(result.pHome), draw: pct(result.pDraw), away: pct(result.pAway) },
    predictedScore: p.predictedScore,
    mostLikely: p.mostLikely,
    confidence: result.confidence,
    model: {
      differential: r3(result.differential),
      margin: r3(result.margin),
      expectedGoals: { home: r3(result.expectedHomeGoals), away: r3(result.expectedAwayGoals) },
      contributions: mapFactors(result.contributions, r3),
    },
  };
}

export type PresentedPrediction = ReturnType<typeof presentPrediction>;
export type PresentedModelConfig = ReturnType<typeof presentModelConfig>;

export function presentModelConfig(config: ModelConfig) {
  return {
    weights: mapFactors(config.weights, (w) => `${Math.round(w * 100)}%`),
    normalization: { ...config.normalization },
    probability: { ...config.probability },
    scoreline: { ...config.scoreline },
    confidence: { ...config.confidence },
  };
}
