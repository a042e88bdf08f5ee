import type { ModelConfig } from "../config";
import type { Confidence, Outcome } from "../types";

type ProbabilityParams = ModelConfig["probability"];

export type OutcomeProbabilities = { home: number; draw: number; away: number };

export const sigmoid = (x: number) => 1 / (1 + Math.exp(-x));

/** Peaks at drawBase when d = 0 and decays as |d| grows. */
export function drawCurve(d: number, p: ProbabilityParams) {
  return p.drawBase * Math.exp(-((d / p.drawSpread) ** 2));
}

/**
 * Differential score -> 1X2 distribution.
 * Home and away are mirrored sigmoids, the draw a bell around 0; the three
 * curves only become a distribution at the final normalization.
 */
export function outcomeProbabilities(d: number, p: ProbabilityParams): OutcomeProbabilities {
  const home = sigmoid(p.steepness * d);
  const away = sigmoid(-p.steepness * d);
  const draw = drawCurve(d, p);

  // home + away first: keeps the sum bit-identical when the sides swap
  const sum = draw + (home + away);

  return {
    home: home / sum,
    draw: draw / sum,
    away: away / sum,
  };
}

/** Outcomes, most likely first. Ties keep the order home, draw, away. */
export function rankOutcomes(p: OutcomeProbabilities): Array<[Outcome, number]> {
  const ranked: Array<[Outcome, number]> = [
    ["home", p.home],
    ["draw", p.draw],
    ["away", p.away],
  ];
  return ranked.sort((a, b) => b[1] - a[1]);
}

export function confidenceFromMargin(
  margin: number,
  thresholds: ModelConfig["confidence"]
): Confidence {
  if (margin >= thresholds.high) return "High";
  if (margin >= thresholds.medium) return "Medium";
  return "Low";
}

const CONFIDENCE_RANK: Record<Confidence, number> = { Low: 0, Medium: 1, High: 2 };

export function compareConfidence(a: Confidence, b: Confidence) {
  return CONFIDENCE_RANK[a] - CONFIDENCE_RANK[b];
}
