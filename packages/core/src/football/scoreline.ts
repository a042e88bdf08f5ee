import type { ModelConfig } from "../config";
import type { TeamProfile } from "../types";
import { clamp, goalsPerMatch } from "./factors";

type ScorelineParams = ModelConfig["scoreline"];

export type ScorelineEstimate = {
  expectedHomeGoals: number;
  expectedAwayGoals: number;
  predictedHomeGoals: number;
  predictedAwayGoals: number;
};

/**
 * Attacker's scoring rate averaged with the defender's conceding rate, plus a
 * small bonus when the attacker is at home. Kept within [0, maxGoals].
 */
export function expectedGoals(attacker: TeamProfile, defender: TeamProfile, s: ScorelineParams) {
  const scoring = goalsPerMatch(attacker.goalsScored, attacker.matchesPlayed);
  const conceding = goalsPerMatch(defender.goalsConceded, defender.matchesPlayed);
  const bonus = attacker.isHome ? s.homeAdvantageGoals : 0;
  return clamp((scoring + conceding) / 2 + bonus, 0, s.maxGoals);
}

/** Uses the raw goal inputs only; independent of the differential score. */
export function estimateScoreline(home: TeamProfile, away: TeamProfile, s: ScorelineParams): ScorelineEstimate {
  const expectedHomeGoals = expectedGoals(home, away, s);
  const expectedAwayGoals = expectedGoals(away, home, s);

  return {
    expectedHomeGoals,
    expectedAwayGoals,
    predictedHomeGoals: Math.round(expectedHomeGoals),
    predictedAwayGoals: Math.round(expectedAwayGoals),
  };
}

export const formatScoreline = (homeGoals: number, awayGoals: number) => `${homeGoals}-${awayGoals}`;
