import type { ModelConfig } from "../config";
import type { FactorContributions, HeadToHead, TeamProfile } from "../types";

type Normalization = ModelConfig["normalization"];

export function clamp(n: number, lo: number, hi: number) {
  return Math.max(lo, Math.min(hi, n));
}

/** Form points scaled to [0, 1]. */
export const normalizeForm = (points: number, n: Normalization) =>
  clamp(points, 0, n.maxFormPoints) / n.maxFormPoints;

/** 1st in the table is 1, last is 1 / tableSize. */
export const normalizePosition = (position: number, n: Normalization) =>
  (n.tableSize + 1 - clamp(position, 1, n.tableSize)) / n.tableSize;

export const normalizeInjuries = (impact: number, n: Normalization) =>
  clamp(impact, 0, n.maxInjuryImpact) / n.maxInjuryImpact;

export const normalizeGoalRate = (rate: number, n: Normalization) =>
  clamp(rate, 0, n.maxGoalsPerMatch) / n.maxGoalsPerMatch;

export function goalsPerMatch(goals: number, matchesPlayed: number) {
  return matchesPlayed > 0 ? Math.max(0, goals) / matchesPlayed : 0;
}

/** (home wins - away wins) / meetings, 0 with no meetings. Negative counts read as 0. */
export function headToHeadEdge(h2h: HeadToHead) {
  const homeWins = Math.max(0, h2h.homeWins);
  const awayWins = Math.max(0, h2h.awayWins);
  const total = homeWins + Math.max(0, h2h.draws) + awayWins;
  return total > 0 ? clamp((homeWins - awayWins) / total, -1, 1) : 0;
}

/** +1 when only `home` is at its ground, -1 when only `away` is, else 0. */
export function homeAdvantageSign(home: TeamProfile, away: TeamProfile) {
  return Number(home.isHome) - Number(away.isHome);
}

/**
 * Signed, weighted term per factor. Positive favours `home`.
 *
 * Every term is antisymmetric: swapping the two profiles (and flipping the
 * head-to-head record) negates each one exactly.
 */
export function weightedContributions(
  home: TeamProfile,
  away: TeamProfile,
  h2h: HeadToHead,
  config: ModelConfig
): FactorContributions {
  const { weights: w, normalization: n } = config;

  const attackRate = (t: TeamProfile) => normalizeGoalRate(goalsPerMatch(t.goalsScored, t.matchesPlayed), n);
  const concededRate = (t: TeamProfile) => normalizeGoalRate(goalsPerMatch(t.goalsConceded, t.matchesPlayed), n);

  return {
    form: w.form * (normalizeForm(home.recentFormScore, n) - normalizeForm(away.recentFormScore, n)),
    homeAdvantage: w.homeAdvantage * homeAdvantageSign(home, away),
    // more players out lowers a side's score
    injuries: w.injuries * (normalizeInjuries(away.injuryImpact, n) - normalizeInjuries(home.injuryImpact, n)),
    leaguePosition:
      w.leaguePosition * (normalizePosition(home.leaguePosition, n) - normalizePosition(away.leaguePosition, n)),
    headToHead: w.headToHead * headToHeadEdge(h2h),
    attack: w.attack * (attackRate(home) - attackRate(away)),
    defense: w.defense * (concededRate(away) - concededRate(home)),
  };
}

/** The differential score D. Summed in a fixed order so that D(a, b) === -D(b, a). */
export function differentialScore(c: FactorContributions) {
  return c.form + c.homeAdvantage + c.injuries + c.leaguePosition + c.headToHead + c.attack + c.defense;
}
