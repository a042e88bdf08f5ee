export type TeamProfile = {
  /** Points from the last 5 matches (win 3, draw 1, loss 0). */
  recentFormScore: number;
  leaguePosition: number;
  goalsScored: number;
  goalsConceded: number;
  /** Matches the goal totals cover; 0 means no data yet. */
  matchesPlayed: number;
  /** Key players missing through injury or suspension. */
  injuryImpact: number;
  isHome: boolean;
};

/** Recent meetings, oriented to the side passed as `home`. */
export type HeadToHead = {
  homeWins: number;
  draws: number;
  awayWins: number;
};

export type FactorKey =
  | "form"
  | "homeAdvantage"
  | "injuries"
  | "leaguePosition"
  | "headToHead"
  | "attack"
  | "defense";

export type FactorContributions = Record<FactorKey, number>;

export type Confidence = "Low" | "Medium" | "High";

export type Outcome = "home" | "draw" | "away";

export type PredictionResult = {
  pHome: number;
  pDraw: number;
  pAway: number;
  predictedHomeGoals: number;
  predictedAwayGoals: number;
  confidence: Confidence;
  expectedHomeGoals: number;
  expectedAwayGoals: number;
  differential: number;
  contributions: FactorContributions;
  margin: number;
  mostLikely: Outcome;
};
