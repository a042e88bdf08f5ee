import { z } from "zod";
import { formatScoreline } from "./football/scoreline";
import { buildMatchProfiles } from "./profile";
import { defaultPredictor, type Predictor } from "./predictor";
import type { PredictionResult } from "./types";

const count = (max: number) => z.number().int().min(0).max(max);

/**
 * Last 5 matches as wins / draws / losses.
 */
export const RecentFormSchema = z
  .object({
    wins: count(5),
    draws: count(5),
    losses: count(5),
  })
  .refine((r) => r.wins + r.draws + r.losses <= 5, {
    message: "At most 5 recent matches",
    path: ["losses"],
  });

export const TeamInputSchema = z.object({
  name: z.string().min(1),
  recentForm: RecentFormSchema,
  leaguePosition: z.number().int().min(1).max(20),
  goalsScored: count(150),
  goalsConceded: count(150),
  matchesPlayed: count(38),
  keyInjuries: count(11),
  suspensions: count(11),
});

/** Last 5 meetings, counted from the home side's point of view. */
export const HeadToHeadInputSchema = z.object({
  homeWins: count(5),
  draws: count(5),
  awayWins: count(5),
});

export const PredictMatchInputSchema = z.object({
  home: TeamInputSchema,
  away: TeamInputSchema,
  headToHead: HeadToHeadInputSchema,
  neutralVenue: z.boolean().default(false),
});

export type TeamInput = z.infer<typeof TeamInputSchema>;
export type PredictMatchInput = z.infer<typeof PredictMatchInputSchema>;

export type MatchPrediction = {
  homeTeam: string;
  awayTeam: string;
  neutralVenue: boolean;
  /** "H-A" */
  predictedScore: string;
  /** "<team> Win" or "Draw" */
  mostLikely: string;
  result: PredictionResult;
};

/**
 * Validated match input -> labelled prediction.
 * (Pure + deterministic; no API calls.)
 */
export function predictMatch(input: PredictMatchInput, predictor: Predictor = defaultPredictor): MatchPrediction {
  const { home, away, h2h } = buildMatchProfiles(input);
  const result = predictor.predict(home, away, h2h);

  const mostLikely =
    result.mostLikely === "home"
      ? `${input.home.name} Win`
      : result.mostLikely === "away"
        ? `${input.away.name} Win`
        : "Draw";

  return {
    homeTeam: input.home.name,
    awayTeam: input.away.name,
    neutralVenue: input.neutralVenue,
    predictedScore: formatScoreline(result.predictedHomeGoals, result.predictedAwayGoals),
    mostLikely,
    result,
  };
}
