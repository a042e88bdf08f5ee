/**
 * Tests for predict.ts
 *
 * Input schemas and the labelled match prediction.
 */

import { describe, expect, it } from "vitest";
import {
  HeadToHeadInputSchema,
  PredictMatchInputSchema,
  RecentFormSchema,
  TeamInputSchema,
  predictMatch,
  type PredictMatchInput,
} from "./predict";
import { buildMatchProfiles, formPoints, injuryImpact } from "./profile";

const rawInput = {
  home: {
    name: "Riverside",
    recentForm: { wins: 3, draws: 1, losses: 1 },
    leaguePosition: 2,
    goalsScored: 35,
    goalsConceded: 15,
    matchesPlayed: 19,
    keyInjuries: 1,
    suspensions: 0,
  },
  away: {
    name: "Hillcrest",
    recentForm: { wins: 3, draws: 2, losses: 0 },
    leaguePosition: 1,
    goalsScored: 40,
    goalsConceded: 12,
    matchesPlayed: 19,
    keyInjuries: 2,
    suspensions: 1,
  },
  headToHead: { homeWins: 2, draws: 2, awayWins: 1 },
};

const parse = (input: unknown): PredictMatchInput => PredictMatchInputSchema.parse(input);

describe("schemas", () => {
  it("defaults to a home fixture", () => {
    expect(parse(rawInput).neutralVenue).toBe(false);
  });

  it("allows at most five recent matches", () => {
    expect(RecentFormSchema.safeParse({ wins: 3, draws: 1, losses: 1 }).success).toBe(true);

    const tooMany = RecentFormSchema.safeParse({ wins: 4, draws: 2, losses: 0 });
    expect(tooMany.success).toBe(false);
    if (!tooMany.success) {
      expect(tooMany.error.issues[0]?.path).toEqual(["losses"]);
    }
  });

  it("keeps league positions inside a 20-team table", () => {
    expect(TeamInputSchema.safeParse({ ...rawInput.home, leaguePosition: 0 }).success).toBe(false);
    expect(TeamInputSchema.safeParse({ ...rawInput.home, leaguePosition: 21 }).success).toBe(false);
    expect(TeamInputSchema.safeParse({ ...rawInput.home, leaguePosition: 20 }).success).toBe(true);
  });

  it("rejects negative or fractional counts", () => {
    expect(TeamInputSchema.safeParse({ ...rawInput.home, goalsScored: -1 }).success).toBe(false);
    expect(TeamInputSchema.safeParse({ ...rawInput.home, keyInjuries: 1.5 }).success).toBe(false);
    expect(HeadToHeadInputSchema.safeParse({ homeWins: 6, draws: 0, awayWins: 0 }).success).toBe(false);
  });

  it("requires a team name", () => {
    expect(TeamInputSchema.safeParse({ ...rawInput.home, name: "" }).success).toBe(false);
  });
});

describe("profile building", () => {
  it("counts three points a win and one a draw", () => {
    expect(formPoints({ wins: 3, draws: 1, losses: 1 })).toBe(10);
    expect(formPoints({ wins: 0, draws: 0, losses: 5 })).toBe(0);
  });

  it("adds suspensions to key injuries", () => {
    expect(injuryImpact({ keyInjuries: 2, suspensions: 1 })).toBe(3);
  });

  it("flags only the home side at its ground", () => {
    const { home, away, h2h } = buildMatchProfiles(parse(rawInput));

    expect(home).toEqual({
      recentFormScore: 10,
      leaguePosition: 2,
      goalsScored: 35,
      goalsConceded: 15,
      matchesPlayed: 19,
      injuryImpact: 1,
      isHome: true,
    });
    expect(away.isHome).toBe(false);
    expect(away.recentFormScore).toBe(11);
    expect(away.injuryImpact).toBe(3);
    expect(h2h).toEqual({ homeWins: 2, draws: 2, awayWins: 1 });
  });

  it("flags neither side at a neutral venue", () => {
    const { home, away } = buildMatchProfiles(parse({ ...rawInput, neutralVenue: true }));

    expect(home.isHome).toBe(false);
    expect(away.isHome).toBe(false);
  });
});

describe("predictMatch", () => {
  it("labels the outcome with the team names", () => {
    const out = predictMatch(parse(rawInput));

    expect(out.homeTeam).toBe("Riverside");
    expect(out.awayTeam).toBe("Hillcrest");
    expect(out.mostLikely).toBe("Riverside Win");
    expect(out.predictedScore).toBe("1-1");
    expect(out.result.confidence).toBe("Medium");
    expect(out.result.pHome).toBeCloseTo(0.4574622898950308, 9);
    expect(out.result.pDraw).toBeCloseTo(0.26393872953335223, 9);
    expect(out.result.pAway).toBeCloseTo(0.27859898057161686, 9);
  });

  it("drops the home bias at a neutral venue", () => {
    const out = predictMatch(parse({ ...rawInput, neutralVenue: true }));

    expect(out.neutralVenue).toBe(true);
    expect(out.result.contributions.homeAdvantage).toBe(0);
    expect(out.result.expectedHomeGoals).toBeCloseTo(47 / 38, 12);
    expect(out.result.differential).toBeCloseTo(0.01530701754385965, 12);
  });

  it("names the home side when a level game ties home and away", () => {
    const level = parse({
      ...rawInput,
      away: { ...rawInput.home, name: "Hillcrest" },
      headToHead: { homeWins: 1, draws: 3, awayWins: 1 },
      neutralVenue: true,
    });

    const out = predictMatch(level);

    expect(out.result.pHome).toBe(out.result.pAway);
    expect(out.mostLikely).toBe("Riverside Win");
    expect(out.result.confidence).toBe("Low");
  });
});
