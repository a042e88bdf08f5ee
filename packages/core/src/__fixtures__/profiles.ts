import type { HeadToHead, TeamProfile } from "../types";

/** A mid-table side: 7 form points, 10th, 25 scored and conceded in 19. */
export function createProfile(overrides: Partial<TeamProfile> = {}): TeamProfile {
  return {
    recentFormScore: 7,
    leaguePosition: 10,
    goalsScored: 25,
    goalsConceded: 25,
    matchesPlayed: 19,
    injuryImpact: 1,
    isHome: false,
    ...overrides,
  };
}

export function createHeadToHead(overrides: Partial<HeadToHead> = {}): HeadToHead {
  return { homeWins: 2, draws: 1, awayWins: 2, ...overrides };
}

/** The same record seen from the other side. */
export const flipHeadToHead = (h2h: HeadToHead): HeadToHead => ({
  homeWins: h2h.awayWins,
  draws: h2h.draws,
  awayWins: h2h.homeWins,
});
