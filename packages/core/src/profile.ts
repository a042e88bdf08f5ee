import type { HeadToHead, TeamProfile } from "./types";

export type RecentRecord = { wins: number; draws: number; losses: number };

export type TeamNews = { keyInjuries: number; suspensions: number };

export type TeamStatsInput = {
  recentForm: RecentRecord;
  leaguePosition: number;
  goalsScored: number;
  goalsConceded: number;
  matchesPlayed: number;
} & TeamNews;

export const formPoints = (r: RecentRecord) => r.wins * 3 + r.draws;

export const injuryImpact = (news: TeamNews) => news.keyInjuries + news.suspensions;

export function buildTeamProfile(team: TeamStatsInput, isHome: boolean): TeamProfile {
  return {
    recentFormScore: formPoints(team.recentForm),
    leaguePosition: team.leaguePosition,
    goalsScored: team.goalsScored,
    goalsConceded: team.goalsConceded,
    matchesPlayed: team.matchesPlayed,
    injuryImpact: injuryImpact(team),
    isHome,
  };
}

/** At a neutral venue neither side is flagged home, so no home bias applies. */
export function buildMatchProfiles(input: {
  home: TeamStatsInput;
  away: TeamStatsInput;
  headToHead: HeadToHead;
  neutralVenue: boolean;
}) {
  return {
    home: buildTeamProfile(input.home, !input.neutralVenue),
    away: buildTeamProfile(input.away, false),
    h2h: { ...input.headToHead },
  };
}
