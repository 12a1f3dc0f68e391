import type { TeamId } from '../types/team.js';
import type { WeekId } from '../types/week.js';

export const TEAMRANKINGS_BASE_URL = 'https://www.teamrankings.com';
export const PRO_FOOTBALL_REFERENCE_BASE_URL = 'https://www.pro-football-reference.com';

/** Integer weeks are written "week-3"; playoff rounds keep their tag. */
export function weekSegment(week: WeekId): string {
  return typeof week === 'number' ? `week-${week}` : week;
}

/** Matchup page for a game; the sub-pages below hang off it. */
export function gameUrl(homeTeam: TeamId, awayTeam: TeamId, week: WeekId, year: number): string {
  return `${TEAMRANKINGS_BASE_URL}/nfl/matchup/${homeTeam}-${awayTeam}-${weekSegment(week)}-${year}`;
}

export function spreadUrl(homeTeam: TeamId, awayTeam: TeamId, week: WeekId, year: number): string {
  return `${gameUrl(homeTeam, awayTeam, week, year)}/spread-movement`;
}

export function overUnderUrl(homeTeam: TeamId, awayTeam: TeamId, week: WeekId, year: number): string {
  return `${gameUrl(homeTeam, awayTeam, week, year)}/over-under-movement`;
}

export function seasonGamesUrl(year: number): string {
  return `${PRO_FOOTBALL_REFERENCE_BASE_URL}/years/${year}/games.htm`;
}
