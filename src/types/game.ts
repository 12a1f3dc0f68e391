import type { TeamId } from './team.js';
import type { WeekId } from './week.js';

export interface GameKey {
  readonly homeTeam: TeamId;
  readonly awayTeam: TeamId;
  readonly week: WeekId;
  /** Year the season starts in */
  readonly season: number;
}

/**
 * One timestamped row of the merged spread and over/under history.
 * `null` is a missing quote; spreads are relative to the favored team.
 */
export interface MarketQuote {
  /** Local wall-clock time, "YYYY-MM-DD HH:mm:ss" */
  readonly timestamp: string;
  readonly pinnacleSpread: number | null;
  readonly betonlineSpread: number | null;
  readonly bookmakerSpread: number | null;
  readonly pinnacleOverUnder: number | null;
  readonly betonlineOverUnder: number | null;
  readonly bookmakerOverUnder: number | null;
}

export interface GameOddsRecord extends GameKey {
  readonly favored: TeamId;
  /** Ascending by timestamp */
  readonly quotes: readonly MarketQuote[];
}

/** Per-team statistics as the schedule reports them: by result, not venue. */
export interface ScheduleRecord extends GameKey {
  /** "YYYY-MM-DD" */
  readonly gameDate: string;
  readonly winner: TeamId;
  readonly pointsWinner: number;
  readonly pointsLoser: number;
  readonly yardsWinner: number;
  readonly yardsLoser: number;
  readonly turnOversWinner: number;
  readonly turnOversLoser: number;
}

/** Schedule row joined with one quote row, before reorientation. */
export interface MergedRecord extends ScheduleRecord, MarketQuote {
  readonly favored: TeamId;
  readonly homeAwayDiscrepancy: boolean;
}

/** Final home-team-relative row. Negative spreads mean the home team is favored. */
export interface JoinedRecord extends GameKey, MarketQuote {
  readonly gameDate: string;
  readonly pointsHome: number;
  readonly pointsAway: number;
  readonly yardsHome: number;
  readonly yardsAway: number;
  readonly turnOversHome: number;
  readonly turnOversAway: number;
  readonly homeAwayDiscrepancy: boolean;
}
