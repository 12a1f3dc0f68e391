import Papa from 'papaparse';
import type { JoinedRecord } from '../types/game.js';
import { compareWeeks } from '../types/week.js';

type Cell = string | number | boolean | null;

const COLUMNS: ReadonlyArray<readonly [string, (row: JoinedRecord) => Cell]> = [
  ['hometeam', (r) => r.homeTeam],
  ['awayteam', (r) => r.awayTeam],
  ['week', (r) => r.week],
  ['season', (r) => r.season],
  ['game_date', (r) => r.gameDate],
  ['datetime', (r) => r.timestamp],
  ['points_home', (r) => r.pointsHome],
  ['points_away', (r) => r.pointsAway],
  ['yards_home', (r) => r.yardsHome],
  ['yards_away', (r) => r.yardsAway],
  ['turn_overs_home', (r) => r.turnOversHome],
  ['turn_overs_away', (r) => r.turnOversAway],
  ['pinnacle_spread', (r) => r.pinnacleSpread],
  ['betonline_spread', (r) => r.betonlineSpread],
  ['bookmaker_spread', (r) => r.bookmakerSpread],
  ['pinnacle_over_under', (r) => r.pinnacleOverUnder],
  ['betonline_over_under', (r) => r.betonlineOverUnder],
  ['bookmaker_over_under', (r) => r.bookmakerOverUnder],
  ['home_away_discrepency', (r) => r.homeAwayDiscrepancy],
];

export const CSV_HEADER = COLUMNS.map(([name]) => name);

/** Season, week order, teams, then quote time. */
export function compareRows(a: JoinedRecord, b: JoinedRecord): number {
  return (
    a.season - b.season ||
    compareWeeks(a.week, b.week) ||
    a.homeTeam.localeCompare(b.homeTeam) ||
    a.awayTeam.localeCompare(b.awayTeam) ||
    a.timestamp.localeCompare(b.timestamp)
  );
}

/** Missing quotes become empty cells. No trailing newline, with or without rows. */
export function formatCsv(rows: readonly JoinedRecord[]): string {
  const data = [...rows].sort(compareRows).map((row) => COLUMNS.map(([, value]) => value(row)));
  // unparse ends a header-only document with a newline
  return Papa.unparse({ fields: CSV_HEADER, data }, { newline: '\n' }).replace(/\n$/, '');
}
