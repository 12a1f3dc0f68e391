import { DataIntegrityError } from '../errors.js';
import type { JoinedRecord, MergedRecord, ScheduleRecord } from '../types/game.js';
import { describeGame, gameKeyString } from './game-key.js';
import type { Reconciliation } from './home-away.js';

// -0 + 0 === 0, so a negated pick'em line prints as 0.
const negate = (value: number): number => -value + 0;

/**
 * Re-express a merged row relative to the home team: winner/loser statistics
 * become home/away statistics and spreads become negative when the home team
 * is favored.
 */
export function reorient(row: MergedRecord): JoinedRecord {
  const homeWon = row.winner === row.homeTeam;
  const awayWon = row.winner === row.awayTeam;
  if (homeWon === awayWon) {
    throw new DataIntegrityError(`Winner ${row.winner} did not play in ${describeGame(row)}`);
  }

  const homeFavored = row.favored === row.homeTeam;
  const awayFavored = row.favored === row.awayTeam;
  if (homeFavored === awayFavored) {
    throw new DataIntegrityError(`Favored team ${row.favored} did not play in ${describeGame(row)}`);
  }

  const homeRelative = (spread: number | null): number | null =>
    spread === null || homeFavored ? spread : negate(spread);

  return {
    homeTeam: row.homeTeam,
    awayTeam: row.awayTeam,
    week: row.week,
    season: row.season,
    gameDate: row.gameDate,
    timestamp: row.timestamp,
    pointsHome: homeWon ? row.pointsWinner : row.pointsLoser,
    pointsAway: homeWon ? row.pointsLoser : row.pointsWinner,
    yardsHome: homeWon ? row.yardsWinner : row.yardsLoser,
    yardsAway: homeWon ? row.yardsLoser : row.yardsWinner,
    turnOversHome: homeWon ? row.turnOversWinner : row.turnOversLoser,
    turnOversAway: homeWon ? row.turnOversLoser : row.turnOversWinner,
    pinnacleSpread: homeRelative(row.pinnacleSpread),
    betonlineSpread: homeRelative(row.betonlineSpread),
    bookmakerSpread: homeRelative(row.bookmakerSpread),
    pinnacleOverUnder: row.pinnacleOverUnder,
    betonlineOverUnder: row.betonlineOverUnder,
    bookmakerOverUnder: row.bookmakerOverUnder,
    homeAwayDiscrepancy: row.homeAwayDiscrepancy,
  };
}

/**
 * Inner join of a season's schedule with its odds records on
 * (home, away, week), one output row per quote, reoriented to the home team.
 */
export function joinSeason(
  schedule: readonly ScheduleRecord[],
  games: readonly Reconciliation[],
): JoinedRecord[] {
  const oddsByKey = new Map(games.map((game) => [gameKeyString(game.record), game]));
  const rows: JoinedRecord[] = [];

  for (const game of schedule) {
    const odds = oddsByKey.get(gameKeyString(game));
    if (!odds) continue;

    for (const quote of odds.record.quotes) {
      rows.push(
        reorient({
          ...game,
          ...quote,
          favored: odds.record.favored,
          homeAwayDiscrepancy: odds.homeAwayDiscrepancy,
        }),
      );
    }
  }

  return rows;
}

export function countDistinctGames(rows: readonly JoinedRecord[]): number {
  return new Set(rows.map(gameKeyString)).size;
}
