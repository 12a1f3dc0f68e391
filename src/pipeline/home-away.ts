import { isSwapRetryable } from '../errors.js';
import type { GameKey, GameOddsRecord } from '../types/game.js';
import { logger } from '../utils/logger.js';
import { describeGame } from './game-key.js';

export type FetchGameOdds = (key: GameKey) => Promise<GameOddsRecord>;

export type Reconciliation =
  | { status: 'confirmed'; record: GameOddsRecord; homeAwayDiscrepancy: false }
  | { status: 'swapped'; record: GameOddsRecord; homeAwayDiscrepancy: true };

/**
 * Fetch a game whose venue the odds site may list the other way round.
 *
 * The listed orientation is tried first. If that page is missing or
 * unreadable, the teams are swapped once; a record found that way is turned
 * back to the listed orientation so it joins with the schedule. Any other
 * error, and any failure of the swapped attempt, propagates.
 */
export async function reconcileHomeAway(
  listed: GameKey,
  fetchGameOdds: FetchGameOdds,
): Promise<Reconciliation> {
  try {
    const record = await fetchGameOdds(listed);
    return { status: 'confirmed', record, homeAwayDiscrepancy: false };
  } catch (err) {
    if (!isSwapRetryable(err)) throw err;
    logger.debug({ game: describeGame(listed), err }, 'Listed orientation failed, trying swapped teams');
  }

  const swapped = await fetchGameOdds({
    homeTeam: listed.awayTeam,
    awayTeam: listed.homeTeam,
    week: listed.week,
    season: listed.season,
  });

  return {
    status: 'swapped',
    record: { ...swapped, homeTeam: swapped.awayTeam, awayTeam: swapped.homeTeam },
    homeAwayDiscrepancy: true,
  };
}
