import type { GameKey } from '../types/game.js';

/**
 * Join key for one season's games. Season is left out: schedule and odds rows
 * are only ever joined within a single season.
 */
export function gameKeyString(key: Pick<GameKey, 'homeTeam' | 'awayTeam' | 'week'>): string {
  return `${key.homeTeam}|${key.awayTeam}|${key.week}`;
}

/** "broncos at ravens, week 1 2013" for logs and failure reports. */
export function describeGame(key: GameKey): string {
  return `${key.awayTeam} at ${key.homeTeam}, week ${key.week} ${key.season}`;
}
