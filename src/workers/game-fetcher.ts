import { teamRankings } from '../adapters/teamrankings.js';
import { overUnderUrl, spreadUrl } from '../adapters/urls.js';
import { DataIntegrityError } from '../errors.js';
import { normalizeOddsTables } from '../pipeline/game-normalizer.js';
import { describeGame } from '../pipeline/game-key.js';
import type { FetchGameOdds } from '../pipeline/home-away.js';
import { resolveFavoredTeam } from '../pipeline/team-resolver.js';
import type { GameKey, GameOddsRecord } from '../types/game.js';
import { logger } from '../utils/logger.js';
import { fetchDocument, fetchHttp, type FetchPage } from './http-client.js';

/**
 * Download and normalize one game's spread and over/under history, assuming
 * `key` has home and away the way the odds site lists them.
 */
export async function fetchGameOdds(
  key: GameKey,
  fetchPage: FetchPage = fetchHttp,
): Promise<GameOddsRecord> {
  const { homeTeam, awayTeam, week, season } = key;
  const log = logger.child({ game: describeGame(key) });
  log.debug('Getting game');

  const spreadHtml = await fetchDocument(
    spreadUrl(homeTeam, awayTeam, week, season),
    teamRankings.config,
    'spread history',
    fetchPage,
  );
  const spread = teamRankings.parseSpreadHistory(spreadHtml);

  const overUnderHtml = await fetchDocument(
    overUnderUrl(homeTeam, awayTeam, week, season),
    teamRankings.config,
    'over/under history',
    fetchPage,
  );
  const overUnder = teamRankings.parseOverUnderHistory(overUnderHtml);

  const quotes = normalizeOddsTables({ spread, overUnder }, season);
  const favored = resolveFavoredTeam(teamRankings.parseFavoredLandmark(spreadHtml));
  if (favored !== homeTeam && favored !== awayTeam) {
    throw new DataIntegrityError(`Favored team ${favored} is not playing in ${describeGame(key)}`);
  }

  log.debug({ quotes: quotes.length, favored }, 'Game odds normalized');
  return { homeTeam, awayTeam, week, season, favored, quotes };
}

export function createGameOddsFetcher(fetchPage: FetchPage = fetchHttp): FetchGameOdds {
  return (key) => fetchGameOdds(key, fetchPage);
}
