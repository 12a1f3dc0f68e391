import { proFootballReference } from '../adapters/pro-football-reference.js';
import { seasonGamesUrl } from '../adapters/urls.js';
import { config } from '../config.js';
import { DataIntegrityError } from '../errors.js';
import { describeGame } from '../pipeline/game-key.js';
import { reconcileHomeAway } from '../pipeline/home-away.js';
import { countDistinctGames, joinSeason } from '../pipeline/join.js';
import { normalizeSchedule } from '../pipeline/schedule-normalizer.js';
import type { GameKey, JoinedRecord, ScheduleRecord } from '../types/game.js';
import type { WeekId } from '../types/week.js';
import { logger } from '../utils/logger.js';
import { createGameOddsFetcher } from './game-fetcher.js';
import { fetchDocument, fetchHttp, type FetchPage } from './http-client.js';
import { runPool } from './pool.js';

export interface SeasonOptions {
  /** Only games in this week */
  week?: WeekId;
  concurrency?: number;
  /** Deadline for the whole batch of game fetches, per season */
  timeoutMs?: number;
  fetchPage?: FetchPage;
}

export interface GameFailure {
  game: GameKey;
  reason: string;
  error: Error;
}

export interface SeasonResult {
  rows: JoinedRecord[];
  /** One entry per requested game that produced no record */
  failures: GameFailure[];
  timedOut: boolean;
}

export async function fetchSchedule(
  season: number,
  fetchPage: FetchPage = fetchHttp,
): Promise<ScheduleRecord[]> {
  logger.debug({ season }, 'Getting season schedule');
  const html = await fetchDocument(
    seasonGamesUrl(season),
    proFootballReference.config,
    'season games',
    fetchPage,
  );
  return normalizeSchedule(proFootballReference.parseSchedule(html), season);
}

const keyOf = (game: ScheduleRecord): GameKey => ({
  homeTeam: game.homeTeam,
  awayTeam: game.awayTeam,
  week: game.week,
  season: game.season,
});

/**
 * Scores and odds for every game of a season (or of one week of it).
 *
 * Games are fetched in parallel, each with the home/away swap fallback. A game
 * that fails is reported in `failures` and left out of `rows`; the rest still
 * come back.
 */
export async function fetchSeason(season: number, options: SeasonOptions = {}): Promise<SeasonResult> {
  const { week, concurrency = config.CONCURRENCY, timeoutMs, fetchPage = fetchHttp } = options;
  const log = logger.child({ season });
  log.debug({ concurrency, week, timeoutMs }, 'Fetching season');

  const schedule = await fetchSchedule(season, fetchPage);
  const games = week === undefined ? schedule : schedule.filter((game) => game.week === week);
  const fetchGameOdds = createGameOddsFetcher(fetchPage);

  const outcome = await runPool(
    games,
    (game) => reconcileHomeAway(keyOf(game), fetchGameOdds),
    { concurrency, timeoutMs },
  );

  // Only outcomes the pool kept; a game finishing after the deadline is a failure.
  for (const { item, value } of outcome.fulfilled) {
    log.info({ game: describeGame(item), status: value.status }, 'Success');
  }

  const failures = outcome.rejected.map(({ item, error }): GameFailure => {
    log.error({ game: describeGame(item), err: error }, 'Failure');
    return { game: keyOf(item), reason: error.message, error };
  });

  const rows = joinSeason(
    games,
    outcome.fulfilled.map((f) => f.value),
  );

  const expected = outcome.fulfilled.length;
  const joined = countDistinctGames(rows);
  if (joined !== expected) {
    throw new DataIntegrityError(`Expected ${expected} games in season ${season}, got ${joined}`);
  }

  log.info(
    { requested: games.length, succeeded: expected, failed: failures.length, timedOut: outcome.timedOut },
    'Season fetched',
  );
  return { rows, failures, timedOut: outcome.timedOut };
}

/** `fetchSeason` for each year in turn, results concatenated. */
export async function fetchSeasons(
  years: readonly number[],
  options: Omit<SeasonOptions, 'week'> = {},
): Promise<SeasonResult> {
  const combined: SeasonResult = { rows: [], failures: [], timedOut: false };

  for (const year of years) {
    logger.info(`========== ${year} ==========`);
    const result = await fetchSeason(year, options);
    combined.rows.push(...result.rows);
    combined.failures.push(...result.failures);
    combined.timedOut ||= result.timedOut;
  }

  return combined;
}
