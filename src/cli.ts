import { writeFile } from 'node:fs/promises';
import { Command } from 'commander';
import { z } from 'zod';
import { config } from './config.js';
import { errorMessage } from './errors.js';
import { describeGame } from './pipeline/game-key.js';
import { formatCsv } from './output/csv.js';
import { weekIdSchema } from './types/week.js';
import { latestSeasonBefore } from './utils/date.js';
import { logger } from './utils/logger.js';
import { fetchHttp, type FetchPage } from './workers/http-client.js';
import { fetchSeason, fetchSeasons, type SeasonResult } from './workers/season-fetcher.js';

const cliOptionsSchema = z
  .object({
    year: z.coerce.number().int().min(config.EARLIEST_SEASON).optional(),
    week: weekIdSchema.optional(),
    timeout: z.coerce.number().positive().optional(),
    concurrency: z.coerce.number().int().positive(),
    output: z.string().min(1).optional(),
    failOnMissing: z.boolean().default(false),
    verbose: z.number().int().nonnegative().default(0),
  })
  .refine((options) => options.week === undefined || options.year !== undefined, {
    message: '--week requires --year',
    path: ['week'],
  });

export type CliOptions = z.infer<typeof cliOptionsSchema>;

const VERBOSE_LEVELS = ['debug', 'trace'] as const;

export function parseCliOptions(raw: unknown): CliOptions {
  const parsed = cliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(issue ? `${issue.path.join('.') || 'options'}: ${issue.message}` : 'Invalid options');
  }
  return parsed.data;
}

/** Every season from the earliest covered one through the one under way `today`. */
export function seasonsThrough(today: Date, earliest = config.EARLIEST_SEASON): number[] {
  const latest = latestSeasonBefore(today);
  return Array.from({ length: Math.max(0, latest - earliest + 1) }, (_v, i) => earliest + i);
}

export function logLevelFor(verbose: number): string {
  if (verbose <= 0) return config.LOG_LEVEL;
  return VERBOSE_LEVELS[Math.min(verbose, VERBOSE_LEVELS.length) - 1] ?? 'trace';
}

export async function run(options: CliOptions, fetchPage: FetchPage = fetchHttp): Promise<number> {
  logger.level = logLevelFor(options.verbose);
  logger.debug({ options }, 'Starting');

  const seasonOptions = {
    concurrency: options.concurrency,
    timeoutMs: options.timeout === undefined ? undefined : options.timeout * 1000,
    fetchPage,
  };
  const result: SeasonResult =
    options.year === undefined
      ? await fetchSeasons(seasonsThrough(new Date()), seasonOptions)
      : await fetchSeason(options.year, { ...seasonOptions, week: options.week });

  const csv = `${formatCsv(result.rows)}\n`;
  if (options.output) {
    await writeFile(options.output, csv, 'utf-8');
    logger.info({ path: options.output, rows: result.rows.length }, 'CSV written');
  } else {
    process.stdout.write(csv);
  }

  for (const failure of result.failures) {
    logger.warn({ game: describeGame(failure.game), reason: failure.reason }, 'Game missing from output');
  }
  if (result.timedOut) logger.error('Deadline passed before every game was fetched');

  return options.failOnMissing && result.failures.length > 0 ? 2 : 0;
}

export function buildProgram(): Command {
  const program: Command = new Command();

  program
    .name('nfl-spreads')
    .description('Download NFL scores with point-spread and over/under history as CSV')
    .option('-y, --year <year>', 'season to fetch, by the year it starts in (default: every season)')
    .option('-w, --week <week>', 'week number or wild-card|divisional|conference|super-bowl (needs --year)')
    .option('-t, --timeout <seconds>', 'give up waiting for a season after this long')
    .option('-c, --concurrency <n>', 'games fetched in parallel', String(config.CONCURRENCY))
    .option('-o, --output <file>', 'write the CSV here instead of stdout')
    .option('--fail-on-missing', 'exit with status 2 if any game could not be fetched')
    .option('-v, --verbose', 'log more; repeat for even more', (_value: string, previous: number) => previous + 1, 0)
    .action(async () => {
      let options: CliOptions;
      try {
        options = parseCliOptions(program.opts());
      } catch (err) {
        program.error(errorMessage(err));
      }
      process.exitCode = await run(options);
    });

  return program;
}
