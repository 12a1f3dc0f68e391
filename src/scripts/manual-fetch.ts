/**
 * Fetch one game's odds history and print it, trying both home/away orders.
 * Usage: npx tsx src/scripts/manual-fetch.ts <teamA> <teamB> <week> <year>
 * e.g.   npx tsx src/scripts/manual-fetch.ts ravens broncos 1 2013
 */
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { reconcileHomeAway } from '../pipeline/home-away.js';
import { teamIdSchema } from '../types/team.js';
import { weekIdSchema } from '../types/week.js';
import { createGameOddsFetcher } from '../workers/game-fetcher.js';

const argsSchema = z.tuple([teamIdSchema, teamIdSchema, weekIdSchema, z.coerce.number().int()]);

const parsed = argsSchema.safeParse(process.argv.slice(2));
if (!parsed.success) {
  console.error('Usage: manual-fetch.ts <teamA> <teamB> <week> <year>');
  console.error(parsed.error.issues.map((i) => `  ${i.path.join('.')}: ${i.message}`).join('\n'));
  process.exit(1);
}

const [teamA, teamB, week, season] = parsed.data;
console.log(`\n=== ${teamB} at ${teamA}, week ${week} ${season} ===`);

try {
  const result = await reconcileHomeAway(
    { homeTeam: teamA, awayTeam: teamB, week, season },
    createGameOddsFetcher(),
  );
  console.log(`  Status: ${result.status}`);
  console.log(`  Favored: ${result.record.favored}`);
  console.log(`  Quotes: ${result.record.quotes.length}`);
  console.table(result.record.quotes);
} catch (err) {
  console.error(`  ERROR: ${errorMessage(err)}`);
  process.exitCode = 1;
}
