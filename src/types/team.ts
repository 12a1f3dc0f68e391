import { z } from 'zod';

/** Canonical team slugs: the mascot, lowercased. */
export const TEAM_IDS = [
  '49ers', 'bears', 'bengals', 'bills', 'broncos', 'browns', 'buccaneers',
  'cardinals', 'chargers', 'chiefs', 'colts', 'cowboys', 'dolphins', 'eagles',
  'falcons', 'giants', 'jaguars', 'jets', 'lions', 'packers', 'panthers',
  'patriots', 'raiders', 'rams', 'ravens', 'redskins', 'saints', 'seahawks',
  'steelers', 'texans', 'titans', 'vikings',
] as const;

export const teamIdSchema = z.enum(TEAM_IDS);

export type TeamId = z.infer<typeof teamIdSchema>;

export function isTeamId(value: string): value is TeamId {
  return teamIdSchema.safeParse(value).success;
}
