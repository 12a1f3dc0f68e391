import { z } from 'zod';

export const PLAYOFF_ROUNDS = ['wild-card', 'divisional', 'conference', 'super-bowl'] as const;

export type PlayoffRound = (typeof PLAYOFF_ROUNDS)[number];

/** A regular-season week number or a playoff round. */
export type WeekId = number | PlayoffRound;

export const weekIdSchema = z.union([
  z.coerce.number().int().positive(),
  z.enum(PLAYOFF_ROUNDS),
]);

export function isPlayoffRound(week: WeekId): week is PlayoffRound {
  return typeof week === 'string';
}

/** Integer weeks first, then the playoff rounds in bracket order. */
export function compareWeeks(a: WeekId, b: WeekId): number {
  const rank = (w: WeekId) =>
    isPlayoffRound(w) ? Number.MAX_SAFE_INTEGER - PLAYOFF_ROUNDS.length + PLAYOFF_ROUNDS.indexOf(w) : w;
  return rank(a) - rank(b);
}
