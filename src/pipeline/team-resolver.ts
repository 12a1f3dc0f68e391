import { FavoredTeamError, ParseError } from '../errors.js';
import type { FavoredLandmark } from '../adapters/teamrankings.js';
import { isTeamId, type TeamId } from '../types/team.js';

// Matches "| Odds: St. Louis by 3.5,"; city names may hold spaces and periods.
const FAVORED_PATTERN = /\|\s+Odds:\s+([A-Za-z. ]+?)\s+by\s+[0-9.]+,/;

/** "St. Louis" -> "st-louis", the form team links use. */
export function citySlug(city: string): string {
  return city.trim().replace(/\./g, '').replace(/\s+/g, '-').toLowerCase();
}

/** "/nfl/team/st-louis-rams" -> "rams" */
export function teamIdFromLink(href: string): TeamId | null {
  const path = href.replace(/[?#].*$/, '').replace(/\/+$/, '');
  const slug = path.split('-').pop()?.toLowerCase() ?? '';
  return isTeamId(slug) ? slug : null;
}

/** Schedule cells read "City Mascot"; the mascot is the slug. */
export function teamIdFromName(name: string): TeamId {
  const slug = name.trim().split(/\s+/).pop()?.toLowerCase() ?? '';
  if (!isTeamId(slug)) throw new ParseError(`Unknown team: ${JSON.stringify(name)}`);
  return slug;
}

/**
 * Read the favored team off the odds sub-heading. The heading names a city, so
 * the team comes from the first heading link whose target contains that city.
 */
export function resolveFavoredTeam(landmark: FavoredLandmark): TeamId {
  const match = landmark.text.match(FAVORED_PATTERN);
  const city = match?.[1]?.trim();
  if (!city) {
    throw new FavoredTeamError(`Couldn't figure out who was favored: ${JSON.stringify(landmark.text.trim())}`);
  }

  const slug = citySlug(city);
  const href = landmark.links.find((link) => link.toLowerCase().includes(slug));
  if (!href) throw new FavoredTeamError(`No team link for favored city ${JSON.stringify(city)}`);

  const team = teamIdFromLink(href);
  if (!team) throw new FavoredTeamError(`Team link ${JSON.stringify(href)} names no known team`);
  return team;
}
