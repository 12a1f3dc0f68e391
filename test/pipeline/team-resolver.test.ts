import { describe, it, expect } from 'vitest';
import { FavoredTeamError, ParseError } from '../../src/errors.js';
import {
  citySlug,
  resolveFavoredTeam,
  teamIdFromLink,
  teamIdFromName,
} from '../../src/pipeline/team-resolver.js';

describe('teamResolver', () => {
  describe('citySlug', () => {
    it('should hyphenate and drop periods', () => {
      expect(citySlug('St. Louis')).toBe('st-louis');
      expect(citySlug('New England')).toBe('new-england');
      expect(citySlug('Denver')).toBe('denver');
    });
  });

  describe('teamIdFromLink', () => {
    it('should take the mascot from the link target', () => {
      expect(teamIdFromLink('/nfl/team/st-louis-rams')).toBe('rams');
      expect(teamIdFromLink('https://www.teamrankings.com/nfl/team/san-francisco-49ers/')).toBe('49ers');
    });

    it('should return null for unknown teams', () => {
      expect(teamIdFromLink('/nfl/team/washington-commanders')).toBeNull();
    });
  });

  describe('teamIdFromName', () => {
    it('should take the last word of a full team name', () => {
      expect(teamIdFromName('Denver Broncos')).toBe('broncos');
      expect(teamIdFromName('St. Louis Rams')).toBe('rams');
      expect(teamIdFromName('San Francisco 49ers')).toBe('49ers');
    });

    it('should throw ParseError for unknown teams', () => {
      expect(() => teamIdFromName('Washington Commanders')).toThrow(ParseError);
    });
  });

  describe('resolveFavoredTeam', () => {
    const links = ['/nfl/team/arizona-cardinals', '/nfl/team/st-louis-rams'];

    it('should resolve a multi-word favored city', () => {
      const team = resolveFavoredTeam({
        text: 'Week 1 | Sun Sep 8 | Odds: St. Louis by 3.5, Total: 42 |  vs. ',
        links,
      });
      expect(team).toBe('rams');
    });

    it('should take the first link when a city has two teams', () => {
      const team = resolveFavoredTeam({
        text: 'Week 3 | Odds: New York by 1, Total: 40 |',
        links: ['/nfl/team/new-york-giants', '/nfl/team/new-york-jets'],
      });
      expect(team).toBe('giants');
    });

    it('should throw FavoredTeamError when the heading has no odds', () => {
      expect(() => resolveFavoredTeam({ text: 'Week 1 | Sun Sep 8 | Total: 42 |', links })).toThrow(
        FavoredTeamError,
      );
    });

    it('should throw FavoredTeamError when no link names the city', () => {
      expect(() => resolveFavoredTeam({ text: '| Odds: Denver by 7, Total: 48 |', links })).toThrow(
        'No team link for favored city "Denver"',
      );
    });
  });
});
