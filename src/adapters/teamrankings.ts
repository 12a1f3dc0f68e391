import { config } from '../config.js';
import { FavoredTeamError } from '../errors.js';
import type { SiteAdapterConfig } from '../types/adapter.js';
import type { Table } from '../types/table.js';
import { BaseAdapter } from './base-adapter.js';
import { TEAMRANKINGS_BASE_URL } from './urls.js';

/** Text and link targets of the "Odds: Denver by 7," sub-heading. */
export interface FavoredLandmark {
  text: string;
  links: string[];
}

/**
 * TeamRankings matchup pages.
 *
 * `/spread-movement` and `/over-under-movement` each carry one line-movement
 * table: a header row naming the books, three summary rows (history caption,
 * open, current) and then one row per line move, newest first. The spread page
 * also has a `p.h1-sub > strong` sub-heading such as
 * `Week 1 | Thu Sep 5 | Odds: Denver by 7, Total: 48 | <a>Baltimore</a> at <a>Denver</a>`
 * whose links point at `/nfl/team/{city}-{mascot}`.
 */
export class TeamRankingsAdapter extends BaseAdapter {
  readonly config: SiteAdapterConfig = {
    id: 'teamrankings',
    baseUrl: TEAMRANKINGS_BASE_URL,
    rateLimitMs: config.RATE_LIMIT_MS,
  };

  parseSpreadHistory(html: string): Table {
    return this.extractSingleTable(html, {
      what: 'spread history',
      selector: 'table#table-000',
      match: /History/,
      skipRows: 3,
    });
  }

  parseOverUnderHistory(html: string): Table {
    return this.extractSingleTable(html, {
      what: 'over/under history',
      selector: 'table[cellspacing="0"]',
      match: /History/,
      skipRows: 3,
    });
  }

  parseFavoredLandmark(html: string): FavoredLandmark {
    const $ = this.load(html);
    const $strong = $('p.h1-sub strong').first();
    if (!$strong.length) throw new FavoredTeamError('No odds sub-heading on the page');

    const links = $strong
      .find('a[href]')
      .toArray()
      .map((a) => $(a).attr('href') ?? '')
      .filter((href) => href.length > 0);

    // Only the heading's own text; the links spell out both cities.
    const $text = $strong.clone();
    $text.find('a').remove();

    return { text: $text.text(), links };
  }
}

export const teamRankings = new TeamRankingsAdapter();
