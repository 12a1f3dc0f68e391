import { config } from '../config.js';
import type { SiteAdapterConfig } from '../types/adapter.js';
import type { Table } from '../types/table.js';
import { BaseAdapter } from './base-adapter.js';
import { PRO_FOOTBALL_REFERENCE_BASE_URL } from './urls.js';

/**
 * Pro-Football-Reference season pages (`/years/{year}/games.htm`).
 *
 * `table#games` lists every game once, winner first, with the header repeated
 * every few weeks inside the body and blank spacer rows before the playoffs.
 */
export class ProFootballReferenceAdapter extends BaseAdapter {
  readonly config: SiteAdapterConfig = {
    id: 'pro-football-reference',
    baseUrl: PRO_FOOTBALL_REFERENCE_BASE_URL,
    rateLimitMs: config.RATE_LIMIT_MS,
  };

  parseSchedule(html: string): Table {
    return this.extractSingleTable(html, { what: 'season games', selector: 'table#games' });
  }
}

export const proFootballReference = new ProFootballReferenceAdapter();
