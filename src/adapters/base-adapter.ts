import * as cheerio from 'cheerio';
import { CantFindTheRightTable } from '../errors.js';
import type { SiteAdapter, SiteAdapterConfig } from '../types/adapter.js';
import type { Table, TableLocator } from '../types/table.js';

export abstract class BaseAdapter implements SiteAdapter {
  abstract readonly config: SiteAdapterConfig;

  protected load(html: string) {
    return cheerio.load(html);
  }

  /**
   * Every table matching the locator, as cleaned cell text. Nested tables are
   * not flattened into their parent's rows.
   */
  protected extractTables(html: string, locator: TableLocator): Table[] {
    const $ = this.load(html);
    const tables: Table[] = [];
    const headerRow = locator.headerRow ?? 0;
    const skipRows = locator.skipRows ?? 0;

    $(locator.selector).each((_i, tableEl) => {
      const $table = $(tableEl);
      if (locator.match && !locator.match.test($table.text())) return;

      const rows = $table
        .find('tr')
        .filter((_j, tr) => $(tr).closest('table').get(0) === tableEl)
        .toArray()
        .map((tr) =>
          $(tr)
            .children('th, td')
            .toArray()
            .map((cell) => cleanCellText($(cell).text())),
        );

      const header = rows[headerRow];
      if (!header) return;

      tables.push({ header, rows: rows.slice(headerRow + 1 + skipRows) });
    });

    return tables;
  }

  /** The single table matching the locator; zero or several is an error. */
  protected extractSingleTable(html: string, locator: TableLocator): Table {
    return requireSingleTable(this.extractTables(html, locator), locator.what);
  }
}

export function requireSingleTable(tables: Table[], what: string): Table {
  const [table] = tables;
  if (tables.length !== 1 || !table) throw new CantFindTheRightTable(what, tables.length);
  return table;
}

export function cleanCellText(text: string): string {
  // \s covers non-breaking spaces too
  return text.replace(/\s+/g, ' ').trim();
}
