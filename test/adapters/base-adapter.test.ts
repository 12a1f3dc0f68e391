import { describe, it, expect } from 'vitest';
import { BaseAdapter, cleanCellText, requireSingleTable } from '../../src/adapters/base-adapter.js';
import { CantFindTheRightTable } from '../../src/errors.js';
import type { SiteAdapterConfig } from '../../src/types/adapter.js';
import type { TableLocator } from '../../src/types/table.js';

class TestAdapter extends BaseAdapter {
  readonly config: SiteAdapterConfig = {
    id: 'test',
    baseUrl: 'https://example.com',
    rateLimitMs: 0,
  };

  tables(html: string, locator: TableLocator) {
    return this.extractTables(html, locator);
  }

  table(html: string, locator: TableLocator) {
    return this.extractSingleTable(html, locator);
  }
}

const PAGE = `<html><body>
  <table class="grid">
    <tr><th>Name</th><th>Score</th></tr>
    <tr><td>Summary</td><td>skip me</td></tr>
    <tr><td>  Alpha&nbsp;Team </td><td>
      10
    </td></tr>
    <tr><td>Beta</td><td><table><tr><td>inner</td></tr></table>20</td></tr>
  </table>
  <table class="grid">
    <tr><th>Other</th></tr>
    <tr><td>History</td></tr>
  </table>
</body></html>`;

describe('BaseAdapter', () => {
  const adapter = new TestAdapter();

  it('should return every table matching the selector', () => {
    const tables = adapter.tables(PAGE, { what: 'grid', selector: 'table.grid' });
    expect(tables).toHaveLength(2);
  });

  it('should filter tables by their text', () => {
    const tables = adapter.tables(PAGE, { what: 'grid', selector: 'table.grid', match: /History/ });
    expect(tables).toEqual([{ header: ['Other'], rows: [['History']] }]);
  });

  it('should split the header off and skip summary rows', () => {
    const table = adapter.table(PAGE, { what: 'grid', selector: 'table.grid', match: /Score/, skipRows: 1 });
    expect(table.header).toEqual(['Name', 'Score']);
    expect(table.rows).toEqual([
      ['Alpha Team', '10'],
      ['Beta', 'inner20'],
    ]);
  });

  it('should not flatten nested tables into the outer rows', () => {
    const table = adapter.table(PAGE, { what: 'grid', selector: 'table.grid', match: /Score/ });
    expect(table.rows.map((row) => row[0])).toEqual(['Summary', 'Alpha Team', 'Beta']);
  });

  it('should throw CantFindTheRightTable when several tables match', () => {
    expect(() => adapter.table(PAGE, { what: 'grid', selector: 'table.grid' })).toThrow(
      'Expected exactly one grid table, found 2',
    );
  });

  it('should throw CantFindTheRightTable when nothing matches', () => {
    expect(() => adapter.table(PAGE, { what: 'odds', selector: 'table#odds' })).toThrow(CantFindTheRightTable);
  });

  describe('requireSingleTable', () => {
    it('should report how many tables matched', () => {
      try {
        requireSingleTable([], 'spread history');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(CantFindTheRightTable);
        expect(err).toHaveProperty('matches', 0);
      }
    });
  });

  describe('cleanCellText', () => {
    it('should collapse whitespace including non-breaking spaces', () => {
      expect(cleanCellText('\n  09/05\u00a0 07:55PM \t')).toBe('09/05 07:55PM');
      expect(cleanCellText('\u00a0')).toBe('');
    });
  });
});
