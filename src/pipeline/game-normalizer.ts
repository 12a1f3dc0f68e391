import { invariant, ParseError } from '../errors.js';
import type { MarketQuote } from '../types/game.js';
import type { Table } from '../types/table.js';
import { parseQuoteTimestamp } from '../utils/date.js';

const BOOKS = ['pinnacle', 'betonline', 'bookmaker'] as const;
type Book = (typeof BOOKS)[number];

/** Cell text for "this book had no line at that moment". */
export const MISSING_QUOTE = '--';
/** Cell text for a pick'em line: no favorite, margin zero. */
export const PICK_EM_QUOTE = '(Pick)';

type BookQuotes = Record<Book, number | null>;

interface HistoryRow {
  timestamp: string;
  quotes: BookQuotes;
}

export function parseQuoteValue(cell: string): number | null {
  const text = cell.trim();
  if (text === MISSING_QUOTE) return null;
  if (text === PICK_EM_QUOTE) return 0;
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(text)) {
    throw new ParseError(`Unparseable quote: ${JSON.stringify(cell)}`);
  }
  return parseFloat(text);
}

/**
 * Turn one line-movement table into timestamped quotes. The first column holds
 * the timestamp; book columns are found by case-folded header.
 */
export function parseHistoryTable(table: Table, season: number): HistoryRow[] {
  const columns = BOOKS.map((book) => {
    const index = table.header.findIndex((h) => h.toLowerCase() === book);
    if (index < 1) throw new ParseError(`Line-movement table has no ${book} column`);
    return [book, index] as const;
  });

  return table.rows.map((row) => {
    const [timestampCell] = row;
    if (timestampCell === undefined) throw new ParseError('Empty line-movement row');

    const quotes: BookQuotes = { pinnacle: null, betonline: null, bookmaker: null };
    for (const [book, index] of columns) {
      const cell = row[index];
      if (cell === undefined) throw new ParseError(`Row ${JSON.stringify(timestampCell)} has no ${book} cell`);
      quotes[book] = parseQuoteValue(cell);
    }

    return { timestamp: parseQuoteTimestamp(timestampCell, season), quotes };
  });
}

function groupByTimestamp(rows: HistoryRow[]): Map<string, BookQuotes[]> {
  const groups = new Map<string, BookQuotes[]>();
  for (const row of rows) {
    const group = groups.get(row.timestamp);
    if (group) group.push(row.quotes);
    else groups.set(row.timestamp, [row.quotes]);
  }
  return groups;
}

/**
 * Outer-join the spread and over/under histories on timestamp, ascending.
 * Rows sharing a timestamp within one table pair up in table order.
 */
export function normalizeOddsTables(
  tables: { spread: Table; overUnder: Table },
  season: number,
): MarketQuote[] {
  const spread = groupByTimestamp(parseHistoryTable(tables.spread, season));
  const overUnder = groupByTimestamp(parseHistoryTable(tables.overUnder, season));
  const union = new Set([...spread.keys(), ...overUnder.keys()]);

  const quotes: MarketQuote[] = [];
  for (const timestamp of [...union].sort()) {
    const s = spread.get(timestamp) ?? [];
    const o = overUnder.get(timestamp) ?? [];
    for (let i = 0; i < Math.max(s.length, o.length); i++) {
      quotes.push({
        timestamp,
        pinnacleSpread: s[i]?.pinnacle ?? null,
        betonlineSpread: s[i]?.betonline ?? null,
        bookmakerSpread: s[i]?.bookmaker ?? null,
        pinnacleOverUnder: o[i]?.pinnacle ?? null,
        betonlineOverUnder: o[i]?.betonline ?? null,
        bookmakerOverUnder: o[i]?.bookmaker ?? null,
      });
    }
  }

  const joined = new Set(quotes.map((q) => q.timestamp));
  invariant(
    joined.size === union.size && [...union].every((t) => joined.has(t)),
    'merged quote timestamps equal the union of both histories',
  );
  if (quotes.length === 0) throw new ParseError('Both line-movement tables are empty');

  return quotes;
}
