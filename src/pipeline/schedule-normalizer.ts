import { DataIntegrityError, ParseError } from '../errors.js';
import type { ScheduleRecord } from '../types/game.js';
import type { Table } from '../types/table.js';
import type { PlayoffRound, WeekId } from '../types/week.js';
import { parseScheduleDate } from '../utils/date.js';
import { teamIdFromName } from './team-resolver.js';

const PLAYOFF_LABELS = new Map<string, PlayoffRound>([
  ['WildCard', 'wild-card'],
  ['Division', 'divisional'],
  ['ConfChamp', 'conference'],
  ['SuperBowl', 'super-bowl'],
]);

/** Set in the venue column when the listed winner was the visiting team. */
const AWAY_WINNER_MARKER = '@';

const COLUMN_LABELS = {
  week: 'Week',
  date: 'Date',
  winner: 'Winner/tie',
  loser: 'Loser/tie',
  pointsWinner: 'PtsW',
  pointsLoser: 'PtsL',
  yardsWinner: 'YdsW',
  turnOversWinner: 'TOW',
  yardsLoser: 'YdsL',
  turnOversLoser: 'TOL',
} as const;

type ColumnName = keyof typeof COLUMN_LABELS | 'marker';
type Columns = Record<ColumnName, number>;

export function parseWeekLabel(label: string): WeekId {
  const round = PLAYOFF_LABELS.get(label);
  if (round) return round;
  if (/^\d+$/.test(label)) return parseInt(label, 10);
  throw new ParseError(`Unknown week label: ${JSON.stringify(label)}`);
}

function locateColumns(header: string[]): Columns {
  const indexOf = (label: string): number => {
    const index = header.indexOf(label);
    if (index < 0) throw new ParseError(`Schedule table has no ${JSON.stringify(label)} column`);
    return index;
  };

  const winner = indexOf(COLUMN_LABELS.winner);
  // The venue marker sits in the unlabeled column right after the winner.
  const marker = winner + 1;
  if (header[marker] !== '') {
    throw new ParseError(`Expected an unlabeled venue column after ${JSON.stringify(COLUMN_LABELS.winner)}`);
  }

  const columns: Columns = {
    week: indexOf(COLUMN_LABELS.week),
    date: indexOf(COLUMN_LABELS.date),
    winner,
    marker,
    loser: indexOf(COLUMN_LABELS.loser),
    pointsWinner: indexOf(COLUMN_LABELS.pointsWinner),
    pointsLoser: indexOf(COLUMN_LABELS.pointsLoser),
    yardsWinner: indexOf(COLUMN_LABELS.yardsWinner),
    turnOversWinner: indexOf(COLUMN_LABELS.turnOversWinner),
    yardsLoser: indexOf(COLUMN_LABELS.yardsLoser),
    turnOversLoser: indexOf(COLUMN_LABELS.turnOversLoser),
  };
  return columns;
}

function parseCount(text: string, what: string): number {
  if (!/^-?\d+$/.test(text)) throw new ParseError(`Non-integer ${what}: ${JSON.stringify(text)}`);
  return parseInt(text, 10);
}

/** A week cell holding the header text or nothing marks a non-game row. */
function isGameRow(weekCell: string): boolean {
  return weekCell !== '' && weekCell !== COLUMN_LABELS.week;
}

/**
 * Turn one season's schedule table into per-game records, home/away decided by
 * the venue marker. Pure: the same table always gives the same records.
 */
export function normalizeSchedule(table: Table, season: number): ScheduleRecord[] {
  const columns = locateColumns(table.header);
  const records: ScheduleRecord[] = [];

  for (const row of table.rows) {
    if (!isGameRow(row[columns.week] ?? '')) continue;

    const cell = (name: ColumnName): string => {
      const text = row[columns[name]];
      if (text === undefined) throw new ParseError(`Schedule row ${JSON.stringify(row)} has no ${name} cell`);
      return text;
    };

    const winner = teamIdFromName(cell('winner'));
    const loser = teamIdFromName(cell('loser'));
    if (winner === loser) throw new DataIntegrityError(`${winner} listed as both winner and loser`);

    const winnerIsAway = cell('marker') === AWAY_WINNER_MARKER;

    records.push({
      homeTeam: winnerIsAway ? loser : winner,
      awayTeam: winnerIsAway ? winner : loser,
      week: parseWeekLabel(cell('week')),
      season,
      gameDate: parseScheduleDate(cell('date'), season),
      winner,
      pointsWinner: parseCount(cell('pointsWinner'), 'PtsW'),
      pointsLoser: parseCount(cell('pointsLoser'), 'PtsL'),
      yardsWinner: parseCount(cell('yardsWinner'), 'YdsW'),
      yardsLoser: parseCount(cell('yardsLoser'), 'YdsL'),
      turnOversWinner: parseCount(cell('turnOversWinner'), 'TOW'),
      turnOversLoser: parseCount(cell('turnOversLoser'), 'TOL'),
    });
  }

  return records;
}
