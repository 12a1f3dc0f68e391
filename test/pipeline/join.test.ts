import { describe, it, expect } from 'vitest';
import { DataIntegrityError } from '../../src/errors.js';
import type { Reconciliation } from '../../src/pipeline/home-away.js';
import { countDistinctGames, joinSeason, reorient } from '../../src/pipeline/join.js';
import type { MarketQuote, MergedRecord, ScheduleRecord } from '../../src/types/game.js';

const QUOTE: MarketQuote = {
  timestamp: '2014-01-26 10:00:00',
  pinnacleSpread: -2,
  betonlineSpread: -2.5,
  bookmakerSpread: null,
  pinnacleOverUnder: 47.5,
  betonlineOverUnder: 47,
  bookmakerOverUnder: 47.5,
};

const SUPER_BOWL: ScheduleRecord = {
  homeTeam: 'seahawks',
  awayTeam: 'broncos',
  week: 'super-bowl',
  season: 2013,
  gameDate: '2014-02-02',
  winner: 'seahawks',
  pointsWinner: 43,
  pointsLoser: 8,
  yardsWinner: 341,
  yardsLoser: 306,
  turnOversWinner: 0,
  turnOversLoser: 4,
};

function merged(overrides: Partial<MergedRecord> = {}): MergedRecord {
  return { ...SUPER_BOWL, ...QUOTE, favored: 'broncos', homeAwayDiscrepancy: false, ...overrides };
}

describe('join', () => {
  describe('reorient', () => {
    it('should flip spreads when the away team is favored', () => {
      const row = reorient(merged());
      expect(row.pinnacleSpread).toBe(2);
      expect(row.betonlineSpread).toBe(2.5);
      expect(row.bookmakerSpread).toBeNull();
      expect(row.pinnacleOverUnder).toBe(47.5);
    });

    it('should keep spreads when the home team is favored', () => {
      const row = reorient(merged({ favored: 'seahawks' }));
      expect(row.pinnacleSpread).toBe(-2);
      expect(row.betonlineSpread).toBe(-2.5);
    });

    it('should not produce negative zero for a flipped pick-em line', () => {
      const row = reorient(merged({ pinnacleSpread: 0 }));
      expect(Object.is(row.pinnacleSpread, 0)).toBe(true);
    });

    it('should map winner statistics to the home team when it won', () => {
      const row = reorient(merged());
      expect(row).toMatchObject({
        pointsHome: 43,
        pointsAway: 8,
        yardsHome: 341,
        yardsAway: 306,
        turnOversHome: 0,
        turnOversAway: 4,
      });
    });

    it('should map winner statistics to the away team when it won', () => {
      const row = reorient(merged({ winner: 'broncos' }));
      expect(row).toMatchObject({
        pointsHome: 8,
        pointsAway: 43,
        yardsHome: 306,
        yardsAway: 341,
        turnOversHome: 4,
        turnOversAway: 0,
      });
    });

    it('should reject a winner who did not play', () => {
      expect(() => reorient(merged({ winner: 'rams' }))).toThrow(DataIntegrityError);
    });

    it('should reject a favored team that did not play', () => {
      expect(() => reorient(merged({ favored: 'rams' }))).toThrow(
        'Favored team rams did not play in broncos at seahawks, week super-bowl 2013',
      );
    });
  });

  describe('joinSeason', () => {
    const reconciled: Reconciliation = {
      status: 'confirmed',
      homeAwayDiscrepancy: false,
      record: {
        homeTeam: 'seahawks',
        awayTeam: 'broncos',
        week: 'super-bowl',
        season: 2013,
        favored: 'broncos',
        quotes: [QUOTE, { ...QUOTE, timestamp: '2014-02-02 18:35:00', pinnacleSpread: -2.5 }],
      },
    };

    it('should emit one row per quote', () => {
      const rows = joinSeason([SUPER_BOWL], [reconciled]);
      expect(rows.map((r) => [r.timestamp, r.pinnacleSpread])).toEqual([
        ['2014-01-26 10:00:00', 2],
        ['2014-02-02 18:35:00', 2.5],
      ]);
      expect(rows[0]?.gameDate).toBe('2014-02-02');
      expect(countDistinctGames(rows)).toBe(1);
    });

    it('should drop schedule games without odds', () => {
      const other: ScheduleRecord = { ...SUPER_BOWL, homeTeam: 'colts', awayTeam: 'chiefs', winner: 'colts', week: 'wild-card' };
      const rows = joinSeason([other, SUPER_BOWL], [reconciled]);
      expect(rows).toHaveLength(2);
      expect(rows.every((r) => r.homeTeam === 'seahawks')).toBe(true);
    });

    it('should drop odds whose orientation does not match the schedule', () => {
      const reversed: Reconciliation = {
        ...reconciled,
        record: { ...reconciled.record, homeTeam: 'broncos', awayTeam: 'seahawks' },
      };
      expect(joinSeason([SUPER_BOWL], [reversed])).toEqual([]);
    });

    it('should carry the discrepancy flag onto every row', () => {
      const swapped: Reconciliation = { ...reconciled, status: 'swapped', homeAwayDiscrepancy: true };
      const rows = joinSeason([SUPER_BOWL], [swapped]);
      expect(rows.map((r) => r.homeAwayDiscrepancy)).toEqual([true, true]);
    });
  });
});
