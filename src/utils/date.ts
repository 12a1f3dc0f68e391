import { ParseError } from '../errors.js';

const MONTHS: Record<string, number> = {
  january: 1, february: 2, march: 3, april: 4,
  may: 5, june: 6, july: 7, august: 8,
  september: 9, october: 10, november: 11, december: 12,
};

/** Seasons start in September. */
const SEASON_START_MONTH = 9;

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * Calendar year of a date that only carries a month, inside the season that
 * starts in `season`. January and February belong to the playoffs, which cross
 * the new year.
 */
export function calendarYearFor(month: number, season: number): number {
  return month === 1 || month === 2 ? season + 1 : season;
}

/**
 * Parse a movement-table timestamp like "09/05 09:05PM" (no year) into
 * "YYYY-MM-DD HH:mm:ss". A missing time means midnight.
 */
export function parseQuoteTimestamp(raw: string, season: number): string {
  const match = raw
    .trim()
    .match(/^(\d{1,2})\/(\d{1,2})(?:\s+(\d{1,2}):(\d{2})\s*([AaPp][Mm])?)?$/);
  if (!match) throw new ParseError(`Unrecognised quote timestamp: ${JSON.stringify(raw)}`);

  const [, monthText = '', dayText = '', hourText = '0', minuteText = '0', meridiem] = match;
  const month = parseInt(monthText, 10);
  const day = parseInt(dayText, 10);
  let hour = parseInt(hourText, 10);
  const minute = parseInt(minuteText, 10);

  if (meridiem) {
    if (hour < 1 || hour > 12) throw new ParseError(`Bad 12-hour clock time: ${JSON.stringify(raw)}`);
    const pm = meridiem.toLowerCase() === 'pm';
    hour = (hour % 12) + (pm ? 12 : 0);
  }
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59) {
    throw new ParseError(`Out-of-range quote timestamp: ${JSON.stringify(raw)}`);
  }

  const year = calendarYearFor(month, season);
  return `${year}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)}:00`;
}

/** Parse a schedule date like "September 5" into "YYYY-MM-DD". */
export function parseScheduleDate(raw: string, season: number): string {
  const match = raw.trim().match(/^([A-Za-z]+)\s+(\d{1,2})$/);
  const month = match ? MONTHS[match[1]!.toLowerCase()] : undefined;
  if (!match || month === undefined) {
    throw new ParseError(`Unrecognised schedule date: ${JSON.stringify(raw)}`);
  }
  const day = parseInt(match[2]!, 10);
  if (day < 1 || day > 31) throw new ParseError(`Out-of-range schedule date: ${JSON.stringify(raw)}`);

  return `${calendarYearFor(month, season)}-${pad(month)}-${pad(day)}`;
}

/** The latest season that had started by `date`. */
export function latestSeasonBefore(date: Date): number {
  return date.getMonth() + 1 < SEASON_START_MONTH ? date.getFullYear() - 1 : date.getFullYear();
}
