// src/core/date/Rfc822Date.ts

import { DateGrammarError } from '../../utils/errors';
import type { FeedTimestamp } from './types';

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
  january: 1, february: 2, march: 3, april: 4, june: 6,
  july: 7, august: 8, september: 9, october: 10, november: 11, december: 12,
};

const DAY_NAMES = new Set([
  'mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun',
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday',
]);

// Offsets in minutes east of UTC
const NAMED_ZONES: Record<string, number> = {
  UT: 0, UTC: 0, GMT: 0, Z: 0,
  AST: -240, ADT: -180,
  EST: -300, EDT: -240,
  CST: -360, CDT: -300,
  MST: -420, MDT: -360,
  PST: -480, PDT: -420,
};

const INTEGER = /^[+-]?\d+$/;

/**
 * Parse an RFC 822 date-time string as used by RSS <pubDate> and <lastBuildDate>.
 *
 * Accepts the lenient variants seen in real feeds: an optional weekday,
 * swapped day/month tokens, RFC 850 `01-Jan-24` dates, two-digit years and
 * named US zones. A missing or unrecognised zone is read as UTC.
 *
 * @throws {DateGrammarError} If the text is empty or not an RFC 822 date
 *
 * @example
 * ```typescript
 * parseRfc822Date('Mon, 01 Jan 2024 00:00:00 GMT').date.toISOString();
 * // '2024-01-01T00:00:00.000Z'
 * ```
 */
export function parseRfc822Date(text: string): FeedTimestamp {
  if (!text || !text.trim()) {
    throw new DateGrammarError('RSS date strings must be non-empty', text);
  }

  const fail = (reason: string) =>
    new DateGrammarError(`Invalid RSS date string: ${JSON.stringify(text)} (${reason})`, text);

  let tokens = splitAttachedZone(expandRfc850Date(dropWeekday(text.trim().split(/\s+/))));
  if (tokens.length < 5) {
    throw fail('expected day, month, year, time and zone');
  }
  tokens = tokens.slice(0, 5);

  let [day, month, year, time, zone] = tokens;
  if (!day || !month || !year) {
    throw fail('missing date component');
  }

  let monthNumber = MONTHS[month.toLowerCase()];
  if (monthNumber === undefined) {
    [day, month] = [month, day];
    monthNumber = MONTHS[month.toLowerCase()];
    if (monthNumber === undefined) {
      throw fail(`unknown month "${month}"`);
    }
  }

  day = stripTrailingComma(day);
  if (year.indexOf(':') > 0) {
    [year, time] = [time, year];
  }
  year = stripTrailingComma(year);
  if (!year) {
    throw fail('missing year');
  }
  if (!/^\d/.test(year)) {
    [year, zone] = [zone, year];
  }

  const clock = splitClock(stripTrailingComma(time));
  if (!clock) {
    throw fail(`unreadable time "${time}"`);
  }

  const numbers = [year, day, ...clock].map((token) => (INTEGER.test(token) ? Number(token) : NaN));
  if (numbers.some(Number.isNaN)) {
    throw fail('non-numeric date component');
  }
  let [fullYear] = numbers;
  const [, dayOfMonth, hours, minutes, seconds] = numbers;
  if (fullYear < 100) {
    fullYear += fullYear > 68 ? 1900 : 2000;
  }

  if (fullYear < 1 || fullYear > 9999) throw fail('year out of range');
  if (dayOfMonth < 1 || dayOfMonth > daysInMonth(fullYear, monthNumber)) throw fail('day out of range');
  if (hours < 0 || hours > 23) throw fail('hour out of range');
  if (minutes < 0 || minutes > 59) throw fail('minute out of range');
  if (seconds < 0 || seconds > 59) throw fail('second out of range');

  const offset = parseZone(zone);
  const utcMillis = Date.UTC(fullYear, monthNumber - 1, dayOfMonth, hours, minutes, seconds);

  return {
    date: new Date(utcMillis - (offset ?? 0) * 60000),
    utcOffsetMinutes: offset ?? 0,
    zoneSpecified: offset !== undefined,
  };
}

/**
 * Parse an optional RSS date, returning `undefined` when there is no input.
 */
export function parseOptionalRfc822Date(text: string | null | undefined): FeedTimestamp | undefined {
  if (text === null || text === undefined) {
    return undefined;
  }
  return parseRfc822Date(text);
}

function dropWeekday(tokens: string[]): string[] {
  const [first, ...rest] = tokens;
  if (first.endsWith(',') || DAY_NAMES.has(first.toLowerCase())) {
    return rest;
  }
  const comma = first.lastIndexOf(',');
  if (comma >= 0) {
    return [first.slice(comma + 1), ...rest];
  }
  return tokens;
}

// "01-Jan-24 00:00:00 GMT"
function expandRfc850Date(tokens: string[]): string[] {
  if (tokens.length === 3) {
    const parts = tokens[0].split('-');
    if (parts.length === 3) {
      return [...parts, ...tokens.slice(1)];
    }
  }
  return tokens;
}

// "00:00:00+0100" or a missing zone
function splitAttachedZone(tokens: string[]): string[] {
  if (tokens.length !== 4) {
    return tokens;
  }
  const last = tokens[3];
  let sign = last.indexOf('+');
  if (sign === -1) {
    sign = last.indexOf('-');
  }
  if (sign > 0) {
    return [...tokens.slice(0, 3), last.slice(0, sign), last.slice(sign)];
  }
  return [...tokens, ''];
}

function splitClock(time: string): [string, string, string] | undefined {
  const parts = time.split(':');
  if (parts.length === 2) return [parts[0], parts[1], '0'];
  if (parts.length === 3) return [parts[0], parts[1], parts[2]];
  if (parts.length === 1 && time.includes('.')) {
    const dotted = time.split('.');
    if (dotted.length === 2) return [dotted[0], dotted[1], '0'];
    if (dotted.length === 3) return [dotted[0], dotted[1], dotted[2]];
  }
  return undefined;
}

/**
 * Offset in minutes, or `undefined` when the zone is absent, unknown or `-0000`.
 */
function parseZone(zone: string): number | undefined {
  const upper = zone.toUpperCase();
  const named = NAMED_ZONES[upper];
  if (named !== undefined) {
    return named;
  }
  if (!INTEGER.test(upper)) {
    return undefined;
  }
  const hhmm = Number(upper);
  if (hhmm === 0 && upper.startsWith('-')) {
    return undefined;
  }
  const magnitude = Math.abs(hhmm);
  const minutes = Math.floor(magnitude / 100) * 60 + (magnitude % 100);
  return hhmm < 0 ? -minutes : minutes;
}

function stripTrailingComma(token: string): string {
  return token.endsWith(',') ? token.slice(0, -1) : token;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}
