/**
 * Match Time Parsing
 *
 * Converts "M/D" + "H:MMam/pm" input into an instant in the league time
 * zone. Dates carry no year: a date earlier than today (in the league
 * zone) means the next occurrence, so the year rolls forward.
 */

import { ValidationError } from '../models/errors';

const DATE_PATTERN = /^\s*(\d{1,2})\/(\d{1,2})\s*$/;
const TIME_PATTERN = /^\s*(\d{1,2}):(\d{2})\s*([ap]m)\s*$/i;

export const DATE_TIME_FORMAT_HINT = 'Use M/D and H:MMam/pm (e.g. 1/14 and 9:30pm).';

/**
 * Wall-clock fields of an instant in a time zone
 */
export interface ZonedParts {
  year: number;
  month: number;     // 1-12
  day: number;
  hour: number;      // 0-23
  minute: number;
  second: number;
  weekday: number;   // 0 = Sunday
}

const WEEKDAY_INDEX: Record<string, number> = {
  Sun: 0,
  Mon: 1,
  Tue: 2,
  Wed: 3,
  Thu: 4,
  Fri: 5,
  Sat: 6,
};

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric',
      weekday: 'short',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Wall-clock fields of `date` in `timeZone`
 */
export function zonedParts(date: Date, timeZone: string): ZonedParts {
  const parts: Record<string, string> = {};
  for (const part of formatterFor(timeZone).formatToParts(date)) {
    parts[part.type] = part.value;
  }

  return {
    year: parseInt(parts.year, 10),
    month: parseInt(parts.month, 10),
    day: parseInt(parts.day, 10),
    hour: parseInt(parts.hour, 10) % 24,
    minute: parseInt(parts.minute, 10),
    second: parseInt(parts.second, 10),
    weekday: WEEKDAY_INDEX[parts.weekday] ?? 0,
  };
}

/**
 * Offset of `timeZone` from UTC at an instant, in milliseconds
 */
function offsetAt(ms: number, timeZone: string): number {
  const wholeSeconds = Math.floor(ms / 1000) * 1000;
  const p = zonedParts(new Date(wholeSeconds), timeZone);
  return Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second) - wholeSeconds;
}

/**
 * Instant at which the wall clock in `timeZone` shows the given fields
 */
export function zonedTimeToUtc(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  timeZone: string
): Date {
  const wallClock = Date.UTC(year, month - 1, day, hour, minute);
  const firstOffset = offsetAt(wallClock, timeZone);
  let instant = wallClock - firstOffset;

  // Offset can differ on the other side of a DST change
  const secondOffset = offsetAt(instant, timeZone);
  if (secondOffset !== firstOffset) {
    instant = wallClock - secondOffset;
  }

  return new Date(instant);
}

/**
 * Calendar date of an instant in a time zone, as YYYY-MM-DD
 */
export function localDateKey(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone);
  return `${p.year}-${String(p.month).padStart(2, '0')}-${String(p.day).padStart(2, '0')}`;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function invalidInput(reason: string): ValidationError {
  return new ValidationError(`${reason} ${DATE_TIME_FORMAT_HINT}`, {
    date: 'M/D',
    time: 'H:MMam/pm',
  });
}

/**
 * Parse date and time tokens into an instant
 *
 * @param dateToken - "M/D"
 * @param timeToken - "H:MMam" or "H:MMpm"
 * @param timeZone - League time zone
 * @param now - Reference instant for the year rollover
 * @throws ValidationError naming the expected formats
 */
export function parseMatchDateTime(
  dateToken: string,
  timeToken: string,
  timeZone: string,
  now: Date = new Date()
): Date {
  const dateMatch = DATE_PATTERN.exec(dateToken);
  const timeMatch = TIME_PATTERN.exec(timeToken);
  if (!dateMatch || !timeMatch) {
    throw invalidInput('Invalid date or time format.');
  }

  const month = parseInt(dateMatch[1], 10);
  const day = parseInt(dateMatch[2], 10);
  let hour = parseInt(timeMatch[1], 10);
  const minute = parseInt(timeMatch[2], 10);
  const meridiem = timeMatch[3].toLowerCase();

  if (month < 1 || month > 12 || day < 1 || hour < 1 || hour > 12 || minute > 59) {
    throw invalidInput('Invalid date or time.');
  }

  if (meridiem === 'pm' && hour !== 12) {
    hour += 12;
  }
  if (meridiem === 'am' && hour === 12) {
    hour = 0;
  }

  const today = zonedParts(now, timeZone);
  let year = today.year;
  if (month < today.month || (month === today.month && day < today.day)) {
    year += 1;
  }

  if (day > daysInMonth(year, month)) {
    throw invalidInput(`${month}/${day} is not a date in ${year}.`);
  }

  return zonedTimeToUtc(year, month, day, hour, minute, timeZone);
}
