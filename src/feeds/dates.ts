/**
 * Quire — Feed Date Parsing
 *
 * Publication dates arrive in whatever layout the publisher chose.
 * parseFeedDate() tries, in order:
 *   1. RFC 2822 (the RSS convention)
 *   2. RFC 3339 (the Atom convention)
 *   3. a few alternate layouts, each with or without an explicit offset
 * and normalizes the result to UTC.
 */

import { DateParseError } from '../lib/errors';

interface DateParts {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
  offsetMinutes: number;
}

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

// RFC 2822 §4.3 obsolete zones
const ZONE_OFFSETS: Record<string, number> = {
  UT: 0,
  UTC: 0,
  GMT: 0,
  Z: 0,
  EST: -5 * 60,
  EDT: -4 * 60,
  CST: -6 * 60,
  CDT: -5 * 60,
  MST: -7 * 60,
  MDT: -6 * 60,
  PST: -8 * 60,
  PDT: -7 * 60,
};

const DAY = String.raw`(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun)`;
const MON = String.raw`(?<mon>[A-Za-z]{3})`;
const TIME = String.raw`(?<hour>\d{2}):(?<minute>\d{2}):(?<second>\d{2})`;
const FRACTION = String.raw`(?:\.(?<fraction>\d+))?`;
const OPTIONAL_ZONE = String.raw`(?:\s*(?<zone>[Zz]|[+-]\d{2}:?\d{2}))?`;

const RFC2822 = new RegExp(
  String.raw`^(?:${DAY},\s*)?(?<day>\d{1,2})\s+${MON}\s+(?<year>\d{4}|\d{2})\s+` +
    String.raw`(?<hour>\d{2}):(?<minute>\d{2})(?::(?<second>\d{2}))?\s+(?<zone>[+-]\d{4}|[A-Za-z]{1,3})$`,
  'i'
);

const RFC3339 = new RegExp(
  String.raw`^(?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2})[Tt ]${TIME}${FRACTION}(?<zone>[Zz]|[+-]\d{2}:\d{2})$`
);

// Each accepts an explicit offset or none (UTC)
const ALTERNATE_LAYOUTS = [
  new RegExp(String.raw`^(?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2})T${TIME}${FRACTION}${OPTIONAL_ZONE}$`),
  new RegExp(String.raw`^(?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2}) ${TIME}${OPTIONAL_ZONE}$`),
  new RegExp(String.raw`^(?<day>\d{1,2}) ${MON} (?<year>\d{4}) ${TIME}${OPTIONAL_ZONE}$`, 'i'),
  new RegExp(String.raw`^${DAY}, (?<day>\d{1,2}) ${MON} (?<year>\d{4}) ${TIME}${OPTIONAL_ZONE}$`, 'i'),
];

const LAYOUTS: RegExp[] = [RFC2822, RFC3339, ...ALTERNATE_LAYOUTS];

function parseZone(zone: string | undefined): number | undefined {
  if (zone === undefined) return 0;

  const named = ZONE_OFFSETS[zone.toUpperCase()];
  if (named !== undefined) return named;

  const match = /^([+-])(\d{2}):?(\d{2})$/.exec(zone);
  if (!match) return undefined;

  const [, sign, hh, mm] = match;
  const hours = parseInt(hh, 10);
  const minutes = parseInt(mm, 10);
  if (hours > 23 || minutes > 59) return undefined;

  const total = hours * 60 + minutes;
  return sign === '-' ? -total : total;
}

function parseYear(year: string): number {
  const value = parseInt(year, 10);
  if (year.length === 4) return value;
  // Two-digit years, RFC 2822 §4.3
  return value < 50 ? 2000 + value : 1900 + value;
}

function parseMonth(groups: Record<string, string | undefined>): number | undefined {
  if (groups.month !== undefined) return parseInt(groups.month, 10);
  if (groups.mon === undefined) return undefined;

  const index = MONTHS.indexOf(groups.mon.toLowerCase());
  return index === -1 ? undefined : index + 1;
}

function toParts(groups: Record<string, string | undefined>): DateParts | undefined {
  const { year, day, hour, minute, second, fraction, zone } = groups;
  if (year === undefined || day === undefined || hour === undefined || minute === undefined) {
    return undefined;
  }

  const month = parseMonth(groups);
  const offsetMinutes = parseZone(zone);
  if (month === undefined || offsetMinutes === undefined) return undefined;

  return {
    year: parseYear(year),
    month,
    day: parseInt(day, 10),
    hour: parseInt(hour, 10),
    minute: parseInt(minute, 10),
    second: second === undefined ? 0 : parseInt(second, 10),
    millisecond: fraction === undefined ? 0 : parseInt(fraction.padEnd(3, '0').slice(0, 3), 10),
    offsetMinutes,
  };
}

function toDate(parts: DateParts): Date | undefined {
  const { year, month, day, hour, minute, second, millisecond, offsetMinutes } = parts;

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 60) {
    return undefined;
  }

  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day < 1 || day > daysInMonth) return undefined;

  // Leap seconds are folded into the next minute
  const utcMillis =
    Date.UTC(year, month - 1, day, hour, minute, second, millisecond) - offsetMinutes * 60_000;

  return new Date(utcMillis);
}

function parseWith(layout: RegExp, value: string): Date | undefined {
  const match = layout.exec(value);
  if (!match?.groups) return undefined;

  const parts = toParts(match.groups);
  return parts ? toDate(parts) : undefined;
}

/**
 * Parse a feed date, or return undefined when no layout matches.
 */
export function tryParseFeedDate(value: string): Date | undefined {
  const trimmed = value.trim();
  if (!trimmed) return undefined;

  for (const layout of LAYOUTS) {
    const date = parseWith(layout, trimmed);
    if (date) return date;
  }

  return undefined;
}

/**
 * Parse a feed date.
 *
 * @throws DateParseError when every layout fails
 */
export function parseFeedDate(value: string): Date {
  const date = tryParseFeedDate(value);
  if (!date) {
    throw new DateParseError(value);
  }
  return date;
}
