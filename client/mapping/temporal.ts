/** A day on the school calendar. No time of day, no zone. */
export type CalendarDate = {
  readonly year: number;
  readonly month: number; // 1-12
  readonly day: number;
};

/**
 * Wall-clock date-time as the API sent it.
 * `offsetMinutes` is present only when the payload carried a UTC offset;
 * `timeZone` is the school's configured zone, when the caller supplied one.
 */
export type SchoolDateTime = {
  readonly date: CalendarDate;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly millisecond: number;
  readonly offsetMinutes?: number;
  readonly timeZone?: string;
};

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_PATTERN =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

const isLeapYear = (year: number) => (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31;
}

// Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear takes them as given
function utcMs(year: number, month: number, day: number, hour = 0, minute = 0, second = 0, millisecond = 0): number {
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  return d.setUTCHours(hour, minute, second, millisecond);
}

export function parseCalendarDate(text: string): CalendarDate | undefined {
  const m = DATE_PATTERN.exec(text);
  if (!m) return undefined;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (month < 1 || month > 12 || day < 1) return undefined;
  return day <= daysInMonth(year, month) ? { year, month, day } : undefined;
}

function parseOffset(text: string): number {
  if (text.toUpperCase() === "Z") return 0;
  const sign = text.startsWith("-") ? -1 : 1;
  const digits = text.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  // "-00:00" is UTC, not -0
  return sign * (hours * 60 + minutes) || 0;
}

export function parseSchoolDateTime(text: string, timeZone?: string): SchoolDateTime | undefined {
  const m = DATETIME_PATTERN.exec(text.trim());
  if (!m) return undefined;
  const date = parseCalendarDate(m[1] ?? "");
  const hour = Number(m[2]);
  const minute = Number(m[3]);
  const second = m[4] ? Number(m[4]) : 0;
  if (!date || hour > 23 || minute > 59 || second > 59) return undefined;
  const millisecond = m[5] ? Number(m[5].slice(0, 3).padEnd(3, "0")) : 0;
  return {
    date,
    hour,
    minute,
    second,
    millisecond,
    ...(m[6] ? { offsetMinutes: parseOffset(m[6]) } : {}),
    ...(timeZone ? { timeZone } : {}),
  };
}

/** Midnight of a calendar day, for payloads that send a bare date where a timestamp belongs. */
export function startOfDay(date: CalendarDate, timeZone?: string): SchoolDateTime {
  return { date, hour: 0, minute: 0, second: 0, millisecond: 0, ...(timeZone ? { timeZone } : {}) };
}

export function formatCalendarDate(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

function formatOffset(minutes: number): string {
  if (minutes === 0) return "Z";
  const abs = Math.abs(minutes);
  return `${minutes < 0 ? "-" : "+"}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

export function formatSchoolDateTime(value: SchoolDateTime): string {
  const time = `${pad(value.hour)}:${pad(value.minute)}:${pad(value.second)}.${pad(value.millisecond, 3)}`;
  const offset = value.offsetMinutes === undefined ? "" : formatOffset(value.offsetMinutes);
  return `${formatCalendarDate(value.date)}T${time}${offset}`;
}

export function isTimeZone(name: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: name });
    return true;
  } catch {
    return false;
  }
}

function zoneOffsetMinutes(epochMs: number, timeZone: string): number {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hourCycle: "h23",
    year: "numeric",
    month: "numeric",
    day: "numeric",
    hour: "numeric",
    minute: "numeric",
    second: "numeric",
    era: "short",
  }).formatToParts(new Date(epochMs));
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "0";
  const yearOfEra = Number(part("year"));
  const year = part("era") === "BC" ? 1 - yearOfEra : yearOfEra;
  const field = (type: Intl.DateTimeFormatPartTypes) => Number(part(type));
  const asUtc = utcMs(year, field("month"), field("day"), field("hour"), field("minute"), field("second"));
  return Math.round((asUtc - Math.floor(epochMs / 1000) * 1000) / 60_000);
}

/**
 * The instant a school date-time denotes. Uses the payload's own offset when it had one,
 * else the school's zone. Naive values (neither) have no instant.
 */
export function toInstant(value: SchoolDateTime): Date | undefined {
  const { date } = value;
  const wall = utcMs(date.year, date.month, date.day, value.hour, value.minute, value.second, value.millisecond);
  if (value.offsetMinutes !== undefined) return new Date(wall - value.offsetMinutes * 60_000);
  if (!value.timeZone || !isTimeZone(value.timeZone)) return undefined;
  // second pass settles wall times that sit next to a DST transition
  const guess = wall - zoneOffsetMinutes(wall, value.timeZone) * 60_000;
  return new Date(wall - zoneOffsetMinutes(guess, value.timeZone) * 60_000);
}
