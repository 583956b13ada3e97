import type { ClockTime, MarketSession } from "../types.js";

/**
 * Trading-session arithmetic on top of the runtime's IANA timezone database
 * (`Intl.DateTimeFormat`). Every function here is a pure mapping of its
 * arguments; nothing reads the system clock or the host timezone.
 */

export interface ZonedDateTime {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

export function parseClockTime(value: string): ClockTime | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

export function formatClockTime(time: ClockTime): string {
  return `${String(time.hour).padStart(2, "0")}:${String(time.minute).padStart(2, "0")}`;
}

/** Wall-clock fields of `instant` as seen in `timeZone`. */
export function zonedDateParts(instant: Date, timeZone: string): ZonedDateTime {
  const fields: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    if (part.type !== "literal") fields[part.type] = Number(part.value);
  }
  return {
    year: fields.year ?? NaN,
    month: fields.month ?? NaN,
    day: fields.day ?? NaN,
    hour: (fields.hour ?? NaN) % 24,
    minute: fields.minute ?? NaN,
    second: fields.second ?? NaN,
  };
}

/** Local-minus-UTC offset in milliseconds that `timeZone` applies at `epochMs`. */
function offsetAt(epochMs: number, timeZone: string): number {
  const wholeSecond = Math.floor(epochMs / 1000) * 1000;
  const p = zonedDateParts(new Date(wholeSecond), timeZone);
  return Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second) - wholeSecond;
}

/**
 * The UTC instant at which `timeZone` shows the given wall-clock time.
 * A time inside a DST gap moves forward by the gap length; a time that
 * occurs twice in a DST overlap resolves to the earlier instant.
 */
export function zonedTimeToUtc(local: ZonedDateTime, timeZone: string): Date {
  const asUtc = Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute, local.second);

  const offsets = new Set([
    offsetAt(asUtc - DAY_MS, timeZone),
    offsetAt(asUtc, timeZone),
    offsetAt(asUtc + DAY_MS, timeZone),
  ]);
  const matches = [...offsets]
    .map((offset) => asUtc - offset)
    .filter((candidate) => offsetAt(candidate, timeZone) === asUtc - candidate)
    .sort((a, b) => a - b);

  if (matches.length > 0) return new Date(matches[0]);
  return new Date(asUtc - offsetAt(asUtc - DAY_MS, timeZone));
}

function shiftDate(parts: ZonedDateTime, days: number): Pick<ZonedDateTime, "year" | "month" | "day"> {
  const shifted = new Date(Date.UTC(parts.year, parts.month - 1, parts.day + days));
  return { year: shifted.getUTCFullYear(), month: shifted.getUTCMonth() + 1, day: shifted.getUTCDate() };
}

function secondsIntoDay(parts: Pick<ZonedDateTime, "hour" | "minute" | "second">): number {
  return parts.hour * 3600 + parts.minute * 60 + parts.second;
}

function sessionStartParts(now: Date, timeZone: string, open: ClockTime): ZonedDateTime {
  const local = zonedDateParts(now, timeZone);
  const openSeconds = secondsIntoDay({ ...open, second: 0 });
  const date = secondsIntoDay(local) < openSeconds ? shiftDate(local, -1) : local;
  return { year: date.year, month: date.month, day: date.day, hour: open.hour, minute: open.minute, second: 0 };
}

/**
 * Start of the trading session `now` belongs to: today's open in
 * `timeZone`, or yesterday's when the local time is still before the open.
 */
export function resolveSessionStart(now: Date, timeZone: string, open: ClockTime): Date {
  return zonedTimeToUtc(sessionStartParts(now, timeZone, open), timeZone);
}

function isoDate(p: Pick<ZonedDateTime, "year" | "month" | "day">): string {
  return `${p.year}-${String(p.month).padStart(2, "0")}-${String(p.day).padStart(2, "0")}`;
}

/** Calendar date (YYYY-MM-DD) of `instant` in `timeZone`. */
export function localDate(instant: Date, timeZone: string): string {
  return isoDate(zonedDateParts(instant, timeZone));
}

/** Exchange-local calendar date (YYYY-MM-DD) of the session `now` belongs to. */
export function sessionDate(now: Date, timeZone: string, open: ClockTime): string {
  return isoDate(sessionStartParts(now, timeZone, open));
}

export function isWithinMarketHours(now: Date, session: MarketSession): boolean {
  const seconds = secondsIntoDay(zonedDateParts(now, session.timeZone));
  return (
    seconds >= secondsIntoDay({ ...session.open, second: 0 }) &&
    seconds <= secondsIntoDay({ ...session.close, second: 0 })
  );
}

/** "2024-07-16 09:30" in the given zone. */
export function formatInZone(instant: Date, timeZone: string): string {
  const p = zonedDateParts(instant, timeZone);
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${p.year}-${pad(p.month)}-${pad(p.day)} ${pad(p.hour)}:${pad(p.minute)}`;
}
