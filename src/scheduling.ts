/**
 * Calendar helpers for report buckets
 *
 * All bucket math happens in a configured IANA time zone rather than the
 * host's, so hour and day boundaries match what users see on their clocks.
 */

import type { ReportWindow } from "./types";

export const MS_PER_HOUR = 60 * 60 * 1000;

export interface LocalParts {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number; // 0-23
  minute: number;
  second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

// Wall-clock components of an instant in the given zone
export function getLocalParts(instant: number, timeZone: string): LocalParts {
  const parts = getFormatter(timeZone).formatToParts(new Date(instant));
  const read = (type: Intl.DateTimeFormatPartTypes): number => {
    const value = parts.find((part) => part.type === type)?.value ?? "0";
    return Number.parseInt(value, 10);
  };
  return {
    year: read("year"),
    month: read("month"),
    day: read("day"),
    // Some ICU builds still render midnight as "24"
    hour: read("hour") % 24,
    minute: read("minute"),
    second: read("second"),
  };
}

function getOffsetMs(instant: number, timeZone: string): number {
  const p = getLocalParts(instant, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const truncated = instant - (((instant % 1000) + 1000) % 1000);
  return asUtc - truncated;
}

/**
 * Instant at which the zone's wall clock shows the given time.
 * Out-of-range components roll over (day 32 becomes the 1st of next month).
 */
export function zonedTime(
  timeZone: string,
  year: number,
  month: number,
  day: number,
  hour = 0,
): number {
  const baseUtc = Date.UTC(year, month - 1, day, hour);
  const offset = getOffsetMs(baseUtc, timeZone);
  const candidate = baseUtc - offset;
  // Re-check across an offset change (DST transition between guess and result)
  const nextOffset = getOffsetMs(candidate, timeZone);
  return nextOffset === offset ? candidate : baseUtc - nextOffset;
}

const pad = (value: number): string => String(value).padStart(2, "0");

// Calendar date key, e.g. "2026-10-19"
export function dateKey(instant: number, timeZone: string): string {
  const p = getLocalParts(instant, timeZone);
  return `${p.year}-${pad(p.month)}-${pad(p.day)}`;
}

/**
 * Start of the local hour containing `instant`, never later than it.
 * Walking back from the instant keeps the repeated hour of a fall-back
 * transition on the occurrence the instant is in.
 */
export function startOfHour(instant: number, timeZone: string): number {
  const p = getLocalParts(instant, timeZone);
  const millis = ((instant % 1000) + 1000) % 1000;
  return instant - p.minute * 60_000 - p.second * 1000 - millis;
}

// Hour bucket key: the UTC instant the local hour starts at, e.g. "2026-10-19T14:00:00.000Z"
export function hourBucket(instant: number, timeZone: string): string {
  return new Date(startOfHour(instant, timeZone)).toISOString();
}

export function startOfDay(instant: number, timeZone: string): number {
  const p = getLocalParts(instant, timeZone);
  return zonedTime(timeZone, p.year, p.month, p.day);
}

export function startOfNextDay(instant: number, timeZone: string): number {
  const p = getLocalParts(instant, timeZone);
  return zonedTime(timeZone, p.year, p.month, p.day + 1);
}

function parseDateKey(key: string): { year: number; month: number; day: number } {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(key);
  if (!match) {
    throw new Error(`Invalid date key: ${key}`);
  }
  return {
    year: Number.parseInt(match[1], 10),
    month: Number.parseInt(match[2], 10),
    day: Number.parseInt(match[3], 10),
  };
}

// Hourly window for the hour that ended at the start of `instant`'s hour
export function previousHourWindow(instant: number, timeZone: string): ReportWindow {
  const end = startOfHour(instant, timeZone);
  const start = startOfHour(end - 1, timeZone);
  return {
    kind: "hourly",
    start,
    end,
    label: pad(getLocalParts(start, timeZone).hour),
  };
}

// Daily window spanning one full calendar day
export function dailyWindow(key: string, timeZone: string): ReportWindow {
  const { year, month, day } = parseDateKey(key);
  return {
    kind: "daily",
    start: zonedTime(timeZone, year, month, day),
    end: zonedTime(timeZone, year, month, day + 1),
    label: key,
  };
}

/**
 * Calendar day closed by the most recent daily cutoff at or before `instant`.
 *
 * With a cutoff of 23 the report for a day fires at 23:00 that same day;
 * a cutoff of 0 closes the previous day at midnight.
 */
export function reportDayForCutoff(instant: number, timeZone: string, cutoffHour: number): string {
  const p = getLocalParts(instant, timeZone);
  const dayOffset = p.hour >= cutoffHour ? 0 : -1;
  const cutoff = zonedTime(timeZone, p.year, p.month, p.day + dayOffset, cutoffHour);
  return dateKey(cutoff - 1, timeZone);
}

// Every calendar date overlapped by [start, end)
export function dateKeysInRange(start: number, end: number, timeZone: string): string[] {
  const keys: string[] = [];
  let cursor = start;
  while (cursor < end) {
    keys.push(dateKey(cursor, timeZone));
    cursor = startOfNextDay(cursor, timeZone);
  }
  return keys;
}

export function formatClock(instant: number, timeZone: string): string {
  const p = getLocalParts(instant, timeZone);
  return `${pad(p.hour)}:${pad(p.minute)}`;
}
