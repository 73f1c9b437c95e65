/**
 * Recurrence engine
 * Computes the next occurrence of interval- and calendar-based rules
 */

import { addDays, addMonthsClamped, compareYMD, daysBetween, todayYMD } from './dateUtils';
import type { Recurrence, RecurrenceUnit, YMDString } from '../types';

/** Upper bound on occurrences inspected by a single window scan */
export const MAX_OCCURRENCE_SCAN = 50;

/**
 * Day counts for interval rules. Quarters and years are fixed-length
 * approximations (91 and 365 days), not calendar-exact.
 */
const INTERVAL_DAYS: Partial<Record<RecurrenceUnit, number>> = {
  daily: 1,
  weekly: 7,
  quarterly: 91,
  yearly: 365,
};

/** Month step of one unit for calendar rules */
const CALENDAR_MONTHS: Record<RecurrenceUnit, number> = {
  daily: 1,
  weekly: 1,
  monthly: 1,
  quarterly: 3,
  yearly: 12,
};

/**
 * Human readable label used in log lines.
 */
export const describeRecurrence = (recurrence: Recurrence): string => {
  const every = recurrence.every ?? 1;
  const unit = every === 1 ? recurrence.interval : `${every} x ${recurrence.interval}`;
  return `${recurrence.kind}/${unit} from ${recurrence.start}`;
};

/**
 * Resolve the `every` multiplier, or null when the rule cannot advance.
 */
const resolveEvery = (recurrence: Recurrence): number | null => {
  const raw = recurrence.every ?? 1;
  if (!Number.isFinite(raw)) return null;
  const every = Math.trunc(raw);
  return every >= 1 ? every : null;
};

const monthIndex = (ymd: YMDString): number => {
  const [year, month] = ymd.split("-").map(Number);
  return year * 12 + (month - 1);
};

/**
 * First occurrence of a fixed-day-count rule strictly after `after`.
 */
const nextByDays = (start: YMDString, stepDays: number, after: YMDString): YMDString => {
  const elapsed = daysBetween(start, after);
  const steps = Math.floor(elapsed / stepDays) + 1;
  return addDays(start, steps * stepDays);
};

/**
 * First occurrence of a month-stepping rule strictly after `after`.
 * Occurrence k is derived from `start` directly so clamping never accumulates.
 */
const nextByMonths = (start: YMDString, stepMonths: number, after: YMDString): YMDString | null => {
  const startDay = Number(start.split("-")[2]);
  const monthsElapsed = monthIndex(after) - monthIndex(start);
  let k = Math.max(1, Math.floor(monthsElapsed / stepMonths));

  for (let guard = 0; guard < MAX_OCCURRENCE_SCAN; guard += 1) {
    const candidate = addMonthsClamped(start, k * stepMonths, startDay);
    if (compareYMD(candidate, after) > 0) return candidate;
    k += 1;
  }
  return null;
};

/**
 * Calculate the next occurrence after a given date, respecting the end date.
 * When `after` precedes the start, the start itself is the next occurrence.
 * @param after - Reference date; defaults to today.
 * @returns The next occurrence, or null once the rule is exhausted.
 */
export function nextDue(recurrence: Recurrence, after?: YMDString | null): YMDString | null {
  const { start, end } = recurrence;
  if (!start) return null;

  const every = resolveEvery(recurrence);
  if (every === null) {
    console.warn(`Recurrence ${describeRecurrence(recurrence)} has a non-positive step; treating it as exhausted`);
    return null;
  }

  const base = after || todayYMD();
  let candidate: YMDString | null;

  if (compareYMD(base, start) < 0) {
    candidate = start;
  } else if (recurrence.kind === "interval") {
    if (recurrence.interval === "monthly") {
      candidate = nextByMonths(start, every, base);
    } else {
      const unitDays = INTERVAL_DAYS[recurrence.interval];
      if (unitDays === undefined) return null;
      candidate = nextByDays(start, unitDays * every, base);
    }
  } else if (recurrence.kind === "calendar") {
    const unitMonths = CALENDAR_MONTHS[recurrence.interval] ?? 1;
    candidate = nextByMonths(start, unitMonths * every, base);
  } else {
    return null;
  }

  if (!candidate) return null;
  if (end && compareYMD(candidate, end) > 0) return null;
  return candidate;
}

/**
 * Enumerate raw occurrences falling inside [from, to].
 * Logs a warning if the scan cap is hit while still inside the window.
 */
export function occurrencesBetween(
  recurrence: Recurrence,
  from: YMDString,
  to: YMDString,
  limit: number = MAX_OCCURRENCE_SCAN
): YMDString[] {
  const dates: YMDString[] = [];
  let cursor = addDays(from, -1);

  for (let i = 0; i < limit; i += 1) {
    const next = nextDue(recurrence, cursor);
    if (!next || compareYMD(next, to) > 0) return dates;
    if (compareYMD(next, from) >= 0) dates.push(next);
    cursor = next;
  }

  console.warn(
    `Stopped scanning ${describeRecurrence(recurrence)} after ${limit} occurrences between ${from} and ${to}`
  );
  return dates;
}
