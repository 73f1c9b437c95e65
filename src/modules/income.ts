/**
 * Income enumeration
 * Finds the weekend-adjusted pay dates of a payee inside a date window
 */

import { addDays, compareYMD, isInMonth, monthBounds, rollWeekend } from './dateUtils';
import { describeRecurrence, MAX_OCCURRENCE_SCAN, nextDue, occurrencesBetween } from './recurrence';
import type { IncomeEvent, Payee, PaySchedule, ShiftedPayment, YMDString } from '../types';

/** Largest distance a weekend adjustment can move a date (Saturday -> Monday) */
const WEEKEND_SHIFT_MARGIN = 2;

/**
 * Label shown for an income stream.
 */
export const scheduleDescription = (schedule: PaySchedule): string =>
  schedule.description || `${schedule.recurrence.interval} payment`;

/**
 * Adjusted pay dates of one schedule falling inside [windowStart, windowEnd].
 * Raw occurrences just outside the window are inspected too, since a weekend
 * shift can carry them in.
 */
export function scheduleIncomeInWindow(
  schedule: PaySchedule,
  windowStart: YMDString,
  windowEnd: YMDString
): IncomeEvent[] {
  const events: IncomeEvent[] = [];
  const seen = new Set<YMDString>();
  const scanEnd = addDays(windowEnd, WEEKEND_SHIFT_MARGIN);
  let cursor = addDays(windowStart, -(WEEKEND_SHIFT_MARGIN + 1));

  for (let i = 0; i < MAX_OCCURRENCE_SCAN; i += 1) {
    const naturalDate = nextDue(schedule.recurrence, cursor);
    if (!naturalDate || compareYMD(naturalDate, scanEnd) > 0) return events;

    const paymentDate = rollWeekend(naturalDate, schedule.weekendAdjustment);
    const inWindow = compareYMD(paymentDate, windowStart) >= 0 && compareYMD(paymentDate, windowEnd) <= 0;
    if (inWindow && !seen.has(paymentDate)) {
      seen.add(paymentDate);
      events.push({ schedule, naturalDate, paymentDate });
    }
    cursor = naturalDate;
  }

  console.warn(
    `Stopped scanning income ${describeRecurrence(schedule.recurrence)} after ${MAX_OCCURRENCE_SCAN} occurrences between ${windowStart} and ${windowEnd}`
  );
  return events;
}

/**
 * All income events of a payee inside a window, schedule by schedule.
 */
export const incomeInWindow = (payee: Payee, windowStart: YMDString, windowEnd: YMDString): IncomeEvent[] =>
  payee.paySchedules.flatMap((schedule) => scheduleIncomeInWindow(schedule, windowStart, windowEnd));

/**
 * Income events of a payee inside a calendar month.
 */
export const incomeInMonth = (payee: Payee, month: number, year: number): IncomeEvent[] => {
  const { start, end } = monthBounds(month, year);
  return incomeInWindow(payee, start, end);
};

/**
 * Payments whose natural date falls in the month but whose weekend-adjusted
 * date lands outside it.
 */
export function detectShiftedPayments(payee: Payee, month: number, year: number): ShiftedPayment[] {
  const { start, end } = monthBounds(month, year);
  const shifted: ShiftedPayment[] = [];

  for (const schedule of payee.paySchedules) {
    for (const originalDate of occurrencesBetween(schedule.recurrence, start, end)) {
      const adjustedDate = rollWeekend(originalDate, schedule.weekendAdjustment);
      if (!isInMonth(adjustedDate, month, year)) {
        shifted.push({ schedule, originalDate, adjustedDate });
      }
    }
  }

  return shifted;
}
