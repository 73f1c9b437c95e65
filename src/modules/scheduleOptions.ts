import { fromYMD, makeYMD, normalizeMonth, rollWeekend, todayYMD } from './dateUtils';
import type { ScheduleOptions, YMDString } from '../types';

export const DEFAULT_CUTOFF_DAY = 28;
export const DEFAULT_PROJECTION_MONTHS = 12;

/**
 * Produce the default scheduling configuration.
 */
export const defaultScheduleOptions = (): ScheduleOptions => ({
  cutoffDay: DEFAULT_CUTOFF_DAY,
  weekendAdjustment: "last_working_day",
  defaultProjectionMonths: DEFAULT_PROJECTION_MONTHS,
});

/**
 * Cutoff date for a month: the cutoff day clamped to the month's length,
 * then moved off the weekend.
 */
export const getCutoffDate = (options: ScheduleOptions, month: number, year: number): YMDString =>
  rollWeekend(makeYMD(year, month, options.cutoffDay), options.weekendAdjustment);

/**
 * Cutoff date of the month containing the reference date.
 */
export const getCurrentMonthCutoff = (options: ScheduleOptions, reference: YMDString = todayYMD()): YMDString => {
  const ref = fromYMD(reference);
  return getCutoffDate(options, ref.getMonth() + 1, ref.getFullYear());
};

/**
 * Cutoff date of the month after the reference date.
 */
export const getNextMonthCutoff = (options: ScheduleOptions, reference: YMDString = todayYMD()): YMDString => {
  const ref = fromYMD(reference);
  const next = normalizeMonth(ref.getMonth() + 2, ref.getFullYear());
  return getCutoffDate(options, next.month, next.year);
};
