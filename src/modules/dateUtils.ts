import type { MonthRef, WeekendAdjustmentStrategy, YMDString } from '../types';

const MS_PER_DAY = 86400000;

/**
 * Pad a number with a leading zero when needed.
 */
const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * Convert a Date instance into a YYYY-MM-DD string.
 */
export const toYMD = (date: Date): YMDString =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

/**
 * Convert a YYYY-MM-DD string into a Date instance.
 */
export const fromYMD = (value: string): Date => {
  const [year, month, day] = String(value || "").split("-").map(Number);
  return new Date(year, (month || 1) - 1, day || 1);
};

/**
 * Compare two YYYY-MM-DD strings lexicographically.
 * @returns Negative if a < b, positive if a > b, otherwise 0.
 */
export const compareYMD = (a: string, b: string): number =>
  String(a || "").localeCompare(String(b || ""));

/**
 * Number of days in a month (month is 1-based).
 */
export const daysInMonth = (year: number, month: number): number =>
  new Date(year, month, 0).getDate();

/**
 * Build a date string, clamping the day to the last valid day of the month.
 */
export const makeYMD = (year: number, month: number, day: number): YMDString => {
  const clamped = Math.min(Math.max(1, day), daysInMonth(year, month));
  return `${year}-${pad(month)}-${pad(clamped)}`;
};

/**
 * Add days to a YYYY-MM-DD string.
 */
export const addDays = (ymd: YMDString, days: number = 0): YMDString => {
  if (!ymd || typeof ymd !== "string") return ymd;
  const delta = Number(days || 0);
  if (!Number.isFinite(delta)) return ymd;
  const date = fromYMD(ymd);
  if (Number.isNaN(date.getTime())) return ymd;
  date.setDate(date.getDate() + delta);
  return toYMD(date);
};

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export const daysBetween = (from: YMDString, to: YMDString): number => {
  const [fy, fm, fd] = from.split("-").map(Number);
  const [ty, tm, td] = to.split("-").map(Number);
  return Math.round((Date.UTC(ty, tm - 1, td) - Date.UTC(fy, fm - 1, fd)) / MS_PER_DAY);
};

/**
 * Move a date by whole months, re-deriving the day from `dayOfMonth` and
 * clamping it to the target month's length.
 */
export const addMonthsClamped = (ymd: YMDString, months: number, dayOfMonth?: number): YMDString => {
  const [year, month, day] = ymd.split("-").map(Number);
  const index = year * 12 + (month - 1) + months;
  const targetYear = Math.floor(index / 12);
  const targetMonth = index - targetYear * 12 + 1;
  return makeYMD(targetYear, targetMonth, dayOfMonth ?? day);
};

/**
 * Determine if a date string falls on a weekend.
 */
export const isWeekend = (ymd: YMDString): boolean => {
  if (!ymd || typeof ymd !== "string") return false;
  const date = fromYMD(ymd);
  if (Number.isNaN(date.getTime())) return false;
  const day = date.getDay();
  return day === 0 || day === 6;
};

/**
 * Move a weekend date to the adjacent business day.
 * Saturday/Sunday go back to Friday or forward to Monday; weekdays pass through.
 */
export const rollWeekend = (
  ymd: YMDString,
  strategy: WeekendAdjustmentStrategy = "last_working_day"
): YMDString => {
  if (!ymd || typeof ymd !== "string") return ymd;
  const date = fromYMD(ymd);
  if (Number.isNaN(date.getTime())) return ymd;

  const day = date.getDay();
  if (day !== 0 && day !== 6) return ymd;

  if (strategy === "next_working_day") {
    return addDays(ymd, day === 6 ? 2 : 1);
  }
  return addDays(ymd, day === 6 ? -1 : -2);
};

/**
 * Resolve month/year rollover, e.g. month 13 of 2024 is January 2025.
 */
export const normalizeMonth = (month: number, year: number): MonthRef => {
  const index = year * 12 + (month - 1);
  const normalizedYear = Math.floor(index / 12);
  return { month: index - normalizedYear * 12 + 1, year: normalizedYear };
};

/**
 * First and last day of a month.
 */
export const monthBounds = (month: number, year: number): { start: YMDString; end: YMDString } => ({
  start: makeYMD(year, month, 1),
  end: makeYMD(year, month, daysInMonth(year, month)),
});

/**
 * Month containing a date string.
 */
export const monthOf = (ymd: YMDString): MonthRef => {
  const [year, month] = ymd.split("-").map(Number);
  return { month, year };
};

/**
 * Whether a date string falls inside a month.
 */
export const isInMonth = (ymd: YMDString, month: number, year: number): boolean => {
  const ref = monthOf(ymd);
  return ref.month === month && ref.year === year;
};

/**
 * Whether month `a` comes strictly before month `b`.
 */
export const isMonthBefore = (a: MonthRef, b: MonthRef): boolean =>
  a.year < b.year || (a.year === b.year && a.month < b.month);

/**
 * Resolve today's date in YYYY-MM-DD format.
 */
export const todayYMD = (): YMDString => toYMD(new Date());
