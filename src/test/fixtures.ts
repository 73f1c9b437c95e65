/**
 * Builders shared by the test suites
 */

import { defaultState } from '../modules/validation';
import type {
  Bill,
  BillShare,
  HouseholdState,
  Payee,
  PaySchedule,
  Recurrence,
  WeekendAdjustmentStrategy,
  YMDString,
} from '../types';

export const monthlyOn = (start: YMDString): Recurrence => ({
  kind: 'calendar',
  interval: 'monthly',
  every: 1,
  start,
});

export const weeklyFrom = (start: YMDString, every = 1): Recurrence => ({
  kind: 'interval',
  interval: 'weekly',
  every,
  start,
});

export const makeBill = (
  name: string,
  amount: number,
  recurrence: Recurrence = monthlyOn('2024-01-01'),
  share: Partial<BillShare> = {}
): Bill => ({
  name,
  priceHistory: [{ amount, recurrence, startDate: recurrence.start }],
  share: { exclude: share.exclude ?? [], custom: share.custom ?? {} },
});

export const makeSchedule = (
  amount: number,
  recurrence: Recurrence,
  options: {
    description?: string;
    weekendAdjustment?: WeekendAdjustmentStrategy;
    contributionPercentage?: number | null;
  } = {}
): PaySchedule => ({
  amount,
  recurrence,
  description: options.description,
  weekendAdjustment: options.weekendAdjustment ?? 'last_working_day',
  contributionPercentage: options.contributionPercentage ?? null,
});

export const makePayee = (
  name: string,
  paySchedules: PaySchedule[],
  options: { startDate?: YMDString | null; defaultSharePercentage?: number | null } = {}
): Payee => ({
  name,
  startDate: options.startDate ?? null,
  defaultSharePercentage: options.defaultSharePercentage ?? null,
  paySchedules,
});

export const makeState = (bills: Bill[], payees: Payee[]): HouseholdState => ({
  ...defaultState(),
  bills,
  payees,
});
