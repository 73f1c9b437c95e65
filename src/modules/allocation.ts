/**
 * Contribution allocation
 * Splits one payee's share of a bill month across the income events of the
 * funding month.
 */

import { compareYMD } from './dateUtils';
import { scheduleDescription } from './income';
import type { IncomeEvent, MonthRef, PaymentScheduleItem, PaySchedule, ShiftedPayment, YMDString } from '../types';

export const NO_INCOME_DESCRIPTION = "No income in previous month";

/**
 * Input for a single payee in a single bill month
 */
export interface AllocationInput {
  payeeName: string;
  /** Payee's share of the month's bills */
  responsibility: number;
  /** Income events found in the funding month */
  events: readonly IncomeEvent[];
  /** Funding-month payments pushed out of the month by weekend adjustment */
  shiftedPayments?: readonly ShiftedPayment[];
  /** Cutoff date of the bill month */
  cutoffDate: YMDString;
  billMonth: MonthRef;
}

const hasCustomPercentage = (schedule: PaySchedule): schedule is PaySchedule & { contributionPercentage: number } =>
  typeof schedule.contributionPercentage === "number" && Number.isFinite(schedule.contributionPercentage);

const createItem = (input: AllocationInput, event: IncomeEvent, requiredContribution: number): PaymentScheduleItem => {
  const { amount } = event.schedule;
  return {
    payeeName: input.payeeName,
    scheduleDescription: scheduleDescription(event.schedule),
    incomeAmount: amount,
    requiredContribution,
    contributionPercentage: amount > 0 ? (requiredContribution / amount) * 100 : 0,
    paymentDate: event.paymentDate,
    isBeforeCutoff: compareYMD(event.paymentDate, input.cutoffDate) <= 0,
    billMonth: input.billMonth,
  };
};

/**
 * Placeholder row for a payee without income in the funding month.
 */
export const createNoIncomeItem = (
  payeeName: string,
  responsibility: number,
  cutoffDate: YMDString,
  billMonth: MonthRef
): PaymentScheduleItem => ({
  payeeName,
  scheduleDescription: NO_INCOME_DESCRIPTION,
  incomeAmount: 0,
  requiredContribution: responsibility,
  contributionPercentage: 0,
  paymentDate: cutoffDate,
  isBeforeCutoff: false,
  billMonth,
});

/**
 * Share of the responsibility that would have been carried by payments the
 * weekend adjustment pushed out of the funding month.
 */
export function calculateWeekendShortfall(
  shiftedPayments: readonly ShiftedPayment[],
  responsibility: number,
  totalIncome: number
): number {
  let shortfall = 0;
  for (const { schedule } of shiftedPayments) {
    if (hasCustomPercentage(schedule)) {
      shortfall += responsibility * (schedule.contributionPercentage / 100);
    } else if (totalIncome > 0) {
      shortfall += responsibility * (schedule.amount / totalIncome);
    }
  }
  return shortfall;
}

/**
 * Split a payee's responsibility across their funding-month income events.
 *
 * Events with a custom percentage take that percentage of the responsibility
 * (declared percentages above 100 in total are scaled down to 100). The other
 * events share what is left in proportion to their income. Without any custom
 * percentage every event contributes in proportion to its income. Any weekend
 * shortfall is spread over all events by income.
 */
export function allocateContributions(input: AllocationInput): PaymentScheduleItem[] {
  const { payeeName, responsibility, events, cutoffDate, billMonth } = input;

  if (!events.length) {
    return [createNoIncomeItem(payeeName, responsibility, cutoffDate, billMonth)];
  }

  const totalIncome = events.reduce((sum, event) => sum + event.schedule.amount, 0);
  const shortfall = calculateWeekendShortfall(input.shiftedPayments ?? [], responsibility, totalIncome);
  const shortfallShare = (event: IncomeEvent): number =>
    shortfall > 0 && totalIncome > 0 ? shortfall * (event.schedule.amount / totalIncome) : 0;

  const customEvents = events.filter((event) => hasCustomPercentage(event.schedule));

  if (!customEvents.length) {
    return events.map((event) => {
      const contribution = totalIncome > 0
        ? responsibility * (event.schedule.amount / totalIncome) + shortfallShare(event)
        : 0;
      return createItem(input, event, contribution);
    });
  }

  const declaredTotal = customEvents.reduce((sum, event) => sum + (event.schedule.contributionPercentage ?? 0), 0);
  const effectivePercentage = (declared: number): number =>
    declaredTotal > 100 ? (declared / declaredTotal) * 100 : declared;

  const items: PaymentScheduleItem[] = [];
  let usedPercentage = 0;

  for (const event of customEvents) {
    const percentage = effectivePercentage(event.schedule.contributionPercentage ?? 0);
    const contribution = responsibility * (percentage / 100) + shortfallShare(event);
    usedPercentage += percentage;
    items.push(createItem(input, event, contribution));
  }

  const remainingEvents = events.filter((event) => !hasCustomPercentage(event.schedule));
  const remainingPercentage = declaredTotal >= 100 ? 0 : Math.max(0, 100 - usedPercentage);
  const remainingIncome = remainingEvents.reduce((sum, event) => sum + event.schedule.amount, 0);

  for (const event of remainingEvents) {
    let contribution = shortfallShare(event);
    if (remainingPercentage > 0 && remainingIncome > 0) {
      const streamPercentage = remainingPercentage * (event.schedule.amount / remainingIncome);
      contribution += responsibility * (streamPercentage / 100);
    }
    items.push(createItem(input, event, contribution));
  }

  return items;
}
