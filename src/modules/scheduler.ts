/**
 * Cash-flow scheduler
 * Walks the projection window month by month: totals the bills due, splits
 * them per payee and allocates each payee's share over the income received
 * in the preceding (funding) month.
 */

import { allocateContributions } from './allocation';
import { billOccurrencesInMonth, computeMonthShares } from './bills';
import { isMonthBefore, monthOf, normalizeMonth } from './dateUtils';
import { detectShiftedPayments, incomeInMonth, scheduleDescription } from './income';
import { getCutoffDate } from './scheduleOptions';
import type {
  BillDue,
  HouseholdState,
  MonthlyBillTotal,
  MonthRef,
  Payee,
  PaymentScheduleItem,
  PaymentScheduleResult,
  SchedulerOptions,
  WeekendAdjustment,
} from '../types';

/**
 * Bills due in a month and how they split per payee
 */
export interface MonthlyBillBreakdown {
  totalBills: number;
  billsDue: BillDue[];
  /** Payee name -> amount owed for the month */
  responsibilities: Map<string, number>;
}

/**
 * Whether a payee takes part in a bill month: from the month containing their
 * start date onwards.
 */
export const isPayeeActive = (payee: Payee, month: number, year: number): boolean =>
  !payee.startDate || !isMonthBefore({ month, year }, monthOf(payee.startDate));

/**
 * Total the bills due in a month and split each occurrence over the active payees.
 */
export function calculateMonthlyBills(
  state: HouseholdState,
  month: number,
  year: number,
  activePayees: readonly Payee[] = state.payees.filter((payee) => isPayeeActive(payee, month, year))
): MonthlyBillBreakdown {
  const billsDue: BillDue[] = [];
  const responsibilities = new Map<string, number>();
  let totalBills = 0;

  for (const bill of state.bills) {
    const occurrences = billOccurrencesInMonth(bill, month, year);
    if (!occurrences.length) continue;

    const shares = computeMonthShares(bill, activePayees);
    for (const { amount } of occurrences) {
      billsDue.push({ billName: bill.name, amount });
      totalBills += amount;
      for (const [payeeName, percentage] of Object.entries(shares)) {
        responsibilities.set(payeeName, (responsibilities.get(payeeName) ?? 0) + (amount * percentage) / 100);
      }
    }
  }

  return { totalBills, billsDue, responsibilities };
}

/**
 * Total of the bills due in a month.
 */
export const calculateMonthlyBillTotal = (state: HouseholdState, month: number, year: number): number =>
  calculateMonthlyBills(state, month, year).totalBills;

/**
 * Calculate how much each income event must contribute to the bills of each
 * projected month.
 * @param startMonth - First bill month (1-12).
 * @param monthsAhead - Number of months to project; defaults to the configured projection length.
 */
export function calculateProportionalContributions(
  state: HouseholdState,
  startMonth: number,
  startYear: number,
  monthsAhead: number = state.scheduleOptions.defaultProjectionMonths,
  options: SchedulerOptions = {}
): PaymentScheduleResult {
  const scheduleItems: PaymentScheduleItem[] = [];
  const monthlyBillTotals: MonthlyBillTotal[] = [];
  const weekendAdjustments: WeekendAdjustment[] = [];
  const months = Number.isFinite(monthsAhead) ? Math.max(0, Math.trunc(monthsAhead)) : 0;
  const projectionStart: MonthRef | null = options.projectionStart ?? null;

  for (let offset = 0; offset < months; offset += 1) {
    const { month, year } = normalizeMonth(startMonth + offset, startYear);

    if (projectionStart && isMonthBefore({ month, year }, projectionStart)) {
      monthlyBillTotals.push({ month, year, totalBills: 0, billsDue: [] });
      continue;
    }

    const activePayees = state.payees.filter((payee) => isPayeeActive(payee, month, year));
    const { totalBills, billsDue, responsibilities } = calculateMonthlyBills(state, month, year, activePayees);
    monthlyBillTotals.push({ month, year, totalBills, billsDue });

    if (totalBills <= 0) continue;

    const cutoffDate = getCutoffDate(state.scheduleOptions, month, year);
    const funding = normalizeMonth(month - 1, year);

    for (const payee of activePayees) {
      const responsibility = responsibilities.get(payee.name) ?? 0;
      if (responsibility <= 0) continue;

      scheduleItems.push(
        ...allocateContributions({
          payeeName: payee.name,
          responsibility,
          events: incomeInMonth(payee, funding.month, funding.year),
          shiftedPayments: detectShiftedPayments(payee, funding.month, funding.year),
          cutoffDate,
          billMonth: { month, year },
        })
      );

      for (const shifted of detectShiftedPayments(payee, month, year)) {
        weekendAdjustments.push({
          payeeName: payee.name,
          scheduleDescription: scheduleDescription(shifted.schedule),
          originalDate: shifted.originalDate,
          adjustedDate: shifted.adjustedDate,
          incomeAmount: shifted.schedule.amount,
        });
      }
    }
  }

  return {
    scheduleItems,
    monthlyBillTotals,
    weekendAdjustments,
    startMonth,
    startYear,
    monthsAhead: months,
  };
}
