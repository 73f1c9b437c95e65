/**
 * Bill pricing and cost-sharing
 */

import { compareYMD, monthBounds } from './dateUtils';
import { occurrencesBetween } from './recurrence';
import type { Bill, BillPriceEntry, Payee, Recurrence, ShareValidation, YMDString } from '../types';

/** Allowed deviation from 100% when validating shares */
export const SHARE_TOLERANCE = 0.01;

/**
 * Bill occurrence with the amount authoritative on that date
 */
export interface BillOccurrence {
  date: YMDString;
  amount: number;
}

/**
 * Price history entry authoritative on a date: the one with the latest
 * start date on or before it.
 */
export const resolvePriceForDate = (bill: Bill, date: YMDString): BillPriceEntry | null => {
  let current: BillPriceEntry | null = null;
  for (const entry of bill.priceHistory) {
    if (compareYMD(entry.startDate, date) <= 0) {
      if (!current || compareYMD(entry.startDate, current.startDate) >= 0) current = entry;
    }
  }
  return current;
};

export const getAmountForDate = (bill: Bill, date: YMDString): number | null =>
  resolvePriceForDate(bill, date)?.amount ?? null;

export const getRecurrenceForDate = (bill: Bill, date: YMDString): Recurrence | null =>
  resolvePriceForDate(bill, date)?.recurrence ?? null;

/**
 * Whether the bill departs from the default split.
 */
export const hasCustomShares = (bill: Bill): boolean =>
  bill.share.exclude.length > 0 || Object.keys(bill.share.custom).length > 0;

/**
 * Every occurrence of a bill inside a calendar month, each priced by the
 * history entry authoritative on its date.
 */
export function billOccurrencesInMonth(bill: Bill, month: number, year: number): BillOccurrence[] {
  const { start, end } = monthBounds(month, year);
  const occurrences: BillOccurrence[] = [];

  for (const entry of bill.priceHistory) {
    for (const date of occurrencesBetween(entry.recurrence, start, end)) {
      if (resolvePriceForDate(bill, date) === entry) {
        occurrences.push({ date, amount: entry.amount });
      }
    }
  }

  return occurrences.sort((a, b) => compareYMD(a.date, b.date));
}

/**
 * Calculate each payee's percentage share of a bill:
 * exclusions first, then bill-specific custom percentages, then payee
 * defaults, then an equal split of whatever remains.
 * @param activePayees - Payees taking part in the month being split.
 * @returns Payee name -> percentage; empty when nobody is eligible.
 */
export function computeShares(bill: Bill, activePayees: readonly Payee[]): Record<string, number> {
  const result: Record<string, number> = {};
  const excluded = new Set(bill.share.exclude);
  const eligible = activePayees.filter((payee) => !excluded.has(payee.name));
  if (!eligible.length) return result;

  let remaining = 100;
  const unassigned: Payee[] = [];

  for (const payee of eligible) {
    const custom = bill.share.custom[payee.name];
    if (custom !== undefined) {
      result[payee.name] = custom;
      remaining -= custom;
    } else {
      unassigned.push(payee);
    }
  }

  if (!unassigned.length) return result;

  const withDefaults = unassigned.filter((payee) => payee.defaultSharePercentage != null);
  const withoutDefaults = unassigned.filter((payee) => payee.defaultSharePercentage == null);
  const defaultOf = (payee: Payee): number => payee.defaultSharePercentage ?? 0;
  const totalDefaults = withDefaults.reduce((sum, payee) => sum + defaultOf(payee), 0);

  if (remaining <= 0) {
    for (const payee of unassigned) result[payee.name] = 0;
    return result;
  }

  if (totalDefaults > remaining) {
    // Defaults over-claim what is left: scale them down, nothing for the rest
    for (const payee of withDefaults) {
      result[payee.name] = (defaultOf(payee) / totalDefaults) * remaining;
    }
    for (const payee of withoutDefaults) result[payee.name] = 0;
    return result;
  }

  for (const payee of withDefaults) {
    result[payee.name] = defaultOf(payee);
    remaining -= defaultOf(payee);
  }

  if (withoutDefaults.length) {
    const equalShare = remaining > 0 ? remaining / withoutDefaults.length : 0;
    for (const payee of withoutDefaults) result[payee.name] = equalShare;
  } else if (remaining > SHARE_TOLERANCE) {
    // Nobody left to take the remainder: spread it over the defaulters
    for (const payee of withDefaults) {
      const weight = totalDefaults > 0 ? defaultOf(payee) / totalDefaults : 1 / withDefaults.length;
      result[payee.name] += weight * remaining;
    }
  }

  return result;
}

/**
 * Shares of a bill among the payees active in one month, always covering the
 * whole bill. Custom percentages are set against the full household, so when
 * some of their owners are not active yet the claimed total is scaled back up
 * to 100; a claim of nothing falls back to an equal split.
 */
export function computeMonthShares(bill: Bill, activePayees: readonly Payee[]): Record<string, number> {
  const shares = computeShares(bill, activePayees);
  const entries = Object.entries(shares);
  const total = entries.reduce((sum, [, value]) => sum + value, 0);
  if (!entries.length || Math.abs(total - 100) <= SHARE_TOLERANCE) return shares;

  const scaled: Record<string, number> = {};
  for (const [name, value] of entries) {
    scaled[name] = total > 0 ? (value / total) * 100 : 100 / entries.length;
  }
  return scaled;
}

/**
 * Percentage of a bill carried by one payee.
 */
export const getPayeePercentage = (bill: Bill, payeeName: string, payees: readonly Payee[]): number =>
  computeShares(bill, payees)[payeeName] ?? 0;

/**
 * Validate that a bill's share configuration adds up to 100%.
 * A household without payees has nothing to validate.
 */
export function validateBillShares(bill: Bill, payees: readonly Payee[]): ShareValidation {
  if (!payees.length) return { valid: true, message: "Valid" };

  const shares = computeShares(bill, payees);
  const total = Object.values(shares).reduce((sum, value) => sum + value, 0);

  if (Math.abs(total - 100) > SHARE_TOLERANCE) {
    return { valid: false, message: `Total percentages equal ${total.toFixed(2)}%, should be 100%` };
  }

  for (const [name, percentage] of Object.entries(shares)) {
    if (percentage < 0) {
      return { valid: false, message: `Payee '${name}' has negative percentage: ${percentage.toFixed(2)}%` };
    }
  }

  return { valid: true, message: "Valid" };
}
