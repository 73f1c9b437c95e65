"use strict";

import { fromYMD } from "./dateUtils";
import type { LocaleConfig, PayeeSummary, PaymentScheduleItem, YMDString } from "../types";

/**
 * Produce the default display locale.
 */
export const defaultLocaleConfig = (): LocaleConfig => ({
  currencySymbol: "$",
  currencyPosition: "before",
  thousandsSeparator: ",",
  decimalSeparator: ".",
  dateFormat: "mm/dd/yyyy",
});

/**
 * Round a numeric value to two decimal places.
 * @returns Rounded value, or 0 for non-finite input.
 */
export const round2 = (value: number): number => {
  const num = Number(value);
  if (!Number.isFinite(num)) return 0;
  return Math.round(num * 100) / 100;
};

/**
 * Format an amount with the locale's separators and currency symbol.
 * @example formatCurrency(1234.5, defaultLocaleConfig()) // "$1,234.50"
 */
export const formatCurrency = (amount: number, locale: LocaleConfig = defaultLocaleConfig()): string => {
  const value = Number.isFinite(amount) ? amount : 0;
  const [integerPart, decimalPart] = Math.abs(value).toFixed(2).split(".");
  const grouped = locale.thousandsSeparator
    ? integerPart.replace(/\B(?=(\d{3})+(?!\d))/g, locale.thousandsSeparator)
    : integerPart;
  const number = `${grouped}${locale.decimalSeparator}${decimalPart}`;
  const sign = value < 0 && Number(value.toFixed(2)) !== 0 ? "-" : "";

  return locale.currencyPosition === "before"
    ? `${sign}${locale.currencySymbol}${number}`
    : `${sign}${number}${locale.currencySymbol}`;
};

const dateParts = (ymd: YMDString): { day: string; month: string; year: string } => {
  const date = fromYMD(ymd);
  return {
    day: String(date.getDate()).padStart(2, "0"),
    month: String(date.getMonth() + 1).padStart(2, "0"),
    year: String(date.getFullYear()),
  };
};

/**
 * Day and month only, ordered per the locale (e.g. 03/15).
 */
export const formatDateShort = (ymd: YMDString, locale: LocaleConfig = defaultLocaleConfig()): string => {
  const { day, month } = dateParts(ymd);
  return locale.dateFormat === "dd/mm/yyyy" ? `${day}/${month}` : `${month}/${day}`;
};

/**
 * Full date ordered per the locale (e.g. 03/15/2024).
 */
export const formatDateFull = (ymd: YMDString, locale: LocaleConfig = defaultLocaleConfig()): string => {
  const { day, month, year } = dateParts(ymd);
  return locale.dateFormat === "dd/mm/yyyy" ? `${day}/${month}/${year}` : `${month}/${day}/${year}`;
};

export const formatPercentage = (percentage: number): string =>
  `${(Number.isFinite(percentage) ? percentage : 0).toFixed(1)}%`;

const MONTH_NAMES = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

/**
 * Month heading such as "March 2024".
 */
export const formatMonthYear = (month: number, year: number): string =>
  `${MONTH_NAMES[(((month - 1) % 12) + 12) % 12]} ${year}`;

/**
 * Totals per payee over schedule rows, in order of first appearance.
 */
export function summarizeByPayee(items: readonly PaymentScheduleItem[]): PayeeSummary[] {
  const summaries = new Map<string, PayeeSummary>();

  for (const item of items) {
    let summary = summaries.get(item.payeeName);
    if (!summary) {
      summary = { payeeName: item.payeeName, totalContribution: 0, totalIncome: 0, itemCount: 0 };
      summaries.set(item.payeeName, summary);
    }
    summary.totalContribution += item.requiredContribution;
    summary.totalIncome += item.incomeAmount;
    summary.itemCount += 1;
  }

  return [...summaries.values()];
}
