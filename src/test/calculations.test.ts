/**
 * Tests for formatting helpers and payee summaries
 */

import { describe, it, expect } from 'vitest';
import {
  defaultLocaleConfig,
  formatCurrency,
  formatDateFull,
  formatDateShort,
  formatMonthYear,
  formatPercentage,
  round2,
  summarizeByPayee,
} from '../modules/calculations';
import type { LocaleConfig, PaymentScheduleItem } from '../types';

const euro: LocaleConfig = {
  currencySymbol: '€',
  currencyPosition: 'after',
  thousandsSeparator: '.',
  decimalSeparator: ',',
  dateFormat: 'dd/mm/yyyy',
};

const item = (payeeName: string, incomeAmount: number, requiredContribution: number): PaymentScheduleItem => ({
  payeeName,
  scheduleDescription: 'Salary',
  incomeAmount,
  requiredContribution,
  contributionPercentage: 0,
  paymentDate: '2024-02-15',
  isBeforeCutoff: true,
  billMonth: { month: 3, year: 2024 },
});

describe('calculations module', () => {
  describe('round2', () => {
    it('should round to cents', () => {
      expect(round2(1.234)).toBe(1.23);
      expect(round2(1.236)).toBe(1.24);
      expect(round2(NaN)).toBe(0);
    });
  });

  describe('formatCurrency', () => {
    it('should format with the default locale', () => {
      expect(formatCurrency(0)).toBe('$0.00');
      expect(formatCurrency(999)).toBe('$999.00');
      expect(formatCurrency(1234.5)).toBe('$1,234.50');
      expect(formatCurrency(1234567.891)).toBe('$1,234,567.89');
    });

    it('should put the sign before the symbol', () => {
      expect(formatCurrency(-1234.5)).toBe('-$1,234.50');
      expect(formatCurrency(-0.001)).toBe('$0.00');
    });

    it('should follow a custom locale', () => {
      expect(formatCurrency(1234.5, euro)).toBe('1.234,50€');
      expect(formatCurrency(1234.5, { ...defaultLocaleConfig(), thousandsSeparator: '' })).toBe('$1234.50');
    });
  });

  describe('date formatting', () => {
    it('should order day and month per the locale', () => {
      expect(formatDateShort('2024-03-05')).toBe('03/05');
      expect(formatDateShort('2024-03-05', euro)).toBe('05/03');
      expect(formatDateFull('2024-03-05')).toBe('03/05/2024');
      expect(formatDateFull('2024-03-05', euro)).toBe('05/03/2024');
    });

    it('should name months', () => {
      expect(formatMonthYear(3, 2024)).toBe('March 2024');
      expect(formatMonthYear(12, 2025)).toBe('December 2025');
    });
  });

  it('should format percentages with one decimal', () => {
    expect(formatPercentage(33.333)).toBe('33.3%');
    expect(formatPercentage(40)).toBe('40.0%');
  });

  describe('summarizeByPayee', () => {
    it('should total rows per payee in order of appearance', () => {
      const items = [item('Bob', 2000, 600), item('Alice', 3000, 600), item('Bob', 2000, 400)];

      expect(summarizeByPayee(items)).toEqual([
        { payeeName: 'Bob', totalContribution: 1000, totalIncome: 4000, itemCount: 2 },
        { payeeName: 'Alice', totalContribution: 600, totalIncome: 3000, itemCount: 1 },
      ]);
    });
  });
});
