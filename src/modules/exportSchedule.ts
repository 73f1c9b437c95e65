/**
 * Export utilities for payment schedules
 */

import { writeFileSync } from 'node:fs';
import type { PaymentScheduleResult } from '../types';

export const CSV_HEADER = [
  'payee_name',
  'schedule_description',
  'income_amount',
  'required_contribution',
  'contribution_percentage',
  'payment_date',
  'is_before_cutoff',
];

/**
 * Quote a CSV field when it holds a delimiter, quote or line break
 */
export const escapeCsvField = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

/**
 * Render the schedule items as CSV, one row per item
 */
export function paymentScheduleToCsv(result: PaymentScheduleResult): string {
  const lines: string[] = [CSV_HEADER.join(',')];

  result.scheduleItems.forEach((item) => {
    const row = [
      item.payeeName,
      item.scheduleDescription,
      item.incomeAmount.toFixed(2),
      item.requiredContribution.toFixed(2),
      `${item.contributionPercentage.toFixed(1)}%`,
      item.paymentDate,
      String(item.isBeforeCutoff),
    ];
    lines.push(row.map(escapeCsvField).join(','));
  });

  return `${lines.join('\n')}\n`;
}

/**
 * Write the schedule CSV to disk
 */
export function exportPaymentScheduleCsv(result: PaymentScheduleResult, path: string): void {
  writeFileSync(path, paymentScheduleToCsv(result), 'utf8');
}
