/**
 * Tests for schedule CSV export
 */

import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { escapeCsvField, exportPaymentScheduleCsv, paymentScheduleToCsv } from '../modules/exportSchedule';
import type { PaymentScheduleResult } from '../types';

const result: PaymentScheduleResult = {
  scheduleItems: [
    {
      payeeName: 'Alice',
      scheduleDescription: 'Salary, main job',
      incomeAmount: 3000,
      requiredContribution: 1200,
      contributionPercentage: 40,
      paymentDate: '2024-02-15',
      isBeforeCutoff: true,
      billMonth: { month: 3, year: 2024 },
    },
    {
      payeeName: 'Bob',
      scheduleDescription: 'No income in previous month',
      incomeAmount: 0,
      requiredContribution: 333.333,
      contributionPercentage: 0,
      paymentDate: '2024-03-28',
      isBeforeCutoff: false,
      billMonth: { month: 3, year: 2024 },
    },
  ],
  monthlyBillTotals: [],
  weekendAdjustments: [],
  startMonth: 3,
  startYear: 2024,
  monthsAhead: 1,
};

const expected = [
  'payee_name,schedule_description,income_amount,required_contribution,contribution_percentage,payment_date,is_before_cutoff',
  'Alice,"Salary, main job",3000.00,1200.00,40.0%,2024-02-15,true',
  'Bob,No income in previous month,0.00,333.33,0.0%,2024-03-28,false',
  '',
].join('\n');

describe('exportSchedule', () => {
  it('should quote fields only when needed', () => {
    expect(escapeCsvField('plain')).toBe('plain');
    expect(escapeCsvField('Say "hi"')).toBe('"Say ""hi"""');
    expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
  });

  it('should render one row per schedule item', () => {
    expect(paymentScheduleToCsv(result)).toBe(expected);
  });

  it('should write the CSV to disk', () => {
    const dir = mkdtempSync(join(tmpdir(), 'household-csv-'));
    try {
      const path = join(dir, 'schedule.csv');
      exportPaymentScheduleCsv(result, path);
      expect(readFileSync(path, 'utf8')).toBe(expected);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
