/**
 * Tests for validation and normalization
 */

import { describe, it, expect } from 'vitest';
import {
  assertValidState,
  normalizeState,
  sanitizeScheduleOptions,
  serializeState,
  validateAmount,
  validateCutoffDay,
  validateDateString,
  validateMonth,
  validateProjectionMonths,
  validateStateStructure,
  validateYear,
} from '../modules/validation';
import { makeBill, makePayee, makeSchedule, makeState, monthlyOn } from './fixtures';

const monthlyRaw = { kind: 'calendar', interval: 'monthly', start: '2024-01-15' };

describe('validation module', () => {
  describe('input validators', () => {
    it('should parse values inside their ranges', () => {
      expect(validateMonth(' 3 ')).toBe(3);
      expect(validateYear('2024')).toBe(2024);
      expect(validateProjectionMonths(60)).toBe(60);
      expect(validateCutoffDay('31')).toBe(31);
      expect(validateAmount('12.5')).toBe(12.5);
    });

    it('should reject values outside their ranges', () => {
      expect(() => validateMonth('13')).toThrow('Month must be between 1 and 12');
      expect(() => validateYear(2019)).toThrow('Year must be between 2020 and 2100');
      expect(() => validateProjectionMonths(0)).toThrow('Projection months must be between 1 and 60');
      expect(() => validateCutoffDay(32)).toThrow('Cutoff day must be between 1 and 31');
      expect(() => validateAmount('-5')).toThrow('Amount cannot be negative');
    });

    it('should reject malformed input', () => {
      expect(() => validateMonth('abc')).toThrow('Invalid month format: abc');
      expect(() => validateAmount('')).toThrow('Invalid amount format: ');
    });

    it('should check calendar dates', () => {
      expect(validateDateString('')).toBeNull();
      expect(validateDateString('2024-02-29')).toBe('2024-02-29');
      expect(() => validateDateString('2024-02-30')).toThrow('Invalid date format. Use YYYY-MM-DD: 2024-02-30');
    });
  });

  describe('sanitizeScheduleOptions', () => {
    it('should clamp and default persisted options', () => {
      expect(sanitizeScheduleOptions({ cutoff_day: 40, weekend_adjustment: 'bogus', default_projection_months: 0 })).toEqual({
        cutoffDay: 31,
        weekendAdjustment: 'last_working_day',
        defaultProjectionMonths: 1,
      });
      expect(sanitizeScheduleOptions(undefined)).toEqual({
        cutoffDay: 28,
        weekendAdjustment: 'last_working_day',
        defaultProjectionMonths: 12,
      });
    });
  });

  describe('normalizeState', () => {
    it('should convert legacy bills and shares', () => {
      const state = normalizeState({
        bills: [{ name: 'Rent', amount: 1200, recurrence: { kind: 'calendar', interval: 'monthly', start: '2024-01-01' }, share: [{ payee: 'Alice', percentage: 60 }] }],
        payees: [],
      });

      expect(state.bills[0].priceHistory).toEqual([
        {
          amount: 1200,
          recurrence: { kind: 'calendar', interval: 'monthly', every: 1, start: '2024-01-01' },
          startDate: '2024-01-01',
        },
      ]);
      expect(state.bills[0].share).toEqual({ exclude: [], custom: { Alice: 60 } });
    });

    it('should sort price history and fall back to the recurrence start', () => {
      const state = normalizeState({
        bills: [
          {
            name: 'Insurance',
            price_history: [
              { amount: 150, recurrence: { ...monthlyRaw, start: '2024-06-01' }, start_date: '2024-06-01' },
              { amount: 100, recurrence: { ...monthlyRaw, start: '2024-01-01' } },
            ],
          },
        ],
      });

      expect(state.bills[0].priceHistory.map((entry) => [entry.amount, entry.startDate])).toEqual([
        [100, '2024-01-01'],
        [150, '2024-06-01'],
      ]);
    });

    it('should give schedules without an amount the placeholder income', () => {
      const state = normalizeState({ payees: [{ name: 'Alice', pay_schedules: [{ recurrence: monthlyRaw }] }] });
      const [schedule] = state.payees[0].paySchedules;

      expect(schedule.amount).toBe(1000);
      expect(schedule.usesPlaceholderAmount).toBe(true);
      expect(schedule.weekendAdjustment).toBe('last_working_day');
      expect(schedule.contributionPercentage).toBeNull();
    });

    it('should accept camelCase keys', () => {
      const state = normalizeState({
        payees: [
          {
            name: 'Alice',
            startDate: '2024-02-01',
            paySchedules: [{ amount: 2000, recurrence: monthlyRaw, weekendAdjustment: 'next_working_day', contributionPercentage: 25 }],
          },
        ],
        scheduleOptions: { cutoffDay: 20 },
      });

      expect(state.payees[0].startDate).toBe('2024-02-01');
      expect(state.payees[0].paySchedules[0]).toMatchObject({
        amount: 2000,
        weekendAdjustment: 'next_working_day',
        contributionPercentage: 25,
      });
      expect(state.scheduleOptions.cutoffDay).toBe(20);
    });

    it('should fall back to an empty household for non-objects', () => {
      expect(normalizeState('nope')).toEqual({
        bills: [],
        payees: [],
        scheduleOptions: { cutoffDay: 28, weekendAdjustment: 'last_working_day', defaultProjectionMonths: 12 },
      });
    });

    it('should throw on malformed records in strict mode', () => {
      expect(() => normalizeState('nope', { strict: true })).toThrow('Invalid state payload');
      expect(() =>
        normalizeState({ bills: [{ name: 'Rent', amount: 5, recurrence: { kind: 'weird', start: '2024-01-01' } }] }, { strict: true })
      ).toThrow('Invalid recurrence kind: weird');
    });

    it('should survive a serialize round trip', () => {
      const state = normalizeState({
        bills: [{ name: 'Rent', amount: 1200, recurrence: monthlyRaw, share: { exclude: ['Bob'], custom: {} } }],
        payees: [
          { name: 'Alice', default_share_percentage: 40, pay_schedules: [{ amount: 3000, recurrence: monthlyRaw, description: 'Salary' }] },
          { name: 'Bob', pay_schedules: [{ recurrence: monthlyRaw }] },
        ],
        schedule_options: { cutoff_day: 25 },
      });

      const serialized = serializeState(state);
      expect(Object.keys(serialized)).toEqual(['bills', 'payees', 'schedule_options']);
      expect(normalizeState(serialized)).toEqual(state);
    });
  });

  describe('validateStateStructure', () => {
    it('should flag bills without amount and with flattened recurrence', () => {
      expect(validateStateStructure({ bills: [{ name: 'Rent', kind: 'calendar', start: '2024-01-01' }], payees: [] })).toEqual([
        "Bill 'Rent': Missing required 'amount' field (or use 'price_history' for time-based pricing)",
        "Bill 'Rent': Recurrence fields should be nested under 'recurrence:' key",
      ]);
    });

    it('should accept a zero amount as present', () => {
      const errors = validateStateStructure({
        bills: [
          { name: 'Promo', price_history: [{ amount: 0, start_date: '2024-01-15', recurrence: monthlyRaw }] },
          { name: 'Free', amount: 0, kind: 'calendar', start: '2024-01-01' },
        ],
        payees: [],
      });

      expect(errors).toEqual(["Bill 'Free': Recurrence fields should be nested under 'recurrence:' key"]);
      expect(() => assertValidState(makeState([makeBill('Promo', 0)], []))).not.toThrow();
    });

    it('should flag payees without pay schedules', () => {
      expect(validateStateStructure({ bills: [], payees: [{ name: 'Alice', pay_schedules: [] }] })).toEqual([
        "Payee 'Alice': No pay schedules defined",
      ]);
    });

    it('should flag recurrences missing required fields', () => {
      expect(
        validateStateStructure({ payees: [{ name: 'Alice', pay_schedules: [{ amount: 100, recurrence: { kind: 'interval', start: '2024-01-01' } }] }] })
      ).toEqual(["Payee 'Alice', Schedule #1: Interval recurrence missing 'interval' (daily, weekly, monthly, etc.)"]);
    });

    it('should flag unknown payees and impossible shares', () => {
      const errors = validateStateStructure({
        bills: [{ name: 'Rent', amount: 100, recurrence: monthlyRaw, share: { exclude: ['Zed'], custom: { Alice: 120 } } }],
        payees: [{ name: 'Alice', pay_schedules: [{ amount: 2000, recurrence: monthlyRaw }] }],
      });

      expect(errors).toEqual([
        "Bill 'Rent': Excluded payee 'Zed' not found in payees list",
        "Bill 'Rent': Custom percentage for 'Alice' must be between 0 and 100, got 120",
        "Bill 'Rent': Total percentages equal 120.00%, should be 100%",
      ]);
    });

    it('should accept a consistent household', () => {
      const state = makeState(
        [makeBill('Rent', 1200, undefined, { custom: { Alice: 70 } })],
        [makePayee('Alice', [makeSchedule(3000, monthlyOn('2024-01-15'))]), makePayee('Bob', [makeSchedule(2000, monthlyOn('2024-01-15'))])]
      );
      expect(validateStateStructure(serializeState(state))).toEqual([]);
      expect(() => assertValidState(state)).not.toThrow();
    });

    it('should throw from assertValidState with every message', () => {
      const state = makeState([makeBill('Rent', 1200, undefined, { custom: { Alice: 70 } })], [makePayee('Alice', [])]);
      expect(() => assertValidState(state)).toThrow(
        "Payee 'Alice': No pay schedules defined\nBill 'Rent': Total percentages equal 70.00%, should be 100%"
      );
    });
  });
});
