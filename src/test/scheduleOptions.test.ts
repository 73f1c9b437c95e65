/**
 * Tests for cutoff date helpers
 */

import { describe, it, expect } from 'vitest';
import {
  defaultScheduleOptions,
  getCurrentMonthCutoff,
  getCutoffDate,
  getNextMonthCutoff,
} from '../modules/scheduleOptions';

describe('scheduleOptions', () => {
  const options = defaultScheduleOptions();

  describe('getCutoffDate', () => {
    it('should use the cutoff day of the month', () => {
      expect(getCutoffDate(options, 2, 2024)).toBe('2024-02-28');
    });

    it('should clamp the cutoff day to short months', () => {
      expect(getCutoffDate({ ...options, cutoffDay: 31 }, 2, 2024)).toBe('2024-02-29');
    });

    it('should move a weekend cutoff with the configured strategy', () => {
      expect(getCutoffDate({ ...options, cutoffDay: 15 }, 12, 2024)).toBe('2024-12-13');
      expect(getCutoffDate({ ...options, weekendAdjustment: 'next_working_day' }, 9, 2024)).toBe('2024-09-30');
    });
  });

  describe('relative cutoffs', () => {
    it('should find the cutoff of the month containing the reference date', () => {
      expect(getCurrentMonthCutoff(options, '2024-02-10')).toBe('2024-02-28');
    });

    it('should find the cutoff of the following month', () => {
      expect(getNextMonthCutoff(options, '2024-02-10')).toBe('2024-03-28');
    });

    it('should roll the following month into the next year', () => {
      expect(getNextMonthCutoff(options, '2024-12-05')).toBe('2025-01-28');
    });
  });
});
