import { describe, it, expect } from 'vitest';
import {
  DEFAULT_OVERTIME_RULES,
  calculateDailyOvertime,
  calculateOvertimeCost,
  calculateWeeklyOvertime,
  splitWeeklyHours,
  type OvertimeRules,
} from '@/lib/overtimeCalculations';

describe('overtimeCalculations', () => {
  describe('DEFAULT_OVERTIME_RULES', () => {
    it('has 40h weekly / 8h daily defaults', () => {
      expect(DEFAULT_OVERTIME_RULES).toEqual({
        weeklyThresholdHours: 40,
        weeklyOtMultiplier: 1.5,
        dailyThresholdHours: 8,
      });
    });
  });

  describe('calculateDailyOvertime', () => {
    it('returns all regular hours when under daily threshold', () => {
      expect(calculateDailyOvertime(7, 8)).toEqual({ regularHours: 7, dailyOvertimeHours: 0 });
    });

    it('returns daily OT hours when over daily threshold', () => {
      expect(calculateDailyOvertime(10, 8)).toEqual({ regularHours: 8, dailyOvertimeHours: 2 });
    });

    it('handles exactly at daily threshold (no OT)', () => {
      expect(calculateDailyOvertime(8, 8)).toEqual({ regularHours: 8, dailyOvertimeHours: 0 });
    });

    it('clamps negative hours to zero', () => {
      expect(calculateDailyOvertime(-3, 8)).toEqual({ regularHours: 0, dailyOvertimeHours: 0 });
    });
  });

  describe('splitWeeklyHours', () => {
    it('caps regular hours at the threshold', () => {
      expect(splitWeeklyHours(45, 40)).toEqual({ regularHours: 40, overtimeHours: 5 });
    });

    it('keeps everything regular at or under the threshold', () => {
      expect(splitWeeklyHours(40, 40)).toEqual({ regularHours: 40, overtimeHours: 0 });
      expect(splitWeeklyHours(12.25, 40)).toEqual({ regularHours: 12.25, overtimeHours: 0 });
    });

    it('passes a negative total through as regular', () => {
      expect(splitWeeklyHours(-2, 40)).toEqual({ regularHours: -2, overtimeHours: 0 });
    });
  });

  describe('calculateWeeklyOvertime', () => {
    it('uses the weekly total and reports the daily pool separately', () => {
      const result = calculateWeeklyOvertime(
        { '2024-03-04': 10, '2024-03-05': 10, '2024-03-06': 10, '2024-03-07': 10, '2024-03-08': 4 },
        DEFAULT_OVERTIME_RULES
      );

      expect(result).toEqual({
        regularHours: 40,
        weeklyOvertimeHours: 4,
        dailyOvertimeHours: 8,
        weeklyTotal: 44,
      });
    });

    it('finds daily overtime in a week under the weekly threshold', () => {
      const result = calculateWeeklyOvertime({ '2024-03-04': 12, '2024-03-05': 6 }, DEFAULT_OVERTIME_RULES);

      expect(result.weeklyOvertimeHours).toBe(0);
      expect(result.dailyOvertimeHours).toBe(4);
      expect(result.regularHours).toBe(18);
    });

    it('returns zeros for an empty week', () => {
      expect(calculateWeeklyOvertime({}, DEFAULT_OVERTIME_RULES)).toEqual({
        regularHours: 0,
        weeklyOvertimeHours: 0,
        dailyOvertimeHours: 0,
        weeklyTotal: 0,
      });
    });
  });

  describe('calculateOvertimeCost', () => {
    it('prices overtime at the multiplier, in cents', () => {
      expect(calculateOvertimeCost(5, 2000, DEFAULT_OVERTIME_RULES)).toBe(15000);
    });

    it('rounds to the nearest cent', () => {
      const rules: OvertimeRules = { ...DEFAULT_OVERTIME_RULES, weeklyOtMultiplier: 2 };
      expect(calculateOvertimeCost(1.333, 1500, rules)).toBe(3999);
    });
  });
});
