/**
 * Overtime calculation engine.
 *
 * Pure functions -- no database or Supabase dependencies.
 * The reporting service sums time blocks per day and passes the totals here.
 */

export interface OvertimeRules {
  weeklyThresholdHours: number;
  weeklyOtMultiplier: number;
  dailyThresholdHours: number;
}

export interface OvertimeResult {
  regularHours: number;
  weeklyOvertimeHours: number;
  dailyOvertimeHours: number;
  weeklyTotal: number;
}

export const DEFAULT_OVERTIME_RULES: OvertimeRules = {
  weeklyThresholdHours: 40,
  weeklyOtMultiplier: 1.5,
  dailyThresholdHours: 8,
};

export function calculateDailyOvertime(
  hoursWorked: number,
  dailyThreshold: number
): { regularHours: number; dailyOvertimeHours: number } {
  const safeHours = Math.max(0, hoursWorked);

  if (safeHours <= dailyThreshold) {
    return { regularHours: safeHours, dailyOvertimeHours: 0 };
  }

  return { regularHours: dailyThreshold, dailyOvertimeHours: safeHours - dailyThreshold };
}

/**
 * Week-level split. Regular + overtime always equals the total, including
 * negative totals produced by reversed clock records.
 */
export function splitWeeklyHours(
  weeklyTotal: number,
  weeklyThreshold: number
): { regularHours: number; overtimeHours: number } {
  return {
    regularHours: Math.min(weeklyTotal, weeklyThreshold),
    overtimeHours: Math.max(weeklyTotal - weeklyThreshold, 0),
  };
}

/**
 * The daily pool is informational: the authoritative split is taken on the
 * weekly total, so daily overtime hours are never subtracted from it.
 */
export function calculateWeeklyOvertime(
  dailyHours: Record<string, number>,
  rules: OvertimeRules
): OvertimeResult {
  let weeklyTotal = 0;
  let totalDailyOt = 0;

  for (const hours of Object.values(dailyHours)) {
    weeklyTotal += hours;
    totalDailyOt += calculateDailyOvertime(hours, rules.dailyThresholdHours).dailyOvertimeHours;
  }

  const { regularHours, overtimeHours } = splitWeeklyHours(weeklyTotal, rules.weeklyThresholdHours);

  return {
    regularHours,
    weeklyOvertimeHours: overtimeHours,
    dailyOvertimeHours: totalDailyOt,
    weeklyTotal,
  };
}

export function calculateOvertimeCost(
  overtimeHours: number,
  hourlyRateCents: number,
  rules: OvertimeRules
): number {
  return Math.round(overtimeHours * hourlyRateCents * rules.weeklyOtMultiplier);
}
