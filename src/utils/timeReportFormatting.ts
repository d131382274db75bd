import { format, parseISO } from 'date-fns';
import { addCalendarDays } from '@/lib/timezone';
import { formatHours } from '@/lib/timeUtils';
import type { CalendarDay, PayrollRecord, WeeklyReport } from '@/types/timeTracking';

export interface DailyEntryViewModel {
  date: CalendarDay;
  label: string; // "Mon, Feb 16"
  hours: string;
  isOvertime: boolean;
}

export interface WeeklyReportViewModel {
  weekStarting: CalendarDay;
  totalHours: string;
  regularHours: string;
  overtimeHours: string;
  isOvertime: boolean;
  dailyBreakdown: DailyEntryViewModel[];
}

export interface PayrollViewModel {
  payPeriod: string;
  totalHours: string;
  estimatedPay: string | null;
}

const formatDay = (day: CalendarDay, pattern: string): string => format(parseISO(day), pattern);

export const formatCents = (cents: number): string => {
  const sign = cents < 0 ? '-' : '';
  return `${sign}$${(Math.abs(cents) / 100).toFixed(2)}`;
};

export function formatWeeklyReport(report: WeeklyReport): WeeklyReportViewModel {
  return {
    weekStarting: report.week_start_date,
    totalHours: formatHours(report.weekly_total),
    regularHours: formatHours(report.total_regular_hours),
    overtimeHours: formatHours(report.total_overtime_hours),
    isOvertime: report.is_weekly_overtime,
    dailyBreakdown: report.daily_entries.map((entry) => ({
      date: entry.date,
      label: formatDay(entry.date, 'EEE, MMM d'),
      hours: formatHours(entry.hours),
      isOvertime: entry.is_daily_overtime,
    })),
  };
}

/**
 * The stored period end is exclusive; the label shows the last day paid.
 */
export function formatPayrollRecord(record: PayrollRecord): PayrollViewModel {
  const lastDay = record.period_end > record.period_start ? addCalendarDays(record.period_end, -1) : record.period_end;

  return {
    payPeriod: `${formatDay(record.period_start, 'MMM d, yyyy')} - ${formatDay(lastDay, 'MMM d, yyyy')}`,
    totalHours: formatHours(record.total_hours),
    estimatedPay: record.estimated_pay === null ? null : formatCents(record.estimated_pay),
  };
}
