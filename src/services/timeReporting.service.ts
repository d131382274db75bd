/**
 * Weekly / payroll aggregation over closed time blocks.
 *
 * Reads are not snapshot-isolated: a block closed while a report is being
 * built may or may not be counted.
 *
 * @module services/timeReporting
 */

import { z } from 'zod';
import { DAYS_PER_WEEK } from '@/lib/dateConfig';
import {
  DEFAULT_OVERTIME_RULES,
  calculateDailyOvertime,
  calculateOvertimeCost,
  calculateWeeklyOvertime,
  type OvertimeRules,
} from '@/lib/overtimeCalculations';
import { ValidationError } from '@/lib/errors';
import { addCalendarDays, startOfCalendarWeek, toCalendarDay } from '@/lib/timezone';
import type { TimeBlockRepository, WorkerDirectory } from '@/types/repositories';
import type {
  CalendarDay,
  DailyHoursEntry,
  OvertimeReport,
  OvertimeWorkerData,
  PayrollRecord,
  TimeBlock,
  WeeklyReport,
} from '@/types/timeTracking';

export interface TimeReportingOptions {
  timeZone?: string;
  overtimeRules?: OvertimeRules;
  now?: () => Date;
}

export interface PayrollOptions {
  hourlyRate?: number; // In cents, from the caller's wage source
}

export interface OvertimeReportOptions {
  hourlyRates?: Record<string, number>; // workerId -> cents
}

// In cents
const hourlyRateSchema = z.number().finite().nonnegative();

const payrollOptionsSchema = z.object({ hourlyRate: hourlyRateSchema.optional() });

const overtimeReportOptionsSchema = z.object({ hourlyRates: z.record(hourlyRateSchema).optional() });

function parseOptions<S extends z.ZodTypeAny>(schema: S, options: unknown): z.output<S> {
  const parsed = schema.safeParse(options);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      parsed.error.issues
    );
  }
  return parsed.data;
}

/**
 * Sum of closed blocks per day. Open blocks are left out of reports.
 */
export function sumClosedHoursByDay(blocks: TimeBlock[]): Map<CalendarDay, { hours: number; count: number }> {
  const byDay = new Map<CalendarDay, { hours: number; count: number }>();

  for (const block of blocks) {
    if (block.is_active) continue;
    const day = byDay.get(block.work_date) ?? { hours: 0, count: 0 };
    day.hours += block.hours_worked;
    day.count += 1;
    byDay.set(block.work_date, day);
  }

  return byDay;
}

export class TimeReportingService {
  private readonly timeZone?: string;
  private readonly rules: OvertimeRules;
  private readonly now: () => Date;

  constructor(
    private readonly repository: TimeBlockRepository,
    private readonly workers: WorkerDirectory | null,
    options: TimeReportingOptions = {}
  ) {
    this.timeZone = options.timeZone;
    this.rules = options.overtimeRules ?? DEFAULT_OVERTIME_RULES;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Any day within the week may be passed; it is normalized to that week's Monday.
   */
  async generateWeeklyReport(workerId: string, weekStartDate: Date | CalendarDay): Promise<WeeklyReport> {
    const monday = startOfCalendarWeek(this.toDay(weekStartDate, 'weekStartDate'));
    const nextMonday = addCalendarDays(monday, DAYS_PER_WEEK);

    const blocks = await this.repository.findByDateRange(workerId, monday, nextMonday);
    const byDay = sumClosedHoursByDay(blocks);

    const dailyEntries: DailyHoursEntry[] = [];
    const dailyHours: Record<CalendarDay, number> = {};
    for (let i = 0; i < DAYS_PER_WEEK; i++) {
      const date = addCalendarDays(monday, i);
      const totals = byDay.get(date) ?? { hours: 0, count: 0 };
      const { dailyOvertimeHours } = calculateDailyOvertime(totals.hours, this.rules.dailyThresholdHours);

      dailyHours[date] = totals.hours;
      dailyEntries.push({
        date,
        hours: totals.hours,
        block_count: totals.count,
        daily_overtime_hours: dailyOvertimeHours,
        is_daily_overtime: dailyOvertimeHours > 0,
      });
    }

    const overtime = calculateWeeklyOvertime(dailyHours, this.rules);

    return {
      worker_id: workerId,
      week_start_date: monday,
      daily_entries: dailyEntries,
      total_regular_hours: overtime.regularHours,
      total_overtime_hours: overtime.weeklyOvertimeHours,
      daily_overtime_hours: overtime.dailyOvertimeHours,
      weekly_total: overtime.weeklyTotal,
      is_weekly_overtime: overtime.weeklyTotal > this.rules.weeklyThresholdHours,
    };
  }

  /**
   * Totals closed blocks dated in `[periodStart, periodEnd)`. The pay figure
   * is hours × the supplied rate and nothing more.
   */
  async calculatePayroll(
    workerId: string,
    periodStart: Date | CalendarDay,
    periodEnd: Date | CalendarDay,
    options: PayrollOptions = {}
  ): Promise<PayrollRecord> {
    const { hourlyRate } = parseOptions(payrollOptionsSchema, options);
    const start = this.toDay(periodStart, 'periodStart');
    const end = this.toDay(periodEnd, 'periodEnd');
    if (end < start) {
      throw new ValidationError(`Pay period ends (${end}) before it starts (${start})`);
    }

    const blocks = await this.repository.findByDateRange(workerId, start, end);
    const closed = blocks.filter((block) => !block.is_active);
    const totalHours = closed.reduce((sum, block) => sum + block.hours_worked, 0);

    return {
      worker_id: workerId,
      period_start: start,
      period_end: end,
      total_hours: totalHours,
      block_count: closed.length,
      hourly_rate: hourlyRate ?? null,
      estimated_pay: hourlyRate === undefined ? null : Math.round(totalHours * hourlyRate),
    };
  }

  /**
   * Weekly overtime across every active worker in the directory.
   */
  async generateOvertimeReport(
    weekStartDate: Date | CalendarDay,
    options: OvertimeReportOptions = {}
  ): Promise<OvertimeReport> {
    if (!this.workers) {
      throw new ValidationError('Overtime reports need a worker directory');
    }
    const { hourlyRates } = parseOptions(overtimeReportOptionsSchema, options);

    const monday = startOfCalendarWeek(this.toDay(weekStartDate, 'weekStartDate'));
    const roster = (await this.workers.listWorkers()).filter((worker) => worker.is_active);
    const reports = await Promise.all(
      roster.map(async (worker) => ({ worker, report: await this.generateWeeklyReport(worker.id, monday) }))
    );

    const overtimeWorkers: OvertimeWorkerData[] = [];
    let totalOvertimeHours = 0;
    let estimatedOvertimeCost = 0;

    for (const { worker, report } of reports) {
      if (!report.is_weekly_overtime) continue;

      const breakdown: Record<CalendarDay, number> = {};
      for (const entry of report.daily_entries) {
        if (entry.daily_overtime_hours > 0) breakdown[entry.date] = entry.daily_overtime_hours;
      }

      overtimeWorkers.push({
        worker_id: worker.id,
        worker_name: worker.name,
        regular_hours: report.total_regular_hours,
        overtime_hours: report.total_overtime_hours,
        daily_overtime_breakdown: breakdown,
      });
      totalOvertimeHours += report.total_overtime_hours;

      const rate = hourlyRates?.[worker.id];
      if (rate !== undefined) {
        estimatedOvertimeCost += calculateOvertimeCost(report.total_overtime_hours, rate, this.rules);
      }
    }

    console.log(
      `[TimeReporting] Overtime report for week of ${monday}: ${overtimeWorkers.length} of ${roster.length} workers over threshold`
    );

    return {
      week_start_date: monday,
      generated_at: this.now(),
      overtime_workers: overtimeWorkers,
      total_overtime_hours: totalOvertimeHours,
      estimated_overtime_cost: estimatedOvertimeCost,
    };
  }

  private toDay(value: Date | CalendarDay, field: string): CalendarDay {
    try {
      return toCalendarDay(value, this.timeZone);
    } catch (error) {
      throw new ValidationError(`${field}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
