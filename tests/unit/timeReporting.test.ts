import { describe, it, expect } from 'vitest';
import { ValidationError } from '@/lib/errors';
import { InMemoryTimeBlockRepository } from '@/integrations/memory/repositories';
import { sumClosedHoursByDay, TimeReportingService } from '@/services/timeReporting.service';
import { at, createTestEngine, workDays } from '../helpers/timeTracking';

const MON_TO_FRI = ['2024-03-04', '2024-03-05', '2024-03-06', '2024-03-07', '2024-03-08'];

describe('TimeReportingService', () => {
  describe('generateWeeklyReport', () => {
    it('splits 45 hours into 40 regular and 5 overtime', async () => {
      const { engine } = createTestEngine();
      await workDays(engine, 'worker-1', MON_TO_FRI, '07:00', '16:00');

      const report = await engine.generateWeeklyReport('worker-1', '2024-03-04');

      expect(report.weekly_total).toBe(45);
      expect(report.total_regular_hours).toBe(40);
      expect(report.total_overtime_hours).toBe(5);
      expect(report.daily_overtime_hours).toBe(5);
      expect(report.is_weekly_overtime).toBe(true);
      expect(report.daily_entries).toHaveLength(7);
      expect(report.daily_entries[0]).toEqual({
        date: '2024-03-04',
        hours: 9,
        block_count: 1,
        daily_overtime_hours: 1,
        is_daily_overtime: true,
      });
      expect(report.daily_entries[6]).toEqual({
        date: '2024-03-10',
        hours: 0,
        block_count: 0,
        daily_overtime_hours: 0,
        is_daily_overtime: false,
      });
    });

    it('reports no overtime at exactly the threshold', async () => {
      const { engine } = createTestEngine();
      await workDays(engine, 'worker-1', MON_TO_FRI, '08:00', '16:00');

      const report = await engine.generateWeeklyReport('worker-1', '2024-03-04');

      expect(report.weekly_total).toBe(40);
      expect(report.total_regular_hours).toBe(40);
      expect(report.total_overtime_hours).toBe(0);
      expect(report.is_weekly_overtime).toBe(false);
    });

    it('normalizes any day of the week to its Monday', async () => {
      const { engine } = createTestEngine();
      await workDays(engine, 'worker-1', ['2024-03-04'], '08:00', '12:00');

      const fromWednesday = await engine.generateWeeklyReport('worker-1', '2024-03-06');
      const fromSunday = await engine.generateWeeklyReport('worker-1', at('2024-03-10', '15:00'));

      expect(fromWednesday.week_start_date).toBe('2024-03-04');
      expect(fromSunday.week_start_date).toBe('2024-03-04');
      expect(fromSunday.weekly_total).toBe(4);
    });

    it('leaves open blocks and other weeks out', async () => {
      const { engine } = createTestEngine();
      await workDays(engine, 'worker-1', ['2024-03-03', '2024-03-11'], '08:00', '16:00');
      await workDays(engine, 'worker-1', ['2024-03-05'], '08:00', '10:00');
      await engine.clockIn('worker-1', at('2024-03-06', '08:00'));

      const report = await engine.generateWeeklyReport('worker-1', '2024-03-04');

      expect(report.weekly_total).toBe(2);
      expect(report.daily_entries.map((e) => e.block_count)).toEqual([0, 1, 0, 0, 0, 0, 0]);
    });

    it('counts a block that crosses midnight on its clock-in day', async () => {
      const { engine } = createTestEngine();
      await engine.clockIn('worker-1', at('2024-03-10', '22:00'));
      await engine.clockOut('worker-1', at('2024-03-11', '03:00'));

      const week = await engine.generateWeeklyReport('worker-1', '2024-03-04');
      const nextWeek = await engine.generateWeeklyReport('worker-1', '2024-03-11');

      expect(week.weekly_total).toBe(5);
      expect(nextWeek.weekly_total).toBe(0);
    });

    it('keeps regular + overtime equal to a negative total', async () => {
      const { engine } = createTestEngine();
      await workDays(engine, 'worker-1', ['2024-03-04'], '10:00', '08:00');

      const report = await engine.generateWeeklyReport('worker-1', '2024-03-04');

      expect(report.weekly_total).toBe(-2);
      expect(report.total_regular_hours).toBe(-2);
      expect(report.total_overtime_hours).toBe(0);
      expect(report.daily_overtime_hours).toBe(0);
    });

    it('applies custom thresholds', async () => {
      const repository = new InMemoryTimeBlockRepository();
      const { engine } = createTestEngine();
      await workDays(engine, 'worker-1', MON_TO_FRI, '08:00', '16:00');
      const blocks = await engine.getTimeBlocks('worker-1', '2024-03-04');
      blocks.forEach((block) => repository.seed(block));
      const reporting = new TimeReportingService(repository, null, {
        overtimeRules: { weeklyThresholdHours: 6, weeklyOtMultiplier: 2, dailyThresholdHours: 7 },
      });

      const report = await reporting.generateWeeklyReport('worker-1', '2024-03-04');

      expect(report.total_regular_hours).toBe(6);
      expect(report.total_overtime_hours).toBe(2);
      expect(report.daily_overtime_hours).toBe(1);
    });

    it('rejects a malformed week start', async () => {
      const { engine } = createTestEngine();

      await expect(engine.generateWeeklyReport('worker-1', 'next monday')).rejects.toThrow(
        'weekStartDate: Invalid calendar day: next monday'
      );
    });
  });

  describe('calculatePayroll', () => {
    it('totals closed blocks in the period and prices them', async () => {
      const { engine } = createTestEngine();
      await workDays(engine, 'worker-1', MON_TO_FRI, '07:00', '16:00');
      await engine.clockIn('worker-1', at('2024-03-09', '08:00'));

      const record = await engine.calculatePayroll('worker-1', '2024-03-04', '2024-03-11', { hourlyRate: 2000 });

      expect(record).toEqual({
        worker_id: 'worker-1',
        period_start: '2024-03-04',
        period_end: '2024-03-11',
        total_hours: 45,
        block_count: 5,
        hourly_rate: 2000,
        estimated_pay: 90000,
      });
    });

    it('excludes the end day and leaves pay empty without a rate', async () => {
      const { engine } = createTestEngine();
      await workDays(engine, 'worker-1', MON_TO_FRI, '08:00', '12:00');

      const record = await engine.calculatePayroll('worker-1', '2024-03-04', '2024-03-08');

      expect(record.total_hours).toBe(16);
      expect(record.hourly_rate).toBeNull();
      expect(record.estimated_pay).toBeNull();
    });

    it('rejects a negative or non-numeric rate', async () => {
      const { engine } = createTestEngine();

      await expect(
        engine.calculatePayroll('worker-1', '2024-03-04', '2024-03-11', { hourlyRate: -100 })
      ).rejects.toThrow('hourlyRate: Number must be greater than or equal to 0');
      await expect(
        engine.calculatePayroll('worker-1', '2024-03-04', '2024-03-11', { hourlyRate: Number.NaN })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects a period that ends before it starts', async () => {
      const { engine } = createTestEngine();

      await expect(engine.calculatePayroll('worker-1', '2024-03-11', '2024-03-04')).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });

  describe('generateOvertimeReport', () => {
    const workers = [
      { id: 'w-ben', name: 'Ben', is_active: true },
      { id: 'w-ana', name: 'Ana', is_active: true },
      { id: 'w-cy', name: 'Cy', is_active: false },
    ];

    it('lists active workers over the weekly threshold', async () => {
      const now = at('2024-03-11', '06:00');
      const { engine } = createTestEngine({ workers, now });
      await workDays(engine, 'w-ana', MON_TO_FRI, '07:00', '16:00');
      await workDays(engine, 'w-ben', MON_TO_FRI, '08:00', '14:00');
      await workDays(engine, 'w-cy', MON_TO_FRI, '06:00', '16:00');

      const report = await engine.generateOvertimeReport('2024-03-06', { hourlyRates: { 'w-ana': 2000 } });

      expect(report).toEqual({
        week_start_date: '2024-03-04',
        generated_at: now,
        overtime_workers: [
          {
            worker_id: 'w-ana',
            worker_name: 'Ana',
            regular_hours: 40,
            overtime_hours: 5,
            daily_overtime_breakdown: {
              '2024-03-04': 1,
              '2024-03-05': 1,
              '2024-03-06': 1,
              '2024-03-07': 1,
              '2024-03-08': 1,
            },
          },
        ],
        total_overtime_hours: 5,
        estimated_overtime_cost: 15000,
      });
    });

    it('rejects an invalid rate before reading any blocks', async () => {
      const { engine } = createTestEngine({ workers });

      await expect(
        engine.generateOvertimeReport('2024-03-04', { hourlyRates: { 'w-ana': Number.POSITIVE_INFINITY } })
      ).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
      await expect(
        engine.generateOvertimeReport('2024-03-04', { hourlyRates: { 'w-ben': -5 } })
      ).rejects.toThrow('hourlyRates.w-ben: Number must be greater than or equal to 0');
    });

    it('needs a worker directory', async () => {
      const { engine } = createTestEngine();

      await expect(engine.generateOvertimeReport('2024-03-04')).rejects.toThrow(
        'Overtime reports need a worker directory'
      );
    });
  });

  describe('sumClosedHoursByDay', () => {
    it('skips active blocks', () => {
      const base = {
        worker_id: 'worker-1',
        clock_in_time: at('2024-03-04', '08:00'),
        clock_out_time: null,
        week_number: 10,
        year: 2024,
      };

      const byDay = sumClosedHoursByDay([
        { ...base, id: 'a', work_date: '2024-03-04', block_number: 1, hours_worked: 2, is_active: false },
        { ...base, id: 'b', work_date: '2024-03-04', block_number: 2, hours_worked: 1.5, is_active: false },
        { ...base, id: 'c', work_date: '2024-03-04', block_number: 3, hours_worked: 0, is_active: true },
      ]);

      expect(byDay.get('2024-03-04')).toEqual({ hours: 3.5, count: 2 });
    });
  });
});
