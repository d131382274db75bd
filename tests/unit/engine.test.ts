import { describe, it, expect } from 'vitest';
import { createSupabaseTimeTrackingEngine } from '@/engine';
import { DEFAULT_OVERTIME_RULES } from '@/lib/overtimeCalculations';
import { at, createTestEngine } from '../helpers/timeTracking';

describe('createTimeTrackingEngine', () => {
  it('exposes the segment calculator', () => {
    const { engine } = createTestEngine();

    const segment = engine.startWorkSegment(at('2024-03-04', '08:00'), 3, ['Ana', 'Ben', 'Cy']);
    const closed = engine.closeWorkSegment(segment, at('2024-03-04', '12:00'));

    expect(closed.total_hours).toBe(12);
  });

  it('keeps crew sessions apart from worker time blocks', async () => {
    const { engine } = createTestEngine();

    await engine.crew.start('wo-1', { team_size: 2, team_members: ['worker-1', 'worker-2'] }, at('2024-03-04', '08:00'));

    expect(await engine.getClockedInWorkers()).toEqual([]);
    expect(await engine.isClockedIn('worker-1')).toBe(false);
  });

  it('walks a worker through a day', async () => {
    const { engine } = createTestEngine({ now: at('2024-03-04', '18:00') });

    await engine.clockIn('worker-1', at('2024-03-04', '07:00'));
    expect(await engine.getClockedInWorkers()).toEqual(['worker-1']);
    await engine.clockOut('worker-1', at('2024-03-04', '11:00'));
    await engine.clockIn('worker-1', at('2024-03-04', '12:00'));
    await engine.clockOut('worker-1', at('2024-03-04', '16:30'));

    expect(await engine.getTotalHours('worker-1', '2024-03-04')).toBe(8.5);
    const payroll = await engine.calculatePayroll('worker-1', '2024-03-04', '2024-03-05', { hourlyRate: 1800 });
    expect(payroll.estimated_pay).toBe(15300);
  });
});

describe('createSupabaseTimeTrackingEngine', () => {
  it('requires Supabase credentials', () => {
    expect(() =>
      createSupabaseTimeTrackingEngine({ overtimeRules: DEFAULT_OVERTIME_RULES, supabase: null })
    ).toThrow('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set');
  });
});
