/**
 * Composition root. Every service gets its collaborators from here; nothing
 * in the engine holds a process-wide instance.
 */

import { createSupabaseClient } from '@/integrations/supabase/client';
import {
  SupabaseCrewAuditLog,
  SupabaseTimeBlockRepository,
  SupabaseWorkSegmentRepository,
  SupabaseWorkerDirectory,
} from '@/integrations/supabase/repositories';
import { loadConfig, type TimeTrackingConfig } from '@/lib/config';
import { KeyedLock } from '@/lib/keyedLock';
import { DEFAULT_OVERTIME_RULES } from '@/lib/overtimeCalculations';
import { CrewSessionService } from '@/services/crewSession.service';
import { TimeBlockQueries } from '@/services/timeBlockQueries';
import { TimeClockService } from '@/services/timeClock.service';
import {
  TimeReportingService,
  type OvertimeReportOptions,
  type PayrollOptions,
} from '@/services/timeReporting.service';
import { closeWorkSegment, startWorkSegment } from '@/utils/workSegments';
import type {
  CrewAuditLog,
  TimeBlockRepository,
  WorkSegmentRepository,
  WorkerDirectory,
} from '@/types/repositories';
import type {
  CalendarDay,
  OvertimeReport,
  PayrollRecord,
  TimeBlock,
  WeeklyReport,
  WorkSegment,
} from '@/types/timeTracking';

export interface TimeTrackingDependencies {
  timeBlocks: TimeBlockRepository;
  workSegments: WorkSegmentRepository;
  crewAuditLog: CrewAuditLog;
  workers?: WorkerDirectory;
  config?: Partial<Pick<TimeTrackingConfig, 'timeZone' | 'overtimeRules'>>;
  now?: () => Date;
  generateId?: () => string;
}

export interface TimeTrackingEngine {
  clockIn(workerId: string, timestamp: Date): Promise<TimeBlock>;
  clockOut(workerId: string, timestamp: Date): Promise<TimeBlock>;
  isClockedIn(workerId: string): Promise<boolean>;
  getActiveBlock(workerId: string): Promise<TimeBlock | null>;
  getTimeBlocks(workerId: string, date: Date | CalendarDay): Promise<TimeBlock[]>;
  getTotalHours(workerId: string, date: Date | CalendarDay): Promise<number>;
  getClockedInWorkers(): Promise<string[]>;
  startWorkSegment(startTime: Date, teamSize: number, teamMembers: string[]): WorkSegment;
  closeWorkSegment(segment: WorkSegment, endTime: Date): WorkSegment;
  generateWeeklyReport(workerId: string, weekStart: Date | CalendarDay): Promise<WeeklyReport>;
  calculatePayroll(
    workerId: string,
    periodStart: Date | CalendarDay,
    periodEnd: Date | CalendarDay,
    options?: PayrollOptions
  ): Promise<PayrollRecord>;
  generateOvertimeReport(weekStart: Date | CalendarDay, options?: OvertimeReportOptions): Promise<OvertimeReport>;
  crew: CrewSessionService;
}

export function createTimeTrackingEngine(deps: TimeTrackingDependencies): TimeTrackingEngine {
  const timeZone = deps.config?.timeZone;
  const overtimeRules = deps.config?.overtimeRules ?? DEFAULT_OVERTIME_RULES;
  const lock = new KeyedLock();

  const queries = new TimeBlockQueries(deps.timeBlocks, { timeZone, now: deps.now });
  const clock = new TimeClockService(deps.timeBlocks, queries, {
    timeZone,
    lock,
    generateId: deps.generateId,
  });
  const reporting = new TimeReportingService(deps.timeBlocks, deps.workers ?? null, {
    timeZone,
    overtimeRules,
    now: deps.now,
  });
  const crew = new CrewSessionService(deps.workSegments, deps.crewAuditLog, {
    lock,
    generateId: deps.generateId,
    now: deps.now,
  });

  return {
    clockIn: (workerId, timestamp) => clock.clockIn(workerId, timestamp),
    clockOut: (workerId, timestamp) => clock.clockOut(workerId, timestamp),
    isClockedIn: (workerId) => clock.isClockedIn(workerId),
    getActiveBlock: (workerId) => queries.findActiveBlock(workerId),
    getTimeBlocks: (workerId, date) => queries.findBlocks(workerId, date),
    getTotalHours: (workerId, date) => queries.totalHours(workerId, date),
    getClockedInWorkers: () => queries.findClockedInWorkers(),
    startWorkSegment,
    closeWorkSegment: (segment, endTime) => closeWorkSegment(segment, endTime),
    generateWeeklyReport: (workerId, weekStart) => reporting.generateWeeklyReport(workerId, weekStart),
    calculatePayroll: (workerId, periodStart, periodEnd, options) =>
      reporting.calculatePayroll(workerId, periodStart, periodEnd, options),
    generateOvertimeReport: (weekStart, options) => reporting.generateOvertimeReport(weekStart, options),
    crew,
  };
}

/**
 * Production wiring: Supabase-backed repositories configured from the environment.
 */
export function createSupabaseTimeTrackingEngine(
  config: TimeTrackingConfig = loadConfig()
): TimeTrackingEngine {
  if (!config.supabase) {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set');
  }

  const supabase = createSupabaseClient(config.supabase);
  return createTimeTrackingEngine({
    timeBlocks: new SupabaseTimeBlockRepository(supabase),
    workSegments: new SupabaseWorkSegmentRepository(supabase),
    crewAuditLog: new SupabaseCrewAuditLog(supabase),
    workers: new SupabaseWorkerDirectory(supabase),
    config,
  });
}
