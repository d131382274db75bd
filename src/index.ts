export {
  createSupabaseTimeTrackingEngine,
  createTimeTrackingEngine,
  type TimeTrackingDependencies,
  type TimeTrackingEngine,
} from '@/engine';

export {
  AlreadyClockedInError,
  InvalidStateError,
  NotClockedInError,
  StoreError,
  TimeTrackingError,
  ValidationError,
  isTimeTrackingError,
  type StoreErrorReason,
  type TimeTrackingErrorCode,
} from '@/lib/errors';
export { loadConfig, type SupabaseConfig, type TimeTrackingConfig } from '@/lib/config';
export { KeyedLock } from '@/lib/keyedLock';
export {
  DEFAULT_OVERTIME_RULES,
  calculateDailyOvertime,
  calculateOvertimeCost,
  calculateWeeklyOvertime,
  splitWeeklyHours,
  type OvertimeResult,
  type OvertimeRules,
} from '@/lib/overtimeCalculations';
export { formatHours, formatTimeBlock, hoursBetween } from '@/lib/timeUtils';
export { calendarDay, startOfCalendarWeek, toCalendarDay } from '@/lib/timezone';

export {
  InMemoryCrewAuditLog,
  InMemoryTimeBlockRepository,
  InMemoryWorkSegmentRepository,
  InMemoryWorkerDirectory,
} from '@/integrations/memory/repositories';
export { createSupabaseClient } from '@/integrations/supabase/client';
export {
  SupabaseCrewAuditLog,
  SupabaseTimeBlockRepository,
  SupabaseWorkSegmentRepository,
  SupabaseWorkerDirectory,
} from '@/integrations/supabase/repositories';

export { CrewSessionService, type CrewSessionSummary } from '@/services/crewSession.service';
export { TimeBlockQueries } from '@/services/timeBlockQueries';
export { TimeClockService } from '@/services/timeClock.service';
export {
  TimeReportingService,
  type OvertimeReportOptions,
  type PayrollOptions,
} from '@/services/timeReporting.service';

export {
  calculateSegmentHours,
  closeWorkSegment,
  isSegmentActive,
  projectSegmentHours,
  startWorkSegment,
  sumSegmentHours,
} from '@/utils/workSegments';
export {
  formatCents,
  formatPayrollRecord,
  formatWeeklyReport,
  type PayrollViewModel,
  type WeeklyReportViewModel,
} from '@/utils/timeReportFormatting';

export type * from '@/types/repositories';
export type * from '@/types/timeTracking';
