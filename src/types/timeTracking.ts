/** Calendar day in `yyyy-MM-dd` form */
export type CalendarDay = string;

export interface TimeBlock {
  id: string;
  worker_id: string;
  work_date: CalendarDay;
  block_number: number; // 1-based, per worker per day
  clock_in_time: Date | null; // null only on corrupted rows
  clock_out_time: Date | null;
  hours_worked: number; // 0 while open
  is_active: boolean;
  week_number: number; // ISO week of the clock-in
  year: number; // ISO week-numbering year
}

export interface WorkSegment {
  start_time: Date;
  end_time: Date | null;
  team_size: number; // authoritative headcount for the hour formula
  team_members: string[]; // audit only
  total_hours: number; // 0 until closed
}

export interface StoredWorkSegment extends WorkSegment {
  id: string;
  work_order_id: string;
}

export interface Worker {
  id: string;
  name: string;
  is_active: boolean;
}

export interface DailyHoursEntry {
  date: CalendarDay;
  hours: number;
  block_count: number;
  daily_overtime_hours: number;
  is_daily_overtime: boolean;
}

export interface WeeklyReport {
  worker_id: string;
  week_start_date: CalendarDay; // Monday
  daily_entries: DailyHoursEntry[];
  total_regular_hours: number;
  total_overtime_hours: number;
  daily_overtime_hours: number; // informational pool, not part of the split
  weekly_total: number;
  is_weekly_overtime: boolean;
}

export interface PayrollRecord {
  worker_id: string;
  period_start: CalendarDay; // inclusive
  period_end: CalendarDay; // exclusive
  total_hours: number;
  block_count: number;
  hourly_rate: number | null; // In cents
  estimated_pay: number | null; // In cents
}

export interface OvertimeWorkerData {
  worker_id: string;
  worker_name: string;
  regular_hours: number;
  overtime_hours: number;
  daily_overtime_breakdown: Record<CalendarDay, number>;
}

export interface OvertimeReport {
  week_start_date: CalendarDay;
  generated_at: Date;
  overtime_workers: OvertimeWorkerData[];
  total_overtime_hours: number;
  estimated_overtime_cost: number; // In cents
}

// A completed work order is locked against further segments
export type CrewOperationState = 'not_started' | 'in_progress' | 'stopped' | 'locked';

export type CrewAuditAction = 'started' | 'stopped' | 'team_changed' | 'completed';

export interface CrewAuditEntry {
  work_order_id: string;
  action: CrewAuditAction;
  details: string;
  recorded_at: Date;
}

export interface CrewTeam {
  team_size: number;
  team_members: string[];
}
