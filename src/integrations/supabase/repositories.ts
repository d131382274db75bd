import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { StoreError } from '@/lib/errors';
import type {
  CrewAuditLog,
  TimeBlockRepository,
  WorkSegmentRepository,
  WorkerDirectory,
} from '@/types/repositories';
import type { CalendarDay, CrewAuditEntry, StoredWorkSegment, TimeBlock, Worker } from '@/types/timeTracking';

// Postgres unique_violation: raised by the one-open-block-per-worker index
const UNIQUE_VIOLATION = '23505';

const timestampColumn = z
  .string()
  .nullable()
  .transform((value) => (value === null ? null : new Date(value)));

const timeBlockRowSchema = z.object({
  id: z.string(),
  worker_id: z.string(),
  work_date: z.string(),
  block_number: z.number().int(),
  clock_in_time: timestampColumn,
  clock_out_time: timestampColumn,
  hours_worked: z.coerce.number(),
  is_active: z.boolean(),
  week_number: z.number().int(),
  year: z.number().int(),
});

const workSegmentRowSchema = z.object({
  id: z.string(),
  work_order_id: z.string(),
  start_time: z.string().transform((value) => new Date(value)),
  end_time: timestampColumn,
  team_size: z.number().int(),
  team_members: z.array(z.string()),
  total_hours: z.coerce.number(),
});

const workerRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  is_active: z.boolean(),
});

const activeWorkerRowSchema = z.object({ worker_id: z.string() });

const crewAuditRowSchema = z.object({
  work_order_id: z.string(),
  action: z.enum(['started', 'stopped', 'team_changed', 'completed']),
  details: z.string(),
  recorded_at: z.string().transform((value) => new Date(value)),
});

const toTimeBlockRow = (block: TimeBlock) => ({
  ...block,
  clock_in_time: block.clock_in_time?.toISOString() ?? null,
  clock_out_time: block.clock_out_time?.toISOString() ?? null,
});

const toWorkSegmentRow = (segment: StoredWorkSegment) => ({
  ...segment,
  start_time: segment.start_time.toISOString(),
  end_time: segment.end_time?.toISOString() ?? null,
});

function toStoreError(operation: string, error: PostgrestError): StoreError {
  console.error(`[SupabaseStore] ${operation} failed:`, error);
  if (error.code === UNIQUE_VIOLATION) {
    return new StoreError('conflict', `${operation}: ${error.message}`, error);
  }
  return new StoreError('io', `${operation}: ${error.message}`, error);
}

function parseRow<S extends z.ZodTypeAny>(schema: S, operation: string, row: unknown): z.output<S> {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    throw new StoreError('io', `${operation}: unexpected row shape`, parsed.error);
  }
  return parsed.data;
}

export class SupabaseTimeBlockRepository implements TimeBlockRepository {
  constructor(private readonly supabase: SupabaseClient) {}

  async save(block: TimeBlock): Promise<TimeBlock> {
    const { data, error } = await this.supabase
      .from('time_blocks')
      .insert(toTimeBlockRow(block))
      .select()
      .single();

    if (error) throw toStoreError('save time block', error);
    return parseRow(timeBlockRowSchema, 'save time block', data);
  }

  async update(block: TimeBlock): Promise<TimeBlock> {
    const { data, error } = await this.supabase
      .from('time_blocks')
      .update(toTimeBlockRow(block))
      .eq('id', block.id)
      .eq('is_active', true)
      .select()
      .maybeSingle();

    if (error) throw toStoreError('update time block', error);
    if (!data) throw new StoreError('not_found', `Open time block ${block.id} not found`);
    return parseRow(timeBlockRowSchema, 'update time block', data);
  }

  async findActive(workerId: string): Promise<TimeBlock | null> {
    const { data, error } = await this.supabase
      .from('time_blocks')
      .select('*')
      .eq('worker_id', workerId)
      .eq('is_active', true)
      .maybeSingle();

    if (error) throw toStoreError('find active time block', error);
    return data ? parseRow(timeBlockRowSchema, 'find active time block', data) : null;
  }

  async findByDateRange(workerId: string, startDay: CalendarDay, endDay: CalendarDay): Promise<TimeBlock[]> {
    const { data, error } = await this.supabase
      .from('time_blocks')
      .select('*')
      .eq('worker_id', workerId)
      .gte('work_date', startDay)
      .lt('work_date', endDay)
      .order('work_date', { ascending: true })
      .order('block_number', { ascending: true });

    if (error) throw toStoreError('find time blocks', error);
    return parseRow(z.array(timeBlockRowSchema), 'find time blocks', data ?? []);
  }

  async findActiveWorkerIds(): Promise<string[]> {
    const { data, error } = await this.supabase
      .from('time_blocks')
      .select('worker_id')
      .eq('is_active', true);

    if (error) throw toStoreError('find clocked-in workers', error);
    const rows = parseRow(z.array(activeWorkerRowSchema), 'find clocked-in workers', data ?? []);
    return Array.from(new Set(rows.map((row) => row.worker_id))).sort();
  }
}

export class SupabaseWorkSegmentRepository implements WorkSegmentRepository {
  constructor(private readonly supabase: SupabaseClient) {}

  async save(segment: StoredWorkSegment): Promise<StoredWorkSegment> {
    const { data, error } = await this.supabase
      .from('work_segments')
      .insert(toWorkSegmentRow(segment))
      .select()
      .single();

    if (error) throw toStoreError('save work segment', error);
    return parseRow(workSegmentRowSchema, 'save work segment', data);
  }

  async update(segment: StoredWorkSegment): Promise<StoredWorkSegment> {
    const { data, error } = await this.supabase
      .from('work_segments')
      .update(toWorkSegmentRow(segment))
      .eq('id', segment.id)
      .select()
      .maybeSingle();

    if (error) throw toStoreError('update work segment', error);
    if (!data) throw new StoreError('not_found', `Work segment ${segment.id} not found`);
    return parseRow(workSegmentRowSchema, 'update work segment', data);
  }

  async findByWorkOrder(workOrderId: string): Promise<StoredWorkSegment[]> {
    const { data, error } = await this.supabase
      .from('work_segments')
      .select('*')
      .eq('work_order_id', workOrderId)
      .order('start_time', { ascending: true });

    if (error) throw toStoreError('find work segments', error);
    return parseRow(z.array(workSegmentRowSchema), 'find work segments', data ?? []);
  }
}

export class SupabaseWorkerDirectory implements WorkerDirectory {
  constructor(private readonly supabase: SupabaseClient) {}

  async listWorkers(): Promise<Worker[]> {
    const { data, error } = await this.supabase
      .from('workers')
      .select('id, name, is_active')
      .order('name', { ascending: true });

    if (error) throw toStoreError('list workers', error);
    return parseRow(z.array(workerRowSchema), 'list workers', data ?? []);
  }

  async getWorker(workerId: string): Promise<Worker | null> {
    const { data, error } = await this.supabase
      .from('workers')
      .select('id, name, is_active')
      .eq('id', workerId)
      .maybeSingle();

    if (error) throw toStoreError('get worker', error);
    return data ? parseRow(workerRowSchema, 'get worker', data) : null;
  }
}

export class SupabaseCrewAuditLog implements CrewAuditLog {
  constructor(private readonly supabase: SupabaseClient) {}

  async record(entry: CrewAuditEntry): Promise<void> {
    const { error } = await this.supabase
      .from('crew_audit_entries')
      .insert({ ...entry, recorded_at: entry.recorded_at.toISOString() });

    if (error) throw toStoreError('record crew audit entry', error);
  }

  async findByWorkOrder(workOrderId: string): Promise<CrewAuditEntry[]> {
    const { data, error } = await this.supabase
      .from('crew_audit_entries')
      .select('work_order_id, action, details, recorded_at')
      .eq('work_order_id', workOrderId)
      .order('recorded_at', { ascending: true })
      .order('id', { ascending: true });

    if (error) throw toStoreError('find crew audit entries', error);
    return parseRow(z.array(crewAuditRowSchema), 'find crew audit entries', data ?? []);
  }
}
