import type { CalendarDay, CrewAuditEntry, StoredWorkSegment, TimeBlock, Worker } from '@/types/timeTracking';

/**
 * Persistence contract for time blocks.
 *
 * `save` is an atomic check-and-insert: it rejects with a `StoreError` whose
 * reason is `conflict` when the worker already has an active block.
 * `update` only replaces a block that is still active; a closed or missing
 * block rejects with reason `not_found`.
 */
export interface TimeBlockRepository {
  save(block: TimeBlock): Promise<TimeBlock>;
  update(block: TimeBlock): Promise<TimeBlock>;
  findActive(workerId: string): Promise<TimeBlock | null>;
  /** Blocks with `startDay <= work_date < endDay`, ordered by day then block number */
  findByDateRange(workerId: string, startDay: CalendarDay, endDay: CalendarDay): Promise<TimeBlock[]>;
  findActiveWorkerIds(): Promise<string[]>;
}

export interface WorkSegmentRepository {
  save(segment: StoredWorkSegment): Promise<StoredWorkSegment>;
  update(segment: StoredWorkSegment): Promise<StoredWorkSegment>;
  /** Segments of one work order ordered by start time */
  findByWorkOrder(workOrderId: string): Promise<StoredWorkSegment[]>;
}

export interface WorkerDirectory {
  listWorkers(): Promise<Worker[]>;
  getWorker(workerId: string): Promise<Worker | null>;
}

/** Append-only trail of crew session transitions */
export interface CrewAuditLog {
  record(entry: CrewAuditEntry): Promise<void>;
  findByWorkOrder(workOrderId: string): Promise<CrewAuditEntry[]>;
}
