import { StoreError } from '@/lib/errors';
import type {
  CrewAuditLog,
  TimeBlockRepository,
  WorkSegmentRepository,
  WorkerDirectory,
} from '@/types/repositories';
import type { CalendarDay, CrewAuditEntry, StoredWorkSegment, TimeBlock, Worker } from '@/types/timeTracking';

const copyBlock = (block: TimeBlock): TimeBlock => ({ ...block });

const copySegment = (segment: StoredWorkSegment): StoredWorkSegment => ({
  ...segment,
  team_members: [...segment.team_members],
});

/**
 * In-process time block store for tests and single-node tools.
 * Each call completes synchronously, so the active-block check and the
 * insert in `save` cannot interleave with another caller.
 */
export class InMemoryTimeBlockRepository implements TimeBlockRepository {
  private blocks = new Map<string, TimeBlock>();

  async save(block: TimeBlock): Promise<TimeBlock> {
    if (this.blocks.has(block.id)) {
      throw new StoreError('conflict', `Time block ${block.id} already exists`);
    }
    if (block.is_active && this.findActiveSync(block.worker_id)) {
      throw new StoreError('conflict', `Worker ${block.worker_id} already has an open time block`);
    }
    const duplicateNumber = Array.from(this.blocks.values()).some(
      (existing) =>
        existing.worker_id === block.worker_id &&
        existing.work_date === block.work_date &&
        existing.block_number === block.block_number
    );
    if (duplicateNumber) {
      throw new StoreError('conflict', `Block ${block.block_number} already exists for ${block.work_date}`);
    }

    this.blocks.set(block.id, copyBlock(block));
    return copyBlock(block);
  }

  async update(block: TimeBlock): Promise<TimeBlock> {
    const stored = this.blocks.get(block.id);
    if (!stored?.is_active) {
      throw new StoreError('not_found', `Open time block ${block.id} not found`);
    }
    this.blocks.set(block.id, copyBlock(block));
    return copyBlock(block);
  }

  async findActive(workerId: string): Promise<TimeBlock | null> {
    const active = this.findActiveSync(workerId);
    return active ? copyBlock(active) : null;
  }

  async findByDateRange(workerId: string, startDay: CalendarDay, endDay: CalendarDay): Promise<TimeBlock[]> {
    return Array.from(this.blocks.values())
      .filter((b) => b.worker_id === workerId && b.work_date >= startDay && b.work_date < endDay)
      .sort((a, b) => a.work_date.localeCompare(b.work_date) || a.block_number - b.block_number)
      .map(copyBlock);
  }

  async findActiveWorkerIds(): Promise<string[]> {
    const ids = new Set<string>();
    for (const block of this.blocks.values()) {
      if (block.is_active) ids.add(block.worker_id);
    }
    return Array.from(ids).sort();
  }

  /** Test seam: inserts a row as-is, bypassing every check */
  seed(block: TimeBlock): void {
    this.blocks.set(block.id, copyBlock(block));
  }

  private findActiveSync(workerId: string): TimeBlock | undefined {
    return Array.from(this.blocks.values()).find((b) => b.worker_id === workerId && b.is_active);
  }
}

export class InMemoryWorkSegmentRepository implements WorkSegmentRepository {
  private segments = new Map<string, StoredWorkSegment>();

  async save(segment: StoredWorkSegment): Promise<StoredWorkSegment> {
    if (this.segments.has(segment.id)) {
      throw new StoreError('conflict', `Work segment ${segment.id} already exists`);
    }
    this.segments.set(segment.id, copySegment(segment));
    return copySegment(segment);
  }

  async update(segment: StoredWorkSegment): Promise<StoredWorkSegment> {
    if (!this.segments.has(segment.id)) {
      throw new StoreError('not_found', `Work segment ${segment.id} not found`);
    }
    this.segments.set(segment.id, copySegment(segment));
    return copySegment(segment);
  }

  async findByWorkOrder(workOrderId: string): Promise<StoredWorkSegment[]> {
    return Array.from(this.segments.values())
      .filter((s) => s.work_order_id === workOrderId)
      .sort((a, b) => a.start_time.getTime() - b.start_time.getTime())
      .map(copySegment);
  }
}

export class InMemoryWorkerDirectory implements WorkerDirectory {
  private workers: Map<string, Worker>;

  constructor(workers: Worker[] = []) {
    this.workers = new Map(workers.map((w) => [w.id, { ...w }]));
  }

  async listWorkers(): Promise<Worker[]> {
    return Array.from(this.workers.values())
      .map((w) => ({ ...w }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async getWorker(workerId: string): Promise<Worker | null> {
    const worker = this.workers.get(workerId);
    return worker ? { ...worker } : null;
  }
}

export class InMemoryCrewAuditLog implements CrewAuditLog {
  private entries: CrewAuditEntry[] = [];

  async record(entry: CrewAuditEntry): Promise<void> {
    this.entries.push({ ...entry });
  }

  async findByWorkOrder(workOrderId: string): Promise<CrewAuditEntry[]> {
    return this.entries.filter((e) => e.work_order_id === workOrderId).map((e) => ({ ...e }));
  }
}
