import { ValidationError } from '@/lib/errors';
import { addCalendarDays, toCalendarDay } from '@/lib/timezone';
import { hoursBetween } from '@/lib/timeUtils';
import type { TimeBlockRepository } from '@/types/repositories';
import type { CalendarDay, TimeBlock } from '@/types/timeTracking';

export interface TimeBlockQueryOptions {
  timeZone?: string;
  now?: () => Date;
}

/**
 * Read side of the time block store, shared by the clock service, the
 * reporting service and outside presentation code.
 */
export class TimeBlockQueries {
  private readonly timeZone?: string;
  private readonly now: () => Date;

  constructor(
    private readonly repository: TimeBlockRepository,
    options: TimeBlockQueryOptions = {}
  ) {
    this.timeZone = options.timeZone;
    this.now = options.now ?? (() => new Date());
  }

  findActiveBlock(workerId: string): Promise<TimeBlock | null> {
    return this.repository.findActive(workerId);
  }

  /** All blocks of one calendar day, open or closed, ordered by block number */
  async findBlocks(workerId: string, date: Date | CalendarDay): Promise<TimeBlock[]> {
    const day = this.toDay(date);
    const blocks = await this.repository.findByDateRange(workerId, day, addCalendarDays(day, 1));
    return blocks.sort((a, b) => a.block_number - b.block_number);
  }

  /**
   * Closed blocks contribute their stored hours. Open blocks contribute the
   * hours elapsed so far; that projection is never written back.
   */
  async totalHours(workerId: string, date: Date | CalendarDay): Promise<number> {
    const blocks = await this.findBlocks(workerId, date);
    const now = this.now();

    return blocks.reduce((total, block) => {
      if (block.is_active) {
        return block.clock_in_time ? total + hoursBetween(block.clock_in_time, now) : total;
      }
      return total + block.hours_worked;
    }, 0);
  }

  async nextBlockNumber(workerId: string, day: CalendarDay): Promise<number> {
    const blocks = await this.findBlocks(workerId, day);
    const maxBlockNumber = blocks.reduce((max, block) => Math.max(max, block.block_number), 0);
    return maxBlockNumber + 1;
  }

  findClockedInWorkers(): Promise<string[]> {
    return this.repository.findActiveWorkerIds();
  }

  private toDay(date: Date | CalendarDay): CalendarDay {
    try {
      return toCalendarDay(date, this.timeZone);
    } catch (error) {
      throw new ValidationError(error instanceof Error ? error.message : String(error));
    }
  }
}
