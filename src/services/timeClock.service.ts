/**
 * Clock state machine
 *
 * Per worker: ClockedOut ⇄ ClockedIn. A worker is ClockedIn while exactly one
 * of their time blocks is active, whatever day it was opened on.
 *
 * Same-worker transitions are serialized with an in-process lock; across
 * processes the repository's atomic check-and-insert decides the winner of a
 * clock-in, and its conditional update the winner of a clock-out.
 *
 * @module services/timeClock
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  AlreadyClockedInError,
  InvalidStateError,
  NotClockedInError,
  StoreError,
  ValidationError,
} from '@/lib/errors';
import { KeyedLock } from '@/lib/keyedLock';
import { calendarDay, isoWeekOf } from '@/lib/timezone';
import { formatHours, hoursBetween } from '@/lib/timeUtils';
import { TimeBlockQueries } from '@/services/timeBlockQueries';
import type { TimeBlockRepository } from '@/types/repositories';
import type { TimeBlock } from '@/types/timeTracking';

const clockEventSchema = z.object({
  workerId: z.string().trim().min(1, 'workerId is required'),
  timestamp: z.date({ invalid_type_error: 'timestamp must be a valid Date' }),
});

export interface TimeClockServiceOptions {
  timeZone?: string;
  lock?: KeyedLock;
  generateId?: () => string;
}

function parseClockEvent(workerId: string, timestamp: Date): { workerId: string; timestamp: Date } {
  const parsed = clockEventSchema.safeParse({ workerId, timestamp });
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((i) => i.message).join('; '), parsed.error.issues);
  }
  return parsed.data;
}

export class TimeClockService {
  private readonly timeZone?: string;
  private readonly lock: KeyedLock;
  private readonly generateId: () => string;

  constructor(
    private readonly repository: TimeBlockRepository,
    private readonly queries: TimeBlockQueries,
    options: TimeClockServiceOptions = {}
  ) {
    this.timeZone = options.timeZone;
    this.lock = options.lock ?? new KeyedLock();
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Opens a new time block dated on the calendar day of `timestamp`.
   * @throws AlreadyClockedInError when any block of the worker is still active
   */
  async clockIn(workerId: string, timestamp: Date): Promise<TimeBlock> {
    const event = parseClockEvent(workerId, timestamp);

    return this.lock.run(event.workerId, async () => {
      const active = await this.queries.findActiveBlock(event.workerId);
      if (active) {
        throw new AlreadyClockedInError(event.workerId);
      }

      const workDate = calendarDay(event.timestamp, this.timeZone);
      const blockNumber = await this.queries.nextBlockNumber(event.workerId, workDate);
      const { weekNumber, year } = isoWeekOf(event.timestamp, this.timeZone);

      const block: TimeBlock = {
        id: this.generateId(),
        worker_id: event.workerId,
        work_date: workDate,
        block_number: blockNumber,
        clock_in_time: event.timestamp,
        clock_out_time: null,
        hours_worked: 0,
        is_active: true,
        week_number: weekNumber,
        year,
      };

      let saved: TimeBlock;
      try {
        saved = await this.repository.save(block);
      } catch (error) {
        // Another process opened a block between our read and the insert
        if (error instanceof StoreError && error.reason === 'conflict') {
          throw new AlreadyClockedInError(event.workerId);
        }
        throw error;
      }

      console.log(`[TimeClock] Clock IN: ${event.workerId} block ${blockNumber} on ${workDate}`);
      return saved;
    });
  }

  /**
   * Closes the worker's active block. A timestamp before the clock-in yields
   * negative hours; callers that want to reject that must check first.
   */
  async clockOut(workerId: string, timestamp: Date): Promise<TimeBlock> {
    const event = parseClockEvent(workerId, timestamp);

    return this.lock.run(event.workerId, async () => {
      const active = await this.queries.findActiveBlock(event.workerId);
      if (!active) {
        throw new NotClockedInError(event.workerId);
      }
      if (!active.clock_in_time) {
        throw new InvalidStateError(`Time block ${active.id} has no clock-in time`);
      }

      const closed: TimeBlock = {
        ...active,
        clock_out_time: event.timestamp,
        hours_worked: hoursBetween(active.clock_in_time, event.timestamp),
        is_active: false,
      };

      let saved: TimeBlock;
      try {
        saved = await this.repository.update(closed);
      } catch (error) {
        // Another process closed the block between our read and the write
        if (error instanceof StoreError && error.reason === 'not_found') {
          throw new NotClockedInError(event.workerId);
        }
        throw error;
      }

      console.log(
        `[TimeClock] Clock OUT: ${event.workerId} block ${saved.block_number} - ${formatHours(saved.hours_worked)}`
      );
      return saved;
    });
  }

  async isClockedIn(workerId: string): Promise<boolean> {
    return (await this.queries.findActiveBlock(workerId)) !== null;
  }
}
