/**
 * Crew session for one work order.
 *
 * Drives the order's work segments through not_started → in_progress ⇄
 * stopped → locked. A team change while in progress closes the running
 * segment and opens a new one at the same instant; segments are never split
 * after the fact.
 *
 * @module services/crewSession
 */

import { randomUUID } from 'node:crypto';
import { InvalidStateError } from '@/lib/errors';
import { KeyedLock } from '@/lib/keyedLock';
import { formatHours } from '@/lib/timeUtils';
import {
  closeWorkSegment,
  hasTeamChanged,
  projectSegmentHours,
  startWorkSegment,
  sumSegmentHours,
  teamChangeDetails,
} from '@/utils/workSegments';
import type { CrewAuditLog, WorkSegmentRepository } from '@/types/repositories';
import type {
  CrewAuditAction,
  CrewAuditEntry,
  CrewOperationState,
  CrewTeam,
  StoredWorkSegment,
} from '@/types/timeTracking';

export interface CrewSessionSummary {
  work_order_id: string;
  state: CrewOperationState;
  segments: StoredWorkSegment[];
  current_segment: StoredWorkSegment | null;
  total_hours: number; // closed segments only
  live_total_hours: number; // includes the running segment's headcount × elapsed
}

export interface CrewSessionServiceOptions {
  lock?: KeyedLock;
  generateId?: () => string;
  now?: () => Date;
}

export class CrewSessionService {
  private readonly lock: KeyedLock;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(
    private readonly segments: WorkSegmentRepository,
    private readonly auditLog: CrewAuditLog,
    options: CrewSessionServiceOptions = {}
  ) {
    this.lock = options.lock ?? new KeyedLock();
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  async start(workOrderId: string, team: CrewTeam, at: Date): Promise<StoredWorkSegment> {
    return this.lock.run(workOrderId, async () => {
      const { state } = await this.load(workOrderId);
      if (state === 'locked') {
        throw new InvalidStateError(`Work order ${workOrderId} is completed and locked`);
      }
      if (state === 'in_progress') {
        throw new InvalidStateError(`Work order ${workOrderId} already has work in progress`);
      }

      const segment = await this.openSegment(workOrderId, team, at);
      await this.audit(workOrderId, 'started', `Members: ${team.team_size}`, at);
      return segment;
    });
  }

  async stop(workOrderId: string, at: Date): Promise<StoredWorkSegment> {
    return this.lock.run(workOrderId, async () => {
      const { current } = await this.load(workOrderId);
      if (!current) {
        throw new InvalidStateError(`Work order ${workOrderId} has no work in progress`);
      }

      const closed = await this.segments.update(closeWorkSegment(current, at));
      await this.audit(workOrderId, 'stopped', `Segment hours: ${formatHours(closed.total_hours)}`, at);
      return closed;
    });
  }

  /**
   * Closes the running segment and opens one for the new team. Returns the
   * running segment unchanged when the composition is the same.
   */
  async changeTeam(workOrderId: string, team: CrewTeam, at: Date): Promise<StoredWorkSegment> {
    return this.lock.run(workOrderId, async () => {
      const { current } = await this.load(workOrderId);
      if (!current) {
        throw new InvalidStateError(`Work order ${workOrderId} has no work in progress`);
      }
      if (!hasTeamChanged(current, team)) {
        return current;
      }

      // Validate the new team before touching the running segment
      const next = startWorkSegment(at, team.team_size, team.team_members);
      await this.segments.update(closeWorkSegment(current, at));

      let opened: StoredWorkSegment;
      try {
        opened = await this.segments.save({ ...next, id: this.generateId(), work_order_id: workOrderId });
      } catch (error) {
        // Reopen the running segment so the order stays in progress
        await this.segments.update(current);
        throw error;
      }

      const details = `Team change detected. ${teamChangeDetails(current, team)} New segment started automatically.`;
      await this.audit(workOrderId, 'team_changed', details.replace(/\s+/g, ' '), at);
      return opened;
    });
  }

  async complete(workOrderId: string, at: Date): Promise<CrewSessionSummary> {
    return this.lock.run(workOrderId, async () => {
      const { state, current } = await this.load(workOrderId);
      if (state === 'locked') {
        throw new InvalidStateError(`Work order ${workOrderId} is already completed`);
      }

      if (current) {
        const closed = await this.segments.update(closeWorkSegment(current, at));
        await this.audit(workOrderId, 'stopped', `Segment hours: ${formatHours(closed.total_hours)}`, at);
      }

      const segments = await this.segments.findByWorkOrder(workOrderId);
      const totalHours = sumSegmentHours(segments);
      await this.audit(
        workOrderId,
        'completed',
        `Total hours: ${totalHours.toFixed(1)}, Segments: ${segments.length}`,
        at
      );

      return this.summarize(workOrderId, 'locked', segments, at);
    });
  }

  async getSummary(workOrderId: string, now: Date = this.now()): Promise<CrewSessionSummary> {
    const { state, segments } = await this.load(workOrderId);
    return this.summarize(workOrderId, state, segments, now);
  }

  getAuditTrail(workOrderId: string): Promise<CrewAuditEntry[]> {
    return this.auditLog.findByWorkOrder(workOrderId);
  }

  private async load(workOrderId: string): Promise<{
    state: CrewOperationState;
    segments: StoredWorkSegment[];
    current: StoredWorkSegment | null;
  }> {
    const [segments, trail] = await Promise.all([
      this.segments.findByWorkOrder(workOrderId),
      this.auditLog.findByWorkOrder(workOrderId),
    ]);
    const current = segments.find((segment) => segment.end_time === null) ?? null;

    let state: CrewOperationState;
    if (trail.some((entry) => entry.action === 'completed')) {
      state = 'locked';
    } else if (segments.length === 0) {
      state = 'not_started';
    } else if (current) {
      state = 'in_progress';
    } else {
      state = 'stopped';
    }

    return { state, segments, current };
  }

  private async openSegment(workOrderId: string, team: CrewTeam, at: Date): Promise<StoredWorkSegment> {
    const segment = startWorkSegment(at, team.team_size, team.team_members);
    return this.segments.save({ ...segment, id: this.generateId(), work_order_id: workOrderId });
  }

  private summarize(
    workOrderId: string,
    state: CrewOperationState,
    segments: StoredWorkSegment[],
    now: Date
  ): CrewSessionSummary {
    return {
      work_order_id: workOrderId,
      state,
      segments,
      current_segment: segments.find((segment) => segment.end_time === null) ?? null,
      total_hours: sumSegmentHours(segments),
      live_total_hours: segments.reduce((total, segment) => total + projectSegmentHours(segment, now), 0),
    };
  }

  private async audit(workOrderId: string, action: CrewAuditAction, details: string, at: Date): Promise<void> {
    await this.auditLog.record({ work_order_id: workOrderId, action, details, recorded_at: at });
    console.log(`[CrewSession] ${workOrderId} ${action}: ${details}`);
  }
}
