import { z } from 'zod';
import { InvalidStateError, ValidationError } from '@/lib/errors';
import { hoursBetween } from '@/lib/timeUtils';
import type { CrewTeam, WorkSegment } from '@/types/timeTracking';

/**
 * Crew work segment calculator.
 *
 * Pure functions. A segment is valued with the crew multiplier:
 *   totalHours = elapsedHours × teamSize
 * `teamSize` is the declared headcount and wins over `teamMembers.length`,
 * so a crew of 5 with only 2 named members still accounts 5 workers.
 */

const segmentStartSchema = z.object({
  startTime: z.date(),
  teamSize: z.number().int().nonnegative(),
  teamMembers: z.array(z.string()),
});

export function startWorkSegment(startTime: Date, teamSize: number, teamMembers: string[]): WorkSegment {
  const parsed = segmentStartSchema.safeParse({ startTime, teamSize, teamMembers });
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      parsed.error.issues
    );
  }

  return {
    start_time: parsed.data.startTime,
    end_time: null,
    team_size: parsed.data.teamSize,
    team_members: [...parsed.data.teamMembers],
    total_hours: 0,
  };
}

/**
 * Zero while the segment is open. Ordering is not checked: an end before
 * the start yields negative hours.
 */
export function calculateSegmentHours(segment: WorkSegment): number {
  if (!segment.end_time) return 0;
  return hoursBetween(segment.start_time, segment.end_time) * segment.team_size;
}

/**
 * Sets `end_time` and `total_hours` once. Returns a new segment.
 */
export function closeWorkSegment<T extends WorkSegment>(segment: T, endTime: Date): T {
  if (segment.end_time) {
    throw new InvalidStateError('Work segment is already closed');
  }
  if (Number.isNaN(endTime.getTime())) {
    throw new ValidationError('endTime must be a valid Date');
  }

  const closed = { ...segment, team_members: [...segment.team_members], end_time: endTime };
  return { ...closed, total_hours: calculateSegmentHours(closed) };
}

export function isSegmentActive(segment: WorkSegment): boolean {
  return segment.end_time === null;
}

/**
 * Live labor-hours of a segment: stored hours once closed, headcount × elapsed
 * time while open. Never persisted.
 */
export function projectSegmentHours(segment: WorkSegment, now: Date): number {
  if (segment.end_time) return segment.total_hours;
  return hoursBetween(segment.start_time, now) * segment.team_size;
}

export function sumSegmentHours(segments: WorkSegment[]): number {
  return segments.reduce((total, segment) => total + segment.total_hours, 0);
}

export function hasTeamChanged(segment: WorkSegment, team: CrewTeam): boolean {
  if (segment.team_size !== team.team_size) return true;

  if (segment.team_members.length !== team.team_members.length) return true;

  // Same members in any order; repeated names count
  const current = [...segment.team_members].sort();
  const next = [...team.team_members].sort();
  return next.some((member, index) => member !== current[index]);
}

/**
 * e.g. "Added: Ana, Luis. Removed: Marco."
 */
export function teamChangeDetails(previous: WorkSegment, team: CrewTeam): string {
  const before = new Set(previous.team_members);
  const after = new Set(team.team_members);
  const added = team.team_members.filter((member) => !before.has(member));
  const removed = previous.team_members.filter((member) => !after.has(member));

  const parts: string[] = [];
  if (added.length > 0) parts.push(`Added: ${added.join(', ')}.`);
  if (removed.length > 0) parts.push(`Removed: ${removed.join(', ')}.`);
  if (previous.team_size !== team.team_size) {
    parts.push(`Team size ${previous.team_size} → ${team.team_size}.`);
  }
  return parts.join(' ');
}
