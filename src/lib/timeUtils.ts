import { format } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { MS_PER_HOUR } from '@/lib/dateConfig';
import type { TimeBlock } from '@/types/timeTracking';

/**
 * Decimal hours between two instants. Negative when `end` precedes `start`.
 */
export const hoursBetween = (start: Date, end: Date): number => {
  return (end.getTime() - start.getTime()) / MS_PER_HOUR;
};

/**
 * Formats decimal hours as H:MM, rounded to the nearest whole minute
 * @param hours Decimal hours (e.g., 8.5)
 * @returns Formatted string (e.g., "8:30", "0:06" for 0.1)
 */
export const formatHours = (hours: number): string => {
  const totalMinutes = Math.round(Math.abs(hours) * 60);
  const wholeHours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  const sign = hours < 0 && totalMinutes > 0 ? '-' : '';
  return `${sign}${wholeHours}:${minutes.toString().padStart(2, '0')}`;
};

const formatClockTime = (date: Date, timeZone?: string): string => {
  return timeZone ? formatInTimeZone(date, timeZone, 'h:mm a') : format(date, 'h:mm a');
};

/**
 * Formats a time block for display
 * @returns e.g. "Block 1: 7:00 AM - 10:00 AM" or "Block 2: 1:00 PM - Active"
 */
export const formatTimeBlock = (block: TimeBlock, timeZone?: string): string => {
  const label = `Block ${block.block_number}`;

  if (!block.clock_in_time) {
    return `${label}: No time recorded`;
  }

  const clockIn = formatClockTime(block.clock_in_time, timeZone);
  if (block.clock_out_time) {
    return `${label}: ${clockIn} - ${formatClockTime(block.clock_out_time, timeZone)}`;
  }
  return block.is_active ? `${label}: ${clockIn} - Active` : `${label}: ${clockIn} - Not completed`;
};
