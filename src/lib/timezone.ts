import { addDays, format, getISOWeek, getISOWeekYear, isValid, parseISO, startOfWeek } from 'date-fns';
import { formatInTimeZone, toZonedTime } from 'date-fns-tz';
import { WEEK_STARTS_ON } from '@/lib/dateConfig';
import type { CalendarDay } from '@/types/timeTracking';

const CALENDAR_DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isCalendarDay(value: string): boolean {
  return CALENDAR_DAY_PATTERN.test(value) && isValid(parseISO(value));
}

/**
 * Calendar day a timestamp falls on. With a time zone the day boundary is
 * local midnight in that zone, otherwise local midnight of the host.
 */
export function calendarDay(timestamp: Date, timeZone?: string): CalendarDay {
  if (timeZone) {
    return formatInTimeZone(timestamp, timeZone, 'yyyy-MM-dd');
  }
  return format(timestamp, 'yyyy-MM-dd');
}

/**
 * Accepts either a `yyyy-MM-dd` string (taken as-is) or a timestamp.
 */
export function toCalendarDay(value: Date | CalendarDay, timeZone?: string): CalendarDay {
  if (typeof value === 'string') {
    if (!isCalendarDay(value)) {
      throw new RangeError(`Invalid calendar day: ${value}`);
    }
    return value;
  }
  return calendarDay(value, timeZone);
}

// Day strings are parsed at local midnight so addDays never trips over DST.
export function addCalendarDays(day: CalendarDay, amount: number): CalendarDay {
  return format(addDays(parseISO(day), amount), 'yyyy-MM-dd');
}

export function startOfCalendarWeek(day: CalendarDay): CalendarDay {
  return format(startOfWeek(parseISO(day), { weekStartsOn: WEEK_STARTS_ON }), 'yyyy-MM-dd');
}

export function isoWeekOf(timestamp: Date, timeZone?: string): { weekNumber: number; year: number } {
  const local = timeZone ? toZonedTime(timestamp, timeZone) : timestamp;
  return { weekNumber: getISOWeek(local), year: getISOWeekYear(local) };
}
