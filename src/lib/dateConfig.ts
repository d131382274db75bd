/**
 * Week starts on Monday (1) for all date calculations
 * Sunday = 0, Monday = 1, Tuesday = 2, etc.
 *
 * Weekly reports, overtime reports and the weekly overtime split all
 * bucket time blocks into Monday–Sunday weeks.
 */
export const WEEK_STARTS_ON = 1;

export const DAYS_PER_WEEK = 7;

export const MS_PER_HOUR = 1000 * 60 * 60;
