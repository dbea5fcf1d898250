import {
  differenceInCalendarDays,
  eachDayOfInterval,
  format,
  getHours,
  isValid,
  parse,
  startOfDay,
  subDays,
} from "date-fns";

/** A calendar day in the user's local calendar, `YYYY-MM-DD`. */
export type CalendarDay = string;

export const DEFAULT_BOUNDARY_HOUR = 2;

const DAY_FORMAT = "yyyy-MM-dd";
const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function calendarDay(date: Date): CalendarDay {
  return format(date, DAY_FORMAT);
}

/** Local midnight of the given day. */
export function parseCalendarDay(day: CalendarDay): Date {
  return parse(day, DAY_FORMAT, new Date());
}

export function isCalendarDay(value: unknown): value is CalendarDay {
  if (typeof value !== "string" || !DAY_PATTERN.test(value)) return false;
  const parsed = parseCalendarDay(value);
  return isValid(parsed) && calendarDay(parsed) === value;
}

/**
 * Day a sleep-related timestamp belongs to. Hours before `boundaryHour` still count
 * toward the previous calendar day; the boundary hour itself starts the new day.
 */
export function logicalDay(timestamp: Date, boundaryHour: number = DEFAULT_BOUNDARY_HOUR): CalendarDay {
  if (getHours(timestamp) < boundaryHour) {
    return calendarDay(subDays(startOfDay(timestamp), 1));
  }
  return calendarDay(timestamp);
}

export function isNewLogicalDay(timestamp: Date, boundaryHour: number = DEFAULT_BOUNDARY_HOUR): boolean {
  return getHours(timestamp) >= boundaryHour;
}

export function daysBetween(from: CalendarDay, to: CalendarDay): number {
  return differenceInCalendarDays(parseCalendarDay(to), parseCalendarDay(from));
}

/** Inclusive; empty when `to` is before `from`. */
export function eachCalendarDay(from: CalendarDay, to: CalendarDay): CalendarDay[] {
  if (daysBetween(from, to) < 0) return [];
  return eachDayOfInterval({ start: parseCalendarDay(from), end: parseCalendarDay(to) }).map(calendarDay);
}

/** The `days` calendar days ending on `end`, both ends inclusive. */
export function windowEnding(end: CalendarDay, days: number): { from: CalendarDay; to: CalendarDay } {
  return { from: calendarDay(subDays(parseCalendarDay(end), days - 1)), to: end };
}
