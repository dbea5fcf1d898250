import { isCalendarDay, type CalendarDay } from "../../lib/dayBoundary";
import { InvalidInputError } from "../../utils/errors";

export function requireDay(value: string, field = "date"): CalendarDay {
  if (!isCalendarDay(value)) {
    throw new InvalidInputError(`${field} must be a calendar day (YYYY-MM-DD)`, field);
  }
  return value;
}

export function requireRange(value: number, min: number, max: number, field: string): number {
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new InvalidInputError(`${field} must be between ${min} and ${max}`, field);
  }
  return value;
}

export function requireUser(user: string): string {
  if (user.trim() === "") throw new InvalidInputError("user must be a non-empty string", "user");
  return user;
}
