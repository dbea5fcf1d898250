import type { CalendarDay } from "../../lib/dayBoundary";
import type { LoggedEvent, NewEvent } from "../../types/LoggedEventInterface";
import type { UserProfile } from "../../types/ProfileInterface";

/**
 * Storage contract for one event stream. Lookups are scoped by user: an id that
 * belongs to someone else reads as missing.
 */
export interface EventRepository<T extends LoggedEvent> {
  create(event: NewEvent<T>): Promise<T>;
  findById(user: string, id: string): Promise<T | null>;
  /** Replaces every field except id and createdAt. */
  replace(user: string, id: string, event: NewEvent<T>): Promise<T | null>;
  remove(user: string, id: string): Promise<T | null>;
  /** Inclusive day range, ordered by date then creation. */
  list(user: string, from: CalendarDay, to: CalendarDay): Promise<T[]>;
  /** Most recent by date, then by creation; limited to days up to `onOrBefore` when given. */
  latest(user: string, onOrBefore?: CalendarDay): Promise<T | null>;
}

export type ProfileFields = Omit<UserProfile, "updatedAt">;

export interface ProfileRepository {
  find(user: string): Promise<UserProfile | null>;
  upsert(profile: ProfileFields): Promise<UserProfile>;
}
