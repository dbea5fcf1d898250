import { v4 as uuid } from "uuid";
import type { CalendarDay } from "../../lib/dayBoundary";
import type { BodyMeasurement } from "../../types/BodyMeasurementInterface";
import type { ExerciseLog } from "../../types/ExerciseLogInterface";
import type { LoggedEvent, NewEvent } from "../../types/LoggedEventInterface";
import type { MealLog } from "../../types/MealLogInterface";
import type { UserProfile } from "../../types/ProfileInterface";
import type { SleepLog } from "../../types/SleepLogInterface";
import type { EventRepository, ProfileFields, ProfileRepository } from "./repositories";

type EventMeta = Pick<LoggedEvent, "id" | "createdAt" | "updatedAt">;
type Assemble<T extends LoggedEvent> = (event: NewEvent<T>, meta: EventMeta) => T;

function byDateThenCreation(a: LoggedEvent, b: LoggedEvent): number {
  return a.date.localeCompare(b.date) || a.createdAt.getTime() - b.createdAt.getTime();
}

export class MemoryEventRepository<T extends LoggedEvent> implements EventRepository<T> {
  private readonly rows = new Map<string, T>();

  constructor(
    private readonly assemble: Assemble<T>,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  private owned(user: string, id: string): T | null {
    const row = this.rows.get(id);
    return row && row.user === user ? row : null;
  }

  async create(event: NewEvent<T>): Promise<T> {
    const now = this.clock();
    const row = this.assemble(event, { id: uuid(), createdAt: now, updatedAt: now });
    this.rows.set(row.id, row);
    return row;
  }

  async findById(user: string, id: string): Promise<T | null> {
    return this.owned(user, id);
  }

  async replace(user: string, id: string, event: NewEvent<T>): Promise<T | null> {
    const existing = this.owned(user, id);
    if (!existing) return null;
    const row = this.assemble(event, { id, createdAt: existing.createdAt, updatedAt: this.clock() });
    this.rows.set(id, row);
    return row;
  }

  async remove(user: string, id: string): Promise<T | null> {
    const existing = this.owned(user, id);
    if (existing) this.rows.delete(id);
    return existing;
  }

  async list(user: string, from: CalendarDay, to: CalendarDay): Promise<T[]> {
    return Array.from(this.rows.values())
      .filter((row) => row.user === user && row.date >= from && row.date <= to)
      .sort(byDateThenCreation);
  }

  async latest(user: string, onOrBefore?: CalendarDay): Promise<T | null> {
    const mine = Array.from(this.rows.values())
      .filter((row) => row.user === user && (onOrBefore === undefined || row.date <= onOrBefore))
      .sort(byDateThenCreation);
    return mine.length ? mine[mine.length - 1] : null;
  }
}

export class MemoryProfileRepository implements ProfileRepository {
  private readonly rows = new Map<string, UserProfile>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async find(user: string): Promise<UserProfile | null> {
    return this.rows.get(user) ?? null;
  }

  async upsert(profile: ProfileFields): Promise<UserProfile> {
    const row: UserProfile = { ...profile, updatedAt: this.clock() };
    this.rows.set(profile.user, row);
    return row;
  }
}

export function memoryRepositories(clock?: () => Date) {
  return {
    profiles: new MemoryProfileRepository(clock),
    bodyMeasurements: new MemoryEventRepository<BodyMeasurement>((event, meta) => ({ ...event, ...meta }), clock),
    exercises: new MemoryEventRepository<ExerciseLog>((event, meta) => ({ ...event, ...meta }), clock),
    sleepLogs: new MemoryEventRepository<SleepLog>((event, meta) => ({ ...event, ...meta }), clock),
    meals: new MemoryEventRepository<MealLog>((event, meta) => ({ ...event, ...meta }), clock),
  };
}
