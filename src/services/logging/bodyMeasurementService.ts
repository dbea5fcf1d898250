import { calendarDay, windowEnding, type CalendarDay } from "../../lib/dayBoundary";
import type { BodyMeasurement } from "../../types/BodyMeasurementInterface";
import type { NewEvent } from "../../types/LoggedEventInterface";
import { InvalidInputError, NotFoundError } from "../../utils/errors";
import { isBodyTrendPeriod, summarizeBodyTrend, type BodyTrend, type BodyTrendPeriod } from "../body/trends";
import type { LedgerAggregator } from "../ledger/aggregator";
import { computeMetabolicProfile } from "../metabolic/calculator";
import type { EventRepository, ProfileRepository } from "./repositories";
import { EventLocks } from "./eventLocks";
import { requireDay, requireRange, requireUser } from "./validation";

export interface BodyMeasurementInput {
  date: string;
  weight: number;
  bodyFatPercent?: number;
  muscleMass?: number;
}

export const WEIGHT_RANGE_KG = { min: 20, max: 500 } as const;
export const BODY_FAT_RANGE_PERCENT = { min: 1, max: 60 } as const;
export const MUSCLE_MASS_RANGE_KG = { min: 10, max: 100 } as const;

function validate(input: BodyMeasurementInput): BodyMeasurementInput {
  requireDay(input.date);
  requireRange(input.weight, WEIGHT_RANGE_KG.min, WEIGHT_RANGE_KG.max, "weight");
  if (input.bodyFatPercent !== undefined) {
    requireRange(input.bodyFatPercent, BODY_FAT_RANGE_PERCENT.min, BODY_FAT_RANGE_PERCENT.max, "bodyFatPercent");
  }
  if (input.muscleMass !== undefined) {
    requireRange(input.muscleMass, MUSCLE_MASS_RANGE_KG.min, MUSCLE_MASS_RANGE_KG.max, "muscleMass");
    if (input.muscleMass >= input.weight) {
      throw new InvalidInputError("muscleMass must be less than weight", "muscleMass");
    }
  }
  return input;
}

/**
 * Body measurements with their metabolic values cached at save time. Each save
 * seeds the day's ledger with bmr/tdee and mirrors weight and body fat onto it.
 */
export class BodyMeasurementService {
  private readonly locks = new EventLocks();

  constructor(
    private readonly measurements: EventRepository<BodyMeasurement>,
    private readonly profiles: ProfileRepository,
    private readonly ledger: LedgerAggregator,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  private async derive(user: string, input: BodyMeasurementInput): Promise<NewEvent<BodyMeasurement>> {
    validate(input);
    const profile = await this.profiles.find(user);
    if (!profile) {
      throw new InvalidInputError("A profile (height, birth date, sex, activity level) is required first", "profile");
    }
    const metabolic = computeMetabolicProfile(input, profile, input.date);
    const event: NewEvent<BodyMeasurement> = {
      user,
      date: input.date,
      weight: input.weight,
      bmr: metabolic.bmr.toNumber(),
      tdee: metabolic.tdee.toNumber(),
      formulaUsed: metabolic.formulaUsed,
    };
    if (input.bodyFatPercent !== undefined) event.bodyFatPercent = input.bodyFatPercent;
    if (input.muscleMass !== undefined) event.muscleMass = input.muscleMass;
    return event;
  }

  private async report(measurement: BodyMeasurement): Promise<void> {
    const key = { user: measurement.user, day: measurement.date };
    await this.ledger.getOrCreate(key, measurement.bmr, measurement.tdee);
    await this.remirror(measurement.user, measurement.date);
  }

  // The ledger mirrors the day's most recently created measurement, if any.
  private async remirror(user: string, day: CalendarDay): Promise<void> {
    const remaining = await this.measurements.list(user, day, day);
    const last = remaining[remaining.length - 1];
    if (last) {
      await this.ledger.recordBodyMetrics({ user, day }, last.weight, last.bodyFatPercent);
    } else {
      await this.ledger.clearBodyMetrics({ user, day });
    }
  }

  async record(user: string, input: BodyMeasurementInput): Promise<BodyMeasurement> {
    requireUser(user);
    const saved = await this.measurements.create(await this.derive(user, input));
    await this.report(saved);
    return saved;
  }

  async edit(user: string, id: string, input: BodyMeasurementInput): Promise<BodyMeasurement> {
    requireUser(user);
    return this.locks.run(user, id, async () => {
      const previous = await this.get(user, id);
      const next = await this.derive(user, input);
      const saved = await this.measurements.replace(user, id, next);
      if (!saved) throw new NotFoundError(`Body measurement ${id} not found`);
      await this.report(saved);
      if (previous.date !== saved.date) await this.remirror(user, previous.date);
      return saved;
    });
  }

  async remove(user: string, id: string): Promise<BodyMeasurement> {
    requireUser(user);
    return this.locks.run(user, id, async () => {
      const removed = await this.measurements.remove(user, id);
      if (!removed) throw new NotFoundError(`Body measurement ${id} not found`);
      await this.remirror(user, removed.date);
      return removed;
    });
  }

  async get(user: string, id: string): Promise<BodyMeasurement> {
    const found = await this.measurements.findById(user, id);
    if (!found) throw new NotFoundError(`Body measurement ${id} not found`);
    return found;
  }

  latest(user: string): Promise<BodyMeasurement | null> {
    return this.measurements.latest(requireUser(user));
  }

  list(user: string, from: string, to: string): Promise<BodyMeasurement[]> {
    return this.measurements.list(requireUser(user), requireDay(from, "from"), requireDay(to, "to"));
  }

  /** Series over the `period` days ending on `end` (today by default). */
  async trends(
    user: string,
    period: BodyTrendPeriod,
    end?: string,
  ): Promise<BodyTrend & { period: BodyTrendPeriod; from: string; to: string }> {
    if (!isBodyTrendPeriod(period)) {
      throw new InvalidInputError("period must be 30, 60 or 120", "period");
    }
    const last = end === undefined ? calendarDay(this.clock()) : requireDay(end, "end");
    const { from, to } = windowEnding(last, period);
    return { period, from, to, ...summarizeBodyTrend(await this.list(user, from, to)) };
  }
}
