import { dec } from "../../lib/decimal";
import type { BodyMeasurement } from "../../types/BodyMeasurementInterface";
import { ExerciseType } from "../../types/enums/exerciseTypeEnum";
import { Intensity } from "../../types/enums/intensityEnum";
import type { ExerciseLog } from "../../types/ExerciseLogInterface";
import type { NewEvent } from "../../types/LoggedEventInterface";
import { NotFoundError } from "../../utils/errors";
import { DEFAULT_WEIGHT_KG, estimateCaloriesBurned } from "../exercise/calories";
import type { LedgerAggregator } from "../ledger/aggregator";
import { ensureDayLedger } from "./dayLedger";
import type { EventRepository } from "./repositories";
import { EventLocks } from "./eventLocks";
import { requireDay, requireRange, requireUser } from "./validation";

export interface ExerciseInput {
  date: string;
  exerciseType: ExerciseType;
  durationMinutes: number;
  intensity: Intensity;
  /** Measured value from a device; estimated from MET when omitted. */
  caloriesBurned?: number;
  note?: string;
}

export const MAX_EXERCISE_MINUTES = 1440;
export const MAX_EXERCISE_CALORIES = 10000;

function diff(next: number, previous: number): number {
  return dec(next).minus(previous).toNumber();
}

export class ExerciseLogService {
  private readonly locks = new EventLocks();

  constructor(
    private readonly exercises: EventRepository<ExerciseLog>,
    private readonly measurements: EventRepository<BodyMeasurement>,
    private readonly ledger: LedgerAggregator,
  ) {}

  private async build(user: string, input: ExerciseInput): Promise<NewEvent<ExerciseLog>> {
    requireDay(input.date);
    requireRange(input.durationMinutes, 1, MAX_EXERCISE_MINUTES, "durationMinutes");

    let caloriesBurned: number;
    if (input.caloriesBurned !== undefined) {
      caloriesBurned = requireRange(input.caloriesBurned, 0, MAX_EXERCISE_CALORIES, "caloriesBurned");
    } else {
      // Closest weight at or before the session, else the most recent one.
      const latest = (await this.measurements.latest(user, input.date)) ?? (await this.measurements.latest(user));
      caloriesBurned = estimateCaloriesBurned(
        input.exerciseType,
        input.intensity,
        input.durationMinutes,
        latest?.weight ?? DEFAULT_WEIGHT_KG,
      );
    }

    const event: NewEvent<ExerciseLog> = {
      user,
      date: input.date,
      exerciseType: input.exerciseType,
      durationMinutes: input.durationMinutes,
      intensity: input.intensity,
      caloriesBurned,
    };
    if (input.note !== undefined) event.note = input.note;
    return event;
  }

  async add(user: string, input: ExerciseInput): Promise<ExerciseLog> {
    requireUser(user);
    const saved = await this.exercises.create(await this.build(user, input));
    const key = { user, day: saved.date };
    await ensureDayLedger(this.ledger, this.measurements, key);
    await this.ledger.applyExerciseDelta(key, saved.caloriesBurned, saved.durationMinutes, 1);
    return saved;
  }

  /** Same day: one signed delta. Across days: the old day loses the session, the new day gains it. */
  async update(user: string, id: string, input: ExerciseInput): Promise<ExerciseLog> {
    requireUser(user);
    return this.locks.run(user, id, async () => {
      const previous = await this.get(user, id);
      const next = await this.build(user, input);
      const saved = await this.exercises.replace(user, id, next);
      if (!saved) throw new NotFoundError(`Exercise ${id} not found`);

      if (previous.date === saved.date) {
        const key = { user, day: saved.date };
        await ensureDayLedger(this.ledger, this.measurements, key);
        await this.ledger.applyExerciseDelta(
          key,
          diff(saved.caloriesBurned, previous.caloriesBurned),
          diff(saved.durationMinutes, previous.durationMinutes),
          0,
        );
      } else {
        await this.ledger.applyExerciseDelta(
          { user, day: previous.date },
          -previous.caloriesBurned,
          -previous.durationMinutes,
          -1,
        );
        const key = { user, day: saved.date };
        await ensureDayLedger(this.ledger, this.measurements, key);
        await this.ledger.applyExerciseDelta(key, saved.caloriesBurned, saved.durationMinutes, 1);
      }
      return saved;
    });
  }

  async remove(user: string, id: string): Promise<ExerciseLog> {
    requireUser(user);
    return this.locks.run(user, id, async () => {
      const removed = await this.exercises.remove(user, id);
      if (!removed) throw new NotFoundError(`Exercise ${id} not found`);
      await this.ledger.applyExerciseDelta(
        { user, day: removed.date },
        -removed.caloriesBurned,
        -removed.durationMinutes,
        -1,
      );
      return removed;
    });
  }

  async get(user: string, id: string): Promise<ExerciseLog> {
    const found = await this.exercises.findById(user, id);
    if (!found) throw new NotFoundError(`Exercise ${id} not found`);
    return found;
  }

  list(user: string, day: string): Promise<ExerciseLog[]> {
    const date = requireDay(day);
    return this.exercises.list(requireUser(user), date, date);
  }
}
