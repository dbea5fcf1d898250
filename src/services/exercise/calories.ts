import { dec, round0 } from "../../lib/decimal";
import { ExerciseType } from "../../types/enums/exerciseTypeEnum";
import { Intensity } from "../../types/enums/intensityEnum";
import { InvalidInputError } from "../../utils/errors";

/** Body weight assumed when the user has no measurement yet. */
export const DEFAULT_WEIGHT_KG = 70;

type MetRow = Record<Intensity, number>;

const MET_TABLE: Record<ExerciseType, MetRow> = {
  [ExerciseType.WALKING]: { low: 3.5, medium: 4.0, high: 5.0 },
  [ExerciseType.RUNNING]: { low: 7.0, medium: 8.0, high: 10.0 },
  [ExerciseType.CYCLING]: { low: 5.0, medium: 6.0, high: 8.0 },
  [ExerciseType.SWIMMING]: { low: 6.0, medium: 7.0, high: 9.0 },
  [ExerciseType.WEIGHT]: { low: 4.0, medium: 6.0, high: 8.0 },
  [ExerciseType.CROSSFIT]: { low: 6.0, medium: 8.0, high: 10.0 },
  [ExerciseType.YOGA]: { low: 2.5, medium: 3.0, high: 4.0 },
  [ExerciseType.OTHER]: { low: 4.0, medium: 5.0, high: 6.0 },
};

export function metValue(type: ExerciseType, intensity: Intensity): number {
  return MET_TABLE[type][intensity];
}

/** MET × kg × hours, to the nearest kcal. */
export function estimateCaloriesBurned(
  type: ExerciseType,
  intensity: Intensity,
  durationMinutes: number,
  weightKg: number = DEFAULT_WEIGHT_KG,
): number {
  if (!Number.isFinite(durationMinutes) || durationMinutes <= 0) {
    throw new InvalidInputError("durationMinutes must be greater than 0", "durationMinutes");
  }
  if (!Number.isFinite(weightKg) || weightKg <= 0) {
    throw new InvalidInputError("weight must be greater than 0", "weight");
  }
  const hours = dec(durationMinutes).div(60);
  return round0(dec(metValue(type, intensity)).times(weightKg).times(hours)).toNumber();
}
