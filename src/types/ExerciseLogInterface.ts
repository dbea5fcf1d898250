import { ExerciseType } from "./enums/exerciseTypeEnum";
import { Intensity } from "./enums/intensityEnum";
import type { LoggedEvent } from "./LoggedEventInterface";

export interface ExerciseLog extends LoggedEvent {
  exerciseType: ExerciseType;
  durationMinutes: number;
  intensity: Intensity;
  caloriesBurned: number;
  note?: string;
}
