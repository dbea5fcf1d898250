export enum ExerciseType {
  WALKING = "walking",
  RUNNING = "running",
  CYCLING = "cycling",
  SWIMMING = "swimming",
  WEIGHT = "weight",
  CROSSFIT = "crossfit",
  YOGA = "yoga",
  OTHER = "other",
}
