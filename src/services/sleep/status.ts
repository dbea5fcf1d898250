import { SleepStatus } from "../../types/enums/sleepStatusEnum";
import { InvalidInputError } from "../../utils/errors";

export const MAX_SLEEP_MINUTES = 1440;

// Upper bounds (exclusive) in minutes; anything past the last one is oversleep.
const THRESHOLDS: Array<[number, SleepStatus]> = [
  [330, SleepStatus.BAD],
  [390, SleepStatus.SOSO],
  [450, SleepStatus.GOOD],
  [541, SleepStatus.EXCELLENT],
];

export function isValidSleepDuration(minutes: unknown): minutes is number {
  return typeof minutes === "number" && Number.isInteger(minutes) && minutes >= 0 && minutes <= MAX_SLEEP_MINUTES;
}

export function sleepStatusFor(durationMinutes: number): SleepStatus {
  if (!isValidSleepDuration(durationMinutes)) {
    throw new InvalidInputError(
      `durationMinutes must be a whole number between 0 and ${MAX_SLEEP_MINUTES}`,
      "durationMinutes",
    );
  }
  for (const [below, status] of THRESHOLDS) {
    if (durationMinutes < below) return status;
  }
  return SleepStatus.OVERSLEEP;
}
