import { ActivityLevel } from "../../types/enums/activityLevelEnum";
import { Sex } from "../../types/enums/sexEnum";
import { createServices } from "../container";
import type { ProfileInput } from "./profileService";

export function steppingClock(start = Date.UTC(2026, 0, 15, 8)) {
  let t = start;
  return () => new Date((t += 1000));
}

export function memoryServices(sleepBoundaryHour?: number) {
  return createServices({ driver: "memory", clock: steppingClock(), sleepBoundaryHour });
}

export const maleProfile: ProfileInput = {
  heightCm: 175,
  birthDate: "1996-01-01",
  sex: Sex.MALE,
  activityLevel: ActivityLevel.MODERATELY_ACTIVE,
};
