import type { CalendarDay } from "../lib/dayBoundary";
import { SleepStatus } from "./enums/sleepStatusEnum";

export interface LedgerKey {
  user: string;
  day: CalendarDay;
}

/** Running per-day aggregate. Holds sums only, never references to events. */
export interface DailyLedger {
  user: string;
  date: CalendarDay;
  bmr: number;
  tdee: number;
  netCalories: number;
  totalCaloriesIn: number;
  totalCaloriesOut: number;
  totalCarbs: number;
  totalProtein: number;
  totalFat: number;
  carbsRatio?: number;
  proteinRatio?: number;
  fatRatio?: number;
  exerciseMinutes: number;
  exerciseCount: number;
  sleepDurationMinutes?: number;
  sleepStatus?: SleepStatus;
  weight?: number;
  bodyFatPercent?: number;
  createdAt: Date;
  updatedAt: Date;
}
