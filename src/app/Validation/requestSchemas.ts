import { z } from "zod";
import { isCalendarDay } from "../../lib/dayBoundary";
import { ActivityLevel } from "../../types/enums/activityLevelEnum";
import { ExerciseType } from "../../types/enums/exerciseTypeEnum";
import { Intensity } from "../../types/enums/intensityEnum";
import { MealType } from "../../types/enums/mealTypeEnum";
import { QuantityUnit } from "../../types/enums/quantityUnitEnum";
import { Sex } from "../../types/enums/sexEnum";
import { isBodyTrendPeriod } from "../../services/body/trends";
import { isSleepStatsPeriod } from "../../services/sleep/stats";

export const nonEmptyString = z.string().trim().min(1);
export const calendarDay = z.string().refine(isCalendarDay, "expected a calendar day (YYYY-MM-DD)");

export const userParams = z.object({ userId: nonEmptyString.max(128) });
export const userItemParams = userParams.extend({ id: nonEmptyString.max(64) });
export const userDayParams = userParams.extend({ date: calendarDay });

export const dayQuery = z.object({ date: calendarDay });

export const rangeQuery = z
  .object({ from: calendarDay, to: calendarDay })
  .refine((q) => q.from <= q.to, { message: "from must not be after to", path: ["from"] });

export const sleepStatsQuery = z.object({
  period: z.coerce.number().default(7).refine(isSleepStatsPeriod, "period must be 7, 30 or 90"),
  end: calendarDay.optional(),
});

export const bodyTrendsQuery = z.object({
  period: z.coerce.number().default(30).refine(isBodyTrendPeriod, "period must be 30, 60 or 120"),
  end: calendarDay.optional(),
});

export const profileBody = z.object({
  heightCm: z.number().positive(),
  birthDate: calendarDay,
  sex: z.nativeEnum(Sex),
  activityLevel: z.nativeEnum(ActivityLevel),
}).strict();

export const bodyMeasurementBody = z.object({
  date: calendarDay,
  weight: z.number().positive(),
  bodyFatPercent: z.number().optional(),
  muscleMass: z.number().optional(),
}).strict();

export const exerciseBody = z.object({
  date: calendarDay,
  exerciseType: z.nativeEnum(ExerciseType),
  durationMinutes: z.number().int().positive(),
  intensity: z.nativeEnum(Intensity),
  caloriesBurned: z.number().int().nonnegative().optional(),
  note: z.string().max(500).optional(),
}).strict();

export const sleepBody = z.object({
  recordedAt: z.coerce.date(),
  durationMinutes: z.number().int().min(0).max(1440),
}).strict();

export const foodProfile = z.object({
  name: nonEmptyString.max(200),
  servingSizeGrams: z.number().nonnegative(),
  calories: z.number().nonnegative(),
  carbohydrates: z.number().nonnegative(),
  protein: z.number().nonnegative(),
  fat: z.number().nonnegative(),
  sodium: z.number().nonnegative().optional(),
  fiber: z.number().nonnegative().optional(),
  sugar: z.number().nonnegative().optional(),
}).strict();

export const mealBody = z.object({
  date: calendarDay,
  mealType: z.nativeEnum(MealType),
  food: foodProfile,
  quantity: z.number().nonnegative(),
  unit: z.nativeEnum(QuantityUnit),
}).strict();

export const metabolicPreviewBody = z.object({
  weight: z.number().positive(),
  heightCm: z.number().positive(),
  age: z.number().positive(),
  sex: z.nativeEnum(Sex),
  activityLevel: z.nativeEnum(ActivityLevel),
  bodyFatPercent: z.number().optional(),
}).strict();
