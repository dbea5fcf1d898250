import { Schema } from 'mongoose';
import { SleepStatus } from '../../types/enums/sleepStatusEnum';

export interface IDailyLedger {
  user: string;
  date: string; // YYYY-MM-DD
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

// createdAt/updatedAt are written by the aggregator, not by mongoose timestamps.
export const DailyLedgerSchema = new Schema<IDailyLedger>({
  user: { type: String, required: true, index: true },
  date: { type: String, required: true },
  bmr: { type: Number, default: 0 },
  tdee: { type: Number, default: 0 },
  netCalories: { type: Number, default: 0 },
  totalCaloriesIn: { type: Number, default: 0 },
  totalCaloriesOut: { type: Number, default: 0, min: 0 },
  totalCarbs: { type: Number, default: 0 },
  totalProtein: { type: Number, default: 0 },
  totalFat: { type: Number, default: 0 },
  carbsRatio: Number,
  proteinRatio: Number,
  fatRatio: Number,
  exerciseMinutes: { type: Number, default: 0, min: 0 },
  exerciseCount: { type: Number, default: 0, min: 0 },
  sleepDurationMinutes: { type: Number, min: 0, max: 1440 },
  sleepStatus: { type: String, enum: Object.values(SleepStatus) },
  weight: Number,
  bodyFatPercent: Number,
  createdAt: { type: Date, required: true },
  updatedAt: { type: Date, required: true },
});

DailyLedgerSchema.index({ user: 1, date: 1 }, { unique: true });
