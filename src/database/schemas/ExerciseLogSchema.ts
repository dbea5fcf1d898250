import { Schema } from 'mongoose';
import { ExerciseType } from '../../types/enums/exerciseTypeEnum';
import { Intensity } from '../../types/enums/intensityEnum';

export interface IExerciseLog {
  user: string;
  date: string; // YYYY-MM-DD
  exerciseType: ExerciseType;
  durationMinutes: number;
  intensity: Intensity;
  caloriesBurned: number;
  note?: string;
  createdAt: Date;
  updatedAt: Date;
}

export const ExerciseLogSchema = new Schema<IExerciseLog>({
  user: { type: String, required: true, index: true },
  date: { type: String, required: true },
  exerciseType: { type: String, enum: Object.values(ExerciseType), required: true },
  durationMinutes: { type: Number, required: true, min: 1 },
  intensity: { type: String, enum: Object.values(Intensity), required: true },
  caloriesBurned: { type: Number, required: true, min: 0 },
  note: String,
}, { timestamps: true });

ExerciseLogSchema.index({ user: 1, date: 1, createdAt: 1 });
