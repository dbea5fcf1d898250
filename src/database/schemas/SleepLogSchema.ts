import { Schema } from 'mongoose';
import { SleepStatus } from '../../types/enums/sleepStatusEnum';

export interface ISleepLog {
  user: string;
  date: string; // logical day, YYYY-MM-DD
  recordedAt: Date;
  durationMinutes: number;
  status: SleepStatus;
  createdAt: Date;
  updatedAt: Date;
}

export const SleepLogSchema = new Schema<ISleepLog>({
  user: { type: String, required: true, index: true },
  date: { type: String, required: true },
  recordedAt: { type: Date, required: true },
  durationMinutes: { type: Number, required: true, min: 0, max: 1440 },
  status: { type: String, enum: Object.values(SleepStatus), required: true },
}, { timestamps: true });

SleepLogSchema.index({ user: 1, date: 1, createdAt: 1 });
