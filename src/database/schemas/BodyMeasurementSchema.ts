import { Schema } from 'mongoose';
import { BmrFormula } from '../../types/enums/bmrFormulaEnum';

export interface IBodyMeasurement {
  user: string;
  date: string; // YYYY-MM-DD
  weight: number;
  bodyFatPercent?: number;
  muscleMass?: number;
  bmr: number;
  tdee: number;
  formulaUsed: BmrFormula;
  createdAt: Date;
  updatedAt: Date;
}

export const BodyMeasurementSchema = new Schema<IBodyMeasurement>({
  user: { type: String, required: true, index: true },
  date: { type: String, required: true },
  weight: { type: Number, required: true },
  bodyFatPercent: Number,
  muscleMass: Number,
  bmr: { type: Number, required: true },
  tdee: { type: Number, required: true },
  formulaUsed: { type: String, enum: Object.values(BmrFormula), required: true },
}, { timestamps: true });

BodyMeasurementSchema.index({ user: 1, date: 1, createdAt: 1 });
