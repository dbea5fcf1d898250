import { Schema } from 'mongoose';
import { ActivityLevel } from '../../types/enums/activityLevelEnum';
import { Sex } from '../../types/enums/sexEnum';

export interface IUserProfile {
  user: string;
  heightCm: number;
  birthDate: string; // YYYY-MM-DD
  sex: Sex;
  activityLevel: ActivityLevel;
  createdAt?: Date;
  updatedAt?: Date;
}

export const UserProfileSchema = new Schema<IUserProfile>({
  user: { type: String, required: true, unique: true },
  heightCm: { type: Number, required: true },
  birthDate: { type: String, required: true },
  sex: { type: String, enum: Object.values(Sex), required: true },
  activityLevel: { type: String, enum: Object.values(ActivityLevel), required: true },
}, { timestamps: true });
