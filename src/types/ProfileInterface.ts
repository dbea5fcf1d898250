import { ActivityLevel } from "./enums/activityLevelEnum";
import { Sex } from "./enums/sexEnum";

export interface UserProfile {
  user: string;
  heightCm: number;
  /** YYYY-MM-DD */
  birthDate: string;
  sex: Sex;
  activityLevel: ActivityLevel;
  updatedAt: Date;
}
