import { Schema } from 'mongoose';
import { MealType } from '../../types/enums/mealTypeEnum';
import { QuantityUnit } from '../../types/enums/quantityUnitEnum';
import type { CalculatedNutrition, FoodProfile } from '../../types/MealLogInterface';

export interface IMealLog {
  user: string;
  date: string; // YYYY-MM-DD
  mealType: MealType;
  food: FoodProfile;
  quantity: number;
  unit: QuantityUnit;
  nutrition: CalculatedNutrition;
  createdAt: Date;
  updatedAt: Date;
}

const FoodProfileSchema = new Schema<FoodProfile>({
  name: { type: String, required: true },
  servingSizeGrams: { type: Number, required: true },
  calories: { type: Number, required: true },
  carbohydrates: { type: Number, required: true },
  protein: { type: Number, required: true },
  fat: { type: Number, required: true },
  sodium: Number,
  fiber: Number,
  sugar: Number,
}, { _id: false });

const NutritionSchema = new Schema<CalculatedNutrition>({
  quantity: { type: Number, required: true },
  unit: { type: String, enum: Object.values(QuantityUnit), required: true },
  calories: { type: Number, required: true },
  carbohydrates: { type: Number, required: true },
  protein: { type: Number, required: true },
  fat: { type: Number, required: true },
  sodium: Number,
  fiber: Number,
  sugar: Number,
  ratios: {
    carbs: { type: Number, required: true },
    protein: { type: Number, required: true },
    fat: { type: Number, required: true },
  },
}, { _id: false });

export const MealLogSchema = new Schema<IMealLog>({
  user: { type: String, required: true, index: true },
  date: { type: String, required: true },
  mealType: { type: String, enum: Object.values(MealType), required: true },
  food: { type: FoodProfileSchema, required: true },
  quantity: { type: Number, required: true, min: 0 },
  unit: { type: String, enum: Object.values(QuantityUnit), required: true },
  nutrition: { type: NutritionSchema, required: true },
}, { timestamps: true });

MealLogSchema.index({ user: 1, date: 1, createdAt: 1 });
