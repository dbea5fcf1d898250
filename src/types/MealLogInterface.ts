import { MealType } from "./enums/mealTypeEnum";
import { QuantityUnit } from "./enums/quantityUnitEnum";
import type { LoggedEvent } from "./LoggedEventInterface";

/** Per-serving nutrient profile of a food, as supplied by the food catalogue. */
export interface FoodProfile {
  name: string;
  servingSizeGrams: number;
  calories: number;
  carbohydrates: number;
  protein: number;
  fat: number;
  sodium?: number;
  fiber?: number;
  sugar?: number;
}

export interface MacroRatios {
  carbs: number;
  protein: number;
  fat: number;
}

export interface CalculatedNutrition {
  quantity: number;
  unit: QuantityUnit;
  calories: number;
  carbohydrates: number;
  protein: number;
  fat: number;
  sodium?: number;
  fiber?: number;
  sugar?: number;
  ratios: MacroRatios;
}

export interface MealLog extends LoggedEvent {
  mealType: MealType;
  food: FoodProfile;
  quantity: number;
  unit: QuantityUnit;
  nutrition: CalculatedNutrition;
}
