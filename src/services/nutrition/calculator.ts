import { Decimal, dec, round0, round1, type DecimalValue } from "../../lib/decimal";
import { QuantityUnit } from "../../types/enums/quantityUnitEnum";
import type { CalculatedNutrition, FoodProfile, MacroRatios } from "../../types/MealLogInterface";
import { InvalidInputError } from "../../utils/errors";

export const KCAL_PER_GRAM = {
  carbs: 4,
  protein: 4,
  fat: 9,
} as const;

/** Household measures, converted to grams before scaling against the serving size. */
export const GRAMS_PER_UNIT: Partial<Record<QuantityUnit, number>> = {
  [QuantityUnit.TABLESPOON]: 15,
  [QuantityUnit.TEASPOON]: 5,
  [QuantityUnit.ML]: 1,
  [QuantityUnit.CUP]: 240,
};

export function gramsToServings(grams: DecimalValue, servingSizeGrams: DecimalValue): Decimal {
  const size = dec(servingSizeGrams);
  if (size.lte(0)) return dec(0);
  return dec(grams).div(size);
}

export function servingsToGrams(servings: DecimalValue, servingSizeGrams: DecimalValue): Decimal {
  return dec(servings).times(servingSizeGrams);
}

/** Factor applied to the per-serving profile. A food without a serving size scales to 0 by weight. */
export function servingMultiplier(quantity: DecimalValue, unit: QuantityUnit, servingSizeGrams: number): Decimal {
  switch (unit) {
    case QuantityUnit.SERVING:
    case QuantityUnit.PIECE:
      return dec(quantity);
    case QuantityUnit.GRAMS:
      return gramsToServings(quantity, servingSizeGrams);
    default: {
      const gramsPerUnit = GRAMS_PER_UNIT[unit] ?? 1;
      return gramsToServings(dec(quantity).times(gramsPerUnit), servingSizeGrams);
    }
  }
}

/**
 * Share of energy from each macro, in percent with one decimal. All three are 0
 * when the macros carry no energy.
 */
export function macroRatios(carbs: DecimalValue, protein: DecimalValue, fat: DecimalValue): MacroRatios {
  const carbKcal = dec(carbs).times(KCAL_PER_GRAM.carbs);
  const proteinKcal = dec(protein).times(KCAL_PER_GRAM.protein);
  const fatKcal = dec(fat).times(KCAL_PER_GRAM.fat);
  const total = carbKcal.plus(proteinKcal).plus(fatKcal);

  if (total.isZero()) {
    return { carbs: 0, protein: 0, fat: 0 };
  }
  const share = (kcal: Decimal) => round1(kcal.div(total).times(100)).toNumber();
  return {
    carbs: share(carbKcal),
    protein: share(proteinKcal),
    fat: share(fatKcal),
  };
}

function scaleOptional(value: number | undefined, multiplier: Decimal): number | undefined {
  return value === undefined ? undefined : round1(dec(value).times(multiplier)).toNumber();
}

export function calculate(food: FoodProfile, quantity: number, unit: QuantityUnit): CalculatedNutrition {
  if (!Number.isFinite(quantity) || quantity < 0) {
    throw new InvalidInputError("quantity must be a finite number of at least 0", "quantity");
  }
  const multiplier = servingMultiplier(quantity, unit, food.servingSizeGrams);

  const carbohydrates = round1(dec(food.carbohydrates).times(multiplier)).toNumber();
  const protein = round1(dec(food.protein).times(multiplier)).toNumber();
  const fat = round1(dec(food.fat).times(multiplier)).toNumber();

  const result: CalculatedNutrition = {
    quantity,
    unit,
    calories: round0(dec(food.calories).times(multiplier)).toNumber(),
    carbohydrates,
    protein,
    fat,
    ratios: macroRatios(carbohydrates, protein, fat),
  };

  const sodium = scaleOptional(food.sodium, multiplier);
  const fiber = scaleOptional(food.fiber, multiplier);
  const sugar = scaleOptional(food.sugar, multiplier);
  if (sodium !== undefined) result.sodium = sodium;
  if (fiber !== undefined) result.fiber = fiber;
  if (sugar !== undefined) result.sugar = sugar;

  return result;
}
