import { QuantityUnit } from '../../types/enums/quantityUnitEnum';
import type { FoodProfile } from '../../types/MealLogInterface';
import { InvalidInputError } from '../../utils/errors';
import { calculate, gramsToServings, macroRatios, servingsToGrams } from './calculator';

const riceBowl: FoodProfile = {
  name: 'Rice bowl',
  servingSizeGrams: 210,
  calories: 330,
  carbohydrates: 60,
  protein: 6,
  fat: 7,
};

describe('calculate', () => {
  test('scales by weight against the serving size', () => {
    const n = calculate(riceBowl, 300, QuantityUnit.GRAMS);
    expect(n).toEqual({
      quantity: 300,
      unit: QuantityUnit.GRAMS,
      calories: 471,
      carbohydrates: 85.7,
      protein: 8.6,
      fat: 10,
      ratios: { carbs: 73.4, protein: 7.4, fat: 19.3 },
    });
  });

  test('scales by serving count', () => {
    const n = calculate(riceBowl, 1.5, QuantityUnit.SERVING);
    expect([n.calories, n.carbohydrates, n.protein, n.fat]).toEqual([495, 90, 9, 10.5]);
  });

  test('pieces count as servings', () => {
    expect(calculate(riceBowl, 2, QuantityUnit.PIECE).calories).toBe(660);
  });

  test('household units convert to grams first', () => {
    const oil: FoodProfile = { name: 'Olive oil', servingSizeGrams: 100, calories: 884, carbohydrates: 0, protein: 0, fat: 100 };
    const n = calculate(oil, 2, QuantityUnit.TABLESPOON);
    expect(n.calories).toBe(265);
    expect(n.fat).toBe(30);
    expect(n.ratios).toEqual({ carbs: 0, protein: 0, fat: 100 });
  });

  test('a food without serving size scales to nothing by weight', () => {
    const n = calculate({ ...riceBowl, servingSizeGrams: 0 }, 150, QuantityUnit.GRAMS);
    expect([n.calories, n.carbohydrates, n.protein, n.fat]).toEqual([0, 0, 0, 0]);
    expect(n.ratios).toEqual({ carbs: 0, protein: 0, fat: 0 });
  });

  test('optional nutrients are scaled only when present', () => {
    const n = calculate({ ...riceBowl, sodium: 400, fiber: 2.5 }, 2, QuantityUnit.SERVING);
    expect(n.sodium).toBe(800);
    expect(n.fiber).toBe(5);
    expect('sugar' in n).toBe(false);
  });

  test('rounds halves away from zero', () => {
    const tiny: FoodProfile = { name: 'Tiny', servingSizeGrams: 10, calories: 1, carbohydrates: 0.25, protein: 0, fat: 0 };
    const n = calculate(tiny, 2.5, QuantityUnit.SERVING);
    expect(n.calories).toBe(3);
    expect(n.carbohydrates).toBe(0.6);
  });

  test('rejects negative or non-finite quantities', () => {
    expect(() => calculate(riceBowl, -1, QuantityUnit.GRAMS)).toThrow(InvalidInputError);
    expect(() => calculate(riceBowl, Number.NaN, QuantityUnit.SERVING)).toThrow(InvalidInputError);
  });
});

test('macroRatios uses 4/4/9 kcal per gram', () => {
  expect(macroRatios(50, 25, 10)).toEqual({ carbs: 51.3, protein: 25.6, fat: 23.1 });
  expect(macroRatios(0, 0, 0)).toEqual({ carbs: 0, protein: 0, fat: 0 });
});

test('grams and servings convert both ways', () => {
  expect(gramsToServings(105, 210).toNumber()).toBe(0.5);
  expect(gramsToServings(100, 0).toNumber()).toBe(0);
  expect(servingsToGrams(1.5, 210).toNumber()).toBe(315);
});
