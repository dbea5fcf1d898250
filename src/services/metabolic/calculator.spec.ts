import { ActivityLevel } from '../../types/enums/activityLevelEnum';
import { BmrFormula } from '../../types/enums/bmrFormulaEnum';
import { Sex } from '../../types/enums/sexEnum';
import { CalculationOutOfRangeError, InvalidInputError } from '../../utils/errors';
import { activityMultiplier, ageOn, computeBMR, computeMetabolicProfile, computeTDEE } from './calculator';

describe('computeBMR', () => {
  test('standard-weight formula for a male without body fat', () => {
    const { bmr, formulaUsed } = computeBMR({ weight: 70, height: 175, age: 30, sex: Sex.MALE });
    expect(bmr.toNumber()).toBe(1648.75);
    expect(formulaUsed).toBe(BmrFormula.STANDARD_WEIGHT);
  });

  test('standard-weight formula applies the female offset', () => {
    const { bmr } = computeBMR({ weight: 60, height: 165, age: 25, sex: Sex.FEMALE });
    expect(bmr.toNumber()).toBe(1345.25);
  });

  test('lean-mass formula whenever body fat is supplied', () => {
    const result = computeBMR({ weight: 70, height: 175, age: 30, sex: Sex.MALE, bodyFatPercent: 18 });
    expect(result.formulaUsed).toBe(BmrFormula.LEAN_MASS);
    expect(result.leanMass?.toNumber()).toBe(57.4);
    expect(result.bmr.toNumber()).toBe(1609.84);
  });

  test('same input gives the same output', () => {
    const input = { weight: 82.3, height: 181, age: 41, sex: Sex.MALE };
    expect(computeBMR(input).bmr.toString()).toBe(computeBMR(input).bmr.toString());
  });

  test.each([
    ['weight', { weight: 0, height: 175, age: 30 }],
    ['height', { weight: 70, height: -1, age: 30 }],
    ['age', { weight: 70, height: 175, age: 0 }],
  ])('rejects non-positive %s', (_field, values) => {
    expect(() => computeBMR({ ...values, sex: Sex.MALE })).toThrow(InvalidInputError);
  });

  test('accepts a fractional age', () => {
    // 700 + 1093.75 - 152.5 + 5
    expect(computeBMR({ weight: 70, height: 175, age: 30.5, sex: Sex.MALE }).bmr.toNumber()).toBe(1646.25);
  });

  test('rejects body fat outside 1..60', () => {
    expect(() => computeBMR({ weight: 70, height: 175, age: 30, sex: Sex.MALE, bodyFatPercent: 0.5 })).toThrow(InvalidInputError);
    expect(() => computeBMR({ weight: 70, height: 175, age: 30, sex: Sex.MALE, bodyFatPercent: 61 })).toThrow(InvalidInputError);
    expect(computeBMR({ weight: 70, height: 175, age: 30, sex: Sex.MALE, bodyFatPercent: 60 }).bmr.toNumber()).toBe(974.8);
  });

  test('results outside the sanity band are reported, not clamped', () => {
    expect(() => computeBMR({ weight: 20, height: 50, age: 90, sex: Sex.FEMALE })).toThrow(CalculationOutOfRangeError);
    expect(() => computeBMR({ weight: 500, height: 250, age: 1, sex: Sex.MALE })).toThrow(
      'BMR 6562.5 is outside the expected range [300, 5000]',
    );
  });
});

describe('computeTDEE', () => {
  test('scales BMR by the activity multiplier exactly', () => {
    expect(computeTDEE(1648.75, 1.55).toNumber()).toBe(2555.5625);
  });

  test('is strictly increasing in both arguments', () => {
    expect(computeTDEE(1500, 1.2).lt(computeTDEE(1500, 1.375))).toBe(true);
    expect(computeTDEE(1500, 1.55).lt(computeTDEE(1600, 1.55))).toBe(true);
  });

  test('rejects a non-positive BMR or multiplier', () => {
    expect(() => computeTDEE(0, 1.2)).toThrow(InvalidInputError);
    expect(() => computeTDEE(1500, 0)).toThrow(InvalidInputError);
  });

  test('reports values outside 400..10000', () => {
    expect(() => computeTDEE(300, 1.2)).toThrow(CalculationOutOfRangeError);
    expect(() => computeTDEE(5000, 2.1)).toThrow(CalculationOutOfRangeError);
  });
});

test('activity tiers map to fixed multipliers', () => {
  expect(
    [
      ActivityLevel.SEDENTARY,
      ActivityLevel.LIGHTLY_ACTIVE,
      ActivityLevel.MODERATELY_ACTIVE,
      ActivityLevel.VERY_ACTIVE,
      ActivityLevel.EXTRA_ACTIVE,
    ].map(activityMultiplier),
  ).toEqual([1.2, 1.375, 1.55, 1.725, 1.9]);
});

test('age counts whole years up to the given day', () => {
  expect(ageOn('1996-05-20', '2026-05-19')).toBe(29);
  expect(ageOn('1996-05-20', '2026-05-20')).toBe(30);
});

test('computeMetabolicProfile derives age from the profile', () => {
  const profile = { heightCm: 175, birthDate: '1996-01-01', sex: Sex.MALE, activityLevel: ActivityLevel.MODERATELY_ACTIVE };
  const result = computeMetabolicProfile({ weight: 70 }, profile, '2026-06-01');
  expect(result.bmr.toNumber()).toBe(1648.75);
  expect(result.tdee.toNumber()).toBe(2555.5625);
  expect(result.formulaUsed).toBe(BmrFormula.STANDARD_WEIGHT);
});
