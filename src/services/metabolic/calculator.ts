import { differenceInYears } from "date-fns";
import { Decimal, dec, type DecimalValue } from "../../lib/decimal";
import { type CalendarDay, parseCalendarDay } from "../../lib/dayBoundary";
import { ActivityLevel } from "../../types/enums/activityLevelEnum";
import { BmrFormula } from "../../types/enums/bmrFormulaEnum";
import { Sex } from "../../types/enums/sexEnum";
import type { UserProfile } from "../../types/ProfileInterface";
import { CalculationOutOfRangeError, InvalidInputError } from "../../utils/errors";

export const BMR_RANGE = { min: 300, max: 5000 } as const;
export const TDEE_RANGE = { min: 400, max: 10000 } as const;
export const BODY_FAT_RANGE = { min: 1, max: 60 } as const;

// Katch-McArdle
const LEAN_MASS_BASE = 370;
const LEAN_MASS_FACTOR = 21.6;

// Mifflin-St Jeor
const WEIGHT_FACTOR = 10;
const HEIGHT_FACTOR = 6.25;
const AGE_FACTOR = 5;
const SEX_OFFSET: Record<Sex, number> = {
  [Sex.MALE]: 5,
  [Sex.FEMALE]: -161,
};

export const ACTIVITY_MULTIPLIERS: Record<ActivityLevel, number> = {
  [ActivityLevel.SEDENTARY]: 1.2,
  [ActivityLevel.LIGHTLY_ACTIVE]: 1.375,
  [ActivityLevel.MODERATELY_ACTIVE]: 1.55,
  [ActivityLevel.VERY_ACTIVE]: 1.725,
  [ActivityLevel.EXTRA_ACTIVE]: 1.9,
};

export interface BmrInput {
  weight: DecimalValue;
  height: DecimalValue;
  age: number;
  sex: Sex;
  bodyFatPercent?: DecimalValue | null;
}

export interface BmrResult {
  bmr: Decimal;
  formulaUsed: BmrFormula;
  leanMass?: Decimal;
}

export interface MetabolicProfile {
  bmr: Decimal;
  tdee: Decimal;
  formulaUsed: BmrFormula;
}

function positive(value: DecimalValue, field: string): Decimal {
  const d = dec(value);
  if (!d.isFinite() || d.lte(0)) {
    throw new InvalidInputError(`${field} must be greater than 0`, field);
  }
  return d;
}

export function activityMultiplier(level: ActivityLevel): number {
  return ACTIVITY_MULTIPLIERS[level];
}

/**
 * BMR in kcal/day. Uses the lean-mass formula whenever a body-fat percentage is
 * supplied, the standard weight/height/age formula otherwise.
 */
export function computeBMR(input: BmrInput): BmrResult {
  const weight = positive(input.weight, "weight");
  const height = positive(input.height, "height");
  const age = positive(input.age, "age");

  let result: BmrResult;
  if (input.bodyFatPercent !== undefined && input.bodyFatPercent !== null) {
    const bodyFat = dec(input.bodyFatPercent);
    if (!bodyFat.isFinite() || bodyFat.lt(BODY_FAT_RANGE.min) || bodyFat.gt(BODY_FAT_RANGE.max)) {
      throw new InvalidInputError(
        `bodyFatPercent must be between ${BODY_FAT_RANGE.min} and ${BODY_FAT_RANGE.max}`,
        "bodyFatPercent",
      );
    }
    const leanMass = weight.times(dec(1).minus(bodyFat.div(100)));
    result = {
      bmr: dec(LEAN_MASS_BASE).plus(dec(LEAN_MASS_FACTOR).times(leanMass)),
      formulaUsed: BmrFormula.LEAN_MASS,
      leanMass,
    };
  } else {
    const bmr = dec(WEIGHT_FACTOR)
      .times(weight)
      .plus(dec(HEIGHT_FACTOR).times(height))
      .minus(dec(AGE_FACTOR).times(age))
      .plus(SEX_OFFSET[input.sex]);
    result = { bmr, formulaUsed: BmrFormula.STANDARD_WEIGHT };
  }

  if (result.bmr.lt(BMR_RANGE.min) || result.bmr.gt(BMR_RANGE.max)) {
    throw new CalculationOutOfRangeError("BMR", result.bmr.toNumber(), BMR_RANGE.min, BMR_RANGE.max);
  }
  return result;
}

export function computeTDEE(bmr: DecimalValue, multiplier: DecimalValue): Decimal {
  const base = positive(bmr, "bmr");
  const factor = positive(multiplier, "activityMultiplier");
  const tdee = base.times(factor);
  if (tdee.lt(TDEE_RANGE.min) || tdee.gt(TDEE_RANGE.max)) {
    throw new CalculationOutOfRangeError("TDEE", tdee.toNumber(), TDEE_RANGE.min, TDEE_RANGE.max);
  }
  return tdee;
}

/** Whole years between `birthDate` and `on`. */
export function ageOn(birthDate: CalendarDay, on: CalendarDay): number {
  return differenceInYears(parseCalendarDay(on), parseCalendarDay(birthDate));
}

export function computeMetabolicProfile(
  measurement: { weight: number; bodyFatPercent?: number },
  profile: Pick<UserProfile, "heightCm" | "birthDate" | "sex" | "activityLevel">,
  asOf: CalendarDay,
): MetabolicProfile {
  const { bmr, formulaUsed } = computeBMR({
    weight: measurement.weight,
    height: profile.heightCm,
    age: ageOn(profile.birthDate, asOf),
    sex: profile.sex,
    bodyFatPercent: measurement.bodyFatPercent,
  });
  const tdee = computeTDEE(bmr, activityMultiplier(profile.activityLevel));
  return { bmr, tdee, formulaUsed };
}
