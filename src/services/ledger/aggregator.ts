import { atLeastZero, dec, type DecimalValue } from "../../lib/decimal";
import { type CalendarDay, isCalendarDay } from "../../lib/dayBoundary";
import { SleepStatus } from "../../types/enums/sleepStatusEnum";
import type { DailyLedger, LedgerKey } from "../../types/LedgerInterface";
import { InvalidInputError } from "../../utils/errors";
import { macroRatios, KCAL_PER_GRAM } from "../nutrition/calculator";
import { isValidSleepDuration, sleepStatusFor } from "../sleep/status";
import type { LedgerStore } from "./store";

export type Clock = () => Date;

const SLEEP_STATUSES: ReadonlySet<string> = new Set(Object.values(SleepStatus));

function assertKey(key: LedgerKey): void {
  if (typeof key.user !== "string" || key.user.trim() === "") {
    throw new InvalidInputError("user must be a non-empty string", "user");
  }
  if (!isCalendarDay(key.day)) {
    throw new InvalidInputError(`day must be a calendar day (YYYY-MM-DD), got "${key.day}"`, "day");
  }
}

function assertFinite(value: number, field: string): void {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`${field} must be a finite number`, field);
  }
}

function assertNonNegative(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidInputError(`${field} must be a finite number of at least 0`, field);
  }
}

function add(current: number, delta: DecimalValue): number {
  return dec(current).plus(delta).toNumber();
}

function addClamped(current: number, delta: DecimalValue): number {
  return atLeastZero(dec(current).plus(delta)).toNumber();
}

function netCalories(ledger: Pick<DailyLedger, "totalCaloriesIn" | "tdee">): number {
  return dec(ledger.totalCaloriesIn).minus(ledger.tdee).toNumber();
}

/** Ratios are only meaningful while the day's macros carry positive energy. */
function withMacroRatios(ledger: DailyLedger): DailyLedger {
  const { carbsRatio: _c, proteinRatio: _p, fatRatio: _f, ...rest } = ledger;
  const energy = dec(ledger.totalCarbs)
    .times(KCAL_PER_GRAM.carbs)
    .plus(dec(ledger.totalProtein).times(KCAL_PER_GRAM.protein))
    .plus(dec(ledger.totalFat).times(KCAL_PER_GRAM.fat));
  if (energy.lte(0)) return rest;
  const ratios = macroRatios(ledger.totalCarbs, ledger.totalProtein, ledger.totalFat);
  return { ...rest, carbsRatio: ratios.carbs, proteinRatio: ratios.protein, fatRatio: ratios.fat };
}

function withoutSleep(ledger: DailyLedger): DailyLedger {
  const { sleepDurationMinutes: _d, sleepStatus: _s, ...rest } = ledger;
  return rest;
}

/**
 * Maintains one running aggregate per (user, day). Every mutation is a single
 * read-modify-write inside the store's exclusive section for that key, creates the
 * ledger lazily when absent and refreshes `updatedAt`. Inputs are validated before
 * the store is touched; store errors propagate as thrown.
 */
export class LedgerAggregator {
  constructor(
    private readonly store: LedgerStore,
    private readonly clock: Clock = () => new Date(),
  ) {}

  private blank(key: LedgerKey, bmr = 0, tdee = 0): DailyLedger {
    const now = this.clock();
    return {
      user: key.user,
      date: key.day,
      bmr,
      tdee,
      netCalories: dec(0).minus(tdee).toNumber(),
      totalCaloriesIn: 0,
      totalCaloriesOut: 0,
      totalCarbs: 0,
      totalProtein: 0,
      totalFat: 0,
      exerciseMinutes: 0,
      exerciseCount: 0,
      createdAt: now,
      updatedAt: now,
    };
  }

  // Callers must already hold the key.
  private async mutate(key: LedgerKey, change: (ledger: DailyLedger) => DailyLedger): Promise<DailyLedger> {
    const current = (await this.store.loadLedger(key)) ?? this.blank(key);
    const next: DailyLedger = { ...change(current), updatedAt: this.clock() };
    await this.store.saveLedger(next);
    return next;
  }

  private locked(key: LedgerKey, change: (ledger: DailyLedger) => DailyLedger): Promise<DailyLedger> {
    return this.store.exclusive([key], () => this.mutate(key, change));
  }

  /**
   * Existing ledger for the key, or a fresh one carrying `bmr`/`tdee`. A ledger created
   * before metabolic values were known (tdee 0) is backfilled once a positive tdee
   * arrives, and its netCalories recomputed.
   */
  async getOrCreate(key: LedgerKey, bmr: number, tdee: number): Promise<DailyLedger> {
    assertKey(key);
    assertNonNegative(bmr, "bmr");
    assertNonNegative(tdee, "tdee");

    return this.store.exclusive([key], async () => {
      const existing = await this.store.loadLedger(key);
      if (!existing) {
        const created = this.blank(key, bmr, tdee);
        await this.store.saveLedger(created);
        return created;
      }
      if (existing.tdee === 0 && tdee > 0) {
        const backfilled: DailyLedger = {
          ...existing,
          bmr,
          tdee,
          netCalories: netCalories({ totalCaloriesIn: existing.totalCaloriesIn, tdee }),
          updatedAt: this.clock(),
        };
        await this.store.saveLedger(backfilled);
        return backfilled;
      }
      return existing;
    });
  }

  /** Signed deltas for add (+), remove (−) and edit (new − old). Each field floors at 0. */
  async applyExerciseDelta(
    key: LedgerKey,
    caloriesDelta: number,
    minutesDelta: number,
    countDelta: number,
  ): Promise<DailyLedger> {
    assertKey(key);
    assertFinite(caloriesDelta, "caloriesDelta");
    assertFinite(minutesDelta, "minutesDelta");
    if (!Number.isInteger(countDelta)) {
      throw new InvalidInputError("countDelta must be an integer", "countDelta");
    }

    return this.locked(key, (ledger) => ({
      ...ledger,
      totalCaloriesOut: addClamped(ledger.totalCaloriesOut, caloriesDelta),
      exerciseMinutes: addClamped(ledger.exerciseMinutes, minutesDelta),
      exerciseCount: addClamped(ledger.exerciseCount, countDelta),
    }));
  }

  /**
   * Sets the day's sleep fields, or clears them when no duration is given. A missing
   * status is derived from the duration.
   */
  async upsertSleep(key: LedgerKey, durationMinutes?: number, status?: SleepStatus): Promise<DailyLedger> {
    assertKey(key);
    const apply = this.sleepChange(durationMinutes, status);
    return this.locked(key, apply);
  }

  /**
   * Clears the sleep fields on `oldDay` and sets them on `newDay` with both keys held.
   * Returns the ledger of `newDay`.
   */
  async moveSleep(
    user: string,
    oldDay: CalendarDay,
    newDay: CalendarDay,
    durationMinutes: number,
    status: SleepStatus,
  ): Promise<DailyLedger> {
    const oldKey: LedgerKey = { user, day: oldDay };
    const newKey: LedgerKey = { user, day: newDay };
    assertKey(oldKey);
    assertKey(newKey);
    const set = this.sleepChange(durationMinutes, status);

    return this.store.exclusive([oldKey, newKey], async () => {
      if (oldDay !== newDay) {
        await this.mutate(oldKey, withoutSleep);
      }
      return this.mutate(newKey, set);
    });
  }

  /** Intake deltas are not clamped; a negative delta reverses an earlier contribution. */
  async applyNutritionContribution(
    key: LedgerKey,
    caloriesDelta: number,
    carbsDelta: number,
    proteinDelta: number,
    fatDelta: number,
  ): Promise<DailyLedger> {
    assertKey(key);
    assertFinite(caloriesDelta, "caloriesDelta");
    assertFinite(carbsDelta, "carbsDelta");
    assertFinite(proteinDelta, "proteinDelta");
    assertFinite(fatDelta, "fatDelta");

    return this.locked(key, (ledger) => {
      const totalCaloriesIn = add(ledger.totalCaloriesIn, caloriesDelta);
      return withMacroRatios({
        ...ledger,
        totalCaloriesIn,
        totalCarbs: add(ledger.totalCarbs, carbsDelta),
        totalProtein: add(ledger.totalProtein, proteinDelta),
        totalFat: add(ledger.totalFat, fatDelta),
        netCalories: netCalories({ totalCaloriesIn, tdee: ledger.tdee }),
      });
    });
  }

  /** Mirrors the day's latest body measurement onto its ledger. */
  async recordBodyMetrics(key: LedgerKey, weight: number, bodyFatPercent?: number): Promise<DailyLedger> {
    assertKey(key);
    assertNonNegative(weight, "weight");
    if (bodyFatPercent !== undefined) assertNonNegative(bodyFatPercent, "bodyFatPercent");

    return this.locked(key, (ledger) => {
      const { bodyFatPercent: _previous, ...rest } = ledger;
      return bodyFatPercent === undefined ? { ...rest, weight } : { ...rest, weight, bodyFatPercent };
    });
  }

  /** Drops the mirrored body metrics. A day without a ledger is left absent. */
  async clearBodyMetrics(key: LedgerKey): Promise<DailyLedger | null> {
    assertKey(key);
    return this.store.exclusive([key], async () => {
      const existing = await this.store.loadLedger(key);
      if (!existing) return null;
      const { weight: _w, bodyFatPercent: _b, ...rest } = existing;
      const next: DailyLedger = { ...rest, updatedAt: this.clock() };
      await this.store.saveLedger(next);
      return next;
    });
  }

  async getLedger(key: LedgerKey): Promise<DailyLedger | null> {
    assertKey(key);
    return this.store.loadLedger(key);
  }

  async listLedgers(user: string, from: CalendarDay, to: CalendarDay): Promise<DailyLedger[]> {
    assertKey({ user, day: from });
    assertKey({ user, day: to });
    return this.store.listLedgers(user, from, to);
  }

  /** Bulk reset: removes every ledger the user has. */
  async resetAll(user: string): Promise<void> {
    if (typeof user !== "string" || user.trim() === "") {
      throw new InvalidInputError("user must be a non-empty string", "user");
    }
    await this.store.deleteAllLedgers(user);
  }

  private sleepChange(durationMinutes?: number, status?: SleepStatus): (ledger: DailyLedger) => DailyLedger {
    if (durationMinutes === undefined) {
      if (status !== undefined) {
        throw new InvalidInputError("sleepStatus requires durationMinutes", "sleepStatus");
      }
      return withoutSleep;
    }
    if (!isValidSleepDuration(durationMinutes)) {
      throw new InvalidInputError("durationMinutes must be a whole number between 0 and 1440", "durationMinutes");
    }
    if (status !== undefined && !SLEEP_STATUSES.has(status)) {
      throw new InvalidInputError(`unknown sleep status "${String(status)}"`, "sleepStatus");
    }
    const resolved = status ?? sleepStatusFor(durationMinutes);
    return (ledger) => ({ ...ledger, sleepDurationMinutes: durationMinutes, sleepStatus: resolved });
  }
}
