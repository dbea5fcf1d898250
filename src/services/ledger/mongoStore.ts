import { DailyLedger as DailyLedgerModel } from "../../app/Models/DailyLedger";
import type { IDailyLedger } from "../../database/schemas/DailyLedgerSchema";
import { KeyedMutex } from "../../lib/keyedMutex";
import type { CalendarDay } from "../../lib/dayBoundary";
import type { DailyLedger, LedgerKey } from "../../types/LedgerInterface";
import { withStorage } from "../../utils/storage";
import { ledgerKeyId, type LedgerStore } from "./store";

// lean() hands back nulls for unset paths on some drivers; normalize to absent.
function toLedger(doc: IDailyLedger): DailyLedger {
  const ledger: DailyLedger = {
    user: doc.user,
    date: doc.date,
    bmr: doc.bmr,
    tdee: doc.tdee,
    netCalories: doc.netCalories,
    totalCaloriesIn: doc.totalCaloriesIn,
    totalCaloriesOut: doc.totalCaloriesOut,
    totalCarbs: doc.totalCarbs,
    totalProtein: doc.totalProtein,
    totalFat: doc.totalFat,
    exerciseMinutes: doc.exerciseMinutes,
    exerciseCount: doc.exerciseCount,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
  if (doc.carbsRatio != null) ledger.carbsRatio = doc.carbsRatio;
  if (doc.proteinRatio != null) ledger.proteinRatio = doc.proteinRatio;
  if (doc.fatRatio != null) ledger.fatRatio = doc.fatRatio;
  if (doc.sleepDurationMinutes != null) ledger.sleepDurationMinutes = doc.sleepDurationMinutes;
  if (doc.sleepStatus != null) ledger.sleepStatus = doc.sleepStatus;
  if (doc.weight != null) ledger.weight = doc.weight;
  if (doc.bodyFatPercent != null) ledger.bodyFatPercent = doc.bodyFatPercent;
  return ledger;
}

/**
 * MongoDB-backed store. Each save is a single replaceOne upsert on the unique
 * (user, date) index; the keyed mutex serializes read-modify-write within this process.
 */
export class MongoLedgerStore implements LedgerStore {
  private readonly mutex = new KeyedMutex();

  loadLedger(key: LedgerKey): Promise<DailyLedger | null> {
    return withStorage("loadLedger", async () => {
      const doc = await DailyLedgerModel.findOne({ user: key.user, date: key.day }).lean<IDailyLedger>().exec();
      return doc ? toLedger(doc) : null;
    });
  }

  saveLedger(ledger: DailyLedger): Promise<void> {
    return withStorage("saveLedger", async () => {
      await DailyLedgerModel.replaceOne({ user: ledger.user, date: ledger.date }, ledger, { upsert: true }).exec();
    });
  }

  deleteAllLedgers(user: string): Promise<void> {
    return withStorage("deleteAllLedgers", async () => {
      await DailyLedgerModel.deleteMany({ user }).exec();
    });
  }

  listLedgers(user: string, from: CalendarDay, to: CalendarDay): Promise<DailyLedger[]> {
    return withStorage("listLedgers", async () => {
      const docs = await DailyLedgerModel.find({ user, date: { $gte: from, $lte: to } })
        .sort({ date: 1 })
        .lean<IDailyLedger[]>()
        .exec();
      return docs.map(toLedger);
    });
  }

  exclusive<T>(keys: LedgerKey[], work: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(keys.map(ledgerKeyId), work);
  }
}
