import { BodyMeasurement } from '../app/Models/BodyMeasurement';
import { DailyLedger } from '../app/Models/DailyLedger';
import { ExerciseLog } from '../app/Models/ExerciseLog';
import { MealLog } from '../app/Models/MealLog';
import { SleepLog } from '../app/Models/SleepLog';
import { UserProfile } from '../app/Models/UserProfile';
import { logger } from '../observability/logging';

/* Idempotent index sync for the collections the service writes. */
export async function ensureIndexes(): Promise<void> {
  const models = [DailyLedger, UserProfile, BodyMeasurement, ExerciseLog, SleepLog, MealLog];
  for (const model of models) {
    const dropped = await model.syncIndexes();
    if (dropped.length) logger.info({ model: model.modelName, dropped }, '[DB] Dropped stale indexes');
  }
  logger.info('[DB] Indexes in sync');
}
