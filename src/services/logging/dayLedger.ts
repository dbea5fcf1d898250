import type { BodyMeasurement } from "../../types/BodyMeasurementInterface";
import type { DailyLedger, LedgerKey } from "../../types/LedgerInterface";
import type { LedgerAggregator } from "../ledger/aggregator";
import type { EventRepository } from "./repositories";

/**
 * Ensures the day's ledger, seeded from the latest measurement dated on or before that
 * day (0/0 when there is none).
 */
export async function ensureDayLedger(
  ledger: LedgerAggregator,
  measurements: EventRepository<BodyMeasurement>,
  key: LedgerKey,
): Promise<DailyLedger> {
  const latest = await measurements.latest(key.user, key.day);
  return ledger.getOrCreate(key, latest?.bmr ?? 0, latest?.tdee ?? 0);
}
