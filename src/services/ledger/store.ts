import type { CalendarDay } from "../../lib/dayBoundary";
import type { DailyLedger, LedgerKey } from "../../types/LedgerInterface";

/**
 * Persistence contract for daily ledgers. `exclusive` runs `work` while holding every
 * listed key; all read-modify-write sequences against a ledger go through it.
 */
export interface LedgerStore {
  loadLedger(key: LedgerKey): Promise<DailyLedger | null>;
  /** Upsert on (user, date). */
  saveLedger(ledger: DailyLedger): Promise<void>;
  deleteAllLedgers(user: string): Promise<void>;
  /** Inclusive range, ascending by date. */
  listLedgers(user: string, from: CalendarDay, to: CalendarDay): Promise<DailyLedger[]>;
  exclusive<T>(keys: LedgerKey[], work: () => Promise<T>): Promise<T>;
}

export function ledgerKeyId(key: LedgerKey): string {
  return `${key.user}|${key.day}`;
}
