import { KeyedMutex } from "../../lib/keyedMutex";
import type { CalendarDay } from "../../lib/dayBoundary";
import type { DailyLedger, LedgerKey } from "../../types/LedgerInterface";
import { ledgerKeyId, type LedgerStore } from "./store";

/** In-process ledger store. Copies on the way in and out so callers never share rows. */
export class MemoryLedgerStore implements LedgerStore {
  private readonly rows = new Map<string, DailyLedger>();
  private readonly mutex = new KeyedMutex();

  async loadLedger(key: LedgerKey): Promise<DailyLedger | null> {
    const row = this.rows.get(ledgerKeyId(key));
    return row ? { ...row } : null;
  }

  async saveLedger(ledger: DailyLedger): Promise<void> {
    this.rows.set(ledgerKeyId({ user: ledger.user, day: ledger.date }), { ...ledger });
  }

  async deleteAllLedgers(user: string): Promise<void> {
    for (const [id, row] of this.rows) {
      if (row.user === user) this.rows.delete(id);
    }
  }

  async listLedgers(user: string, from: CalendarDay, to: CalendarDay): Promise<DailyLedger[]> {
    return Array.from(this.rows.values())
      .filter((row) => row.user === user && row.date >= from && row.date <= to)
      .sort((a, b) => a.date.localeCompare(b.date))
      .map((row) => ({ ...row }));
  }

  exclusive<T>(keys: LedgerKey[], work: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(keys.map(ledgerKeyId), work);
  }

  get size(): number {
    return this.rows.size;
  }
}
