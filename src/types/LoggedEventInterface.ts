import type { CalendarDay } from "../lib/dayBoundary";

/** Fields every logged event carries. `date` is the ledger day it reports to. */
export interface LoggedEvent {
  id: string;
  user: string;
  date: CalendarDay;
  createdAt: Date;
  updatedAt: Date;
}

export type NewEvent<T extends LoggedEvent> = Omit<T, "id" | "createdAt" | "updatedAt">;
