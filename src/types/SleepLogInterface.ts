import { SleepStatus } from "./enums/sleepStatusEnum";
import type { LoggedEvent } from "./LoggedEventInterface";

/** `date` is the logical day of `recordedAt`, not its calendar day. */
export interface SleepLog extends LoggedEvent {
  recordedAt: Date;
  durationMinutes: number;
  status: SleepStatus;
}
