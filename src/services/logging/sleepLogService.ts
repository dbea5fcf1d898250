import { DEFAULT_BOUNDARY_HOUR, logicalDay, windowEnding } from "../../lib/dayBoundary";
import type { NewEvent } from "../../types/LoggedEventInterface";
import type { SleepLog } from "../../types/SleepLogInterface";
import { InvalidInputError, NotFoundError } from "../../utils/errors";
import type { LedgerAggregator } from "../ledger/aggregator";
import { isSleepStatsPeriod, summarizeSleep, type SleepStats, type SleepStatsPeriod } from "../sleep/stats";
import { sleepStatusFor } from "../sleep/status";
import type { EventRepository } from "./repositories";
import { EventLocks } from "./eventLocks";
import { requireDay, requireUser } from "./validation";

export interface SleepInput {
  /** Wake-up time as reported by the device or the user. */
  recordedAt: Date;
  durationMinutes: number;
}

export class SleepLogService {
  private readonly locks = new EventLocks();

  constructor(
    private readonly sleepLogs: EventRepository<SleepLog>,
    private readonly ledger: LedgerAggregator,
    private readonly boundaryHour: number = DEFAULT_BOUNDARY_HOUR,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  private build(user: string, input: SleepInput): NewEvent<SleepLog> {
    if (Number.isNaN(input.recordedAt.getTime())) {
      throw new InvalidInputError("recordedAt must be a valid timestamp", "recordedAt");
    }
    return {
      user,
      date: logicalDay(input.recordedAt, this.boundaryHour),
      recordedAt: input.recordedAt,
      durationMinutes: input.durationMinutes,
      status: sleepStatusFor(input.durationMinutes),
    };
  }

  async record(user: string, input: SleepInput): Promise<SleepLog> {
    requireUser(user);
    const saved = await this.sleepLogs.create(this.build(user, input));
    await this.ledger.upsertSleep({ user, day: saved.date }, saved.durationMinutes, saved.status);
    return saved;
  }

  async update(user: string, id: string, input: SleepInput): Promise<SleepLog> {
    requireUser(user);
    return this.locks.run(user, id, async () => {
      const previous = await this.get(user, id);
      const next = this.build(user, input);
      const saved = await this.sleepLogs.replace(user, id, next);
      if (!saved) throw new NotFoundError(`Sleep record ${id} not found`);
      await this.ledger.moveSleep(user, previous.date, saved.date, saved.durationMinutes, saved.status);
      return saved;
    });
  }

  async remove(user: string, id: string): Promise<SleepLog> {
    requireUser(user);
    return this.locks.run(user, id, async () => {
      const removed = await this.sleepLogs.remove(user, id);
      if (!removed) throw new NotFoundError(`Sleep record ${id} not found`);
      await this.ledger.upsertSleep({ user, day: removed.date });
      return removed;
    });
  }

  async get(user: string, id: string): Promise<SleepLog> {
    const found = await this.sleepLogs.findById(user, id);
    if (!found) throw new NotFoundError(`Sleep record ${id} not found`);
    return found;
  }

  list(user: string, from: string, to: string): Promise<SleepLog[]> {
    return this.sleepLogs.list(requireUser(user), requireDay(from, "from"), requireDay(to, "to"));
  }

  /** Summary of the `period` logical days ending on `end` (today's logical day by default). */
  async stats(
    user: string,
    period: SleepStatsPeriod,
    end?: string,
  ): Promise<SleepStats & { period: SleepStatsPeriod; from: string; to: string }> {
    if (!isSleepStatsPeriod(period)) {
      throw new InvalidInputError("period must be 7, 30 or 90", "period");
    }
    const last = end === undefined ? logicalDay(this.clock(), this.boundaryHour) : requireDay(end, "end");
    const { from, to } = windowEnding(last, period);
    const records = await this.list(user, from, to);
    return { period, from, to, ...summarizeSleep(records) };
  }
}
