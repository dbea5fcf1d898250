import { DEFAULT_BOUNDARY_HOUR } from "../lib/dayBoundary";
import { LedgerAggregator, type Clock } from "./ledger/aggregator";
import { MemoryLedgerStore } from "./ledger/memoryStore";
import { MongoLedgerStore } from "./ledger/mongoStore";
import { BodyMeasurementService } from "./logging/bodyMeasurementService";
import { ExerciseLogService } from "./logging/exerciseLogService";
import { MealLogService } from "./logging/mealLogService";
import { memoryRepositories } from "./logging/memoryRepositories";
import { mongoRepositories } from "./logging/mongoRepositories";
import { ProfileService } from "./logging/profileService";
import { SleepLogService } from "./logging/sleepLogService";

export type StorageDriver = "mongo" | "memory";

export interface ServiceOptions {
  driver: StorageDriver;
  sleepBoundaryHour?: number;
  clock?: Clock;
}

export interface Services {
  profiles: ProfileService;
  bodyMeasurements: BodyMeasurementService;
  exercises: ExerciseLogService;
  sleep: SleepLogService;
  meals: MealLogService;
  ledger: LedgerAggregator;
}

export function createServices(options: ServiceOptions): Services {
  const clock = options.clock ?? (() => new Date());
  const repos = options.driver === "memory" ? memoryRepositories(clock) : mongoRepositories();
  const store = options.driver === "memory" ? new MemoryLedgerStore() : new MongoLedgerStore();
  const ledger = new LedgerAggregator(store, clock);

  return {
    profiles: new ProfileService(repos.profiles, clock),
    bodyMeasurements: new BodyMeasurementService(repos.bodyMeasurements, repos.profiles, ledger, clock),
    exercises: new ExerciseLogService(repos.exercises, repos.bodyMeasurements, ledger),
    sleep: new SleepLogService(repos.sleepLogs, ledger, options.sleepBoundaryHour ?? DEFAULT_BOUNDARY_HOUR, clock),
    meals: new MealLogService(repos.meals, repos.bodyMeasurements, ledger),
    ledger,
  };
}
