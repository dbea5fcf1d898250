import { dec, round1, roundTo, sumOf } from "../../lib/decimal";
import { SleepStatus } from "../../types/enums/sleepStatusEnum";
import type { SleepLog } from "../../types/SleepLogInterface";

export const SLEEP_STATS_PERIODS = [7, 30, 90] as const;
export type SleepStatsPeriod = (typeof SLEEP_STATS_PERIODS)[number];

/** Records needed before a recent-vs-previous comparison is reported. */
export const MIN_RECORDS_FOR_TREND = 14;

// A coefficient of variation at or above this scores 0.
const MAX_CONSISTENT_VARIATION = 0.5;

export function isSleepStatsPeriod(value: number): value is SleepStatsPeriod {
  return SLEEP_STATS_PERIODS.some((period) => period === value);
}

export interface SleepStatusShare {
  status: SleepStatus;
  count: number;
  percent: number;
}

export interface SleepTrend {
  previousAverageMinutes: number;
  recentAverageMinutes: number;
  changeMinutes: number;
}

export interface SleepStats {
  count: number;
  totalMinutes: number;
  averageMinutes: number | null;
  medianMinutes: number | null;
  minMinutes: number | null;
  maxMinutes: number | null;
  /** Last record minus first record. */
  changeMinutes: number | null;
  /** Most frequent first. */
  statuses: SleepStatusShare[];
  mostCommonStatus: SleepStatus | null;
  goodSleepPercent: number;
  poorSleepPercent: number;
  /** 0..1, two decimals; 1 means every night had the same duration. */
  consistencyScore: number | null;
  recentTrend: SleepTrend | null;
}

type SleepPoint = Pick<SleepLog, "durationMinutes" | "status">;

// Averages of minutes are whole minutes, truncated.
function averageMinutes(durations: number[]): number {
  return Math.trunc(sumOf(durations).div(durations.length).toNumber());
}

function percent(part: number, whole: number): number {
  return whole === 0 ? 0 : round1(dec(part).div(whole).times(100)).toNumber();
}

function median(durations: number[]): number {
  const sorted = [...durations].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[middle];
  return averageMinutes([sorted[middle - 1], sorted[middle]]);
}

function consistency(durations: number[], average: number): number | null {
  if (average <= 0) return null;
  const variance = sumOf(durations.map((d) => dec(d).minus(average).pow(2))).div(durations.length);
  const variation = variance.sqrt().div(average);
  const score = dec(1).minus(variation.div(MAX_CONSISTENT_VARIATION));
  return roundTo(Math.min(1, Math.max(0, score.toNumber())), 2).toNumber();
}

function trend(durations: number[]): SleepTrend | null {
  if (durations.length < MIN_RECORDS_FOR_TREND) return null;
  const half = Math.floor(durations.length / 2);
  const previous = averageMinutes(durations.slice(0, half));
  const recent = averageMinutes(durations.slice(durations.length - half));
  return { previousAverageMinutes: previous, recentAverageMinutes: recent, changeMinutes: recent - previous };
}

/** Summary of sleep records given in chronological order. */
export function summarizeSleep(records: SleepPoint[]): SleepStats {
  const durations = records.map((r) => r.durationMinutes);
  const count = durations.length;
  const counts = new Map<SleepStatus, number>();
  for (const r of records) counts.set(r.status, (counts.get(r.status) ?? 0) + 1);

  // Ties keep the enum order, worst to best.
  const statuses = Object.values(SleepStatus)
    .map((status) => ({ status, count: counts.get(status) ?? 0 }))
    .filter((s) => s.count > 0)
    .sort((a, b) => b.count - a.count)
    .map((s) => ({ ...s, percent: percent(s.count, count) }));

  const good = (counts.get(SleepStatus.GOOD) ?? 0) + (counts.get(SleepStatus.EXCELLENT) ?? 0);
  const average = count ? averageMinutes(durations) : null;

  return {
    count,
    totalMinutes: sumOf(durations).toNumber(),
    averageMinutes: average,
    medianMinutes: count ? median(durations) : null,
    minMinutes: count ? Math.min(...durations) : null,
    maxMinutes: count ? Math.max(...durations) : null,
    changeMinutes: count ? durations[count - 1] - durations[0] : null,
    statuses,
    mostCommonStatus: statuses.length ? statuses[0].status : null,
    goodSleepPercent: percent(good, count),
    poorSleepPercent: percent(counts.get(SleepStatus.BAD) ?? 0, count),
    consistencyScore: average === null ? null : consistency(durations, average),
    recentTrend: trend(durations),
  };
}
