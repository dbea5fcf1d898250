import { dec, roundTo, sumOf } from "../../lib/decimal";
import type { CalendarDay } from "../../lib/dayBoundary";
import type { BodyMeasurement } from "../../types/BodyMeasurementInterface";

export const BODY_TREND_PERIODS = [30, 60, 120] as const;
export type BodyTrendPeriod = (typeof BODY_TREND_PERIODS)[number];

export function isBodyTrendPeriod(value: number): value is BodyTrendPeriod {
  return BODY_TREND_PERIODS.some((period) => period === value);
}

export interface BodyTrendPoint {
  date: CalendarDay;
  weight: number;
  bodyFatPercent?: number;
  muscleMass?: number;
  bmr: number;
  tdee: number;
}

export interface SeriesSummary {
  average: number;
  min: number;
  max: number;
  /** Last value minus first value. */
  change: number;
}

export interface BodyTrend {
  count: number;
  points: BodyTrendPoint[];
  weight: SeriesSummary | null;
  bodyFatPercent: SeriesSummary | null;
  muscleMass: SeriesSummary | null;
}

type TrendSource = Pick<BodyMeasurement, "date" | "weight" | "bodyFatPercent" | "muscleMass" | "bmr" | "tdee">;

function summarize(values: number[]): SeriesSummary | null {
  if (values.length === 0) return null;
  return {
    average: roundTo(sumOf(values).div(values.length), 2).toNumber(),
    min: Math.min(...values),
    max: Math.max(...values),
    change: dec(values[values.length - 1]).minus(values[0]).toNumber(),
  };
}

function toPoint(m: TrendSource): BodyTrendPoint {
  const point: BodyTrendPoint = { date: m.date, weight: m.weight, bmr: m.bmr, tdee: m.tdee };
  if (m.bodyFatPercent !== undefined) point.bodyFatPercent = m.bodyFatPercent;
  if (m.muscleMass !== undefined) point.muscleMass = m.muscleMass;
  return point;
}

/**
 * Weight, body-fat and muscle series over measurements in chronological order. Body fat
 * and muscle mass are optional per measurement, so each series only covers the
 * measurements that carry it.
 */
export function summarizeBodyTrend(measurements: TrendSource[]): BodyTrend {
  const points = measurements.map(toPoint);
  const bodyFat: number[] = [];
  const muscle: number[] = [];
  for (const p of points) {
    if (p.bodyFatPercent !== undefined) bodyFat.push(p.bodyFatPercent);
    if (p.muscleMass !== undefined) muscle.push(p.muscleMass);
  }
  return {
    count: points.length,
    points,
    weight: summarize(points.map((p) => p.weight)),
    bodyFatPercent: summarize(bodyFat),
    muscleMass: summarize(muscle),
  };
}
