// src/impactEngine.ts
import { getFactor } from "./factorRepository";
import type { ActionCategory } from "./factorRepository";

export const TIMES_OF_DAY = ["peak", "off_peak", "standard"] as const;

export type TimeOfDay = (typeof TIMES_OF_DAY)[number];

export interface ImpactResult {
  co2e_kg: number;
  water_l: number;
}

/**
 * One logged action with its computed footprint. Records are never edited;
 * a correction is a delete followed by a new record.
 */
export type ActionRecord = {
  category: ActionCategory;
  item: string;
  amount: number;
  subcategory: string | null;
  time_of_day: TimeOfDay;
  co2e_kg: number;
  water_l: number;
};

export type CategoryBenchmark = {
  avg_daily_co2e_kg: number;
  avg_daily_water_l: number;
  description: string;
};

export type BenchmarkComparison = {
  co2e_vs_avg_percent: number;
  water_vs_avg_percent: number;
  co2e_benchmark_kg: number;
  water_benchmark_l: number;
};

const CO2E_DIGITS = 4;
const WATER_DIGITS = 2;

// Electricity has distinct table entries per tariff window.
const ELECTRICITY_ITEM = "electricity_kwh";
const ELECTRICITY_BY_TIME: Partial<Record<TimeOfDay, string>> = {
  peak: "electricity_kwh_peak",
  off_peak: "electricity_kwh_offpeak",
};

// Average daily footprint of one person in Korea.
const BENCHMARKS: ReadonlyMap<string, CategoryBenchmark> = new Map<string, CategoryBenchmark>([
  [
    "mobility",
    {
      avg_daily_co2e_kg: 3.5,
      avg_daily_water_l: 8.0,
      description: "Average Korean daily mobility footprint",
    },
  ],
  [
    "purchase",
    {
      avg_daily_co2e_kg: 4.2,
      avg_daily_water_l: 2500,
      description: "Average Korean daily consumption footprint",
    },
  ],
  [
    "home_energy",
    {
      avg_daily_co2e_kg: 2.8,
      avg_daily_water_l: 0,
      description: "Average Korean household daily energy footprint (per person)",
    },
  ],
]);

export function roundTo(n: number, digits: number): number {
  const scale = 10 ** digits;
  return Math.round(n * scale) / scale;
}

function resolveItem(category: string, item: string, timeOfDay?: TimeOfDay | null): string {
  if (category !== "home_energy" || !timeOfDay) return item;
  if (item.toLowerCase().trim() !== ELECTRICITY_ITEM) return item;
  return ELECTRICITY_BY_TIME[timeOfDay] ?? item;
}

/**
 * CO2e (kg, 4 decimals) and water (L, 2 decimals) for `amount` units of an item.
 *
 * The amount is expected to be positive already; callers validate it.
 * FactorNotFoundError from the repository propagates unchanged.
 */
export function calculateImpact(
  category: string,
  item: string,
  amount: number,
  subcategory?: string | null,
  timeOfDay?: TimeOfDay | null
): ImpactResult {
  const factor = getFactor(category, resolveItem(category, item, timeOfDay), subcategory);

  return {
    co2e_kg: roundTo(factor.co2e_per_unit * amount, CO2E_DIGITS),
    water_l: roundTo(factor.water_per_unit * amount, WATER_DIGITS),
  };
}

export function buildActionRecord(args: {
  category: ActionCategory;
  item: string;
  amount: number;
  subcategory?: string | null;
  time_of_day?: TimeOfDay | null;
}): ActionRecord {
  const timeOfDay = args.time_of_day ?? "standard";
  const impact = calculateImpact(args.category, args.item, args.amount, args.subcategory, timeOfDay);

  return {
    category: args.category,
    item: args.item,
    amount: args.amount,
    subcategory: args.subcategory ?? null,
    time_of_day: timeOfDay,
    co2e_kg: impact.co2e_kg,
    water_l: impact.water_l,
  };
}

export function getCategoryBenchmark(category: string): CategoryBenchmark {
  const found = BENCHMARKS.get(category);
  return found ? { ...found } : { avg_daily_co2e_kg: 0, avg_daily_water_l: 0, description: "" };
}

function percentVs(value: number, benchmark: number): number {
  if (benchmark <= 0) return 0;
  return roundTo((value / benchmark - 1) * 100, 1);
}

export function compareToBenchmark(category: string, co2eKg: number, waterL: number): BenchmarkComparison {
  const benchmark = getCategoryBenchmark(category);

  return {
    co2e_vs_avg_percent: percentVs(co2eKg, benchmark.avg_daily_co2e_kg),
    water_vs_avg_percent: percentVs(waterL, benchmark.avg_daily_water_l),
    co2e_benchmark_kg: benchmark.avg_daily_co2e_kg,
    water_benchmark_l: benchmark.avg_daily_water_l,
  };
}
