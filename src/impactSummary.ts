// src/impactSummary.ts
import type { ActionCategory } from "./factorRepository";
import { roundTo } from "./impactEngine";
import type { StoredAction } from "./actionStore";
import { addDays } from "./dates";

export type CategoryTotals = {
  co2e_kg: number;
  water_l: number;
  action_count: number;
  percentage: number; // share of the period's CO2e
};

export type Contributor = Pick<StoredAction, "category" | "item" | "amount" | "co2e_kg" | "water_l">;

export type ImpactSummary = {
  date: string;
  total_co2e_kg: number;
  total_water_l: number;
  breakdown_by_category: Partial<Record<ActionCategory, CategoryTotals>>;
  top_contributors: Contributor[];
  action_count: number;
};

export type DailyTotal = {
  date: string;
  total_co2e: number;
  total_water: number;
  action_count: number;
};

export type WeeklyTrend = {
  dates: string[];
  co2e_values: number[];
  water_values: number[];
  daily_averages: { co2e_kg: number; water_l: number };
};

type Impactful = Pick<StoredAction, "category" | "co2e_kg" | "water_l">;

/**
 * Per-category totals in first-seen order. Percentages are rounded to one decimal.
 */
export function breakdownByCategory(records: readonly Impactful[]): Partial<Record<ActionCategory, CategoryTotals>> {
  const byCategory = new Map<ActionCategory, CategoryTotals>();
  let total = 0;

  for (const r of records) {
    const cur = byCategory.get(r.category) ?? { co2e_kg: 0, water_l: 0, action_count: 0, percentage: 0 };
    cur.co2e_kg += r.co2e_kg;
    cur.water_l += r.water_l;
    cur.action_count += 1;
    byCategory.set(r.category, cur);
    total += r.co2e_kg;
  }

  const out: Partial<Record<ActionCategory, CategoryTotals>> = {};
  for (const [category, totals] of byCategory) {
    totals.percentage = total > 0 ? roundTo((totals.co2e_kg / total) * 100, 1) : 0;
    out[category] = totals;
  }
  return out;
}

export function topContributors(records: readonly StoredAction[], limit: number): Contributor[] {
  return [...records]
    .sort((a, b) => b.co2e_kg - a.co2e_kg)
    .slice(0, Math.max(0, limit))
    .map((r) => ({ category: r.category, item: r.item, amount: r.amount, co2e_kg: r.co2e_kg, water_l: r.water_l }));
}

export function summarizeDay(records: readonly StoredAction[], date: string): ImpactSummary {
  const ofDay = records.filter((r) => r.date === date);

  return {
    date,
    total_co2e_kg: roundTo(ofDay.reduce((acc, r) => acc + r.co2e_kg, 0), 4),
    total_water_l: roundTo(ofDay.reduce((acc, r) => acc + r.water_l, 0), 2),
    breakdown_by_category: breakdownByCategory(ofDay),
    top_contributors: topContributors(ofDay, 3),
    action_count: ofDay.length,
  };
}

/** One entry per date that has records, ascending. */
export function summarizeDaily(records: readonly StoredAction[]): DailyTotal[] {
  const byDate = new Map<string, DailyTotal>();
  for (const r of records) {
    const cur = byDate.get(r.date) ?? { date: r.date, total_co2e: 0, total_water: 0, action_count: 0 };
    cur.total_co2e += r.co2e_kg;
    cur.total_water += r.water_l;
    cur.action_count += 1;
    byDate.set(r.date, cur);
  }
  return Array.from(byDate.values()).sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

function averageOfNonZero(values: number[]): number {
  const nonZero = values.filter((v) => v > 0);
  if (!nonZero.length) return 0;
  return roundTo(nonZero.reduce((acc, v) => acc + v, 0) / nonZero.length, 2);
}

/**
 * The seven days ending at `endDate`, zero-filled. Averages skip empty days.
 */
export function buildWeeklyTrend(records: readonly StoredAction[], endDate: string): WeeklyTrend {
  const startDate = addDays(endDate, -6);
  const totals = new Map(
    summarizeDaily(records.filter((r) => r.date >= startDate && r.date <= endDate)).map((d): [string, DailyTotal] => [d.date, d])
  );

  const dates: string[] = [];
  const co2eValues: number[] = [];
  const waterValues: number[] = [];

  for (let i = 0; i < 7; i++) {
    const d = addDays(startDate, i);
    const t = totals.get(d);
    dates.push(d);
    co2eValues.push(t ? roundTo(t.total_co2e, 4) : 0);
    waterValues.push(t ? roundTo(t.total_water, 2) : 0);
  }

  return {
    dates,
    co2e_values: co2eValues,
    water_values: waterValues,
    daily_averages: { co2e_kg: averageOfNonZero(co2eValues), water_l: averageOfNonZero(waterValues) },
  };
}

/**
 * Consecutive logged days ending at `today`. `dates` may be in any order.
 */
export function countStreakDays(dates: readonly string[], today: string): number {
  const logged = new Set(dates);
  let streak = 0;
  let expected = today;
  while (logged.has(expected)) {
    streak += 1;
    expected = addDays(expected, -1);
  }
  return streak;
}
