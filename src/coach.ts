// src/coach.ts
import type { ActionCategory } from "./factorRepository";
import { compareToBenchmark } from "./impactEngine";
import type { BenchmarkComparison } from "./impactEngine";
import { getRecommendations } from "./recommendationEngine";
import type { Recommendation } from "./recommendationEngine";
import type { ActionStore } from "./actionStore";
import { countStreakDays, summarizeDaily, summarizeDay } from "./impactSummary";
import type { Contributor, DailyTotal, ImpactSummary } from "./impactSummary";
import { addDays } from "./dates";

function envInt(name: string, fallback: number): number {
  const n = Number.parseInt(process.env[name] ?? "", 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export const COACH_MAX_RECOMMENDATIONS = envInt("COACH_MAX_RECOMMENDATIONS", 3);

export type DailyCoaching = {
  date: string;
  summary: string;
  impact_summary: ImpactSummary;
  recommendations: Recommendation[];
  benchmarks: Record<ActionCategory, BenchmarkComparison>;
  streak_days: number;
};

export function generateDailySummary(
  totalCo2eKg: number,
  totalWaterL: number,
  topContributors: readonly Contributor[]
): string {
  if (totalCo2eKg === 0) {
    return "No actions logged today. Start tracking to understand your environmental impact!";
  }

  let level: string;
  let verdict: string;
  if (totalCo2eKg < 2) {
    level = "low";
    verdict = "Great job";
  } else if (totalCo2eKg < 5) {
    level = "moderate";
    verdict = "Room for improvement";
  } else if (totalCo2eKg < 10) {
    level = "high";
    verdict = "Consider alternatives";
  } else {
    level = "very high";
    verdict = "Significant impact day";
  }

  const parts = [`Today's impact: ${totalCo2eKg.toFixed(2)} kg CO2e (${level}). ${verdict}.`];

  if (totalWaterL > 0) parts.push(`Water footprint: ${totalWaterL.toFixed(0)} L.`);

  const top = topContributors[0];
  if (top) {
    parts.push(`Biggest contributor: ${top.item.replace(/_/g, " ")} (${top.co2e_kg.toFixed(2)} kg CO2e).`);
  }

  return parts.join(" ");
}

/**
 * One-line trend for daily totals in ascending date order. The last two
 * entries are compared as "today" and "yesterday".
 */
export function getWeeklyInsight(dailyTotals: readonly Pick<DailyTotal, "total_co2e">[]): string {
  if (dailyTotals.length < 2) return "Keep logging to see your weekly trends!";

  const values = dailyTotals.map((d) => d.total_co2e);
  const avg = values.reduce((acc, v) => acc + v, 0) / values.length;

  const recent = values[values.length - 1];
  const previous = values[values.length - 2];

  if (previous > 0) {
    const changePct = ((recent - previous) / previous) * 100;
    if (changePct < -10) {
      return `Excellent! Your emissions dropped ${Math.abs(changePct).toFixed(0)}% compared to yesterday.`;
    }
    if (changePct > 10) {
      return `Your emissions increased ${changePct.toFixed(0)}% compared to yesterday. Check your top contributors.`;
    }
    return `Your emissions are stable. Weekly average: ${avg.toFixed(1)} kg CO2e/day.`;
  }

  return `Weekly average: ${avg.toFixed(1)} kg CO2e/day.`;
}

/**
 * Everything the coach says about one day: summary sentence, totals,
 * ranked suggestions, per-category benchmark comparison and the logging streak.
 */
export async function getDailyCoaching(
  store: ActionStore,
  date: string,
  today: string,
  maxRecommendations = COACH_MAX_RECOMMENDATIONS
): Promise<DailyCoaching> {
  const actions = await store.listByDate(date);
  const impact = summarizeDay(actions, date);

  const versusBenchmark = (category: ActionCategory) => {
    const totals = impact.breakdown_by_category[category];
    return compareToBenchmark(category, totals?.co2e_kg ?? 0, totals?.water_l ?? 0);
  };

  return {
    date,
    summary: generateDailySummary(impact.total_co2e_kg, impact.total_water_l, impact.top_contributors),
    impact_summary: impact,
    recommendations: getRecommendations(actions, maxRecommendations),
    benchmarks: {
      mobility: versusBenchmark("mobility"),
      purchase: versusBenchmark("purchase"),
      home_energy: versusBenchmark("home_energy"),
    },
    streak_days: countStreakDays(await store.listLoggedDates(), today),
  };
}

export async function getWeeklyCoachingInsight(store: ActionStore, endDate: string): Promise<string> {
  const records = await store.listByDateRange(addDays(endDate, -6), endDate);
  return getWeeklyInsight(summarizeDaily(records));
}
