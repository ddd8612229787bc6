// src/report.ts
/**
 * Daily and weekly impact reports.
 *
 * Report data is assembled from an ActionStore by buildDailyReport /
 * buildWeeklyReport and rendered as plain text, Markdown, HTML (email-sized,
 * inline styles) or JSON.
 */
import { ACTION_CATEGORIES } from "./factorRepository";
import type { ActionCategory } from "./factorRepository";
import { roundTo } from "./impactEngine";
import { getRecommendations } from "./recommendationEngine";
import type { Difficulty, Recommendation } from "./recommendationEngine";
import type { ActionStore, StoredAction } from "./actionStore";
import { breakdownByCategory, buildWeeklyTrend, countStreakDays, topContributors } from "./impactSummary";
import type { CategoryTotals, Contributor } from "./impactSummary";
import { titleCaseItem } from "./format";
import { addDays, todayIso } from "./dates";

export const REPORT_FORMATS = ["text", "markdown", "html", "json"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export type ReportPeriod = "daily" | "weekly";

export type ReportComparison = {
  vs_yesterday?: number;
  vs_weekly_avg?: number;
};

export type ReportData = {
  report_date: string;
  period: ReportPeriod;
  total_co2e_kg: number;
  total_water_l: number;
  action_count: number;
  breakdown_by_category: Partial<Record<ActionCategory, CategoryTotals>>;
  top_contributors: Contributor[];
  recommendations: Recommendation[];
  comparison: ReportComparison | null;
  streak_days: number;
};

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((f) => f === value);
}

const CATEGORY_EMOJI: Record<ActionCategory, string> = {
  mobility: "🚗",
  purchase: "🛒",
  home_energy: "🏠",
};

const DIFFICULTY_EMOJI: Record<Difficulty, string> = {
  easy: "🟢",
  medium: "🟡",
  hard: "🔴",
};

const MAX_CONTRIBUTORS = 5;
const MAX_RECOMMENDATIONS = 3;

export function createReportData(args: {
  reportDate: string;
  period: ReportPeriod;
  records: readonly StoredAction[];
  topContributors: Contributor[];
  recommendations: Recommendation[];
  streakDays?: number;
  comparison?: ReportComparison | null;
}): ReportData {
  return {
    report_date: args.reportDate,
    period: args.period,
    total_co2e_kg: args.records.reduce((acc, r) => acc + r.co2e_kg, 0),
    total_water_l: args.records.reduce((acc, r) => acc + r.water_l, 0),
    action_count: args.records.length,
    breakdown_by_category: breakdownByCategory(args.records),
    top_contributors: args.topContributors,
    recommendations: args.recommendations,
    comparison: args.comparison ?? null,
    streak_days: args.streakDays ?? 0,
  };
}

function categoryEntries(data: ReportData): Array<[ActionCategory, CategoryTotals]> {
  const out: Array<[ActionCategory, CategoryTotals]> = [];
  for (const category of ACTION_CATEGORIES) {
    const totals = data.breakdown_by_category[category];
    if (totals) out.push([category, totals]);
  }
  return out;
}

function trendArrow(change: number) {
  if (change > 0) return "↑";
  if (change < 0) return "↓";
  return "→";
}

function capitalize(s: string) {
  return s ? s[0].toUpperCase() + s.slice(1) : s;
}

export function generateTextReport(data: ReportData): string {
  const rule = "=".repeat(60);
  const sub = "-".repeat(40);
  const lines: string[] = [];

  lines.push(rule);
  lines.push(`🌱 Daily Impact Coach - ${capitalize(data.period)} Report`);
  lines.push(`📅 Date: ${data.report_date}`);
  lines.push(rule);
  lines.push("");

  lines.push("📊 IMPACT SUMMARY");
  lines.push(sub);
  lines.push(`Total CO₂e Emissions: ${data.total_co2e_kg.toFixed(3)} kg`);
  lines.push(`Total Water Footprint: ${data.total_water_l.toFixed(1)} L`);
  lines.push(`Actions Logged: ${data.action_count}`);
  if (data.streak_days > 0) lines.push(`Current Streak: ${data.streak_days} days 🔥`);
  lines.push("");

  const categories = categoryEntries(data);
  if (categories.length) {
    lines.push("📈 BREAKDOWN BY CATEGORY");
    lines.push(sub);
    for (const [category, totals] of categories) {
      lines.push(`${CATEGORY_EMOJI[category]} ${titleCaseItem(category)}:`);
      lines.push(`   CO₂e: ${totals.co2e_kg.toFixed(3)} kg (${totals.percentage.toFixed(1)}%)`);
      if (totals.water_l > 0) lines.push(`   Water: ${totals.water_l.toFixed(1)} L`);
    }
    lines.push("");
  }

  if (data.top_contributors.length) {
    lines.push("🏆 TOP IMPACT CONTRIBUTORS");
    lines.push(sub);
    data.top_contributors.slice(0, MAX_CONTRIBUTORS).forEach((c, i) => {
      lines.push(`${i + 1}. ${titleCaseItem(c.item)}`);
      lines.push(`   Amount: ${c.amount} | CO₂e: ${c.co2e_kg.toFixed(3)} kg`);
    });
    lines.push("");
  }

  if (data.recommendations.length) {
    lines.push("🎯 RECOMMENDED ACTIONS");
    lines.push(sub);
    data.recommendations.slice(0, MAX_RECOMMENDATIONS).forEach((rec, i) => {
      lines.push(`${i + 1}. ${rec.action}`);
      lines.push(
        `   ${DIFFICULTY_EMOJI[rec.difficulty]} ${capitalize(rec.difficulty)} | Saves: ${rec.estimated_savings_co2e_kg.toFixed(2)} kg CO₂e`
      );
      lines.push(`   ${rec.rationale}`);
    });
    lines.push("");
  }

  const cmp = data.comparison;
  if (cmp && (cmp.vs_yesterday !== undefined || cmp.vs_weekly_avg !== undefined)) {
    lines.push("📉 COMPARISON");
    lines.push(sub);
    if (cmp.vs_yesterday !== undefined) {
      lines.push(`vs Yesterday: ${trendArrow(cmp.vs_yesterday)} ${Math.abs(cmp.vs_yesterday).toFixed(1)}%`);
    }
    if (cmp.vs_weekly_avg !== undefined) {
      lines.push(`vs Weekly Avg: ${trendArrow(cmp.vs_weekly_avg)} ${Math.abs(cmp.vs_weekly_avg).toFixed(1)}%`);
    }
    lines.push("");
  }

  lines.push(rule);
  lines.push("🌍 Every action counts! Keep making sustainable choices.");
  lines.push(rule);

  return lines.join("\n");
}

export function generateMarkdownReport(data: ReportData): string {
  const lines: string[] = [];

  lines.push(`# 🌱 ${capitalize(data.period)} Impact Report`);
  lines.push(`**Date:** ${data.report_date}`);
  lines.push("");

  lines.push("## 📊 Summary");
  lines.push("");
  lines.push("| Metric | Value |");
  lines.push("|--------|-------|");
  lines.push(`| Total CO₂e | ${data.total_co2e_kg.toFixed(3)} kg |`);
  lines.push(`| Total Water | ${data.total_water_l.toFixed(1)} L |`);
  lines.push(`| Actions | ${data.action_count} |`);
  if (data.streak_days > 0) lines.push(`| Streak | ${data.streak_days} days 🔥 |`);
  lines.push("");

  const categories = categoryEntries(data);
  if (categories.length) {
    lines.push("## 📈 By Category");
    lines.push("");
    lines.push("| Category | CO₂e (kg) | % | Water (L) |");
    lines.push("|----------|-----------|---|-----------|");
    for (const [category, t] of categories) {
      lines.push(
        `| ${titleCaseItem(category)} | ${t.co2e_kg.toFixed(3)} | ${t.percentage.toFixed(1)}% | ${t.water_l.toFixed(1)} |`
      );
    }
    lines.push("");
  }

  if (data.top_contributors.length) {
    lines.push("## 🏆 Top Contributors");
    lines.push("");
    data.top_contributors.slice(0, MAX_CONTRIBUTORS).forEach((c, i) => {
      lines.push(`${i + 1}. **${titleCaseItem(c.item)}** - ${c.amount} units → ${c.co2e_kg.toFixed(3)} kg CO₂e`);
    });
    lines.push("");
  }

  if (data.recommendations.length) {
    lines.push("## 🎯 Recommendations");
    lines.push("");
    for (const rec of data.recommendations.slice(0, MAX_RECOMMENDATIONS)) {
      lines.push(`### ${rec.action}`);
      lines.push(`- **Difficulty:** ${DIFFICULTY_EMOJI[rec.difficulty]} ${capitalize(rec.difficulty)}`);
      lines.push(`- **Potential Savings:** ${rec.estimated_savings_co2e_kg.toFixed(2)} kg CO₂e`);
      lines.push(`- ${rec.rationale}`);
      lines.push("");
    }
  }

  lines.push("---");
  lines.push("*Generated by Daily Impact Coach* 🌍");

  return lines.join("\n");
}

const HTML_STYLE = `
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; max-width: 600px; margin: 0 auto; padding: 20px; background: #f5f5f5; }
  .container { background: white; border-radius: 12px; padding: 24px; box-shadow: 0 2px 8px rgba(0,0,0,0.1); }
  .header { text-align: center; border-bottom: 2px solid #22c55e; padding-bottom: 16px; margin-bottom: 24px; }
  .header h1 { color: #22c55e; margin: 0; font-size: 24px; }
  .date { color: #666; font-size: 14px; margin-top: 8px; }
  .streak { display: inline-block; background: #fef3c7; color: #d97706; padding: 4px 12px; border-radius: 16px; font-size: 14px; margin-top: 8px; }
  .summary { display: grid; grid-template-columns: repeat(3, 1fr); gap: 16px; margin-bottom: 24px; }
  .metric { text-align: center; padding: 16px; background: #f0fdf4; border-radius: 8px; }
  .metric-value { font-size: 24px; font-weight: bold; color: #16a34a; }
  .metric-label { font-size: 12px; color: #666; margin-top: 4px; }
  .section { margin-bottom: 24px; }
  .section h2 { font-size: 16px; color: #333; margin-bottom: 12px; }
  .category-bar { display: flex; align-items: center; margin-bottom: 8px; }
  .category-name { width: 120px; font-size: 14px; }
  .category-bar-fill { height: 20px; background: linear-gradient(90deg, #22c55e, #16a34a); border-radius: 4px; min-width: 4px; }
  .category-value { margin-left: 8px; font-size: 12px; color: #666; }
  .recommendation { background: #f8fafc; border-left: 4px solid #22c55e; padding: 12px; margin-bottom: 8px; border-radius: 0 8px 8px 0; }
  .recommendation-title { font-weight: 600; color: #333; }
  .recommendation-detail { font-size: 13px; color: #666; margin-top: 4px; }
  .footer { text-align: center; padding-top: 16px; border-top: 1px solid #eee; color: #666; font-size: 12px; }
`;

const HTML_ESCAPES: Record<string, string> = { "&": "&amp;", "<": "&lt;", ">": "&gt;", '"': "&quot;", "'": "&#39;" };

function escapeHtml(s: string): string {
  return s.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);
}

function koreanDate(iso: string) {
  const [y, m, d] = iso.split("-");
  return `${y}년 ${m}월 ${d}일`;
}

/** Standalone HTML page for email or web display. */
export function generateHtmlReport(data: ReportData): string {
  const lines: string[] = [];

  lines.push("<!DOCTYPE html>");
  lines.push('<html lang="ko">');
  lines.push("<head>");
  lines.push('<meta charset="UTF-8">');
  lines.push('<meta name="viewport" content="width=device-width, initial-scale=1.0">');
  lines.push(`<title>${capitalize(data.period)} Impact Report - ${escapeHtml(data.report_date)}</title>`);
  lines.push(`<style>${HTML_STYLE}</style>`);
  lines.push("</head>");
  lines.push("<body>");
  lines.push('<div class="container">');

  lines.push('<div class="header">');
  lines.push(`<h1>🌱 ${capitalize(data.period)} Impact Report</h1>`);
  lines.push(`<div class="date">${escapeHtml(koreanDate(data.report_date))}</div>`);
  if (data.streak_days > 1) lines.push(`<div class="streak">🔥 ${data.streak_days} days streak!</div>`);
  lines.push("</div>");

  lines.push('<div class="summary">');
  const metrics: Array<[string, string]> = [
    [data.total_co2e_kg.toFixed(2), "kg CO₂e"],
    [data.total_water_l.toFixed(0), "L Water"],
    [String(data.action_count), "Actions"],
  ];
  for (const [value, label] of metrics) {
    lines.push(`<div class="metric"><div class="metric-value">${value}</div><div class="metric-label">${label}</div></div>`);
  }
  lines.push("</div>");

  const categories = categoryEntries(data);
  if (categories.length) {
    const maxCo2e = Math.max(...categories.map(([, t]) => t.co2e_kg)) || 1;
    lines.push('<div class="section">');
    lines.push("<h2>📊 Impact by Category</h2>");
    for (const [category, t] of categories) {
      const width = roundTo((t.co2e_kg / maxCo2e) * 100, 1);
      lines.push(
        `<div class="category-bar"><span class="category-name">${CATEGORY_EMOJI[category]} ${titleCaseItem(category)}</span>` +
          `<div class="category-bar-fill" style="width: ${width}%"></div>` +
          `<span class="category-value">${t.co2e_kg.toFixed(2)} kg (${t.percentage.toFixed(0)}%)</span></div>`
      );
    }
    lines.push("</div>");
  }

  if (data.recommendations.length) {
    lines.push('<div class="section">');
    lines.push("<h2>🎯 Recommended Actions</h2>");
    for (const rec of data.recommendations.slice(0, MAX_RECOMMENDATIONS)) {
      lines.push(
        `<div class="recommendation"><div class="recommendation-title">${DIFFICULTY_EMOJI[rec.difficulty]} ${escapeHtml(rec.action)}</div>` +
          `<div class="recommendation-detail">Potential savings: ${rec.estimated_savings_co2e_kg.toFixed(2)} kg CO₂e</div></div>`
      );
    }
    lines.push("</div>");
  }

  lines.push('<div class="footer">🌍 Every action counts! Keep making sustainable choices.<br>Generated by Daily Impact Coach</div>');
  lines.push("</div>");
  lines.push("</body>");
  lines.push("</html>");

  return lines.join("\n");
}

export function generateJsonReport(data: ReportData, generatedAt: string = todayIso()): string {
  return JSON.stringify(
    {
      report_date: data.report_date,
      period: data.period,
      generated_at: generatedAt,
      summary: {
        total_co2e_kg: roundTo(data.total_co2e_kg, 3),
        total_water_l: roundTo(data.total_water_l, 1),
        action_count: data.action_count,
        streak_days: data.streak_days,
      },
      breakdown_by_category: data.breakdown_by_category,
      top_contributors: data.top_contributors,
      recommendations: data.recommendations,
      comparison: data.comparison,
    },
    null,
    2
  );
}

export function renderReport(data: ReportData, format: ReportFormat): string {
  switch (format) {
    case "markdown":
      return generateMarkdownReport(data);
    case "html":
      return generateHtmlReport(data);
    case "json":
      return generateJsonReport(data);
    case "text":
      return generateTextReport(data);
  }
}

function percentChange(value: number, base: number): number | undefined {
  if (base <= 0) return undefined;
  return roundTo((value / base - 1) * 100, 1);
}

/**
 * Report for one day, compared against the day before and against the
 * average of logged days in the week ending on `date`.
 */
export async function buildDailyReport(store: ActionStore, date: string, today: string): Promise<ReportData> {
  const weekStart = addDays(date, -6);
  const weekRecords = await store.listByDateRange(weekStart, date);
  const dayRecords = weekRecords.filter((r) => r.date === date);
  const yesterday = addDays(date, -1);

  const dayTotal = dayRecords.reduce((acc, r) => acc + r.co2e_kg, 0);
  const yesterdayTotal = weekRecords.filter((r) => r.date === yesterday).reduce((acc, r) => acc + r.co2e_kg, 0);
  const weeklyAvg = buildWeeklyTrend(weekRecords, date).daily_averages.co2e_kg;

  const comparison: ReportComparison = {};
  const vsYesterday = percentChange(dayTotal, yesterdayTotal);
  if (vsYesterday !== undefined) comparison.vs_yesterday = vsYesterday;
  const vsWeekly = percentChange(dayTotal, weeklyAvg);
  if (vsWeekly !== undefined) comparison.vs_weekly_avg = vsWeekly;

  return createReportData({
    reportDate: date,
    period: "daily",
    records: dayRecords,
    topContributors: topContributors(dayRecords, MAX_CONTRIBUTORS),
    recommendations: getRecommendations(dayRecords, MAX_RECOMMENDATIONS),
    streakDays: countStreakDays(await store.listLoggedDates(), today),
    comparison: dayRecords.length ? comparison : null,
  });
}

/** Report over the seven days ending at `endDate`. */
export async function buildWeeklyReport(store: ActionStore, endDate: string, today: string): Promise<ReportData> {
  const records = await store.listByDateRange(addDays(endDate, -6), endDate);

  return createReportData({
    reportDate: endDate,
    period: "weekly",
    records,
    topContributors: topContributors(records, MAX_CONTRIBUTORS),
    recommendations: getRecommendations(records, MAX_RECOMMENDATIONS),
    streakDays: countStreakDays(await store.listLoggedDates(), today),
  });
}
