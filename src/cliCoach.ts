/**
 * Print coaching or a report for a day (or the week ending on it).
 *
 * Run:
 *   npm run coach
 *   npm run coach -- --date 2024-06-01
 *   npm run coach -- --format markdown
 *   npm run coach -- --weekly --format json
 *
 * Env (.env):
 *   SUPABASE_URL=...
 *   SUPABASE_SERVICE_ROLE_KEY=...
 *   (optional) COACH_MAX_RECOMMENDATIONS=3
 */
import "dotenv/config";
import { actionStore } from "./dbClient";
import { ACTION_CATEGORIES } from "./factorRepository";
import { getDailyCoaching, getWeeklyCoachingInsight } from "./coach";
import { buildDailyReport, buildWeeklyReport, isReportFormat, renderReport, REPORT_FORMATS } from "./report";
import type { ReportFormat } from "./report";
import { titleCaseItem } from "./format";
import { isIsoDate, todayIso } from "./dates";

function getArg(name: string): string | null {
  const i = process.argv.indexOf(name);
  return i === -1 ? null : (process.argv[i + 1] ?? null);
}

function hasFlag(name: string): boolean {
  return process.argv.includes(name);
}

function fmtCo2(n: number, digits = 3) {
  if (!Number.isFinite(n)) return "0";
  return `${n.toFixed(digits)} kgCO2e`;
}

function fmtPct(n: number) {
  return `${n > 0 ? "+" : ""}${n.toFixed(1)}%`;
}

function printSection(title: string) {
  console.log(`\n${title}`);
  console.log("-".repeat(Math.min(80, title.length)));
}

async function printDailyCoaching(date: string, today: string) {
  const c = await getDailyCoaching(actionStore, date, today);

  console.log(`\n=== Coaching for ${c.date} ===`);
  console.log(c.summary);
  if (c.streak_days > 0) console.log(`Streak: ${c.streak_days} day(s)`);

  printSection("By category (vs. average day)");
  for (const category of ACTION_CATEGORIES) {
    const cmp = c.benchmarks[category];
    const totals = c.impact_summary.breakdown_by_category[category];
    console.log(
      `${titleCaseItem(category).padEnd(12)} ${fmtCo2(totals?.co2e_kg ?? 0)}  ${fmtPct(cmp.co2e_vs_avg_percent)} vs avg ${fmtCo2(cmp.co2e_benchmark_kg, 1)}`
    );
  }

  printSection("Next steps");
  for (const rec of c.recommendations) {
    console.log(`${rec.priority}. ${rec.action}  [${rec.difficulty}]`);
    console.log(`   ${rec.rationale}`);
    console.log(`   saves ~${fmtCo2(rec.estimated_savings_co2e_kg, 2)}${rec.estimated_savings_water_l > 0 ? `, ${rec.estimated_savings_water_l.toFixed(1)} L water` : ""}`);
  }
}

async function main() {
  const today = todayIso();
  const date = getArg("--date") ?? today;
  const weekly = hasFlag("--weekly");
  const formatArg = getArg("--format");

  if (!isIsoDate(date)) {
    throw new Error("Usage: npm run coach -- [--date YYYY-MM-DD] [--weekly] [--format text|markdown|json]");
  }
  if (formatArg !== null && !isReportFormat(formatArg)) {
    throw new Error(`Unknown --format '${formatArg}', expected one of: ${REPORT_FORMATS.join(", ")}`);
  }
  const format: ReportFormat | null = formatArg;

  if (weekly) {
    const report = await buildWeeklyReport(actionStore, date, today);
    console.log(renderReport(report, format ?? "text"));
    if (format !== "json") console.log(`\n${await getWeeklyCoachingInsight(actionStore, date)}`);
    return;
  }

  if (format) {
    console.log(renderReport(await buildDailyReport(actionStore, date, today), format));
    return;
  }

  await printDailyCoaching(date, today);
}

main().catch((e: unknown) => {
  console.error("[FAIL]", e instanceof Error ? e.message : e);
  process.exit(1);
});
