/**
 * Log one action from the command line and print its footprint.
 *
 * Run:
 *   npm run log:action -- --category mobility --item taxi_ice --amount 12
 *   npm run log:action -- --category home_energy --item electricity_kwh --amount 4 --time peak
 *   npm run log:action -- --category purchase --item beef_meal --amount 1 --dry-run
 *
 * Optional: --subcategory <name> --location <text> --notes <text> --date YYYY-MM-DD
 *
 * Env (.env):
 *   SUPABASE_URL=...
 *   SUPABASE_SERVICE_ROLE_KEY=...
 */
import "dotenv/config";
import { logAction, validateActionInput } from "./actionLog";
import { buildActionRecord } from "./impactEngine";
import { getRecommendations } from "./recommendationEngine";
import { isIsoDate, todayIso } from "./dates";

function getArg(name: string): string | null {
  const i = process.argv.indexOf(name);
  return i === -1 ? null : (process.argv[i + 1] ?? null);
}

function hasFlag(name: string): boolean {
  return process.argv.includes(name);
}

function fmtCo2(n: number, digits = 4) {
  if (!Number.isFinite(n)) return "0";
  return `${n.toFixed(digits)} kgCO2e`;
}

async function main() {
  const date = getArg("--date") ?? todayIso();
  const dryRun = hasFlag("--dry-run");

  if (!isIsoDate(date)) throw new Error("Invalid --date, expected YYYY-MM-DD");

  const input = {
    category: getArg("--category"),
    item: getArg("--item"),
    amount: getArg("--amount"),
    subcategory: getArg("--subcategory"),
    time_of_day: getArg("--time"),
    location: getArg("--location"),
    notes: getArg("--notes"),
  };

  if (dryRun) {
    const record = buildActionRecord(validateActionInput(input));
    console.log("[DRY-RUN] Would log action:", { date, ...record });
    return;
  }

  // Loaded only for real writes; it needs the Supabase credentials.
  const { actionStore } = await import("./dbClient");

  const saved = await logAction(actionStore, input, date);
  console.log(`[OK] Logged action id=${saved.id} on ${saved.date}`);
  console.log(`     ${saved.item} x${saved.amount}: ${fmtCo2(saved.co2e_kg)}, ${saved.water_l.toFixed(2)} L water`);

  const [top] = getRecommendations([saved], 1);
  if (top?.trigger_item) {
    console.log(`[INFO] Tip: ${top.action} (saves ~${top.estimated_savings_co2e_kg.toFixed(2)} kg CO2e)`);
  }
}

main().catch((e: unknown) => {
  console.error("[FAIL]", e instanceof Error ? e.message : e);
  process.exit(1);
});
