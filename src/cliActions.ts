/**
 * List logged actions for a day or a date range, or delete one by id.
 *
 * Run:
 *   npm run actions
 *   npm run actions -- --date 2024-06-10
 *   npm run actions -- --from 2024-06-01 --to 2024-06-07 [--json]
 *   npm run actions -- --delete 42
 *
 * Env (.env):
 *   SUPABASE_URL=...
 *   SUPABASE_SERVICE_ROLE_KEY=...
 */
import "dotenv/config";
import { actionStore } from "./dbClient";
import { deleteAction, listActions } from "./actionLog";
import type { ActionQuery } from "./actionLog";
import type { StoredAction } from "./actionStore";
import { todayIso } from "./dates";

function getArg(name: string): string | null {
  const i = process.argv.indexOf(name);
  return i === -1 ? null : (process.argv[i + 1] ?? null);
}

function hasFlag(name: string): boolean {
  return process.argv.includes(name);
}

function toInt(x: string | null): number | null {
  if (!x) return null;
  const n = Number.parseInt(x, 10);
  return Number.isFinite(n) ? n : null;
}

function fmtCo2(n: number, digits = 3) {
  if (!Number.isFinite(n)) return "0";
  return `${n.toFixed(digits)} kgCO2e`;
}

function printSection(title: string) {
  console.log(`\n${title}`);
  console.log("-".repeat(Math.min(80, title.length)));
}

function printRows(rows: StoredAction[]) {
  if (!rows.length) {
    console.log("(none)");
    return;
  }
  for (const r of rows) {
    const extra = [r.subcategory, r.time_of_day !== "standard" ? r.time_of_day : null, r.location]
      .filter(Boolean)
      .join(", ");
    console.log(
      `#${String(r.id).padEnd(6)} ${r.date}  ${r.category.padEnd(11)} ${r.item.padEnd(24)} x${r.amount}  ${fmtCo2(r.co2e_kg)}  ${r.water_l.toFixed(1)} L${extra ? `  (${extra})` : ""}`
    );
    if (r.notes) console.log(`        ${r.notes}`);
  }
}

async function main() {
  const deleteArg = getArg("--delete");
  if (deleteArg !== null) {
    const id = toInt(deleteArg);
    if (id === null) throw new Error("Usage: npm run actions -- --delete <id>");
    await deleteAction(actionStore, id);
    console.log(`[OK] Deleted action #${id}`);
    return;
  }

  const from = getArg("--from");
  const to = getArg("--to");
  if ((from === null) !== (to === null)) throw new Error("--from and --to must be given together");

  const query: ActionQuery = from !== null && to !== null ? { from, to } : { date: getArg("--date") ?? todayIso() };
  const rows = await listActions(actionStore, query);

  if (hasFlag("--json")) {
    console.log(JSON.stringify(rows, null, 2));
    return;
  }

  const label = "date" in query ? query.date : `${query.from} .. ${query.to}`;
  printSection(`Actions ${label} (${rows.length})`);
  printRows(rows);

  const total = rows.reduce((acc, r) => acc + r.co2e_kg, 0);
  const water = rows.reduce((acc, r) => acc + r.water_l, 0);
  if (rows.length) console.log(`\nTotal: ${fmtCo2(total)}  ${water.toFixed(1)} L`);
}

main().catch((e: unknown) => {
  console.error("[FAIL]", e instanceof Error ? e.message : e);
  process.exit(1);
});
