/**
 * Print the emission factor tables.
 *
 * Run:
 *   npm run factors
 *   npm run factors -- --category purchase
 *   npm run factors -- --json
 */
import { ACTION_CATEGORIES, getAllFactors, getPurchaseSubcategories, isActionCategory } from "./factorRepository";
import type { ActionCategory, Factor } from "./factorRepository";
import { titleCaseItem } from "./format";

function getArg(name: string): string | null {
  const i = process.argv.indexOf(name);
  return i === -1 ? null : (process.argv[i + 1] ?? null);
}

function hasFlag(name: string): boolean {
  return process.argv.includes(name);
}

function printSection(title: string) {
  console.log(`\n${title}`);
  console.log("-".repeat(Math.min(80, title.length)));
}

function printFactors(rows: readonly Factor[]) {
  for (const f of rows) {
    const water = f.water_per_unit > 0 ? `  ${f.water_per_unit} L/${f.unit}` : "";
    console.log(`${f.item.padEnd(26)} ${String(f.co2e_per_unit).padStart(8)} kgCO2e/${f.unit}${water}`);
  }
}

async function main() {
  const categoryArg = getArg("--category");
  const asJson = hasFlag("--json");

  if (categoryArg !== null && !isActionCategory(categoryArg)) {
    throw new Error("Usage: npm run factors -- [--category mobility|purchase|home_energy] [--json]");
  }

  const all = getAllFactors();
  const categories: ActionCategory[] = categoryArg ? [categoryArg] : [...ACTION_CATEGORIES];

  if (asJson) {
    console.log(JSON.stringify(Object.fromEntries(categories.map((c) => [c, all[c]])), null, 2));
    return;
  }

  for (const category of categories) {
    if (category !== "purchase") {
      printSection(`${titleCaseItem(category)} (${all[category].length})`);
      printFactors(all[category]);
      continue;
    }
    for (const sub of getPurchaseSubcategories()) {
      const rows = all.purchase.filter((f) => f.subcategory === sub);
      printSection(`Purchase / ${titleCaseItem(sub)} (${rows.length})`);
      printFactors(rows);
    }
  }
}

main().catch((e: unknown) => {
  console.error("[FAIL]", e instanceof Error ? e.message : e);
  process.exit(1);
});
