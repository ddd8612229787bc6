// src/loadActionsCsv.ts
/**
 * Bulk-load actions from a CSV file.
 *
 * Expected header: date,category,item,amount[,subcategory,time_of_day,location,notes]
 * Rows without a date are logged on --date (default today).
 *
 * Run:
 *   npm run load:actions -- --file actions.csv [--date YYYY-MM-DD] [--dry-run]
 */
import "dotenv/config";
import fs from "fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { logActionsBulk, validateActionInput, InvalidActionError } from "./actionLog";
import { isIsoDate, todayIso } from "./dates";

function getArg(name: string): string | null {
  const i = process.argv.indexOf(name);
  return i === -1 ? null : (process.argv[i + 1] ?? null);
}

function hasFlag(name: string): boolean {
  return process.argv.includes(name);
}

const CsvRowSchema = z.record(z.string(), z.string());

export type CsvActionRow = { date: string; input: Record<string, string | null> };

/**
 * Parse CSV text into per-date action inputs. Empty cells become null.
 */
export function parseActionsCsv(csvText: string, defaultDate: string): CsvActionRow[] {
  const records = z
    .array(CsvRowSchema)
    .parse(parse(csvText, { columns: true, skip_empty_lines: true, trim: true }));

  return records.map((row, i) => {
    const date = row.date || defaultDate;
    if (!isIsoDate(date)) throw new Error(`Row ${i + 2}: invalid date '${date}'`);

    const input: Record<string, string | null> = {};
    for (const [key, value] of Object.entries(row)) {
      if (key !== "date") input[key] = value === "" ? null : value;
    }
    return { date, input };
  });
}

function groupByDate(rows: CsvActionRow[]) {
  const byDate = new Map<string, Array<{ line: number; input: Record<string, string | null> }>>();
  rows.forEach((r, i) => {
    const list = byDate.get(r.date) ?? [];
    list.push({ line: i + 2, input: r.input });
    byDate.set(r.date, list);
  });
  return byDate;
}

async function main() {
  const file = getArg("--file");
  const defaultDate = getArg("--date") ?? todayIso();
  const dryRun = hasFlag("--dry-run");

  if (!file) throw new Error("Usage: npm run load:actions -- --file <path.csv> [--date YYYY-MM-DD] [--dry-run]");
  if (!isIsoDate(defaultDate)) throw new Error("Invalid --date, expected YYYY-MM-DD");

  const csvText = await fs.promises.readFile(file, "utf8");
  const rows = parseActionsCsv(csvText, defaultDate);
  console.log(`[INFO] Parsed ${rows.length} rows from ${file}`);

  if (dryRun) {
    let valid = 0;
    rows.forEach((r, i) => {
      try {
        validateActionInput(r.input);
        valid += 1;
      } catch (e: unknown) {
        if (!(e instanceof InvalidActionError)) throw e;
        console.log(`[WARN] line ${i + 2}: ${e.message}`);
      }
    });
    console.log(`[DRY-RUN] ${valid}/${rows.length} rows would be logged`);
    return;
  }

  const { actionStore } = await import("./dbClient");

  let logged = 0;
  for (const [date, entries] of groupByDate(rows)) {
    const result = await logActionsBulk(
      actionStore,
      entries.map((e) => e.input),
      date
    );
    logged += result.logged.length;
    for (const s of result.skipped) {
      console.log(`[WARN] line ${entries[s.index].line} skipped: ${s.reason}`);
    }
    console.log(`[INFO] ${date}: ${result.logged.length}/${entries.length} logged`);
  }

  console.log(`[OK] Done. ${logged}/${rows.length} actions logged.`);
}

if (require.main === module) {
  main().catch((e: unknown) => {
    console.error("[FAIL]", e instanceof Error ? e.message : e);
    process.exit(1);
  });
}
