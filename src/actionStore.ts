// src/actionStore.ts
import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { ACTION_CATEGORIES } from "./factorRepository";
import { TIMES_OF_DAY } from "./impactEngine";
import type { ActionRecord } from "./impactEngine";

export const ACTION_LOG_TABLE = process.env.ACTION_LOG_TABLE || "action_logs";

// Upper bound for list queries; PostgREST would otherwise apply its own max-rows cap.
export const ACTION_ROW_LIMIT = 5000;

const ROW_COLUMNS =
  "id, date, category, item, amount, subcategory, time_of_day, location, notes, co2e_kg, water_l, created_at";

/** An action record as it sits in the log. */
export type StoredAction = ActionRecord & {
  id: number;
  date: string; // YYYY-MM-DD
  location: string | null;
  notes: string | null;
  created_at: string | null;
};

export type NewAction = ActionRecord & {
  date: string;
  location?: string | null;
  notes?: string | null;
};

/**
 * Persistence for logged actions. Rows are insert-only apart from delete.
 */
export interface ActionStore {
  insert(action: NewAction): Promise<StoredAction>;
  /** Newest first. */
  listByDate(date: string): Promise<StoredAction[]>;
  /** Inclusive; date desc, then newest first within a day. */
  listByDateRange(start: string, end: string): Promise<StoredAction[]>;
  /** Distinct dates that have at least one record, newest first. */
  listLoggedDates(): Promise<string[]>;
  delete(id: number): Promise<boolean>;
  /** Removes every record and returns how many there were. */
  clear(): Promise<number>;
}

const ActionRowSchema = z.object({
  id: z.coerce.number().int(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  category: z.enum(ACTION_CATEGORIES),
  item: z.string().min(1),
  amount: z.coerce.number().positive(),
  subcategory: z.string().nullable().default(null),
  time_of_day: z.enum(TIMES_OF_DAY).default("standard"),
  location: z.string().nullable().default(null),
  notes: z.string().nullable().default(null),
  co2e_kg: z.coerce.number(),
  water_l: z.coerce.number(),
  created_at: z.string().nullable().default(null),
});

export function parseActionRow(row: unknown): StoredAction {
  const parsed = ActionRowSchema.safeParse(row);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Malformed action_logs row: ${issues}`);
  }
  return parsed.data;
}

function parseRows(data: unknown[] | null): StoredAction[] {
  return (data ?? []).map(parseActionRow);
}

export class SupabaseActionStore implements ActionStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string = ACTION_LOG_TABLE
  ) {}

  async insert(action: NewAction): Promise<StoredAction> {
    const { data, error } = await this.client
      .from(this.table)
      .insert({
        date: action.date,
        category: action.category,
        item: action.item,
        amount: action.amount,
        subcategory: action.subcategory,
        time_of_day: action.time_of_day,
        location: action.location ?? null,
        notes: action.notes ?? null,
        co2e_kg: action.co2e_kg,
        water_l: action.water_l,
      })
      .select(ROW_COLUMNS)
      .single();

    if (error || !data) {
      throw new Error(`Failed to insert into ${this.table}: ${error?.message ?? "no row returned"}`);
    }
    return parseActionRow(data);
  }

  async listByDate(date: string): Promise<StoredAction[]> {
    const { data, error } = await this.client
      .from(this.table)
      .select(ROW_COLUMNS)
      .eq("date", date)
      .order("created_at", { ascending: false })
      .order("id", { ascending: false })
      .limit(ACTION_ROW_LIMIT);

    if (error) throw new Error(`Failed to load ${this.table}: ${error.message}`);
    return parseRows(data);
  }

  async listByDateRange(start: string, end: string): Promise<StoredAction[]> {
    const { data, error } = await this.client
      .from(this.table)
      .select(ROW_COLUMNS)
      .gte("date", start)
      .lte("date", end)
      .order("date", { ascending: false })
      .order("created_at", { ascending: false })
      .order("id", { ascending: false })
      .limit(ACTION_ROW_LIMIT);

    if (error) throw new Error(`Failed to load ${this.table}: ${error.message}`);
    return parseRows(data);
  }

  async listLoggedDates(): Promise<string[]> {
    const { data, error } = await this.client
      .from(this.table)
      .select("date")
      .order("date", { ascending: false })
      .limit(ACTION_ROW_LIMIT);

    if (error) throw new Error(`Failed to load ${this.table} dates: ${error.message}`);

    const dates: string[] = [];
    for (const row of data ?? []) {
      const date = z.object({ date: z.string() }).parse(row).date;
      if (dates[dates.length - 1] !== date) dates.push(date);
    }
    return dates;
  }

  async delete(id: number): Promise<boolean> {
    const { error, count } = await this.client.from(this.table).delete({ count: "exact" }).eq("id", id);
    if (error) throw new Error(`Failed to delete from ${this.table}: ${error.message}`);
    return (count ?? 0) > 0;
  }

  async clear(): Promise<number> {
    // PostgREST refuses an unfiltered delete.
    const { error, count } = await this.client.from(this.table).delete({ count: "exact" }).gte("id", 0);
    if (error) throw new Error(`Failed to clear ${this.table}: ${error.message}`);
    return count ?? 0;
  }
}
