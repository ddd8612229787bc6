// src/dbClient.ts
import "dotenv/config";
import { createClient } from "@supabase/supabase-js";
import { ACTION_LOG_TABLE, SupabaseActionStore } from "./actionStore";

const supabaseUrl = process.env.SUPABASE_URL;
const serviceRoleKey = process.env.SUPABASE_SERVICE_ROLE_KEY;

if (!supabaseUrl || !serviceRoleKey) {
  throw new Error("Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY in .env");
}

export const db = createClient(supabaseUrl, serviceRoleKey, {
  auth: { persistSession: false },
});

export const actionStore = new SupabaseActionStore(db, ACTION_LOG_TABLE);

/**
 * Test database connection
 */
export async function testConnection(): Promise<boolean> {
  const { error, count } = await db.from(ACTION_LOG_TABLE).select("id", { count: "exact", head: true });

  if (error) {
    console.error(`❌ Cannot read ${ACTION_LOG_TABLE}:`, error.message);
    return false;
  }

  console.log(`✅ Database connection successful! ${ACTION_LOG_TABLE} has ${count ?? 0} rows.`);
  return true;
}
