/**
 * Check that the Supabase project is reachable and the action log table exists.
 *
 * Run:
 *   npm run ping
 */
import "dotenv/config";

async function main() {
  if (!process.env.SUPABASE_URL || !process.env.SUPABASE_SERVICE_ROLE_KEY) {
    console.log("Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY in .env");
    process.exit(1);
  }

  const { testConnection } = await import("./dbClient");
  const ok = await testConnection();
  if (!ok) {
    console.log("[INFO] Create the table with sql/action_logs.sql if it does not exist yet.");
    process.exit(1);
  }
}

main().catch((e: unknown) => {
  console.error("[FAIL]", e instanceof Error ? e.message : e);
  process.exit(1);
});
