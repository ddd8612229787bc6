/**
 * Interactive chat log: type what you did, get the footprint back.
 *
 * Run:
 *   npm run chat
 *   npm run chat -- --offline      // keep the log in memory, no database
 *
 * Commands inside the chat: /suggest, /summary, /coach, /quit
 *
 * Env (.env):
 *   SUPABASE_URL=...
 *   SUPABASE_SERVICE_ROLE_KEY=...
 */
import "dotenv/config";
import prompts from "prompts";
import type { ActionStore } from "./actionStore";
import { InMemoryActionStore } from "./memoryActionStore";
import { logChatMessage } from "./actionLog";
import { ChatSession, getChatSuggestions } from "./chatbot";
import { getDailyCoaching } from "./coach";
import { todayIso } from "./dates";

function hasFlag(name: string): boolean {
  return process.argv.includes(name);
}

function printSection(title: string) {
  console.log(`\n${title}`);
  console.log("-".repeat(Math.min(80, title.length)));
}

// dbClient throws at import without credentials, so it is only loaded when needed.
async function openStore(offline: boolean): Promise<ActionStore> {
  if (offline) return new InMemoryActionStore();
  const { actionStore } = await import("./dbClient");
  return actionStore;
}

function printSummary(session: ChatSession) {
  const s = session.getDailySummary();
  printSection("This session");
  if (!s.action_count) {
    console.log("(nothing logged yet)");
    return;
  }
  for (const a of s.actions) {
    console.log(`- ${a.item} x${a.amount}: ${a.co2e_kg.toFixed(3)} kg CO2e, ${a.water_l.toFixed(1)} L`);
  }
  console.log(`Total: ${s.total_co2e_kg.toFixed(3)} kg CO2e, ${s.total_water_l.toFixed(1)} L water (${s.action_count} actions)`);
}

async function printCoaching(store: ActionStore, today: string) {
  const coaching = await getDailyCoaching(store, today, today);
  printSection("Coach");
  console.log(coaching.summary);
  if (coaching.streak_days > 1) console.log(`Streak: ${coaching.streak_days} days`);
  for (const rec of coaching.recommendations) {
    console.log(`${rec.priority}. ${rec.action} (saves ~${rec.estimated_savings_co2e_kg.toFixed(2)} kg CO2e, ${rec.difficulty})`);
  }
}

async function main() {
  const offline = hasFlag("--offline");
  const store = await openStore(offline);
  const session = new ChatSession();

  console.log(`Daily impact chat${offline ? " [offline]" : ""}. /suggest for examples, /quit to leave.`);

  for (;;) {
    const { message } = await prompts(
      {
        type: "text",
        name: "message",
        message: ">",
      },
      {
        onCancel: () => {
          process.exit(0);
        },
      }
    );

    const text = String(message ?? "").trim();
    const today = todayIso();

    if (text === "/quit" || text === "/exit") break;

    if (text === "/suggest") {
      printSection("Try saying");
      for (const s of getChatSuggestions()) console.log(`- ${s}`);
      continue;
    }

    if (text === "/summary") {
      printSummary(session);
      continue;
    }

    if (text === "/coach") {
      await printCoaching(store, today);
      continue;
    }

    session.addMessage("user", text);
    const result = await logChatMessage(store, text, today);
    for (const a of result.analyzed) session.addAction(a);
    session.addMessage("assistant", result.response);

    console.log(`\n${result.response}\n`);
    if (result.impacts.length) {
      console.log(`[OK] Logged ${result.impacts.length} action(s) for ${today}`);
    }
  }
}

main().catch((e: unknown) => {
  console.error("[FAIL]", e instanceof Error ? e.message : e);
  process.exit(1);
});
