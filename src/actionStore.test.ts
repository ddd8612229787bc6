import { createClient } from "@supabase/supabase-js";
import { describe, expect, it } from "vitest";
import { ACTION_ROW_LIMIT, SupabaseActionStore, parseActionRow } from "./actionStore";
import type { NewAction } from "./actionStore";
import { InMemoryActionStore } from "./memoryActionStore";
import { buildActionRecord } from "./impactEngine";

describe("parseActionRow", () => {
  const row = {
    id: "7",
    date: "2024-06-10",
    category: "mobility",
    item: "bus",
    amount: "5",
    subcategory: null,
    time_of_day: "standard",
    location: "Mapo-gu",
    notes: null,
    co2e_kg: 0.44,
    water_l: 1,
    created_at: "2024-06-10T08:00:00+00:00",
  };

  it("coerces numeric columns", () => {
    expect(parseActionRow(row)).toEqual({ ...row, id: 7, amount: 5 });
  });

  it("defaults missing optional columns", () => {
    const { time_of_day, subcategory, location, notes, created_at, ...rest } = row;
    const parsed = parseActionRow(rest);
    expect(parsed.time_of_day).toBe("standard");
    expect(parsed.subcategory).toBeNull();
    expect(parsed.created_at).toBeNull();
  });

  it("rejects rows outside the schema", () => {
    expect(() => parseActionRow({ ...row, category: "travel" })).toThrow(/^Malformed action_logs row: category: /);
    expect(() => parseActionRow({ ...row, amount: 0 })).toThrow(/^Malformed action_logs row: amount: /);
  });
});

function newAction(date: string, item: string, amount: number): NewAction {
  return { ...buildActionRecord({ category: "mobility", item, amount }), date };
}

describe("InMemoryActionStore", () => {
  it("assigns increasing ids and stamps created_at", async () => {
    const store = new InMemoryActionStore(() => new Date("2024-06-10T09:00:00Z"));
    const a = await store.insert(newAction("2024-06-10", "bus", 5));
    const b = await store.insert({ ...newAction("2024-06-10", "subway", 3), notes: "commute" });

    expect(a.id).toBe(1);
    expect(b.id).toBe(2);
    expect(a.created_at).toBe("2024-06-10T09:00:00.000Z");
    expect(a.location).toBeNull();
    expect(b.notes).toBe("commute");
  });

  it("lists one day newest first", async () => {
    const store = new InMemoryActionStore();
    await store.insert(newAction("2024-06-10", "bus", 1));
    await store.insert(newAction("2024-06-09", "bus", 2));
    await store.insert(newAction("2024-06-10", "subway", 3));

    expect((await store.listByDate("2024-06-10")).map((r) => r.item)).toEqual(["subway", "bus"]);
  });

  it("lists a range by date, then newest first", async () => {
    const store = new InMemoryActionStore();
    await store.insert(newAction("2024-06-08", "bus", 1));
    await store.insert(newAction("2024-06-10", "taxi_ice", 1));
    await store.insert(newAction("2024-06-09", "subway", 1));
    await store.insert(newAction("2024-06-10", "walking", 1));
    await store.insert(newAction("2024-06-11", "bicycle", 1));

    const rows = await store.listByDateRange("2024-06-08", "2024-06-10");
    expect(rows.map((r) => [r.date, r.item])).toEqual([
      ["2024-06-10", "walking"],
      ["2024-06-10", "taxi_ice"],
      ["2024-06-09", "subway"],
      ["2024-06-08", "bus"],
    ]);
  });

  it("lists distinct logged dates newest first", async () => {
    const store = new InMemoryActionStore();
    await store.insert(newAction("2024-06-08", "bus", 1));
    await store.insert(newAction("2024-06-10", "bus", 1));
    await store.insert(newAction("2024-06-08", "bus", 1));

    expect(await store.listLoggedDates()).toEqual(["2024-06-10", "2024-06-08"]);
  });

  it("deletes by id", async () => {
    const store = new InMemoryActionStore();
    const row = await store.insert(newAction("2024-06-10", "bus", 1));

    expect(await store.delete(row.id)).toBe(true);
    expect(await store.delete(row.id)).toBe(false);
    expect(await store.listByDate("2024-06-10")).toEqual([]);
  });

  it("clears everything and reports the count", async () => {
    const store = new InMemoryActionStore();
    await store.insert(newAction("2024-06-10", "bus", 1));
    await store.insert(newAction("2024-06-11", "bus", 1));

    expect(await store.clear()).toBe(2);
    expect(await store.listLoggedDates()).toEqual([]);
  });

  it("hands out copies of stored rows", async () => {
    const store = new InMemoryActionStore();
    const row = await store.insert(newAction("2024-06-10", "bus", 1));
    row.item = "changed";

    expect((await store.listByDate("2024-06-10"))[0].item).toBe("bus");
  });
});

// Supabase client whose HTTP layer answers every request with `rows`.
function fakeSupabase(rows: unknown[]) {
  const requests: URL[] = [];
  const client = createClient("http://localhost:54321", "test-secret", {
    auth: { persistSession: false, autoRefreshToken: false },
    global: {
      fetch: async (input) => {
        requests.push(new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url));
        return new Response(JSON.stringify(rows), { status: 200, headers: { "Content-Type": "application/json" } });
      },
    },
  });
  return { store: new SupabaseActionStore(client, "action_logs"), requests };
}

describe("SupabaseActionStore", () => {
  const row = {
    id: 3,
    date: "2024-06-10",
    category: "mobility",
    item: "bus",
    amount: 5,
    subcategory: null,
    time_of_day: "standard",
    location: null,
    notes: null,
    co2e_kg: 0.44,
    water_l: 1,
    created_at: "2024-06-10T08:00:00+00:00",
  };

  it("caps range queries explicitly", async () => {
    const { store, requests } = fakeSupabase([row]);

    expect(await store.listByDateRange("2024-06-04", "2024-06-10")).toEqual([row]);
    expect(requests).toHaveLength(1);
    expect(requests[0].pathname).toBe("/rest/v1/action_logs");
    expect(requests[0].searchParams.getAll("date")).toEqual(["gte.2024-06-04", "lte.2024-06-10"]);
    expect(requests[0].searchParams.get("limit")).toBe(String(ACTION_ROW_LIMIT));
  });

  it("caps one-day queries explicitly", async () => {
    const { store, requests } = fakeSupabase([row]);

    await store.listByDate("2024-06-10");
    expect(requests[0].searchParams.get("limit")).toBe("5000");
  });

  it("caps the logged-date scan and removes repeats", async () => {
    const { store, requests } = fakeSupabase([{ date: "2024-06-10" }, { date: "2024-06-10" }, { date: "2024-06-08" }]);

    expect(await store.listLoggedDates()).toEqual(["2024-06-10", "2024-06-08"]);
    expect(requests[0].searchParams.get("select")).toBe("date");
    expect(requests[0].searchParams.get("limit")).toBe("5000");
  });
});
