import { describe, expect, it } from "vitest";
import {
  ActionNotFoundError,
  deleteAction,
  EMPTY_MESSAGE_RESPONSE,
  InvalidActionError,
  listActions,
  logAction,
  logActionsBulk,
  logChatMessage,
  validateActionInput,
} from "./actionLog";
import { FactorNotFoundError } from "./factorRepository";
import { NOT_UNDERSTOOD_MESSAGE } from "./chatbot";
import { InMemoryActionStore } from "./memoryActionStore";

const DAY = "2024-06-10";

describe("validateActionInput", () => {
  it("normalises the item and fills defaults", () => {
    expect(validateActionInput({ category: "mobility", item: "  Taxi_ICE ", amount: 10 })).toEqual({
      category: "mobility",
      item: "taxi_ice",
      amount: 10,
      subcategory: null,
      time_of_day: "standard",
      location: null,
      notes: null,
    });
  });

  it("accepts numeric strings from flags and CSV cells", () => {
    expect(validateActionInput({ category: "purchase", item: "coffee", amount: "2", time_of_day: null }).amount).toBe(2);
  });

  it("lists every problem", () => {
    try {
      validateActionInput({ category: "travel", item: "   ", amount: 0 });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidActionError);
      if (e instanceof InvalidActionError) {
        expect(e.issues.map((i) => i.split(":")[0])).toEqual(["category", "item", "amount"]);
        expect(e.issues[1]).toBe("item: item is required");
        expect(e.issues[2]).toBe("amount: Number must be greater than 0");
      }
    }
  });

  it("limits notes to 500 characters", () => {
    const base = { category: "mobility", item: "bus", amount: 1 };
    expect(validateActionInput({ ...base, notes: "x".repeat(500) }).notes).toHaveLength(500);
    expect(() => validateActionInput({ ...base, notes: "x".repeat(501) })).toThrow(InvalidActionError);
  });
});

describe("logAction", () => {
  it("stores the computed footprint", async () => {
    const store = new InMemoryActionStore();
    const saved = await logAction(store, { category: "mobility", item: "Taxi_ICE", amount: 10, location: "Gangnam-gu" }, DAY);

    expect(saved).toMatchObject({
      id: 1,
      date: DAY,
      category: "mobility",
      item: "taxi_ice",
      amount: 10,
      time_of_day: "standard",
      location: "Gangnam-gu",
      co2e_kg: 2.1,
      water_l: 5,
    });
    expect(await store.listByDate(DAY)).toHaveLength(1);
  });

  it("applies the tariff window", async () => {
    const store = new InMemoryActionStore();
    const saved = await logAction(store, { category: "home_energy", item: "electricity_kwh", amount: 4, time_of_day: "peak" }, DAY);
    expect(saved.co2e_kg).toBe(1.996);
    expect(saved.time_of_day).toBe("peak");
  });

  it("stores nothing for invalid input", async () => {
    const store = new InMemoryActionStore();
    await expect(logAction(store, { category: "mobility", item: "bus", amount: -1 }, DAY)).rejects.toThrow(InvalidActionError);
    expect(await store.listLoggedDates()).toEqual([]);
  });

  it("propagates unknown factors", async () => {
    const store = new InMemoryActionStore();
    await expect(logAction(store, { category: "mobility", item: "rocket", amount: 1 }, DAY)).rejects.toThrow(FactorNotFoundError);
    expect(await store.listLoggedDates()).toEqual([]);
  });
});

describe("logActionsBulk", () => {
  it("logs what it can and reports the rest by index", async () => {
    const store = new InMemoryActionStore();
    const result = await logActionsBulk(
      store,
      [
        { category: "mobility", item: "bus", amount: 5 },
        { category: "mobility", item: "bus", amount: 0 },
        { category: "mobility", item: "rocket", amount: 1 },
        { category: "purchase", item: "coffee", amount: 2 },
      ],
      DAY
    );

    expect(result.logged.map((r) => [r.item, r.co2e_kg])).toEqual([
      ["bus", 0.44],
      ["coffee", 0.56],
    ]);
    expect(result.skipped).toEqual([
      { index: 1, reason: "Invalid action: amount: Number must be greater than 0" },
      { index: 2, reason: "Factor not found for category='mobility', item='rocket'" },
    ]);
    expect(await store.listByDate(DAY)).toHaveLength(2);
  });
});

describe("logChatMessage", () => {
  it("answers an empty message without parsing", async () => {
    const store = new InMemoryActionStore();
    expect(await logChatMessage(store, "   ", DAY)).toEqual({
      response: EMPTY_MESSAGE_RESPONSE,
      actions: [],
      impacts: [],
      analyzed: [],
    });
  });

  it("logs each parsed action", async () => {
    const store = new InMemoryActionStore();
    const result = await logChatMessage(store, "오늘 택시로 5km 이동했어", DAY);

    expect(result.actions).toEqual([{ category: "mobility", item: "taxi_ice", amount: 5, confidence: 0.8 }]);
    expect(result.impacts).toEqual([{ id: 1, item: "taxi_ice", amount: 5, co2e_kg: 1.05, water_l: 2.5 }]);
    expect(result.response.split("\n")).toContain("🚗 **Taxi Ice** (5)");
    expect((await store.listByDate(DAY)).map((r) => r.item)).toEqual(["taxi_ice"]);
  });

  it("skips actions whose quantity is zero", async () => {
    const store = new InMemoryActionStore();
    const result = await logChatMessage(store, "I took a taxi for 0km and much later in the afternoon bought 2 coffee cups", DAY);

    expect(result.actions.map((a) => [a.item, a.amount])).toEqual([["coffee", 2]]);
    expect((await store.listByDate(DAY)).map((r) => [r.item, r.amount])).toEqual([["coffee", 2]]);
  });

  it("logs nothing when every quantity is zero", async () => {
    const store = new InMemoryActionStore();
    const result = await logChatMessage(store, "택시 0km 탔고 커피 2잔", DAY);

    expect(result.response).toBe(NOT_UNDERSTOOD_MESSAGE);
    expect(await store.listLoggedDates()).toEqual([]);
  });

  it("logs nothing for text it does not understand", async () => {
    const store = new InMemoryActionStore();
    const result = await logChatMessage(store, "이상한 문장", DAY);

    expect(result.response).toBe(NOT_UNDERSTOOD_MESSAGE);
    expect(result.impacts).toEqual([]);
    expect(await store.listLoggedDates()).toEqual([]);
  });
});

describe("listActions", () => {
  async function seeded() {
    const store = new InMemoryActionStore();
    await logAction(store, { category: "mobility", item: "bus", amount: 5 }, "2024-06-08");
    await logAction(store, { category: "purchase", item: "coffee", amount: 1 }, DAY);
    await logAction(store, { category: "mobility", item: "subway", amount: 3 }, DAY);
    return store;
  }

  it("lists one day newest first", async () => {
    const rows = await listActions(await seeded(), { date: DAY });
    expect(rows.map((r) => r.item)).toEqual(["subway", "coffee"]);
  });

  it("lists an inclusive range", async () => {
    const rows = await listActions(await seeded(), { from: "2024-06-08", to: DAY });
    expect(rows.map((r) => [r.date, r.item])).toEqual([
      [DAY, "subway"],
      [DAY, "coffee"],
      ["2024-06-08", "bus"],
    ]);
  });

  it("rejects malformed dates and reversed ranges", async () => {
    const store = await seeded();
    await expect(listActions(store, { date: "10/06/2024" })).rejects.toThrow("Invalid date '10/06/2024', expected YYYY-MM-DD");
    await expect(listActions(store, { from: DAY, to: "2024-06-08" })).rejects.toThrow(
      "Invalid range: 2024-06-10 is after 2024-06-08"
    );
  });
});

describe("deleteAction", () => {
  it("removes the row so it can be logged again corrected", async () => {
    const store = new InMemoryActionStore();
    const wrong = await logAction(store, { category: "mobility", item: "taxi_ice", amount: 50 }, DAY);

    await deleteAction(store, wrong.id);
    await logAction(store, { category: "mobility", item: "taxi_ice", amount: 5 }, DAY);

    expect((await listActions(store, { date: DAY })).map((r) => [r.id, r.amount])).toEqual([[2, 5]]);
  });

  it("throws ActionNotFoundError for an unknown id", async () => {
    const store = new InMemoryActionStore();
    await expect(deleteAction(store, 7)).rejects.toThrow(ActionNotFoundError);
    await expect(deleteAction(store, 7)).rejects.toThrow("Action not found: id=7");
  });

  it("rejects ids that cannot exist", async () => {
    await expect(deleteAction(new InMemoryActionStore(), 0)).rejects.toThrow("Invalid action id: 0");
  });
});
