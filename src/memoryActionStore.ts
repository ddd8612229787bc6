// src/memoryActionStore.ts
// Process-local ActionStore for tests and the offline chat.
import type { ActionStore, NewAction, StoredAction } from "./actionStore";

export class InMemoryActionStore implements ActionStore {
  private rows: StoredAction[] = [];
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async insert(action: NewAction): Promise<StoredAction> {
    const row: StoredAction = {
      id: this.nextId++,
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
      created_at: this.now().toISOString(),
    };
    this.rows.push(row);
    return { ...row };
  }

  async listByDate(date: string): Promise<StoredAction[]> {
    return this.newestFirst(this.rows.filter((r) => r.date === date));
  }

  async listByDateRange(start: string, end: string): Promise<StoredAction[]> {
    const inRange = this.rows.filter((r) => r.date >= start && r.date <= end);
    // ISO dates compare correctly as strings
    return this.newestFirst(inRange).sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
  }

  async listLoggedDates(): Promise<string[]> {
    return Array.from(new Set(this.rows.map((r) => r.date))).sort().reverse();
  }

  async delete(id: number): Promise<boolean> {
    const before = this.rows.length;
    this.rows = this.rows.filter((r) => r.id !== id);
    return this.rows.length < before;
  }

  async clear(): Promise<number> {
    const count = this.rows.length;
    this.rows = [];
    return count;
  }

  // Insertion order breaks created_at ties, like the identity column does.
  private newestFirst(rows: StoredAction[]): StoredAction[] {
    return rows
      .map((r) => ({ ...r }))
      .sort((a, b) => {
        const ta = a.created_at ?? "";
        const tb = b.created_at ?? "";
        if (ta !== tb) return ta < tb ? 1 : -1;
        return b.id - a.id;
      });
  }
}
