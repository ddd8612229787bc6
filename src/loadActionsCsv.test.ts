import { describe, expect, it } from "vitest";
import { parseActionsCsv } from "./loadActionsCsv";
import { validateActionInput } from "./actionLog";

describe("parseActionsCsv", () => {
  it("groups cells into inputs and falls back to the default date", () => {
    const csv = "date,category,item,amount,notes\n2024-06-10,mobility,taxi_ice,12,\n\n,purchase,coffee,2,morning\n";

    expect(parseActionsCsv(csv, "2024-06-11")).toEqual([
      { date: "2024-06-10", input: { category: "mobility", item: "taxi_ice", amount: "12", notes: null } },
      { date: "2024-06-11", input: { category: "purchase", item: "coffee", amount: "2", notes: "morning" } },
    ]);
  });

  it("produces inputs the validator accepts", () => {
    const [row] = parseActionsCsv("category,item,amount,time_of_day\nhome_energy, electricity_kwh ,3.5,peak\n", "2024-06-11");

    expect(row.date).toBe("2024-06-11");
    expect(validateActionInput(row.input)).toMatchObject({ item: "electricity_kwh", amount: 3.5, time_of_day: "peak" });
  });

  it("names the line of a bad date", () => {
    const csv = "date,category,item,amount\n06/10/2024,mobility,bus,3\n";
    expect(() => parseActionsCsv(csv, "2024-06-11")).toThrow("Row 2: invalid date '06/10/2024'");
  });
});
