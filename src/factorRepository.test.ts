import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import {
  clearFactorCache,
  FactorNotFoundError,
  getAllFactors,
  getFactor,
  getPurchaseSubcategories,
  isActionCategory,
} from "./factorRepository";

describe("getFactor", () => {
  it("ignores case and surrounding whitespace in the item", () => {
    const f = getFactor("mobility", "  Taxi_ICE ");
    expect(f.item).toBe("taxi_ice");
    expect(f.co2e_per_unit).toBe(0.21);
    expect(f.water_per_unit).toBe(0.5);
    expect(f.unit).toBe("km");
    expect(f.subcategory).toBeNull();
  });

  it("finds purchases without a subcategory", () => {
    const f = getFactor("purchase", "beef_meal");
    expect(f.subcategory).toBe("food");
    expect(f.co2e_per_unit).toBe(6.5);
    expect(f.water_per_unit).toBe(1850);
  });

  it("falls back to other subcategories when the hinted one lacks the item", () => {
    expect(getFactor("purchase", "beef_meal", "fashion").subcategory).toBe("food");
    expect(getFactor("purchase", "tshirt_fastfashion", "fashion").co2e_per_unit).toBe(5.5);
  });

  it("gives home energy no water footprint", () => {
    for (const f of getAllFactors().home_energy) {
      expect(f.water_per_unit).toBe(0);
    }
  });

  it("throws FactorNotFoundError for unknown items", () => {
    expect(() => getFactor("mobility", "spaceship")).toThrow(FactorNotFoundError);
    expect(() => getFactor("mobility", "spaceship")).toThrow("Factor not found for category='mobility', item='spaceship'");
  });

  it("throws FactorNotFoundError for unknown categories", () => {
    try {
      getFactor("travel", "bus");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(FactorNotFoundError);
      if (e instanceof FactorNotFoundError) {
        expect(e.category).toBe("travel");
        expect(e.item).toBe("bus");
        expect(e.subcategory).toBeNull();
      }
    }
  });

  it("does not treat object prototype keys as items", () => {
    expect(() => getFactor("mobility", "constructor")).toThrow(FactorNotFoundError);
  });
});

describe("getAllFactors", () => {
  it("lists every table in declaration order", () => {
    const all = getAllFactors();
    expect(all.mobility).toHaveLength(12);
    expect(all.purchase).toHaveLength(23);
    expect(all.home_energy).toHaveLength(6);
    expect(all.mobility[0].item).toBe("walking");
    expect(all.home_energy.map((f) => f.item).slice(0, 3)).toEqual([
      "electricity_kwh",
      "electricity_kwh_peak",
      "electricity_kwh_offpeak",
    ]);
  });

  it("returns the same cached tables on every call", () => {
    expect(getAllFactors()).toBe(getAllFactors());
  });

  it("reloads equal tables after the cache is cleared", () => {
    const before = getAllFactors();
    clearFactorCache();
    const after = getAllFactors();
    expect(after).not.toBe(before);
    expect(after).toEqual(before);
  });

  it("hands out frozen factors", () => {
    expect(Object.isFrozen(getFactor("mobility", "bus"))).toBe(true);
    expect(Object.isFrozen(getAllFactors().mobility)).toBe(true);
  });
});

describe("getPurchaseSubcategories", () => {
  it("keeps file order", () => {
    expect(getPurchaseSubcategories()).toEqual(["food", "fashion", "electronics", "household"]);
  });
});

describe("isActionCategory", () => {
  it("accepts only the three categories", () => {
    expect(isActionCategory("home_energy")).toBe(true);
    expect(isActionCategory("travel")).toBe(false);
  });
});

describe("reference data validation", () => {
  const originalDir = process.env.FACTOR_DATA_DIR;
  let tmpDir: string | null = null;

  function useDataDir(files: Record<string, unknown>) {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "factors-"));
    for (const [name, content] of Object.entries(files)) {
      fs.writeFileSync(path.join(tmpDir, name), JSON.stringify(content));
    }
    process.env.FACTOR_DATA_DIR = tmpDir;
    clearFactorCache();
  }

  afterEach(() => {
    if (originalDir === undefined) delete process.env.FACTOR_DATA_DIR;
    else process.env.FACTOR_DATA_DIR = originalDir;
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = null;
    clearFactorCache();
  });

  it("rejects negative factors", () => {
    useDataDir({
      "emission_factors.json": { mobility: { bus: { co2e_kg_per_km: -1 } }, home_energy: {} },
      "product_factors.json": { purchase: {} },
    });
    expect(() => getFactor("mobility", "bus")).toThrow(/^Malformed factor file emission_factors\.json: mobility\.bus\.co2e_kg_per_km/);
  });

  it("rejects items that differ only in case", () => {
    useDataDir({
      "emission_factors.json": {
        mobility: { Bus: { co2e_kg_per_km: 0.1 }, bus: { co2e_kg_per_km: 0.2 } },
        home_energy: {},
      },
      "product_factors.json": { purchase: {} },
    });
    expect(() => getAllFactors()).toThrow("Duplicate factor item 'bus' in mobility");
  });

  it("prefers the given subcategory over declaration order", () => {
    useDataDir({
      "emission_factors.json": { mobility: {}, home_energy: {} },
      "product_factors.json": {
        purchase: {
          a: { x: { co2e_kg_per_unit: 1 } },
          b: { x: { co2e_kg_per_unit: 2 } },
        },
      },
    });
    expect(getFactor("purchase", "x", "b").co2e_per_unit).toBe(2);
    expect(getFactor("purchase", "x", "B ").subcategory).toBe("b");
    expect(getFactor("purchase", "x").co2e_per_unit).toBe(1);
    expect(getFactor("purchase", "x", "c").subcategory).toBe("a");
  });

  it("fills optional fields with defaults", () => {
    useDataDir({
      "emission_factors.json": { mobility: { bus: { co2e_kg_per_km: 0.1 } }, home_energy: {} },
      "product_factors.json": { purchase: { food: { toast: { co2e_kg_per_unit: 0.2 } } } },
    });
    expect(getFactor("mobility", "bus")).toEqual({
      category: "mobility",
      item: "bus",
      subcategory: null,
      co2e_per_unit: 0.1,
      water_per_unit: 0,
      unit: "km",
      description: "",
    });
    expect(getFactor("purchase", "toast").unit).toBe("unit");
  });
});
