// src/factorRepository.ts
import fs from "fs";
import path from "path";
import { z } from "zod";

export const ACTION_CATEGORIES = ["mobility", "purchase", "home_energy"] as const;

export type ActionCategory = (typeof ACTION_CATEGORIES)[number];

export type Factor = {
  category: ActionCategory;
  item: string;
  subcategory: string | null; // purchase only
  co2e_per_unit: number;
  water_per_unit: number;
  unit: string;
  description: string;
};

export class FactorNotFoundError extends Error {
  readonly category: string;
  readonly item: string;
  readonly subcategory: string | null;

  constructor(category: string, item: string, subcategory: string | null = null) {
    super(`Factor not found for category='${category}', item='${item}'`);
    this.name = "FactorNotFoundError";
    this.category = category;
    this.item = item;
    this.subcategory = subcategory;
  }
}

export function isActionCategory(value: string): value is ActionCategory {
  return ACTION_CATEGORIES.some((c) => c === value);
}

// ---- reference data files -------------------------------------------------

const MobilityEntrySchema = z.object({
  co2e_kg_per_km: z.number().nonnegative(),
  water_l_per_km: z.number().nonnegative().default(0),
  description: z.string().default(""),
});

// Household energy carries no water footprint.
const EnergyEntrySchema = z.object({
  co2e_kg_per_unit: z.number().nonnegative(),
  unit: z.string().default("unit"),
  description: z.string().default(""),
});

const ProductEntrySchema = z.object({
  co2e_kg_per_unit: z.number().nonnegative(),
  water_l_per_unit: z.number().nonnegative().default(0),
  unit: z.string().default("unit"),
  description: z.string().default(""),
});

const EmissionFactorFileSchema = z.object({
  metadata: z.record(z.string(), z.unknown()).optional(),
  mobility: z.record(z.string(), MobilityEntrySchema),
  home_energy: z.record(z.string(), EnergyEntrySchema),
});

const ProductFactorFileSchema = z.object({
  metadata: z.record(z.string(), z.unknown()).optional(),
  purchase: z.record(z.string(), z.record(z.string(), ProductEntrySchema)),
});

export const EMISSION_FACTORS_FILE = "emission_factors.json";
export const PRODUCT_FACTORS_FILE = "product_factors.json";

/** Reference data lives in data/ at the project root unless FACTOR_DATA_DIR says otherwise. */
export function dataFilePath(fileName: string): string {
  return path.join(process.env.FACTOR_DATA_DIR || path.join(__dirname, "..", "data"), fileName);
}

function readJsonFile(fileName: string): unknown {
  const filePath = dataFilePath(fileName);
  const text = fs.readFileSync(filePath, "utf8");
  try {
    return JSON.parse(text);
  } catch (e: unknown) {
    throw new Error(`Invalid JSON in ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

function parseFile<T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const result = schema.safeParse(readJsonFile(fileName));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Malformed factor file ${fileName}: ${issues}`);
  }
  return result.data;
}

// ---- cached tables --------------------------------------------------------

type FactorTables = {
  mobility: ReadonlyMap<string, Factor>;
  home_energy: ReadonlyMap<string, Factor>;
  // subcategory -> item -> factor, both in declaration order
  purchase: ReadonlyMap<string, ReadonlyMap<string, Factor>>;
  all: Readonly<Record<ActionCategory, readonly Factor[]>>;
};

let cachedTables: FactorTables | null = null;

function normalizeKey(raw: string): string {
  return raw.toLowerCase().trim();
}

function addUnique(table: Map<string, Factor>, factor: Factor, where: string) {
  if (table.has(factor.item)) {
    throw new Error(`Duplicate factor item '${factor.item}' in ${where}`);
  }
  table.set(factor.item, Object.freeze(factor));
}

function buildTables(): FactorTables {
  const emission = parseFile(EMISSION_FACTORS_FILE, EmissionFactorFileSchema);
  const product = parseFile(PRODUCT_FACTORS_FILE, ProductFactorFileSchema);

  const mobility = new Map<string, Factor>();
  for (const [rawItem, data] of Object.entries(emission.mobility)) {
    addUnique(
      mobility,
      {
        category: "mobility",
        item: normalizeKey(rawItem),
        subcategory: null,
        co2e_per_unit: data.co2e_kg_per_km,
        water_per_unit: data.water_l_per_km,
        unit: "km",
        description: data.description,
      },
      "mobility"
    );
  }

  const homeEnergy = new Map<string, Factor>();
  for (const [rawItem, data] of Object.entries(emission.home_energy)) {
    addUnique(
      homeEnergy,
      {
        category: "home_energy",
        item: normalizeKey(rawItem),
        subcategory: null,
        co2e_per_unit: data.co2e_kg_per_unit,
        water_per_unit: 0,
        unit: data.unit,
        description: data.description,
      },
      "home_energy"
    );
  }

  const purchase = new Map<string, Map<string, Factor>>();
  for (const [rawSubcategory, items] of Object.entries(product.purchase)) {
    const subcategory = normalizeKey(rawSubcategory);
    const table = purchase.get(subcategory) ?? new Map<string, Factor>();
    for (const [rawItem, data] of Object.entries(items)) {
      addUnique(
        table,
        {
          category: "purchase",
          item: normalizeKey(rawItem),
          subcategory,
          co2e_per_unit: data.co2e_kg_per_unit,
          water_per_unit: data.water_l_per_unit,
          unit: data.unit,
          description: data.description,
        },
        `purchase.${subcategory}`
      );
    }
    purchase.set(subcategory, table);
  }

  const purchaseAll: Factor[] = [];
  for (const table of purchase.values()) purchaseAll.push(...table.values());

  return {
    mobility,
    home_energy: homeEnergy,
    purchase,
    all: Object.freeze({
      mobility: Object.freeze(Array.from(mobility.values())),
      purchase: Object.freeze(purchaseAll),
      home_energy: Object.freeze(Array.from(homeEnergy.values())),
    }),
  };
}

/**
 * Tables are built completely before they are published to the cache,
 * so readers see either no cache or a full one.
 */
function loadFactorTables(): FactorTables {
  if (cachedTables) return cachedTables;
  const tables = buildTables();
  cachedTables = tables;
  return tables;
}

/**
 * Drop the cached tables; the next lookup reloads them from disk.
 */
export function clearFactorCache(): void {
  cachedTables = null;
}

// ---- lookups --------------------------------------------------------------

/**
 * Resolve the per-unit factor for an item.
 *
 * Purchases look in `subcategory` first when it is given, then scan every
 * subcategory in declaration order.
 *
 * @throws FactorNotFoundError when no table holds the item
 */
export function getFactor(category: string, item: string, subcategory?: string | null): Factor {
  const key = normalizeKey(item);
  const tables = loadFactorTables();

  if (category === "mobility" || category === "home_energy") {
    const found = tables[category].get(key);
    if (found) return found;
  } else if (category === "purchase") {
    if (subcategory) {
      const preferred = tables.purchase.get(normalizeKey(subcategory))?.get(key);
      if (preferred) return preferred;
    }
    for (const table of tables.purchase.values()) {
      const found = table.get(key);
      if (found) return found;
    }
  }

  throw new FactorNotFoundError(category, key, subcategory ?? null);
}

export function getAllFactors(): Readonly<Record<ActionCategory, readonly Factor[]>> {
  return loadFactorTables().all;
}

export function getPurchaseSubcategories(): string[] {
  return Array.from(loadFactorTables().purchase.keys());
}
