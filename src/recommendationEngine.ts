// src/recommendationEngine.ts
import { FactorNotFoundError, getFactor } from "./factorRepository";
import type { ActionCategory } from "./factorRepository";
import { roundTo } from "./impactEngine";
import type { ActionRecord } from "./impactEngine";

export type Difficulty = "easy" | "medium" | "hard";

export type RecommendationRule = {
  category: ActionCategory;
  trigger_item: string;
  action: string;
  alternative_item: string | null;
  rationale: string;
  difficulty: Difficulty;
};

export type Recommendation = {
  priority: number;
  category: ActionCategory;
  action: string;
  rationale: string;
  estimated_savings_co2e_kg: number;
  estimated_savings_water_l: number;
  difficulty: Difficulty;
  // present on rule matches only
  trigger_item?: string;
  trigger_amount?: number;
};

export type Savings = { co2e_kg: number; water_l: number };

// Reduction assumed for rules without a measurable alternative item.
const BEHAVIORAL_REDUCTION = 0.2;

function rule(
  category: ActionCategory,
  trigger_item: string,
  action: string,
  alternative_item: string | null,
  rationale: string,
  difficulty: Difficulty
): RecommendationRule {
  return Object.freeze({ category, trigger_item, action, alternative_item, rationale, difficulty });
}

export const RECOMMENDATION_RULES: readonly RecommendationRule[] = Object.freeze([
  // mobility
  rule("mobility", "taxi_ice", "Switch to EV taxi for your next ride", "taxi_ev", "EV taxis produce 76% less CO2 than gasoline taxis", "easy"),
  rule("mobility", "taxi_ice", "Use public transit for trips under 5km", "subway", "Subway produces 83% less CO2 per km than taxi", "medium"),
  rule("mobility", "car_gasoline", "Consider carpooling or public transit tomorrow", "bus", "Bus travel reduces your per-km emissions by 54%", "medium"),
  rule("mobility", "car_gasoline", "Try walking or cycling for short trips under 3km", "bicycle", "Zero emissions and health benefits", "easy"),
  rule("mobility", "domestic_flight", "Consider KTX for domestic travel when possible", "train_ktx", "High-speed rail produces 89% less CO2 than flying", "medium"),

  // food
  rule("purchase", "beef_meal", "Try chicken or fish for one meal tomorrow", "chicken_meal", "Chicken produces 83% less CO2 and uses 77% less water than beef", "easy"),
  rule("purchase", "beef_meal", "Explore a vegetarian meal option", "vegetarian_meal", "Vegetarian meals produce 94% less CO2 than beef", "medium"),
  rule("purchase", "coffee", "Bring a reusable cup for your coffee", null, "Reduces packaging waste and often gets you a discount", "easy"),
  rule("purchase", "milk_liter", "Try plant-based milk alternatives", "oat_milk_liter", "Oat milk produces 53% less CO2 and 92% less water than dairy", "easy"),

  // fashion
  rule("purchase", "tshirt_fastfashion", "Consider secondhand or sustainable options next time", "tshirt_secondhand", "Secondhand clothing reduces impact by 91%", "medium"),
  rule("purchase", "jeans_fastfashion", "Postpone your next jeans purchase and explore secondhand", "jeans_secondhand", "Secondhand jeans save 95% of CO2 and water", "medium"),
  rule("purchase", "sneakers_new", "Check for refurbished or secondhand options", "sneakers_secondhand", "Secondhand shoes reduce impact by 90%", "medium"),

  // electronics
  rule("purchase", "smartphone_new", "Consider refurbished phones for your next upgrade", "smartphone_refurbished", "Refurbished phones use 79% less resources", "easy"),
  rule("purchase", "laptop_new", "Extend your laptop's life or buy refurbished", "laptop_refurbished", "Refurbished laptops reduce impact by 80%", "medium"),

  // household
  rule("purchase", "plastic_bag", "Bring reusable bags for shopping", "reusable_bag", "Reusable bags reduce impact by 94% per use", "easy"),
  rule("purchase", "bottled_water_500ml", "Use a reusable water bottle", "tap_water_500ml", "Tap water in reusable bottles reduces impact by 99%", "easy"),

  // home energy
  rule("home_energy", "electricity_kwh", "Shift high-power activities to off-peak hours", "electricity_kwh_offpeak", "Off-peak electricity has 17% lower carbon intensity", "medium"),
  rule("home_energy", "electricity_kwh_peak", "Reduce peak-hour electricity usage tomorrow", "electricity_kwh_offpeak", "Peak hours have 31% higher carbon intensity", "medium"),
  rule("home_energy", "natural_gas_m3", "Lower heating by 1-2 degrees and wear layers", null, "Each degree reduction saves about 7% of heating energy", "easy"),
]);

const DEFAULT_RECOMMENDATIONS: readonly Readonly<Recommendation>[] = Object.freeze([
  {
    priority: 1,
    category: "mobility",
    action: "Try walking or cycling for one trip today",
    rationale: "Zero-emission transport improves health and reduces carbon footprint",
    estimated_savings_co2e_kg: 0.5,
    estimated_savings_water_l: 0,
    difficulty: "easy",
  },
  {
    priority: 2,
    category: "purchase",
    action: "Choose a plant-based meal option today",
    rationale: "Plant-based meals typically have 50-80% lower carbon footprint",
    estimated_savings_co2e_kg: 3.0,
    estimated_savings_water_l: 1000,
    difficulty: "easy",
  },
  {
    priority: 3,
    category: "home_energy",
    action: "Turn off unused lights and appliances",
    rationale: "Standby power can account for 5-10% of home energy use",
    estimated_savings_co2e_kg: 0.2,
    estimated_savings_water_l: 0,
    difficulty: "easy",
  },
  {
    priority: 4,
    category: "purchase",
    action: "Bring a reusable bag for your next shopping trip",
    rationale: "Single-use plastics contribute to pollution and emissions",
    estimated_savings_co2e_kg: 0.03,
    estimated_savings_water_l: 0.5,
    difficulty: "easy",
  },
  {
    priority: 5,
    category: "mobility",
    action: "Plan your errands to combine trips",
    rationale: "Fewer trips mean less fuel and lower emissions",
    estimated_savings_co2e_kg: 1.0,
    estimated_savings_water_l: 0,
    difficulty: "easy",
  },
] satisfies Recommendation[]);

/**
 * Fresh copies of the first `count` fallback recommendations, in their fixed order.
 */
export function getDefaultRecommendations(count = 3): Recommendation[] {
  return DEFAULT_RECOMMENDATIONS.slice(0, Math.max(0, count)).map((r) => ({ ...r }));
}

/**
 * Savings from switching `amount` units of the trigger item to the alternative.
 * Never negative; zero when either factor is missing.
 */
export function calculateSavings(
  triggerItem: string,
  alternativeItem: string,
  category: string,
  amount = 1.0
): Savings {
  try {
    const trigger = getFactor(category, triggerItem);
    const alternative = getFactor(category, alternativeItem);

    const co2e = (trigger.co2e_per_unit - alternative.co2e_per_unit) * amount;
    const water = (trigger.water_per_unit - alternative.water_per_unit) * amount;

    return {
      co2e_kg: roundTo(Math.max(0, co2e), 4),
      water_l: roundTo(Math.max(0, water), 2),
    };
  } catch (e: unknown) {
    if (e instanceof FactorNotFoundError) return { co2e_kg: 0, water_l: 0 };
    throw e;
  }
}

type ActionGroup = {
  category: ActionCategory;
  item: string;
  amount: number;
  co2e_kg: number;
};

export type RecommendationInput = Pick<ActionRecord, "category" | "item" | "amount" | "co2e_kg">;

function groupActions(actions: readonly RecommendationInput[]): ActionGroup[] {
  const groups = new Map<string, ActionGroup>();
  for (const a of actions) {
    const key = `${a.category}|||${a.item}`;
    const cur = groups.get(key);
    if (!cur) {
      groups.set(key, { category: a.category, item: a.item, amount: a.amount, co2e_kg: a.co2e_kg });
    } else {
      cur.amount += a.amount;
      cur.co2e_kg += a.co2e_kg;
    }
  }
  return Array.from(groups.values());
}

/**
 * Rank rule-based suggestions for a set of logged actions.
 *
 * Actions are grouped by (category, item) first, so an item logged several
 * times is judged once at its total amount. Matches are ordered by CO2e
 * savings (ties keep rule table order) and padded with the default list.
 */
export function getRecommendations(
  actions: readonly RecommendationInput[],
  maxRecommendations = 3
): Recommendation[] {
  if (!actions.length) return getDefaultRecommendations(maxRecommendations);

  const matched: Recommendation[] = [];
  const seenActions = new Set<string>();

  for (const group of groupActions(actions)) {
    for (const r of RECOMMENDATION_RULES) {
      if (r.category !== group.category || r.trigger_item !== group.item) continue;

      const actionKey = `${r.category}:${r.action}`;
      if (seenActions.has(actionKey)) continue;
      seenActions.add(actionKey);

      const savings: Savings = r.alternative_item
        ? calculateSavings(r.trigger_item, r.alternative_item, group.category, group.amount)
        : { co2e_kg: roundTo(group.co2e_kg * BEHAVIORAL_REDUCTION, 4), water_l: 0 };

      matched.push({
        priority: 0,
        category: group.category,
        action: r.action,
        rationale: r.rationale,
        estimated_savings_co2e_kg: savings.co2e_kg,
        estimated_savings_water_l: savings.water_l,
        difficulty: r.difficulty,
        trigger_item: group.item,
        trigger_amount: group.amount,
      });
    }
  }

  // Array.prototype.sort is stable, so equal savings keep rule order.
  matched.sort((a, b) => b.estimated_savings_co2e_kg - a.estimated_savings_co2e_kg);

  const result = matched.slice(0, Math.max(0, maxRecommendations)).map((rec, i) => ({ ...rec, priority: i + 1 }));

  if (result.length < maxRecommendations) {
    for (const rec of getDefaultRecommendations(maxRecommendations - result.length)) {
      result.push({ ...rec, priority: result.length + 1 });
    }
  }

  return result;
}
