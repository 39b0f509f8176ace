import type { FoodPlannerDb } from "./db.js";
import { HttpError } from "./errors.js";
import { type Logger, createLogger } from "./logger.js";
import { type OpenFoodFactsClient, toFoodDraft } from "./open-food-facts.js";
import type { Food } from "./types.js";

export const UPC_PATTERN = /^\d{8,14}$/;

export function isValidUpc(upc: string): boolean {
  return UPC_PATTERN.test(upc);
}

export type CustomFoodInput = {
  name: string;
  brand?: string;
  ingredients?: string;
  calories_per_100g?: number;
  protein_per_100g?: number;
  carbs_per_100g?: number;
  fat_per_100g?: number;
  fiber_per_100g?: number;
  sugar_per_100g?: number;
  sodium_per_100g?: number;
};

const CUSTOM_NUTRIENTS = [
  "calories_per_100g",
  "protein_per_100g",
  "carbs_per_100g",
  "fat_per_100g",
  "fiber_per_100g",
  "sugar_per_100g",
  "sodium_per_100g",
] as const;

/** Local store first, Open Food Facts second; found products are persisted. */
export class FoodCatalog {
  private readonly log: Logger;

  constructor(
    private readonly db: FoodPlannerDb,
    private readonly off: OpenFoodFactsClient,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger("food-catalog");
  }

  async lookupByUpc(upc: string): Promise<Food | null> {
    if (!isValidUpc(upc)) {
      throw new HttpError(400, "Invalid UPC code: expected 8 to 14 digits");
    }
    const local = this.db.getFoodByUpc(upc);
    if (local) {
      return local;
    }
    const product = await this.off.getProduct(upc);
    if (!product) {
      return null;
    }
    const food = this.db.insertFood(toFoodDraft(product, { upc, fallbackName: `Product ${upc}` }));
    this.log.info("Stored product from Open Food Facts", { upc, foodId: food.id });
    return food;
  }

  async searchByName(query: string, limit: number): Promise<Food[]> {
    const term = query.trim();
    if (!term) {
      return [];
    }
    const local = this.db.searchFoods(term, limit);
    if (local.length > 0) {
      return local;
    }

    const products = await this.off.search(term);
    const results: Food[] = [];
    for (const product of products) {
      const name = typeof product.product_name === "string" ? product.product_name.trim() : "";
      if (!name) {
        continue;
      }
      const code = typeof product.code === "string" && product.code ? product.code : null;
      const existing = code ? this.db.getFoodByUpc(code) : null;
      results.push(
        existing ?? this.db.insertFood(toFoodDraft(product, { fallbackName: "Unknown Product" })),
      );
      if (results.length >= limit) {
        break;
      }
    }
    this.log.debug("Remote name search", { query: term, results: results.length });
    return results;
  }

  createCustomFood(input: CustomFoodInput): Food {
    const nutrition: Record<string, number> = {};
    for (const key of CUSTOM_NUTRIENTS) {
      nutrition[key] = input[key] ?? 0;
    }
    return this.db.insertFood({
      upc_code: null,
      name: input.name,
      brand: input.brand ?? "",
      ingredients: input.ingredients ?? "",
      nutrition_data: nutrition,
    });
  }
}
