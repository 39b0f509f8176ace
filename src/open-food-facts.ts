import { readDataFile } from "./data-files.js";
import { errorMessage } from "./errors.js";
import { isRecord } from "./http.js";
import { type Logger, createLogger } from "./logger.js";
import type { FoodDraft, NutritionData } from "./types.js";

export type OffProduct = Record<string, unknown>;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type OpenFoodFactsOptions = {
  baseUrl: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  logger?: Logger;
};

const SEARCH_PAGE_SIZE = 10;
const USER_AGENT = "FoodPlanner/0.1 (nutrition tracker)";

// ── Field helpers ───────────────────────────────────────────────────────────

/** Number or numeric string; anything else becomes 0. */
export function safeFloat(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

function str(product: OffProduct, key: string): string {
  const value = product[key];
  return typeof value === "string" ? value : "";
}

function tags(product: OffProduct, key: string): string[] {
  const value = product[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

let nutrientKeys: Record<string, string> | null = null;

function loadNutrientKeys(): Record<string, string> {
  if (!nutrientKeys) {
    const raw = readDataFile("off-nutrients.json");
    const keys: Record<string, string> = {};
    if (isRecord(raw)) {
      for (const [target, source] of Object.entries(raw)) {
        if (typeof source === "string") {
          keys[target] = source;
        }
      }
    }
    nutrientKeys = keys;
  }
  return nutrientKeys;
}

// ── Extraction ──────────────────────────────────────────────────────────────

/** Maps Open Food Facts `*_100g` nutriments onto `*_per_100g` keys. */
export function extractNutritionFacts(nutriments: unknown): NutritionData {
  const source = isRecord(nutriments) ? nutriments : {};
  const facts: NutritionData = {};
  for (const [target, key] of Object.entries(loadNutrientKeys())) {
    facts[target] = safeFloat(source[key]);
  }
  return facts;
}

export function extractProductQuality(product: OffProduct): NutritionData {
  const labels = tags(product, "labels_tags");
  return {
    nutri_score_grade: str(product, "nutriscore_grade").toUpperCase(),
    nutri_score_score: safeFloat(product.nutriscore_score),
    nova_group: safeFloat(product.nova_group),
    ecoscore_grade: str(product, "ecoscore_grade").toUpperCase(),
    ecoscore_score: safeFloat(product.ecoscore_score),

    allergens: tags(product, "allergens_tags"),
    traces: tags(product, "traces_tags"),
    is_vegan: labels.includes("en:vegan"),
    is_vegetarian: labels.includes("en:vegetarian"),
    is_organic: labels.some((label) => label.toLowerCase().includes("organic")),
    is_gluten_free: labels.includes("en:gluten-free"),
    is_palm_oil_free: labels.includes("en:palm-oil-free"),

    serving_size: str(product, "serving_size"),
    serving_quantity: safeFloat(product.serving_quantity),
    quantity: str(product, "quantity"),
    packaging: tags(product, "packaging_tags"),
    categories: tags(product, "categories_tags"),
    countries: tags(product, "countries_tags"),
    origins: tags(product, "origins_tags"),
    manufacturing_places: tags(product, "manufacturing_places_tags"),
    labels,
    stores: tags(product, "stores_tags"),

    additives: tags(product, "additives_tags"),
    ingredients_analysis: tags(product, "ingredients_analysis_tags"),
    carbon_footprint: safeFloat(product.carbon_footprint_100g),
    image_url: str(product, "image_url"),
    image_front_url: str(product, "image_front_url"),
    image_nutrition_url: str(product, "image_nutrition_url"),
  };
}

export function toFoodDraft(
  product: OffProduct,
  opts: { upc?: string; fallbackName: string },
): FoodDraft {
  const code = opts.upc ?? (str(product, "code") || null);
  return {
    upc_code: code,
    name: str(product, "product_name").trim() || opts.fallbackName,
    brand: str(product, "brands"),
    ingredients: str(product, "ingredients_text"),
    nutrition_data: {
      ...extractNutritionFacts(product.nutriments),
      ...extractProductQuality(product),
    },
  };
}

// ── Client ──────────────────────────────────────────────────────────────────

export class OpenFoodFactsClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(opts: OpenFoodFactsOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.log = opts.logger ?? createLogger("open-food-facts");
  }

  async getProduct(barcode: string): Promise<OffProduct | null> {
    const url = `${this.baseUrl}/api/v0/product/${encodeURIComponent(barcode)}.json`;
    const data = await this.getJson(url);
    if (!data || data.status !== 1 || !isRecord(data.product)) {
      return null;
    }
    return data.product;
  }

  async search(query: string): Promise<OffProduct[]> {
    const params = new URLSearchParams({
      search_terms: query,
      search_simple: "1",
      action: "process",
      json: "1",
      page_size: String(SEARCH_PAGE_SIZE),
    });
    const data = await this.getJson(`${this.baseUrl}/cgi/search.pl?${params.toString()}`);
    if (!data || !Array.isArray(data.products)) {
      return [];
    }
    return data.products.filter(isRecord).slice(0, SEARCH_PAGE_SIZE);
  }

  private async getJson(url: string): Promise<Record<string, unknown> | null> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await this.fetchImpl(url, {
        signal: controller.signal,
        headers: { "User-Agent": USER_AGENT, Accept: "application/json" },
      });
      if (!res.ok) {
        this.log.warn("Open Food Facts request failed", { url, status: res.status });
        return null;
      }
      const data: unknown = await res.json();
      return isRecord(data) ? data : null;
    } catch (err) {
      // Timeouts and network errors count as "not found".
      this.log.warn("Open Food Facts request failed", { url, error: errorMessage(err) });
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}
