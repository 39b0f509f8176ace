// ── Meal types ──────────────────────────────────────────────────────────────
export const MEAL_TYPES = ["breakfast", "lunch", "dinner", "snack"] as const;
export type MealType = (typeof MEAL_TYPES)[number];

export const RECOMMENDATION_TYPES = ["meal", "snack", "alternative"] as const;
export type RecommendationType = (typeof RECOMMENDATION_TYPES)[number];

export type Rating = 1 | -1;

// ── User ────────────────────────────────────────────────────────────────────
export type User = {
  id: number;
  auth0_user_id: string;
  email: string;
  name: string;
  picture_url: string | null;
  created_at: string;
  daily_calorie_goal: number;
  dietary_restrictions: string[];
  preferred_cuisine: string | null;
};

// Identity claims as issued by Auth0 (ID token / userinfo).
export type IdentityClaims = {
  sub: string;
  email: string;
  name?: string;
  picture?: string;
};

export type UserPreferences = {
  daily_calorie_goal: number;
  preferred_cuisine: string | null;
  dietary_restrictions: string[];
};

// ── Food ────────────────────────────────────────────────────────────────────

// Per-100 g nutrient facts merged with product-quality metadata.
export type NutritionValue = number | string | boolean | string[] | null;
export type NutritionData = Record<string, NutritionValue>;

export type Food = {
  id: number;
  upc_code: string | null;
  name: string;
  brand: string;
  ingredients: string;
  nutrition_data: NutritionData;
  created_at: string;
};

export type FoodDraft = Omit<Food, "id" | "created_at">;

// ── Food log ────────────────────────────────────────────────────────────────
export type FoodLog = {
  id: number;
  user_id: number;
  food_id: number;
  quantity: number; // grams
  meal_type: MealType;
  logged_at: string;
  notes: string;
};

export type FoodLogEntry = FoodLog & { food: Food };

// Wire shape of a log: the entry plus derived values.
export type FoodLogView = FoodLog & {
  food: { id: number; name: string; brand: string; upc_code: string | null };
  calories: number;
  nutrients: Record<string, number>;
};

// ── Daily plan ──────────────────────────────────────────────────────────────
export type JsonObject = { [key: string]: unknown };

export type DailyPlan = {
  id: number;
  user_id: number;
  date: string; // YYYY-MM-DD
  meals_planned: JsonObject;
  nutritional_goals: JsonObject;
  created_at: string;
};

// ── AI recommendation ───────────────────────────────────────────────────────
export type RecommendationContext = {
  recent_foods: string[];
  dietary_restrictions: string[];
  calorie_goal: number;
  preferred_cuisine: string | null;
};

export type AIRecommendation = {
  id: number;
  user_id: number;
  recommendation_type: RecommendationType;
  recommendation_text: string;
  context_data: JsonObject;
  created_at: string;
  is_used: boolean;
  rating: Rating | null;
};

// ── Aggregates ──────────────────────────────────────────────────────────────
export type DailyMacroTotals = {
  calories: number;
  protein: number;
  carbs: number;
  fat: number;
  items: number;
};

export type NutritionSummary = {
  total_calories: number;
  total_items: number;
  avg_daily_calories: number;
  daily_data: Record<string, DailyMacroTotals>;
  calorie_goal: number;
  period_days: number;
};

export type DemoDataResult = {
  logs_created: number;
  unique_dates: number;
  avg_calories_per_day: number;
  meal_breakdown: Partial<Record<MealType, number>>;
  date_range: string;
  message: string;
};

export function isMealType(value: unknown): value is MealType {
  return typeof value === "string" && MEAL_TYPES.some((type) => type === value);
}

export function isRecommendationType(value: unknown): value is RecommendationType {
  return typeof value === "string" && RECOMMENDATION_TYPES.some((type) => type === value);
}
