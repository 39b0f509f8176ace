import type {
  AIRecommendation,
  DailyMacroTotals,
  DailyPlan,
  FoodLogEntry,
  FoodLogView,
  MealType,
  NutritionSummary,
  NutritionValue,
} from "./types.js";
import { MEAL_TYPES } from "./types.js";

const PER_100G_SUFFIX = "_per_100g";

// ── Numbers ─────────────────────────────────────────────────────────────────

/** Finite numbers and numeric strings; everything else is null. */
export function toNumber(value: NutritionValue | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

// ── Per-log values ──────────────────────────────────────────────────────────

export function logCalories(entry: FoodLogEntry): number {
  const per100 = toNumber(entry.food.nutrition_data.calories_per_100g) ?? 0;
  return (per100 * entry.quantity) / 100;
}

/** `*_per_100g` nutrients scaled to the logged quantity, keyed without the suffix. */
export function logNutrients(entry: FoodLogEntry): Record<string, number> {
  const scaled: Record<string, number> = {};
  for (const [key, raw] of Object.entries(entry.food.nutrition_data)) {
    if (!key.endsWith(PER_100G_SUFFIX)) {
      continue;
    }
    const value = toNumber(raw);
    if (value === null) {
      continue;
    }
    scaled[key.slice(0, -PER_100G_SUFFIX.length)] = (value * entry.quantity) / 100;
  }
  return scaled;
}

export function toLogView(entry: FoodLogEntry): FoodLogView {
  const { food, ...log } = entry;
  return {
    ...log,
    food: { id: food.id, name: food.name, brand: food.brand, upc_code: food.upc_code },
    calories: round1(logCalories(entry)),
    nutrients: Object.fromEntries(
      Object.entries(logNutrients(entry)).map(([k, v]) => [k, Math.round(v * 100) / 100]),
    ),
  };
}

// ── Dates (UTC day keys) ────────────────────────────────────────────────────

export function dateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function logDateKey(entry: FoodLogEntry): string {
  return entry.logged_at.slice(0, 10);
}

export function isDateKey(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && dateKey(parsed) === value;
}

export function addDays(key: string, days: number): string {
  const date = new Date(`${key}T00:00:00.000Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return dateKey(date);
}

/** Monday of the week containing `key`. */
export function weekStart(key: string): string {
  const weekday = new Date(`${key}T00:00:00.000Z`).getUTCDay();
  return addDays(key, -((weekday + 6) % 7));
}

export function daysBetween(from: string, to: string): number {
  const ms = Date.parse(`${to}T00:00:00.000Z`) - Date.parse(`${from}T00:00:00.000Z`);
  return Math.round(ms / 86_400_000);
}

// ── Aggregates ──────────────────────────────────────────────────────────────

export function totalCalories(entries: FoodLogEntry[]): number {
  return entries.reduce((sum, entry) => sum + logCalories(entry), 0);
}

export function buildNutritionSummary(
  entries: FoodLogEntry[],
  days: number,
  calorieGoal: number,
): NutritionSummary {
  const daily: Record<string, DailyMacroTotals> = {};
  let total = 0;

  for (const entry of entries) {
    const key = logDateKey(entry);
    const day = (daily[key] ??= { calories: 0, protein: 0, carbs: 0, fat: 0, items: 0 });
    const calories = logCalories(entry);
    const nutrients = logNutrients(entry);
    day.calories += calories;
    day.items += 1;
    day.protein += nutrients.protein ?? 0;
    day.carbs += nutrients.carbs ?? 0;
    day.fat += nutrients.fat ?? 0;
    total += calories;
  }

  for (const day of Object.values(daily)) {
    day.calories = round1(day.calories);
    day.protein = round1(day.protein);
    day.carbs = round1(day.carbs);
    day.fat = round1(day.fat);
  }

  return {
    total_calories: round1(total),
    total_items: entries.length,
    avg_daily_calories: days > 0 ? round1(total / days) : 0,
    daily_data: daily,
    calorie_goal: calorieGoal,
    period_days: days,
  };
}

const TRACKED_NUTRIENTS = ["protein", "carbs", "fat", "fiber", "sugar", "sodium"] as const;

export type DailyNutrients = Record<"calories" | (typeof TRACKED_NUTRIENTS)[number], number>;

export function buildNutritionView(
  entries: FoodLogEntry[],
  start: string,
  end: string,
): { start_date: string; end_date: string; days: number; nutrition_data: Record<string, DailyNutrients> } {
  const data: Record<string, DailyNutrients> = {};
  for (const entry of entries) {
    const day = (data[logDateKey(entry)] ??= {
      calories: 0,
      protein: 0,
      carbs: 0,
      fat: 0,
      fiber: 0,
      sugar: 0,
      sodium: 0,
    });
    day.calories += logCalories(entry);
    const nutrients = logNutrients(entry);
    for (const name of TRACKED_NUTRIENTS) {
      day[name] += nutrients[name] ?? 0;
    }
  }
  for (const day of Object.values(data)) {
    day.calories = round1(day.calories);
    for (const name of TRACKED_NUTRIENTS) {
      day[name] = Math.round(day[name] * 100) / 100;
    }
  }
  return { start_date: start, end_date: end, days: daysBetween(start, end) + 1, nutrition_data: data };
}

export type DashboardView = {
  today: string;
  today_logs: FoodLogView[];
  total_calories: number;
  calorie_goal: number;
  recent_recommendations: AIRecommendation[];
  week_summary: Record<string, { calories: number; meals: number }>;
};

export function buildDashboard(params: {
  today: string;
  todayLogs: FoodLogEntry[];
  weekLogs: FoodLogEntry[];
  calorieGoal: number;
  recommendations: AIRecommendation[];
}): DashboardView {
  const week: Record<string, { calories: number; meals: number }> = {};
  for (const entry of params.weekLogs) {
    const day = (week[logDateKey(entry)] ??= { calories: 0, meals: 0 });
    day.calories += logCalories(entry);
    day.meals += 1;
  }
  for (const day of Object.values(week)) {
    day.calories = round1(day.calories);
  }
  return {
    today: params.today,
    today_logs: params.todayLogs.map(toLogView),
    total_calories: round1(totalCalories(params.todayLogs)),
    calorie_goal: params.calorieGoal,
    recent_recommendations: params.recommendations,
    week_summary: week,
  };
}

export type MealPlannerView = {
  plan_date: string;
  existing_plan: DailyPlan | null;
  logged_by_meal: Partial<Record<MealType, FoodLogView[]>>;
  meal_types: MealType[];
};

export function buildMealPlanner(
  date: string,
  plan: DailyPlan | null,
  entries: FoodLogEntry[],
): MealPlannerView {
  const byMeal: Partial<Record<MealType, FoodLogView[]>> = {};
  for (const entry of entries) {
    (byMeal[entry.meal_type] ??= []).push(toLogView(entry));
  }
  return { plan_date: date, existing_plan: plan, logged_by_meal: byMeal, meal_types: [...MEAL_TYPES] };
}

export type AnalyticsView = {
  meal_patterns: Partial<Record<MealType, number>>;
  avg_daily_calories: number;
  total_days: number;
  calorie_goal: number;
  chart_data: { dates: string[]; calories: number[]; goal: number[] };
};

export function buildAnalytics(entries: FoodLogEntry[], calorieGoal: number): AnalyticsView {
  const patterns: Partial<Record<MealType, number>> = {};
  const daily = new Map<string, number>();
  for (const entry of entries) {
    patterns[entry.meal_type] = (patterns[entry.meal_type] ?? 0) + 1;
    const key = logDateKey(entry);
    daily.set(key, (daily.get(key) ?? 0) + logCalories(entry));
  }
  const dates = [...daily.keys()].sort();
  const calories = dates.map((d) => round1(daily.get(d) ?? 0));
  const sum = [...daily.values()].reduce((a, b) => a + b, 0);
  return {
    meal_patterns: patterns,
    avg_daily_calories: dates.length > 0 ? round1(sum / dates.length) : 0,
    total_days: dates.length,
    calorie_goal: calorieGoal,
    chart_data: { dates, calories, goal: dates.map(() => calorieGoal) },
  };
}
