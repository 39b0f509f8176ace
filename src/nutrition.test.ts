import { describe, expect, it } from "vitest";
import {
  addDays,
  buildAnalytics,
  buildDashboard,
  buildMealPlanner,
  buildNutritionSummary,
  buildNutritionView,
  dateKey,
  daysBetween,
  isDateKey,
  logCalories,
  logNutrients,
  round1,
  toLogView,
  toNumber,
  weekStart,
} from "./nutrition.js";
import type { FoodLogEntry, MealType, NutritionData } from "./types.js";

const OATS: NutritionData = {
  calories_per_100g: 200,
  protein_per_100g: 10,
  carbs_per_100g: "20",
  fat_per_100g: 5,
  nutri_score_grade: "A",
};

let nextId = 1;

function entry(
  loggedAt: string,
  quantity: number,
  mealType: MealType = "breakfast",
  nutrition: NutritionData = OATS,
): FoodLogEntry {
  const id = nextId++;
  return {
    id,
    user_id: 1,
    food_id: 7,
    quantity,
    meal_type: mealType,
    logged_at: loggedAt,
    notes: "",
    food: {
      id: 7,
      upc_code: "12345670",
      name: "Oats",
      brand: "Mill",
      ingredients: "oats",
      nutrition_data: nutrition,
      created_at: "2026-01-01T00:00:00.000Z",
    },
  };
}

describe("numbers", () => {
  it("reads finite numbers and numeric strings", () => {
    expect(toNumber(3)).toBe(3);
    expect(toNumber("2.5")).toBe(2.5);
    expect(toNumber("")).toBeNull();
    expect(toNumber("abc")).toBeNull();
    expect(toNumber(true)).toBeNull();
    expect(toNumber(undefined)).toBeNull();
  });

  it("rounds to one decimal", () => {
    expect(round1(85.714)).toBe(85.7);
    expect(round1(2.25)).toBe(2.3);
  });
});

describe("per-log values", () => {
  it("scales calories by quantity", () => {
    expect(logCalories(entry("2026-01-15T08:00:00.000Z", 150))).toBe(300);
  });

  it("counts missing calories as zero", () => {
    expect(logCalories(entry("2026-01-15T08:00:00.000Z", 150, "lunch", {}))).toBe(0);
  });

  it("scales every per-100g nutrient and drops the suffix", () => {
    expect(logNutrients(entry("2026-01-15T08:00:00.000Z", 150))).toEqual({
      calories: 300,
      protein: 15,
      carbs: 30,
      fat: 7.5,
    });
  });

  it("builds the wire view", () => {
    const view = toLogView(entry("2026-01-15T08:00:00.000Z", 33));
    expect(view.food).toEqual({ id: 7, name: "Oats", brand: "Mill", upc_code: "12345670" });
    expect(view.calories).toBe(66);
    expect(view.nutrients).toEqual({ calories: 66, protein: 3.3, carbs: 6.6, fat: 1.65 });
    expect(view.quantity).toBe(33);
    expect("nutrition_data" in view.food).toBe(false);
  });
});

describe("dates", () => {
  it("uses UTC day keys", () => {
    expect(dateKey(new Date("2026-01-15T23:30:00.000Z"))).toBe("2026-01-15");
  });

  it("validates day keys", () => {
    expect(isDateKey("2026-02-28")).toBe(true);
    expect(isDateKey("2026-02-30")).toBe(false);
    expect(isDateKey("2026-2-28")).toBe(false);
  });

  it("adds days across month boundaries", () => {
    expect(addDays("2026-03-01", -1)).toBe("2026-02-28");
    expect(addDays("2025-12-31", 1)).toBe("2026-01-01");
  });

  it("starts weeks on Monday", () => {
    expect(weekStart("2026-01-15")).toBe("2026-01-12");
    expect(weekStart("2026-01-18")).toBe("2026-01-12");
    expect(weekStart("2026-01-12")).toBe("2026-01-12");
  });

  it("counts days between keys", () => {
    expect(daysBetween("2026-01-01", "2026-01-15")).toBe(14);
  });
});

describe("aggregates", () => {
  const logs = [
    entry("2026-01-14T19:00:00.000Z", 150, "dinner"),
    entry("2026-01-15T08:00:00.000Z", 100, "breakfast"),
    entry("2026-01-15T10:00:00.000Z", 50, "snack"),
  ];

  it("summarizes per day and averages over the period", () => {
    const summary = buildNutritionSummary(logs, 7, 2000);
    expect(summary.total_calories).toBe(600);
    expect(summary.total_items).toBe(3);
    expect(summary.avg_daily_calories).toBe(85.7);
    expect(summary.period_days).toBe(7);
    expect(summary.calorie_goal).toBe(2000);
    expect(summary.daily_data["2026-01-15"]).toEqual({
      calories: 300,
      protein: 15,
      carbs: 30,
      fat: 7.5,
      items: 2,
    });
  });

  it("builds a day-by-day nutrition view", () => {
    const view = buildNutritionView(logs, "2026-01-09", "2026-01-15");
    expect(view.days).toBe(7);
    expect(view.nutrition_data["2026-01-14"]).toEqual({
      calories: 300,
      protein: 15,
      carbs: 30,
      fat: 7.5,
      fiber: 0,
      sugar: 0,
      sodium: 0,
    });
  });

  it("builds the dashboard", () => {
    const dashboard = buildDashboard({
      today: "2026-01-15",
      todayLogs: logs.slice(1),
      weekLogs: logs,
      calorieGoal: 1800,
      recommendations: [],
    });
    expect(dashboard.total_calories).toBe(300);
    expect(dashboard.today_logs).toHaveLength(2);
    expect(dashboard.week_summary).toEqual({
      "2026-01-14": { calories: 300, meals: 1 },
      "2026-01-15": { calories: 300, meals: 2 },
    });
  });

  it("groups the planner's logs by meal", () => {
    const planner = buildMealPlanner("2026-01-15", null, logs.slice(1));
    expect(planner.meal_types).toEqual(["breakfast", "lunch", "dinner", "snack"]);
    expect(Object.keys(planner.logged_by_meal)).toEqual(["breakfast", "snack"]);
    expect(planner.existing_plan).toBeNull();
  });

  it("builds analytics over logged days", () => {
    const analytics = buildAnalytics(logs, 2000);
    expect(analytics.meal_patterns).toEqual({ dinner: 1, breakfast: 1, snack: 1 });
    expect(analytics.avg_daily_calories).toBe(300);
    expect(analytics.total_days).toBe(2);
    expect(analytics.chart_data).toEqual({
      dates: ["2026-01-14", "2026-01-15"],
      calories: [300, 300],
      goal: [2000, 2000],
    });
  });

  it("handles an empty history", () => {
    expect(buildAnalytics([], 2000).avg_daily_calories).toBe(0);
    expect(buildNutritionSummary([], 7, 2000).avg_daily_calories).toBe(0);
  });
});
