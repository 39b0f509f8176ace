import { describe, expect, it } from "vitest";
import { createLogger } from "./logger.js";
import { RecommendationService, analyzeEatingPatterns, toRecentFoods } from "./recommendations.js";
import { FakeAiProvider } from "./test-utils.js";
import type { FoodLogEntry, MealType } from "./types.js";

const silent = createLogger("recommendations", "silent");

function entry(name: string, quantity: number, mealType: MealType, loggedAt: string, calories = 200): FoodLogEntry {
  return {
    id: 1,
    user_id: 1,
    food_id: 1,
    quantity,
    meal_type: mealType,
    logged_at: loggedAt,
    notes: "",
    food: {
      id: 1,
      upc_code: null,
      name,
      brand: "Home",
      ingredients: "",
      nutrition_data: { calories_per_100g: calories },
      created_at: "2026-01-01T00:00:00.000Z",
    },
  };
}

const LOGS = [
  entry("Chicken Salad", 150, "lunch", "2026-01-14T12:00:00.000Z"),
  entry("Brown Rice", 100, "dinner", "2026-01-14T19:00:00.000Z"),
  entry("Scrambled Eggs", 100, "breakfast", "2026-01-15T08:00:00.000Z"),
  entry("Cola", 330, "snack", "2026-01-15T15:00:00.000Z", 42),
];

describe("toRecentFoods", () => {
  it("summarizes each log", () => {
    expect(toRecentFoods(LOGS.slice(0, 1))).toEqual([
      {
        name: "Chicken Salad",
        brand: "Home",
        quantity: 150,
        calories: 300,
        meal_type: "lunch",
        date: "2026-01-14",
      },
    ]);
  });
});

describe("analyzeEatingPatterns", () => {
  it("counts meals, categories and days", () => {
    const patterns = analyzeEatingPatterns(LOGS);
    expect(patterns.meal_patterns).toEqual({
      lunch: { count: 1, calories: 300 },
      dinner: { count: 1, calories: 200 },
      breakfast: { count: 1, calories: 200 },
      snack: { count: 1, calories: 138.6 },
    });
    // "Chicken Salad" lands in the first matching category only.
    expect(patterns.food_categories).toEqual({ fruits_vegetables: 1, grains: 1, proteins: 1 });
    expect(patterns.days_tracked).toBe(2);
    expect(patterns.total_calories).toBe(838.6);
    expect(patterns.avg_daily_calories).toBe(419.3);
  });

  it("handles no logs", () => {
    expect(analyzeEatingPatterns([])).toEqual({
      meal_patterns: {},
      food_categories: {},
      days_tracked: 0,
      total_calories: 0,
      avg_daily_calories: 0,
    });
  });
});

describe("RecommendationService", () => {
  it("reports availability", () => {
    expect(new RecommendationService(null, silent).available).toBe(false);
    expect(new RecommendationService(new FakeAiProvider(), silent).available).toBe(true);
  });

  it("asks for a meal recommendation with the user's profile", async () => {
    const provider = new FakeAiProvider("Grilled salmon with quinoa.");
    const service = new RecommendationService(provider, silent);

    const text = await service.getMealRecommendation(LOGS, ["gluten-free"], 1800, "Japanese", "snack");

    expect(text).toBe("Grilled salmon with quinoa.");
    const request = provider.requests[0];
    expect(request?.maxTokens).toBe(300);
    expect(request?.temperature).toBe(0.7);
    expect(request?.prompt).toContain("provide a personalized snack recommendation.");
    expect(request?.prompt).toContain("- Daily calorie goal: 1800 calories");
    expect(request?.prompt).toContain("- Dietary restrictions: gluten-free");
    expect(request?.prompt).toContain("- Preferred cuisine: Japanese");
    expect(request?.prompt).toContain('"name": "Chicken Salad"');
  });

  it("says so when no provider is configured", async () => {
    const service = new RecommendationService(null, silent);
    expect(await service.getMealRecommendation([], [], 2000, null)).toBe(
      "AI recommendations are not available. Please configure an AI provider API key.",
    );
    expect(await service.getFoodAlternatives("chips", [])).toBe(
      "Food alternatives are not available. Please configure an AI provider API key.",
    );
  });

  it("falls back to fixed advice when the provider fails", async () => {
    const provider = new FakeAiProvider();
    provider.failWith = new Error("rate limited");
    const service = new RecommendationService(provider, silent);

    expect(await service.getMealRecommendation([], [], 1800, null)).toContain("to meet your 1800 calorie goal.");
    expect(await service.getFoodAlternatives("chips", [])).toMatch(/^Consider healthier alternatives to chips /);
    expect(await service.analyzeDailyNutrition(LOGS.slice(2), 2000)).toBe(
      "Your daily intake was 339 calories. Keep tracking your meals and aim for balanced nutrition throughout the day.",
    );
  });

  it("builds the insights and daily prompts", async () => {
    const provider = new FakeAiProvider("Looks balanced.");
    const service = new RecommendationService(provider, silent);

    await service.getHealthInsights(LOGS, { calorie_goal: 2000, dietary_restrictions: [] });
    await service.analyzeDailyNutrition(LOGS.slice(2), 2000);

    const [insights, daily] = provider.requests;
    expect(insights?.maxTokens).toBe(400);
    expect(insights?.prompt).toContain("EATING PATTERNS (last 2 days):");
    expect(insights?.prompt).toContain("- Average daily calories: 419");
    expect(insights?.prompt).toContain("- Dietary restrictions: None");
    expect(daily?.maxTokens).toBe(150);
    expect(daily?.prompt).toContain("- Total calories: 339");
  });
});
