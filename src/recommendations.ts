import type { AiProvider, CompletionRequest } from "./ai-provider.js";
import { errorMessage } from "./errors.js";
import { type Logger, createLogger } from "./logger.js";
import { logCalories, logDateKey, round1 } from "./nutrition.js";
import {
  type EatingPatterns,
  type RecentFood,
  buildDailyAnalysisPrompt,
  buildFoodAlternativesPrompt,
  buildHealthInsightsPrompt,
  buildMealRecommendationPrompt,
} from "./prompts.js";
import type { FoodLogEntry, RecommendationType } from "./types.js";

const FOOD_CATEGORIES: Array<[category: string, keywords: string[]]> = [
  ["fruits_vegetables", ["vegetable", "fruit", "salad", "spinach", "broccoli"]],
  ["proteins", ["chicken", "fish", "beef", "protein", "egg"]],
  ["grains", ["bread", "rice", "pasta", "grain"]],
];

export function toRecentFoods(logs: FoodLogEntry[]): RecentFood[] {
  return logs.map((log) => ({
    name: log.food.name,
    brand: log.food.brand,
    quantity: log.quantity,
    calories: round1(logCalories(log)),
    meal_type: log.meal_type,
    date: logDateKey(log),
  }));
}

export function analyzeEatingPatterns(logs: FoodLogEntry[]): EatingPatterns {
  const mealPatterns: EatingPatterns["meal_patterns"] = {};
  const categories: Record<string, number> = {};
  const days = new Set<string>();
  let total = 0;

  for (const log of logs) {
    const calories = logCalories(log);
    const pattern = (mealPatterns[log.meal_type] ??= { count: 0, calories: 0 });
    pattern.count += 1;
    pattern.calories = round1(pattern.calories + calories);
    total += calories;
    days.add(logDateKey(log));

    // First matching category wins.
    const name = log.food.name.toLowerCase();
    const match = FOOD_CATEGORIES.find(([, words]) => words.some((w) => name.includes(w)));
    if (match) {
      categories[match[0]] = (categories[match[0]] ?? 0) + 1;
    }
  }

  return {
    meal_patterns: mealPatterns,
    food_categories: categories,
    days_tracked: days.size,
    total_calories: round1(total),
    avg_daily_calories: days.size > 0 ? round1(total / days.size) : 0,
  };
}

/** Prompted calls to the configured AI provider, with fixed text when it is missing or failing. */
export class RecommendationService {
  private readonly log: Logger;

  constructor(
    private readonly provider: AiProvider | null,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger("recommendations");
  }

  get available(): boolean {
    return this.provider !== null;
  }

  async getMealRecommendation(
    recentLogs: FoodLogEntry[],
    restrictions: string[],
    calorieGoal: number,
    cuisine: string | null,
    type: RecommendationType = "meal",
  ): Promise<string> {
    const prompt = buildMealRecommendationPrompt({
      type,
      calorieGoal,
      restrictions,
      cuisine,
      recentFoods: toRecentFoods(recentLogs),
    });
    return this.run("meal recommendation", { prompt, maxTokens: 300, temperature: 0.7 }, {
      unavailable: "AI recommendations are not available. Please configure an AI provider API key.",
      fallback:
        "I'd be happy to help with meal recommendations, but I'm having trouble connecting to the AI service right now. " +
        `Consider balancing your meals with lean proteins, whole grains, and plenty of vegetables to meet your ${calorieGoal} calorie goal.`,
    });
  }

  async getHealthInsights(
    logs: FoodLogEntry[],
    prefs: { calorie_goal: number; dietary_restrictions: string[] },
  ): Promise<string> {
    const prompt = buildHealthInsightsPrompt({
      calorieGoal: prefs.calorie_goal,
      restrictions: prefs.dietary_restrictions,
      patterns: analyzeEatingPatterns(logs),
    });
    return this.run("health insights", { prompt, maxTokens: 400, temperature: 0.6 }, {
      unavailable: "Health insights are not available. Please configure an AI provider API key.",
      fallback:
        "I'm having trouble analyzing your eating patterns right now. Keep tracking your meals and aim for a balanced diet " +
        "with plenty of fruits, vegetables, lean proteins, and whole grains.",
    });
  }

  async getFoodAlternatives(foodName: string, restrictions: string[]): Promise<string> {
    const prompt = buildFoodAlternativesPrompt(foodName, restrictions);
    return this.run("food alternatives", { prompt, maxTokens: 250, temperature: 0.7 }, {
      unavailable: "Food alternatives are not available. Please configure an AI provider API key.",
      fallback:
        `Consider healthier alternatives to ${foodName} such as options that are baked instead of fried, ` +
        "have less added sugar, or include more whole grains and vegetables.",
    });
  }

  async analyzeDailyNutrition(dailyLogs: FoodLogEntry[], calorieGoal: number): Promise<string> {
    const total = dailyLogs.reduce((sum, log) => sum + logCalories(log), 0);
    const meals: Record<string, Array<{ food: string; calories: number; quantity: number }>> = {};
    for (const log of dailyLogs) {
      (meals[log.meal_type] ??= []).push({
        food: log.food.name,
        calories: round1(logCalories(log)),
        quantity: log.quantity,
      });
    }
    const prompt = buildDailyAnalysisPrompt({ totalCalories: total, calorieGoal, meals });
    return this.run("daily analysis", { prompt, maxTokens: 150, temperature: 0.6 }, {
      unavailable: "Nutrition analysis is not available. Please configure an AI provider API key.",
      fallback:
        `Your daily intake was ${Math.round(total)} calories. ` +
        "Keep tracking your meals and aim for balanced nutrition throughout the day.",
    });
  }

  private async run(
    kind: string,
    request: CompletionRequest,
    messages: { unavailable: string; fallback: string },
  ): Promise<string> {
    if (!this.provider) {
      return messages.unavailable;
    }
    try {
      return await this.provider.complete(request);
    } catch (err) {
      this.log.error(`AI ${kind} failed`, { provider: this.provider.name, error: errorMessage(err) });
      return messages.fallback;
    }
  }
}
