import type { RecommendationType } from "./types.js";

export type RecentFood = {
  name: string;
  brand: string;
  quantity: number;
  calories: number;
  meal_type: string;
  date: string;
};

function listOrNone(items: string[]): string {
  return items.length > 0 ? items.join(", ") : "None";
}

// ── Meal recommendation ─────────────────────────────────────────────────────

export function buildMealRecommendationPrompt(params: {
  type: RecommendationType;
  calorieGoal: number;
  restrictions: string[];
  cuisine: string | null;
  recentFoods: RecentFood[];
}): string {
  return [
    "You are a helpful nutrition assistant. Based on the following information about a user's recent food intake,",
    `provide a personalized ${params.type} recommendation.`,
    "",
    "USER PROFILE:",
    `- Daily calorie goal: ${params.calorieGoal} calories`,
    `- Dietary restrictions: ${listOrNone(params.restrictions)}`,
    `- Preferred cuisine: ${params.cuisine || "No preference"}`,
    "",
    "RECENT FOOD INTAKE (last 10 items):",
    params.recentFoods.length > 0
      ? JSON.stringify(params.recentFoods, null, 2)
      : "No recent food logs",
    "",
    "GUIDELINES:",
    "1. Consider the user's calorie goal and recent intake",
    "2. Respect dietary restrictions",
    "3. Consider preferred cuisine if specified",
    "4. Provide specific, actionable recommendations",
    "5. Include estimated calorie information",
    "6. Keep recommendations realistic and achievable",
    "7. Focus on nutritional balance",
    "",
    `Please provide a ${params.type} recommendation in 2-3 sentences. Be specific about food suggestions`,
    "and include brief reasoning for your recommendation.",
  ].join("\n");
}

// ── Health insights ─────────────────────────────────────────────────────────

export type EatingPatterns = {
  meal_patterns: Record<string, { count: number; calories: number }>;
  food_categories: Record<string, number>;
  days_tracked: number;
  total_calories: number;
  avg_daily_calories: number;
};

export function buildHealthInsightsPrompt(params: {
  calorieGoal: number;
  restrictions: string[];
  patterns: EatingPatterns;
}): string {
  const p = params.patterns;
  return [
    "You are a nutrition expert analyzing a user's eating patterns. Provide helpful health insights based on the following data:",
    "",
    "USER PROFILE:",
    `- Daily calorie goal: ${params.calorieGoal} calories`,
    `- Dietary restrictions: ${listOrNone(params.restrictions)}`,
    "",
    `EATING PATTERNS (last ${p.days_tracked} days):`,
    `- Average daily calories: ${Math.round(p.avg_daily_calories)}`,
    `- Total calories tracked: ${Math.round(p.total_calories)}`,
    `- Meal patterns: ${JSON.stringify(p.meal_patterns, null, 2)}`,
    `- Food categories: ${JSON.stringify(p.food_categories, null, 2)}`,
    "",
    "Please provide 3-4 specific, actionable health insights based on this data. Focus on:",
    "1. Calorie balance relative to goals",
    "2. Meal timing and frequency",
    "3. Food variety and nutritional balance",
    "4. Specific recommendations for improvement",
    "",
    "Keep insights positive and encouraging while being honest about areas for improvement.",
  ].join("\n");
}

// ── Alternatives ────────────────────────────────────────────────────────────

export function buildFoodAlternativesPrompt(foodName: string, restrictions: string[]): string {
  return [
    `You are a nutrition expert. A user is looking for healthier alternatives to "${foodName}".`,
    "",
    "USER CONSTRAINTS:",
    `- Dietary restrictions: ${listOrNone(restrictions)}`,
    "",
    "Please suggest 3-4 healthier alternatives that:",
    "1. Are similar in taste or texture",
    "2. Are generally lower in calories or higher in nutritional value",
    "3. Respect the user's dietary restrictions",
    "4. Are commonly available",
    "",
    "Format your response as a simple list with brief explanations for each alternative.",
  ].join("\n");
}

// ── Daily analysis ──────────────────────────────────────────────────────────

export function buildDailyAnalysisPrompt(params: {
  totalCalories: number;
  calorieGoal: number;
  meals: Record<string, Array<{ food: string; calories: number; quantity: number }>>;
}): string {
  return [
    "You are a nutrition expert analyzing a user's daily food intake. Provide a brief analysis and suggestions.",
    "",
    "DAILY INTAKE:",
    `- Total calories: ${Math.round(params.totalCalories)}`,
    `- Calorie goal: ${params.calorieGoal}`,
    `- Meals: ${JSON.stringify(params.meals, null, 2)}`,
    "",
    "Please provide:",
    "1. A brief assessment of the day's nutrition",
    "2. What went well",
    "3. One specific suggestion for improvement",
    "4. Keep it encouraging and under 100 words",
  ].join("\n");
}

// ── Barcode OCR ─────────────────────────────────────────────────────────────

export const BARCODE_OCR_PROMPT = [
  "You are a barcode reading function.",
  "Look at the image and find the UPC or EAN barcode.",
  "Return ONLY the digits printed under the barcode, with no spaces or commentary.",
  "If there is no readable barcode in the image, return exactly: NONE",
].join("\n");
