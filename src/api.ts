import { type AppContext, type AuthedHandler, withUser } from "./context.js";
import { HttpError } from "./errors.js";
import { logFood, validateLogFood } from "./food-logs.js";
import {
  type HttpRoute,
  byMethod,
  createBodyValidator,
  jsonResponse,
  parseIdParam,
  parseIntParam,
  readJsonBody,
} from "./http.js";
import { addDays, buildNutritionSummary, dateKey, isDateKey } from "./nutrition.js";
import { sanitizeList, sanitizeText } from "./sanitize.js";
import {
  AlternativesBody,
  InsightsBody,
  PreferencesBody,
  RateBody,
  RecommendBody,
} from "./schemas.js";
import type { FoodLogEntry, RecommendationContext, User } from "./types.js";

const validateRecommend = createBodyValidator(RecommendBody);
const validateRate = createBodyValidator(RateBody);
const validateInsights = createBodyValidator(InsightsBody);
const validateAlternatives = createBodyValidator(AlternativesBody);
export const validatePreferences = createBodyValidator(PreferencesBody);

const NAME_SEARCH_LIMIT = 10;
const RECENT_LOG_LIMIT = 10;

export function recommendationContext(user: User, recentLogs: FoodLogEntry[]): RecommendationContext {
  return {
    recent_foods: recentLogs.slice(0, 5).map((log) => log.food.name),
    dietary_restrictions: user.dietary_restrictions,
    calorie_goal: user.daily_calorie_goal,
    preferred_cuisine: user.preferred_cuisine,
  };
}

export function preferencesOf(user: User) {
  return {
    daily_calorie_goal: user.daily_calorie_goal,
    preferred_cuisine: user.preferred_cuisine,
    dietary_restrictions: user.dietary_restrictions,
  };
}

// ── Route handlers ──────────────────────────────────────────────────────────

export function createApiRoutes(app: AppContext): HttpRoute[] {
  const authed = (fn: AuthedHandler) => withUser(app, fn);

  // ── Food ────────────────────────────────────────────────────────────────

  const searchUpc = authed(async (_req, res, ctx) => {
    const upc = ctx.params.upc ?? "";
    const food = await app.catalog.lookupByUpc(upc);
    if (!food) {
      throw new HttpError(404, "Food not found for this UPC code");
    }
    jsonResponse(res, 200, { food });
  });

  const searchName = authed(async (_req, res, ctx) => {
    const query = sanitizeText(ctx.url.searchParams.get("q") ?? "");
    if (!query) {
      throw new HttpError(400, "Search query is required");
    }
    const foods = await app.catalog.searchByName(query, NAME_SEARCH_LIMIT);
    jsonResponse(res, 200, { foods });
  });

  const logFoodHandler = authed(async (req, res, _ctx, user) => {
    const body = validateLogFood(await readJsonBody(req));
    const result = logFood(app, user, body);
    jsonResponse(res, 201, result);
  });

  // ── AI ──────────────────────────────────────────────────────────────────

  const recommend = authed(async (req, res, _ctx, user) => {
    const body = validateRecommend(await readJsonBody(req));
    const type = body.type ?? "meal";
    const recentLogs = app.db.getRecentLogs(user.id, RECENT_LOG_LIMIT);
    const text = await app.recommendations.getMealRecommendation(
      recentLogs,
      user.dietary_restrictions,
      user.daily_calorie_goal,
      user.preferred_cuisine,
      type,
    );
    const recommendation = app.db.insertRecommendation({
      userId: user.id,
      type,
      text,
      context: recommendationContext(user, recentLogs),
    });
    jsonResponse(res, 201, { recommendation });
  });

  const rate = authed(async (req, res, ctx, user) => {
    const id = parseIdParam(ctx);
    const body = validateRate(await readJsonBody(req));
    const recommendation = app.db.rateRecommendation(id, user.id, body.rating);
    if (!recommendation) {
      throw new HttpError(404, "Recommendation not found");
    }
    jsonResponse(res, 200, { recommendation, message: "Rating saved successfully" });
  });

  const markUsed = authed(async (_req, res, ctx, user) => {
    const recommendation = app.db.markRecommendationUsed(parseIdParam(ctx), user.id);
    if (!recommendation) {
      throw new HttpError(404, "Recommendation not found");
    }
    jsonResponse(res, 200, { recommendation });
  });

  const insights = authed(async (req, res, _ctx, user) => {
    const body = validateInsights(await readJsonBody(req));
    const days = body.days ?? 30;
    const today = dateKey(app.now());
    const logs = app.db.getLogsByDateRange(user.id, addDays(today, -(days - 1)), today);
    const text = await app.recommendations.getHealthInsights(logs, {
      calorie_goal: user.daily_calorie_goal,
      dietary_restrictions: user.dietary_restrictions,
    });
    jsonResponse(res, 200, { insights: text, days, logs_analyzed: logs.length });
  });

  const alternatives = authed(async (req, res, _ctx, user) => {
    const body = validateAlternatives(await readJsonBody(req));
    const foodName = sanitizeText(body.food_name);
    if (!foodName) {
      throw new HttpError(400, "food_name is required");
    }
    const text = await app.recommendations.getFoodAlternatives(foodName, user.dietary_restrictions);
    const recentLogs = app.db.getRecentLogs(user.id, RECENT_LOG_LIMIT);
    const recommendation = app.db.insertRecommendation({
      userId: user.id,
      type: "alternative",
      text,
      context: { ...recommendationContext(user, recentLogs), food_name: foodName },
    });
    jsonResponse(res, 201, { recommendation });
  });

  const dailyAnalysis = authed(async (_req, res, ctx, user) => {
    const requested = ctx.url.searchParams.get("date");
    if (requested && !isDateKey(requested)) {
      throw new HttpError(400, "date must be YYYY-MM-DD");
    }
    const date = requested ?? dateKey(app.now());
    const logs = app.db.getLogsByDateRange(user.id, date, date);
    const analysis = await app.recommendations.analyzeDailyNutrition(logs, user.daily_calorie_goal);
    jsonResponse(res, 200, { date, analysis, items: logs.length });
  });

  // ── Nutrition & preferences ─────────────────────────────────────────────

  const nutritionSummary = authed(async (_req, res, ctx, user) => {
    const days = parseIntParam(ctx.url, "days", { fallback: 7, min: 1, max: 365 });
    const today = dateKey(app.now());
    const logs = app.db.getLogsByDateRange(user.id, addDays(today, -(days - 1)), today);
    jsonResponse(res, 200, {
      summary: buildNutritionSummary(logs, days, user.daily_calorie_goal),
    });
  });

  const getPreferences = authed(async (_req, res, _ctx, user) => {
    jsonResponse(res, 200, { preferences: preferencesOf(user) });
  });

  const updatePreferences = authed(async (req, res, _ctx, user) => {
    const body = validatePreferences(await readJsonBody(req));
    const updated = app.db.updatePreferences(user.id, {
      daily_calorie_goal: body.daily_calorie_goal,
      preferred_cuisine:
        body.preferred_cuisine === undefined || body.preferred_cuisine === null
          ? body.preferred_cuisine
          : sanitizeText(body.preferred_cuisine),
      dietary_restrictions: body.dietary_restrictions
        ? sanitizeList(body.dietary_restrictions)
        : undefined,
    });
    jsonResponse(res, 200, {
      preferences: preferencesOf(updated),
      message: "Preferences updated successfully",
    });
  });

  return [
    { path: "/api/food/search-upc/:upc", handler: byMethod({ GET: searchUpc }) },
    { path: "/api/food/search-name", handler: byMethod({ GET: searchName }) },
    { path: "/api/food/log", handler: byMethod({ POST: logFoodHandler }) },
    { path: "/api/ai/recommend", handler: byMethod({ POST: recommend }) },
    { path: "/api/ai/recommendation/:id/rate", handler: byMethod({ POST: rate }) },
    { path: "/api/ai/recommendation/:id/use", handler: byMethod({ POST: markUsed }) },
    { path: "/api/ai/insights", handler: byMethod({ POST: insights }) },
    { path: "/api/ai/alternatives", handler: byMethod({ POST: alternatives }) },
    { path: "/api/ai/daily-analysis", handler: byMethod({ GET: dailyAnalysis }) },
    { path: "/api/nutrition/summary", handler: byMethod({ GET: nutritionSummary }) },
    {
      path: "/api/user/preferences",
      handler: byMethod({ GET: getPreferences, POST: updatePreferences, PUT: updatePreferences }),
    },
  ];
}
