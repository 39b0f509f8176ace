import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { AnalyticsView, DashboardView, MealPlannerView } from "./nutrition.js";
import { type TestServer, authHeader, foodDraft, makeTestServer, request } from "./test-utils.js";
import type { AIRecommendation, DailyPlan, MealType } from "./types.js";

let server: TestServer;
let userId: number;
let foodId: number;

function call(method: string, url: string, body?: unknown) {
  return request(server.host, method, url, { body, headers: authHeader() });
}

function log(loggedAt: string, quantity: number, mealType: MealType = "lunch") {
  return server.db.insertLog({ userId, foodId, quantity, mealType, loggedAt });
}

beforeEach(async () => {
  server = makeTestServer();
  // First authenticated call creates the user.
  await call("GET", "/auth/profile");
  const user = server.db.getUserByAuth0Id("auth0|user-1");
  if (!user) {
    throw new Error("test user was not created");
  }
  userId = user.id;
  foodId = server.db.insertFood(foodDraft("Lentil Stew", 100)).id;
});

afterEach(() => {
  server.cleanup();
});

describe("GET /dashboard", () => {
  it("shows today, this week and fresh recommendations", async () => {
    log("2026-01-11T12:00:00.000Z", 500);
    log("2026-01-12T12:00:00.000Z", 300);
    log("2026-01-15T08:00:00.000Z", 150, "breakfast");
    log("2026-01-15T12:30:00.000Z", 250);
    const recs = ["A", "B", "C", "D"].map((text) =>
      server.db.insertRecommendation({ userId, type: "meal", text, context: {} }),
    );
    server.db.markRecommendationUsed(recs[3]?.id ?? 0, userId);

    const res = await call("GET", "/dashboard");
    const body = res.json<DashboardView>();

    expect(body.today).toBe("2026-01-15");
    expect(body.today_logs.map((l) => l.quantity)).toEqual([150, 250]);
    expect(body.total_calories).toBe(400);
    expect(body.calorie_goal).toBe(2000);
    expect(body.week_summary).toEqual({
      "2026-01-12": { calories: 300, meals: 1 },
      "2026-01-15": { calories: 400, meals: 2 },
    });
    expect(body.recent_recommendations.map((r) => r.recommendation_text)).toEqual(["C", "B", "A"]);
  });
});

describe("GET /dashboard/nutrition", () => {
  it("reports daily nutrients for the window", async () => {
    log("2026-01-08T12:00:00.000Z", 100);
    log("2026-01-09T12:00:00.000Z", 200);

    const res = await call("GET", "/dashboard/nutrition?days=7");
    expect(res.json()).toEqual({
      start_date: "2026-01-09",
      end_date: "2026-01-15",
      days: 7,
      nutrition_data: {
        "2026-01-09": { calories: 200, protein: 20, carbs: 40, fat: 10, fiber: 0, sugar: 0, sodium: 0 },
      },
    });
  });
});

describe("/dashboard/meal-planner", () => {
  it("shows the plan and logged meals for a day", async () => {
    log("2026-01-15T08:00:00.000Z", 150, "breakfast");

    const res = await call("GET", "/dashboard/meal-planner?date=not-a-date");
    const body = res.json<MealPlannerView>();
    expect(body.plan_date).toBe("2026-01-15");
    expect(body.existing_plan).toBeNull();
    expect(body.logged_by_meal.breakfast?.map((l) => l.quantity)).toEqual([150]);
    expect(body.meal_types).toEqual(["breakfast", "lunch", "dinner", "snack"]);
  });

  it("saves a plan", async () => {
    const saved = await call("PUT", "/dashboard/meal-planner?date=2026-01-20", {
      meals_planned: { dinner: ["Lentil Stew"] },
      nutritional_goals: { calories: 1900 },
    });
    expect(saved.statusCode).toBe(200);
    expect(saved.json<{ plan: DailyPlan }>().plan).toMatchObject({
      date: "2026-01-20",
      meals_planned: { dinner: ["Lentil Stew"] },
      nutritional_goals: { calories: 1900 },
    });

    const res = await call("GET", "/dashboard/meal-planner?date=2026-01-20");
    expect(res.json<MealPlannerView>().existing_plan?.meals_planned).toEqual({ dinner: ["Lentil Stew"] });

    const bad = await call("PUT", "/dashboard/meal-planner?date=2026-13-01", {});
    expect(bad.statusCode).toBe(400);
  });
});

describe("GET /dashboard/ai-recommendations", () => {
  it("hides thumbs-down recommendations", async () => {
    const liked = server.db.insertRecommendation({ userId, type: "meal", text: "liked", context: {} });
    const disliked = server.db.insertRecommendation({ userId, type: "snack", text: "disliked", context: {} });
    server.db.rateRecommendation(liked.id, userId, 1);
    server.db.rateRecommendation(disliked.id, userId, -1);

    const res = await call("GET", "/dashboard/ai-recommendations");
    expect(
      res.json<{ recommendations: AIRecommendation[] }>().recommendations.map((r) => r.recommendation_text),
    ).toEqual(["liked"]);
  });
});

describe("GET /dashboard/analytics", () => {
  it("charts the last 30 days", async () => {
    log("2025-12-15T12:00:00.000Z", 900);
    log("2025-12-16T12:00:00.000Z", 200, "dinner");
    log("2026-01-15T08:00:00.000Z", 100, "breakfast");
    log("2026-01-15T12:00:00.000Z", 300);

    const res = await call("GET", "/dashboard/analytics");
    expect(res.json<AnalyticsView>()).toEqual({
      meal_patterns: { dinner: 1, breakfast: 1, lunch: 1 },
      avg_daily_calories: 300,
      total_days: 2,
      calorie_goal: 2000,
      chart_data: {
        dates: ["2025-12-16", "2026-01-15"],
        calories: [200, 400],
        goal: [2000, 2000],
      },
    });
  });
});
