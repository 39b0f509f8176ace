import { type AppContext, type AuthedHandler, withUser } from "./context.js";
import { HttpError } from "./errors.js";
import {
  type HttpRoute,
  byMethod,
  createBodyValidator,
  jsonResponse,
  parseIntParam,
  readJsonBody,
} from "./http.js";
import {
  addDays,
  buildAnalytics,
  buildDashboard,
  buildMealPlanner,
  buildNutritionView,
  dateKey,
  isDateKey,
  weekStart,
} from "./nutrition.js";
import { PlanBody } from "./schemas.js";

const validatePlan = createBodyValidator(PlanBody);

const DASHBOARD_RECOMMENDATIONS = 3;
const ANALYTICS_DAYS = 30;

export function createDashboardRoutes(app: AppContext): HttpRoute[] {
  const authed = (fn: AuthedHandler) => withUser(app, fn);

  const main = authed(async (_req, res, _ctx, user) => {
    const today = dateKey(app.now());
    jsonResponse(
      res,
      200,
      buildDashboard({
        today,
        todayLogs: app.db.getLogsByDateRange(user.id, today, today),
        weekLogs: app.db.getLogsByDateRange(user.id, weekStart(today), today),
        calorieGoal: user.daily_calorie_goal,
        recommendations: app.db.listUnusedRecommendations(user.id, DASHBOARD_RECOMMENDATIONS),
      }),
    );
  });

  const nutrition = authed(async (_req, res, ctx, user) => {
    const days = parseIntParam(ctx.url, "days", { fallback: 7, min: 1, max: 365 });
    const end = dateKey(app.now());
    const start = addDays(end, -(days - 1));
    const logs = app.db.getLogsByDateRange(user.id, start, end);
    jsonResponse(res, 200, buildNutritionView(logs, start, end));
  });

  // Missing or malformed dates fall back to today.
  const planDate = (raw: string | null): string =>
    raw && isDateKey(raw) ? raw : dateKey(app.now());

  const getPlanner = authed(async (_req, res, ctx, user) => {
    const date = planDate(ctx.url.searchParams.get("date"));
    jsonResponse(
      res,
      200,
      buildMealPlanner(
        date,
        app.db.getPlan(user.id, date),
        app.db.getLogsByDateRange(user.id, date, date),
      ),
    );
  });

  const savePlan = authed(async (req, res, ctx, user) => {
    const raw = ctx.url.searchParams.get("date");
    if (raw && !isDateKey(raw)) {
      throw new HttpError(400, "date must be YYYY-MM-DD");
    }
    const body = validatePlan(await readJsonBody(req));
    const plan = app.db.upsertPlan(user.id, planDate(raw), body);
    jsonResponse(res, 200, { plan });
  });

  const recommendations = authed(async (_req, res, _ctx, user) => {
    jsonResponse(res, 200, { recommendations: app.db.listVisibleRecommendations(user.id) });
  });

  const analytics = authed(async (_req, res, _ctx, user) => {
    const end = dateKey(app.now());
    const logs = app.db.getLogsByDateRange(user.id, addDays(end, -ANALYTICS_DAYS), end);
    jsonResponse(res, 200, buildAnalytics(logs, user.daily_calorie_goal));
  });

  return [
    { path: "/dashboard", handler: byMethod({ GET: main }) },
    { path: "/dashboard/nutrition", handler: byMethod({ GET: nutrition }) },
    { path: "/dashboard/meal-planner", handler: byMethod({ GET: getPlanner, PUT: savePlan }) },
    { path: "/dashboard/ai-recommendations", handler: byMethod({ GET: recommendations }) },
    { path: "/dashboard/analytics", handler: byMethod({ GET: analytics }) },
  ];
}
