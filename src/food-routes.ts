import { type AppContext, type AuthedHandler, withUser } from "./context.js";
import { HttpError } from "./errors.js";
import { requireOwnLog, validateUpdateLog } from "./food-logs.js";
import {
  type HttpRoute,
  byMethod,
  createBodyValidator,
  jsonResponse,
  parseIdParam,
  parseIntParam,
  readJsonBody,
} from "./http.js";
import { toLogView } from "./nutrition.js";
import { sanitizeText } from "./sanitize.js";
import { CustomFoodBody } from "./schemas.js";

const validateCustomFood = createBodyValidator(CustomFoodBody);

const SEARCH_LIMIT = 20;

export function createFoodRoutes(app: AppContext): HttpRoute[] {
  const authed = (fn: AuthedHandler) => withUser(app, fn);

  const search = authed(async (_req, res, ctx) => {
    const query = sanitizeText(ctx.url.searchParams.get("q") ?? "");
    const upc = (ctx.url.searchParams.get("upc") ?? "").trim();

    if (upc) {
      const food = await app.catalog.lookupByUpc(upc);
      jsonResponse(res, 200, { query, upc, foods: food ? [food] : [] });
      return;
    }
    const foods = query ? await app.catalog.searchByName(query, SEARCH_LIMIT) : [];
    jsonResponse(res, 200, { query, upc, foods });
  });

  const createCustom = authed(async (req, res, _ctx, user) => {
    const body = validateCustomFood(await readJsonBody(req));
    const name = sanitizeText(body.name);
    if (!name) {
      throw new HttpError(400, "Food name is required");
    }
    const food = app.catalog.createCustomFood({
      name,
      brand: sanitizeText(body.brand ?? ""),
      ingredients: sanitizeText(body.ingredients ?? ""),
      calories_per_100g: body.calories,
      protein_per_100g: body.protein,
      carbs_per_100g: body.carbs,
      fat_per_100g: body.fat,
      fiber_per_100g: body.fiber,
      sugar_per_100g: body.sugar,
      sodium_per_100g: body.sodium,
    });
    app.log.info("Custom food added", { userId: user.id, foodId: food.id });
    jsonResponse(res, 201, { food, message: `Custom food "${food.name}" added successfully` });
  });

  const history = authed(async (_req, res, ctx, user) => {
    const page = parseIntParam(ctx.url, "page", { fallback: 1, min: 1, max: 100_000 });
    const perPage = app.config.itemsPerPage;
    const { logs, total } = app.db.getLogsPage(user.id, page, perPage);
    const pages = Math.max(1, Math.ceil(total / perPage));
    jsonResponse(res, 200, {
      logs: logs.map(toLogView),
      pagination: { page, per_page: perPage, total, pages, has_next: page < pages, has_prev: page > 1 },
    });
  });

  const updateLog = authed(async (req, res, ctx, user) => {
    const entry = requireOwnLog(app, user, parseIdParam(ctx), "edit");
    const body = validateUpdateLog(await readJsonBody(req));
    const updated = app.db.updateLog(entry.id, {
      quantity: body.quantity,
      meal_type: body.meal_type,
      notes: body.notes === undefined ? undefined : sanitizeText(body.notes),
    });
    if (!updated) {
      throw new HttpError(404, "Food log not found");
    }
    jsonResponse(res, 200, { log: toLogView(updated), message: "Food log updated successfully" });
  });

  const deleteLog = authed(async (_req, res, ctx, user) => {
    const entry = requireOwnLog(app, user, parseIdParam(ctx), "delete");
    app.db.deleteLog(entry.id);
    jsonResponse(res, 200, { deleted: true, log: toLogView(entry) });
  });

  return [
    { path: "/food/search", handler: byMethod({ GET: search }) },
    { path: "/food/custom", handler: byMethod({ POST: createCustom }) },
    { path: "/food/history", handler: byMethod({ GET: history }) },
    { path: "/food/logs/:id", handler: byMethod({ PUT: updateLog, DELETE: deleteLog }) },
  ];
}
