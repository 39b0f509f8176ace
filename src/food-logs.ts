import type { Static } from "@sinclair/typebox";
import type { AppContext } from "./context.js";
import { HttpError } from "./errors.js";
import { createBodyValidator } from "./http.js";
import { toLogView } from "./nutrition.js";
import { sanitizeText } from "./sanitize.js";
import { LogFoodBody, UpdateLogBody } from "./schemas.js";
import type { FoodLogEntry, FoodLogView, User } from "./types.js";

export const validateLogFood = createBodyValidator(LogFoodBody);
export const validateUpdateLog = createBodyValidator(UpdateLogBody);

/** Shared by the API and barcode flows. */
export function logFood(
  app: AppContext,
  user: User,
  body: Static<typeof LogFoodBody>,
): { log: FoodLogView; message: string } {
  const food = app.db.getFood(body.food_id);
  if (!food) {
    throw new HttpError(404, "Food item not found");
  }
  const entry = app.db.insertLog({
    userId: user.id,
    foodId: food.id,
    quantity: body.quantity,
    mealType: body.meal_type,
    notes: sanitizeText(body.notes ?? ""),
    loggedAt: app.now().toISOString(),
  });
  app.log.info("Food logged", { userId: user.id, logId: entry.id, foodId: food.id });
  return {
    log: toLogView(entry),
    message: `Successfully logged ${body.quantity}g of ${food.name}`,
  };
}

/** Loads a log the user owns: 404 when missing, 403 when it belongs to someone else. */
export function requireOwnLog(app: AppContext, user: User, logId: number, action: string): FoodLogEntry {
  const entry = app.db.getLog(logId);
  if (!entry) {
    throw new HttpError(404, "Food log not found");
  }
  if (entry.user_id !== user.id) {
    throw new HttpError(403, `You can only ${action} your own food logs`);
  }
  return entry;
}
