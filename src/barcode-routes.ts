import { type AppContext, type AuthedHandler, withUser } from "./context.js";
import { logFood, validateLogFood } from "./food-logs.js";
import { type HttpRoute, byMethod, createBodyValidator, jsonResponse, readJsonBody } from "./http.js";
import { ScanBody } from "./schemas.js";

const validateScan = createBodyValidator(ScanBody);

export function createBarcodeRoutes(app: AppContext): HttpRoute[] {
  const authed = (fn: AuthedHandler) => withUser(app, fn);

  const scan = authed(async (req, res, _ctx, user) => {
    const body = validateScan(await readJsonBody(req, app.config.maxContentLength));
    const { barcode, food } = await app.scanner.scan(body);
    app.log.info("Barcode scanned", { userId: user.id, barcode, foodId: food.id });
    jsonResponse(res, 200, { barcode, food });
  });

  const logScanned = authed(async (req, res, _ctx, user) => {
    const body = validateLogFood(await readJsonBody(req));
    jsonResponse(res, 201, logFood(app, user, body));
  });

  return [
    { path: "/barcode/scan", handler: byMethod({ POST: scan }) },
    { path: "/barcode/log-scanned", handler: byMethod({ POST: logScanned }) },
  ];
}
