import { createApiRoutes } from "./src/api.js";
import { createAuthRoutes } from "./src/auth-routes.js";
import { createBarcodeRoutes } from "./src/barcode-routes.js";
import type { AppContext } from "./src/context.js";
import { createDashboardRoutes } from "./src/dashboard-routes.js";
import { createFoodRoutes } from "./src/food-routes.js";
import type { RouteRegistry } from "./src/server.js";
import { createSiteRoutes } from "./src/site-routes.js";

export { loadConfig } from "./src/config.js";
export { createAppContext } from "./src/context.js";
export { HttpHost } from "./src/server.js";

export default function register(api: RouteRegistry, app: AppContext) {
  // ── HTTP routes ─────────────────────────────────────────────────────────
  const groups = [
    createSiteRoutes(app),
    createAuthRoutes(app),
    createApiRoutes(app),
    createFoodRoutes(app),
    createDashboardRoutes(app),
    createBarcodeRoutes(app),
  ];
  for (const routes of groups) {
    for (const route of routes) {
      api.registerHttpRoute(route);
    }
  }
}
