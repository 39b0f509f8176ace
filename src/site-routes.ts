import type { AppContext } from "./context.js";
import { type HttpRoute, byMethod, jsonResponse } from "./http.js";

export const SERVICE_NAME = "food-planner";
export const SERVICE_VERSION = "0.1.0";

export function createSiteRoutes(app: AppContext): HttpRoute[] {
  const started = app.now().getTime();

  return [
    {
      path: "/",
      handler: byMethod({
        GET: async (_req, res) => {
          jsonResponse(res, 200, {
            name: SERVICE_NAME,
            version: SERVICE_VERSION,
            login_url: "/auth/login",
            dashboard_url: "/dashboard",
          });
        },
      }),
    },
    {
      path: "/about",
      handler: byMethod({
        GET: async (_req, res) => {
          jsonResponse(res, 200, {
            name: SERVICE_NAME,
            description:
              "Track what you eat by barcode photo, UPC or name search, follow your daily nutrition, and get AI meal suggestions.",
            features: {
              authentication: app.auth.configured,
              ai_recommendations: app.recommendations.available,
              barcode_scanning: app.recommendations.available,
              nutrition_source: "Open Food Facts",
            },
          });
        },
      }),
    },
    {
      path: "/health",
      handler: byMethod({
        GET: async (_req, res) => {
          jsonResponse(res, 200, {
            status: "ok",
            uptime_seconds: Math.round((app.now().getTime() - started) / 1000),
            foods: app.db.countFoods(),
          });
        },
      }),
    },
  ];
}
