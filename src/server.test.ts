import { afterEach, describe, expect, it } from "vitest";
import { HttpError } from "./errors.js";
import { jsonResponse } from "./http.js";
import { createLogger } from "./logger.js";
import { HttpHost, SECURITY_HEADERS } from "./server.js";
import { makeTestServer, request } from "./test-utils.js";

const silent = createLogger("http", "silent");

describe("HttpHost", () => {
  let host: HttpHost;

  afterEach(async () => {
    await host.close();
  });

  it("matches path parameters", async () => {
    host = new HttpHost(silent);
    host.registerHttpRoute({
      path: "/items/:id/notes/:note",
      handler: async (_req, res, ctx) => jsonResponse(res, 200, ctx.params),
    });

    const res = await request(host, "GET", "/items/42/notes/hello%20world?x=1");
    expect(res.json()).toEqual({ id: "42", note: "hello world" });
  });

  it("sets security headers on every response", async () => {
    host = new HttpHost(silent);
    const res = await request(host, "GET", "/missing");

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "Not found" });
    for (const [name, value] of Object.entries(SECURITY_HEADERS)) {
      expect(res.headers[name.toLowerCase()]).toBe(value);
    }
  });

  it("turns HttpError into a JSON error", async () => {
    host = new HttpHost(silent);
    host.registerHttpRoute({
      path: "/teapot",
      handler: async () => {
        throw new HttpError(418, "I'm a teapot");
      },
    });
    const res = await request(host, "GET", "/teapot");
    expect(res.statusCode).toBe(418);
    expect(res.json()).toEqual({ error: "I'm a teapot" });
  });

  it("answers 500 for unexpected errors", async () => {
    host = new HttpHost(silent);
    host.registerHttpRoute({
      path: "/boom",
      handler: async () => {
        throw new Error("boom");
      },
    });
    const res = await request(host, "GET", "/boom");
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "Error: boom" });
  });

  it("answers 400 when a path parameter cannot be decoded", async () => {
    host = new HttpHost(silent);
    host.registerHttpRoute({
      path: "/items/:id",
      handler: async (_req, res, ctx) => jsonResponse(res, 200, ctx.params),
    });
    const res = await request(host, "GET", "/items/%E0");
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "Failed to decode param '%E0'" });
  });

  it("passes the query string through to handlers", async () => {
    host = new HttpHost(silent);
    host.registerHttpRoute({
      path: "/echo",
      handler: async (_req, res, ctx) => jsonResponse(res, 200, { q: ctx.url.searchParams.get("q") }),
    });
    const res = await request(host, "GET", "/echo?q=oat%20milk");
    expect(res.json()).toEqual({ q: "oat milk" });
    expect(res.headers["x-powered-by"]).toBeUndefined();
  });

  it("refuses duplicate paths", () => {
    host = new HttpHost(silent);
    const route = { path: "/x", handler: async () => {} };
    host.registerHttpRoute(route);
    expect(() => host.registerHttpRoute(route)).toThrow("Route already registered: /x");
  });

  it("serves over a real socket", async () => {
    host = new HttpHost(silent);
    host.registerHttpRoute({ path: "/ping", handler: async (_req, res) => jsonResponse(res, 200, { pong: true }) });
    const server = await host.listen(0, "127.0.0.1");
    const address = server.address();
    const port = typeof address === "object" && address ? address.port : 0;

    const res = await fetch(`http://127.0.0.1:${port}/ping`);
    expect(res.status).toBe(200);
    expect(res.headers.get("x-frame-options")).toBe("DENY");
    expect(await res.json()).toEqual({ pong: true });
  });
});

describe("registered application", () => {
  it("registers every route group", () => {
    const server = makeTestServer();
    try {
      expect(server.host.paths).toEqual([
        "/",
        "/about",
        "/health",
        "/auth/login",
        "/auth/callback",
        "/auth/logout",
        "/auth/profile",
        "/auth/demo-data",
        "/api/food/search-upc/:upc",
        "/api/food/search-name",
        "/api/food/log",
        "/api/ai/recommend",
        "/api/ai/recommendation/:id/rate",
        "/api/ai/recommendation/:id/use",
        "/api/ai/insights",
        "/api/ai/alternatives",
        "/api/ai/daily-analysis",
        "/api/nutrition/summary",
        "/api/user/preferences",
        "/food/search",
        "/food/custom",
        "/food/history",
        "/food/logs/:id",
        "/dashboard",
        "/dashboard/nutrition",
        "/dashboard/meal-planner",
        "/dashboard/ai-recommendations",
        "/dashboard/analytics",
        "/barcode/scan",
        "/barcode/log-scanned",
      ]);
    } finally {
      server.cleanup();
    }
  });

  it("describes itself on the public pages", async () => {
    const server = makeTestServer();
    try {
      expect((await request(server.host, "GET", "/")).json()).toEqual({
        name: "food-planner",
        version: "0.1.0",
        login_url: "/auth/login",
        dashboard_url: "/dashboard",
      });
      const about = await request(server.host, "GET", "/about");
      expect(about.json<{ features: Record<string, unknown> }>().features).toEqual({
        authentication: true,
        ai_recommendations: true,
        barcode_scanning: true,
        nutrition_source: "Open Food Facts",
      });
      expect((await request(server.host, "GET", "/health")).json()).toEqual({
        status: "ok",
        uptime_seconds: 0,
        foods: 0,
      });
    } finally {
      server.cleanup();
    }
  });
});
