import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig, resolveDbPath } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config.port).toBe(5000);
    expect(config.host).toBe("0.0.0.0");
    expect(config.baseUrl).toBe("http://localhost:5000");
    expect(config.logLevel).toBe("info");
    expect(config.auth0).toBeNull();
    expect(config.ai).toEqual({
      provider: undefined,
      anthropicApiKey: undefined,
      anthropicModel: "claude-3-5-sonnet-latest",
      openaiApiKey: undefined,
      openaiModel: "gpt-4o-mini",
    });
    expect(config.openFoodFactsBaseUrl).toBe("https://world.openfoodfacts.org");
    expect(config.itemsPerPage).toBe(20);
    expect(config.maxContentLength).toBe(16 * 1024 * 1024);
    expect(config.databasePath).toBe(path.join(os.homedir(), ".food-planner", "food-planner.db"));
  });

  it("coerces numeric values", () => {
    const config = loadConfig({ PORT: "8080", ITEMS_PER_PAGE: "50" });
    expect(config.port).toBe(8080);
    expect(config.itemsPerPage).toBe(50);
    expect(config.baseUrl).toBe("http://localhost:8080");
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ PORT: "  ", LOG_LEVEL: "" }).port).toBe(5000);
  });

  it("rejects values that fail the schema", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow("Invalid configuration: PORT must be integer");
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(/LOG_LEVEL/);
  });

  it("builds the Auth0 config from domain and client id", () => {
    const config = loadConfig({
      AUTH0_DOMAIN: "https://tenant.auth0.local/",
      AUTH0_CLIENT_ID: "test-client",
    });
    expect(config.auth0).toEqual({
      domain: "tenant.auth0.local",
      clientId: "test-client",
      clientSecret: "",
      audience: "test-client",
    });
  });

  it("keeps Auth0 disabled without a client id", () => {
    expect(loadConfig({ AUTH0_DOMAIN: "tenant.auth0.local" }).auth0).toBeNull();
  });

  it("strips trailing slashes from URLs", () => {
    const config = loadConfig({
      APP_BASE_URL: "https://food.example.com/",
      OPEN_FOOD_FACTS_BASE_URL: "https://off.example.com//",
    });
    expect(config.baseUrl).toBe("https://food.example.com");
    expect(config.openFoodFactsBaseUrl).toBe("https://off.example.com");
  });

  it("prefers DATABASE_PATH over the state dir", () => {
    expect(loadConfig({ FOOD_PLANNER_STATE_DIR: "/tmp/state" }).databasePath).toBe(
      path.join("/tmp/state", "food-planner.db"),
    );
    expect(
      loadConfig({ FOOD_PLANNER_STATE_DIR: "/tmp/state", DATABASE_PATH: "/tmp/other.db" }).databasePath,
    ).toBe("/tmp/other.db");
  });
});

describe("resolveDbPath", () => {
  it("falls back to the home directory", () => {
    expect(resolveDbPath("  ")).toBe(path.join(os.homedir(), ".food-planner", "food-planner.db"));
  });
});
