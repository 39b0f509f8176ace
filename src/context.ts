import { type AiProvider, createAiProvider } from "./ai-provider.js";
import type { IncomingMessage } from "node:http";
import { Auth0Authenticator, type KeyResolver } from "./auth.js";
import { BarcodeScanner } from "./barcode.js";
import type { AppConfig } from "./config.js";
import { FoodPlannerDb } from "./db.js";
import { DemoDataGenerator } from "./demo-data.js";
import { FoodCatalog } from "./food-catalog.js";
import type { HttpResponse, RouteContext, RouteHandler } from "./http.js";
import { type Logger, createLogger } from "./logger.js";
import { type FetchLike, OpenFoodFactsClient } from "./open-food-facts.js";
import { RecommendationService } from "./recommendations.js";
import type { User } from "./types.js";

export type AppContext = {
  config: AppConfig;
  db: FoodPlannerDb;
  auth: Auth0Authenticator;
  catalog: FoodCatalog;
  recommendations: RecommendationService;
  scanner: BarcodeScanner;
  demo: DemoDataGenerator;
  log: Logger;
  now: () => Date;
};

export type AppContextOverrides = {
  db?: FoodPlannerDb;
  /** `null` disables AI features; omitted means "from config". */
  aiProvider?: AiProvider | null;
  fetch?: FetchLike;
  resolveKey?: KeyResolver;
  random?: () => number;
  now?: () => Date;
};

export function createAppContext(config: AppConfig, overrides: AppContextOverrides = {}): AppContext {
  const log = createLogger("food-planner", config.logLevel);
  const now = overrides.now ?? (() => new Date());
  const db = overrides.db ?? new FoodPlannerDb(config.databasePath, { now });
  const provider =
    overrides.aiProvider !== undefined
      ? overrides.aiProvider
      : createAiProvider(config.ai, createLogger("ai", config.logLevel));
  const off = new OpenFoodFactsClient({
    baseUrl: config.openFoodFactsBaseUrl,
    fetch: overrides.fetch,
    logger: createLogger("open-food-facts", config.logLevel),
  });
  const catalog = new FoodCatalog(db, off, createLogger("food-catalog", config.logLevel));

  return {
    config,
    db,
    auth: new Auth0Authenticator(db, config.auth0, config.baseUrl, {
      resolveKey: overrides.resolveKey,
      fetch: overrides.fetch,
      logger: createLogger("auth", config.logLevel),
    }),
    catalog,
    recommendations: new RecommendationService(
      provider,
      createLogger("recommendations", config.logLevel),
    ),
    scanner: new BarcodeScanner(provider, catalog, createLogger("barcode", config.logLevel)),
    demo: new DemoDataGenerator(db, {
      random: overrides.random,
      now,
      logger: createLogger("demo-data", config.logLevel),
    }),
    log,
    now,
  };
}

export type AuthedHandler = (
  req: IncomingMessage,
  res: HttpResponse,
  ctx: RouteContext,
  user: User,
) => Promise<void>;

/** Wraps a handler so it only runs for a verified bearer token. */
export function withUser(app: AppContext, fn: AuthedHandler): RouteHandler {
  return async (req, res, ctx) => {
    const user = await app.auth.authenticate(req);
    await fn(req, res, ctx, user);
  };
}
