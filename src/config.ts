import { type Static, Type } from "@sinclair/typebox";
import AjvModule from "ajv";
import os from "node:os";
import path from "node:path";
import type { LogLevel } from "./logger.js";

const Ajv = AjvModule.default;

// ── Environment schema ──────────────────────────────────────────────────────

const EnvSchema = Type.Object({
  PORT: Type.Integer({ minimum: 1, maximum: 65535, default: 5000 }),
  HOST: Type.String({ default: "0.0.0.0" }),
  APP_BASE_URL: Type.Optional(Type.String({ pattern: "^https?://" })),
  DATABASE_PATH: Type.Optional(Type.String()),
  FOOD_PLANNER_STATE_DIR: Type.Optional(Type.String()),
  LOG_LEVEL: Type.Union(
    [
      Type.Literal("debug"),
      Type.Literal("info"),
      Type.Literal("warn"),
      Type.Literal("error"),
      Type.Literal("silent"),
    ],
    { default: "info" },
  ),
  AI_PROVIDER: Type.Optional(
    Type.Union([Type.Literal("anthropic"), Type.Literal("openai"), Type.Literal("none")]),
  ),
  ANTHROPIC_API_KEY: Type.Optional(Type.String()),
  ANTHROPIC_MODEL: Type.String({ default: "claude-3-5-sonnet-latest" }),
  OPENAI_API_KEY: Type.Optional(Type.String()),
  OPENAI_MODEL: Type.String({ default: "gpt-4o-mini" }),
  AUTH0_DOMAIN: Type.Optional(Type.String()),
  AUTH0_CLIENT_ID: Type.Optional(Type.String()),
  AUTH0_CLIENT_SECRET: Type.Optional(Type.String()),
  AUTH0_AUDIENCE: Type.Optional(Type.String()),
  OPEN_FOOD_FACTS_BASE_URL: Type.String({
    pattern: "^https?://",
    default: "https://world.openfoodfacts.org",
  }),
  ITEMS_PER_PAGE: Type.Integer({ minimum: 1, maximum: 200, default: 20 }),
  MAX_CONTENT_LENGTH: Type.Integer({ minimum: 1024, default: 16 * 1024 * 1024 }),
});

type Env = Static<typeof EnvSchema>;

const ajv = new Ajv({ allErrors: true, strict: false, coerceTypes: true, useDefaults: true });
const validateEnv = ajv.compile<Env>(EnvSchema);

// ── Resolved configuration ──────────────────────────────────────────────────

export type AiProviderName = "anthropic" | "openai" | "none";

export type Auth0Config = {
  domain: string;
  clientId: string;
  clientSecret: string;
  audience: string;
};

export type AppConfig = {
  port: number;
  host: string;
  baseUrl: string;
  databasePath: string;
  logLevel: LogLevel;
  ai: {
    provider?: AiProviderName;
    anthropicApiKey?: string;
    anthropicModel: string;
    openaiApiKey?: string;
    openaiModel: string;
  };
  auth0: Auth0Config | null;
  openFoodFactsBaseUrl: string;
  itemsPerPage: number;
  maxContentLength: number;
};

export function resolveDbPath(stateDir?: string): string {
  const dir = stateDir?.trim() || path.join(os.homedir(), ".food-planner");
  return path.join(dir, "food-planner.db");
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Only keys the schema knows; blank values count as unset.
  const candidate: Record<string, unknown> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = env[key]?.trim();
    if (value) {
      candidate[key] = value;
    }
  }

  if (!validateEnv(candidate)) {
    const errors = (validateEnv.errors ?? [])
      .map((e) => `${e.instancePath.replace(/^\//, "") || "<root>"} ${e.message ?? "is invalid"}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${errors}`);
  }

  const parsed = candidate;
  const domain = parsed.AUTH0_DOMAIN?.replace(/^https?:\/\//, "").replace(/\/+$/, "");
  const auth0 =
    domain && parsed.AUTH0_CLIENT_ID
      ? {
          domain,
          clientId: parsed.AUTH0_CLIENT_ID,
          clientSecret: parsed.AUTH0_CLIENT_SECRET ?? "",
          audience: parsed.AUTH0_AUDIENCE ?? parsed.AUTH0_CLIENT_ID,
        }
      : null;

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    baseUrl: stripTrailingSlash(parsed.APP_BASE_URL ?? `http://localhost:${parsed.PORT}`),
    databasePath: parsed.DATABASE_PATH ?? resolveDbPath(parsed.FOOD_PLANNER_STATE_DIR),
    logLevel: parsed.LOG_LEVEL,
    ai: {
      provider: parsed.AI_PROVIDER,
      anthropicApiKey: parsed.ANTHROPIC_API_KEY,
      anthropicModel: parsed.ANTHROPIC_MODEL,
      openaiApiKey: parsed.OPENAI_API_KEY,
      openaiModel: parsed.OPENAI_MODEL,
    },
    auth0,
    openFoodFactsBaseUrl: stripTrailingSlash(parsed.OPEN_FOOD_FACTS_BASE_URL),
    itemsPerPage: parsed.ITEMS_PER_PAGE,
    maxContentLength: parsed.MAX_CONTENT_LENGTH,
  };
}
