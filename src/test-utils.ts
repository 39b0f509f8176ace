import jwt from "jsonwebtoken";
import crypto from "node:crypto";
import fs from "node:fs";
import http from "node:http";
import net from "node:net";
import os from "node:os";
import path from "node:path";
import register from "../index.js";
import type { AiProvider, CompletionRequest } from "./ai-provider.js";
import type { AppConfig } from "./config.js";
import { type AppContext, createAppContext } from "./context.js";
import { FoodPlannerDb } from "./db.js";
import { createLogger } from "./logger.js";
import type { FetchLike } from "./open-food-facts.js";
import { HttpHost } from "./server.js";
import type { FoodDraft } from "./types.js";

// ── HTTP doubles ────────────────────────────────────────────────────────────

export function createMockRequest(
  method: string,
  url: string,
  opts: { body?: string; headers?: Record<string, string> } = {},
): http.IncomingMessage {
  const req = new http.IncomingMessage(new net.Socket());
  req.method = method;
  req.url = url;
  req.headers = { ...opts.headers };
  if (opts.body !== undefined) {
    req.push(opts.body);
  }
  req.push(null);
  return req;
}

export class MockResponse {
  statusCode = 200;
  headers: Record<string, string | number | readonly string[]> = {};
  body = "";
  ended = false;

  setHeader(key: string, value: string | number | readonly string[]) {
    this.headers[key.toLowerCase()] = value;
  }

  end(data?: string) {
    if (data) {
      this.body += data;
    }
    this.ended = true;
  }

  json<T>(): T {
    return JSON.parse(this.body);
  }
}

// ── Fakes ───────────────────────────────────────────────────────────────────

export class FakeAiProvider implements AiProvider {
  readonly name = "fake";
  readonly requests: CompletionRequest[] = [];
  failWith: Error | null = null;

  constructor(public reply = "Try a grilled chicken salad.") {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    if (this.failWith) {
      throw this.failWith;
    }
    return this.reply;
  }
}

type FakeRoute = (url: URL, init?: RequestInit) => unknown;

/** Answers each request from the first route whose prefix matches; unmatched URLs get a 404. */
export function createFakeFetch(routes: Record<string, FakeRoute>): FetchLike & { calls: string[] } {
  const calls: string[] = [];
  const fake = async (url: string, init?: RequestInit): Promise<Response> => {
    calls.push(url);
    for (const [prefix, route] of Object.entries(routes)) {
      if (url.startsWith(prefix)) {
        const body = route(new URL(url), init);
        if (body instanceof Response) {
          return body;
        }
        return new Response(JSON.stringify(body), {
          status: 200,
          headers: { "Content-Type": "application/json" },
        });
      }
    }
    return new Response("not found", { status: 404 });
  };
  return Object.assign(fake, { calls });
}

// ── Tokens ──────────────────────────────────────────────────────────────────

export const TEST_AUTH0 = {
  domain: "test.auth0.local",
  clientId: "test-client",
  clientSecret: "test-secret",
  audience: "test-client",
} as const;

export const TEST_KID = "test-key";

const keys = crypto.generateKeyPairSync("rsa", { modulusLength: 2048 });
export const TEST_PUBLIC_KEY = keys.publicKey.export({ type: "spki", format: "pem" }).toString();
const TEST_PRIVATE_KEY = keys.privateKey.export({ type: "pkcs8", format: "pem" }).toString();

export const resolveTestKey = async () => TEST_PUBLIC_KEY;

export function signTestToken(
  claims: Record<string, unknown> = {},
  opts: { audience?: string; issuer?: string; expiresIn?: number } = {},
): string {
  return jwt.sign({ sub: "auth0|user-1", email: "ada@example.com", name: "Ada", ...claims }, TEST_PRIVATE_KEY, {
    algorithm: "RS256",
    keyid: TEST_KID,
    audience: opts.audience ?? TEST_AUTH0.audience,
    issuer: opts.issuer ?? `https://${TEST_AUTH0.domain}/`,
    expiresIn: opts.expiresIn ?? 3600,
  });
}

export function authHeader(claims: Record<string, unknown> = {}): Record<string, string> {
  return { authorization: `Bearer ${signTestToken(claims)}` };
}

// ── App fixture ─────────────────────────────────────────────────────────────

export function makeTestConfig(dbPath: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 5000,
    host: "127.0.0.1",
    baseUrl: "http://localhost:5000",
    databasePath: dbPath,
    logLevel: "silent",
    ai: { anthropicModel: "test-model", openaiModel: "test-model" },
    auth0: { ...TEST_AUTH0 },
    openFoodFactsBaseUrl: "https://off.test",
    itemsPerPage: 20,
    maxContentLength: 16 * 1024 * 1024,
    ...overrides,
  };
}

export type TestApp = {
  app: AppContext;
  db: FoodPlannerDb;
  provider: FakeAiProvider;
  fetch: ReturnType<typeof createFakeFetch>;
  cleanup: () => void;
};

export const TEST_NOW = new Date("2026-01-15T12:00:00.000Z");

export function makeTestApp(
  opts: {
    config?: Partial<AppConfig>;
    provider?: FakeAiProvider | null;
    fetchRoutes?: Record<string, FakeRoute>;
    random?: () => number;
  } = {},
): TestApp {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "food-planner-test-"));
  const db = new FoodPlannerDb(path.join(tmpDir, "test.db"), { now: () => TEST_NOW });
  const provider = opts.provider === undefined ? new FakeAiProvider() : opts.provider;
  const fetch = createFakeFetch(opts.fetchRoutes ?? {});
  const app = createAppContext(makeTestConfig(path.join(tmpDir, "test.db"), opts.config), {
    db,
    aiProvider: provider,
    fetch,
    resolveKey: resolveTestKey,
    random: opts.random ?? (() => 0.5),
    now: () => TEST_NOW,
  });
  return {
    app,
    db,
    // Unused when AI is disabled.
    provider: provider ?? new FakeAiProvider(),
    fetch,
    cleanup: () => {
      db.close();
      fs.rmSync(tmpDir, { recursive: true, force: true });
    },
  };
}

export function foodDraft(name: string, caloriesPer100g: number, extra: Partial<FoodDraft> = {}): FoodDraft {
  return {
    upc_code: null,
    name,
    brand: "",
    ingredients: "",
    nutrition_data: {
      calories_per_100g: caloriesPer100g,
      protein_per_100g: 10,
      carbs_per_100g: 20,
      fat_per_100g: 5,
    },
    ...extra,
  };
}

// ── Routed requests ─────────────────────────────────────────────────────────

export type TestServer = TestApp & { host: HttpHost };

export function makeTestServer(opts: Parameters<typeof makeTestApp>[0] = {}): TestServer {
  const testApp = makeTestApp(opts);
  const host = new HttpHost(createLogger("http", "silent"));
  register(host, testApp.app);
  return { ...testApp, host };
}

export type TestResponse = {
  statusCode: number;
  headers: Record<string, string | string[]>;
  body: string;
  json<T = unknown>(): T;
};

const listening = new Map<HttpHost, Promise<string>>();

function baseUrlOf(host: HttpHost): Promise<string> {
  let base = listening.get(host);
  if (!base) {
    base = host.listen(0, "127.0.0.1").then((server) => {
      const address = server.address();
      if (!address || typeof address === "string") {
        throw new Error("Test server has no TCP address");
      }
      return `http://127.0.0.1:${address.port}`;
    });
    listening.set(host, base);
  }
  return base;
}

/** Closes every host opened by `request`. Runs after each test (see vitest.setup.ts). */
export async function closeTestServers(): Promise<void> {
  const hosts = [...listening.keys()];
  listening.clear();
  await Promise.all(hosts.map((host) => host.close()));
}

/** Sends one request to the host over a loopback socket. Redirects are not followed. */
export async function request(
  host: HttpHost,
  method: string,
  url: string,
  opts: { body?: unknown; headers?: Record<string, string> } = {},
): Promise<TestResponse> {
  const body =
    opts.body === undefined || typeof opts.body === "string" ? opts.body : JSON.stringify(opts.body);
  const res = await fetch(`${await baseUrlOf(host)}${url}`, {
    method,
    headers: opts.headers,
    body,
    redirect: "manual",
  });
  const headers: Record<string, string | string[]> = {};
  res.headers.forEach((value, name) => {
    if (name !== "set-cookie") {
      headers[name] = value;
    }
  });
  const cookies = res.headers.getSetCookie();
  if (cookies.length > 0) {
    headers["set-cookie"] = cookies;
  }
  const text = await res.text();
  return {
    statusCode: res.status,
    headers,
    body: text,
    json: () => JSON.parse(text),
  };
}
