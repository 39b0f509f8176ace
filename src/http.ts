import type { TSchema, Static } from "@sinclair/typebox";
import AjvModule from "ajv";
import { parse as parseCookieHeader, serialize as serializeCookieHeader } from "cookie";
import type { IncomingMessage } from "node:http";
import { HttpError } from "./errors.js";

const Ajv = AjvModule.default;

// Subset of ServerResponse the handlers write through.
export type HttpResponse = {
  statusCode: number;
  setHeader(name: string, value: string | number | readonly string[]): unknown;
  end(data?: string): unknown;
};

export type RouteContext = {
  url: URL;
  params: Record<string, string>;
};

export type RouteHandler = (
  req: IncomingMessage,
  res: HttpResponse,
  ctx: RouteContext,
) => Promise<void>;

export type HttpRoute = {
  path: string;
  handler: RouteHandler;
};

export const DEFAULT_BODY_LIMIT = 1_000_000;

// ── Responses ───────────────────────────────────────────────────────────────

export function jsonResponse(res: HttpResponse, status: number, data: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.end(JSON.stringify(data));
}

export function errorResponse(res: HttpResponse, status: number, message: string): void {
  jsonResponse(res, status, { error: message });
}

export function redirect(res: HttpResponse, location: string, cookies: string[] = []): void {
  res.statusCode = 302;
  res.setHeader("Location", location);
  if (cookies.length > 0) {
    res.setHeader("Set-Cookie", cookies);
  }
  res.end();
}

type MethodHandlers = Partial<Record<"GET" | "POST" | "PUT" | "DELETE", RouteHandler>>;

export function byMethod(handlers: MethodHandlers): RouteHandler {
  const allowed = Object.keys(handlers);
  return async (req, res, ctx) => {
    const method = req.method ?? "GET";
    const handler =
      method === "GET" || method === "POST" || method === "PUT" || method === "DELETE"
        ? handlers[method]
        : undefined;
    if (!handler) {
      res.setHeader("Allow", allowed.join(", "));
      errorResponse(res, 405, "Method not allowed");
      return;
    }
    await handler(req, res, ctx);
  };
}

// ── Request parsing ─────────────────────────────────────────────────────────

export function parseUrl(req: IncomingMessage): URL {
  return new URL(req.url ?? "/", "http://localhost");
}

export function readBody(req: IncomingMessage, limit = DEFAULT_BODY_LIMIT): Promise<string> {
  return new Promise((resolve, reject) => {
    const declared = Number(req.headers["content-length"]);
    if (Number.isFinite(declared) && declared > limit) {
      reject(new HttpError(413, "Request body too large"));
      return;
    }
    const chunks: Buffer[] = [];
    let size = 0;
    let aborted = false;
    req.on("data", (chunk: Buffer | string) => {
      if (aborted) {
        return;
      }
      const buf = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      size += buf.length;
      if (size > limit) {
        aborted = true;
        reject(new HttpError(413, "Request body too large"));
        return;
      }
      chunks.push(buf);
    });
    req.on("end", () => {
      if (!aborted) {
        resolve(Buffer.concat(chunks).toString("utf-8"));
      }
    });
    req.on("error", reject);
  });
}

export async function readJsonBody(
  req: IncomingMessage,
  limit = DEFAULT_BODY_LIMIT,
): Promise<Record<string, unknown>> {
  const body = await readBody(req, limit);
  if (!body.trim()) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new HttpError(400, "Invalid JSON body");
  }
  if (!isRecord(parsed)) {
    throw new HttpError(400, "JSON body must be an object");
  }
  return parsed;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ── Validation ──────────────────────────────────────────────────────────────

const ajv = new Ajv({ allErrors: true, strict: false, coerceTypes: true, useDefaults: true });

export function createBodyValidator<T extends TSchema>(
  schema: T,
): (body: Record<string, unknown>) => Static<T> {
  const validate = ajv.compile<Static<T>>(schema);
  return (body) => {
    if (!validate(body)) {
      const errors = (validate.errors ?? [])
        .map((e) => `${e.instancePath || "<root>"} ${e.message ?? "is invalid"}`)
        .join("; ");
      throw new HttpError(400, `Invalid request body: ${errors}`);
    }
    return body;
  };
}

export type IntParamOptions = {
  fallback: number;
  min: number;
  max: number;
};

export function parseIntParam(url: URL, name: string, opts: IntParamOptions): number {
  const raw = url.searchParams.get(name);
  if (raw === null || raw.trim() === "") {
    return opts.fallback;
  }
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new HttpError(400, `'${name}' must be an integer`);
  }
  const value = Number(raw);
  if (value < opts.min || value > opts.max) {
    throw new HttpError(400, `'${name}' must be between ${opts.min} and ${opts.max}`);
  }
  return value;
}

export function parseIdParam(ctx: RouteContext, name = "id"): number {
  const raw = ctx.params[name] ?? "";
  if (!/^\d+$/.test(raw)) {
    throw new HttpError(400, `Invalid ${name}`);
  }
  return Number(raw);
}

// ── Auth headers and cookies ────────────────────────────────────────────────

export function getBearerToken(req: IncomingMessage): string | null {
  const header = req.headers.authorization;
  if (!header) {
    return null;
  }
  const match = header.match(/^Bearer\s+(.+)$/i);
  return match?.[1]?.trim() || null;
}

export function parseCookies(req: IncomingMessage): Record<string, string> {
  const cookies: Record<string, string> = {};
  for (const [key, value] of Object.entries(parseCookieHeader(req.headers.cookie ?? ""))) {
    if (value !== undefined) {
      cookies[key] = value;
    }
  }
  return cookies;
}

export type CookieOptions = {
  maxAge?: number;
  secure?: boolean;
};

/** Session-scoped HttpOnly cookie on the whole site. */
export function serializeCookie(name: string, value: string, opts: CookieOptions = {}): string {
  return serializeCookieHeader(name, value, {
    path: "/",
    httpOnly: true,
    sameSite: "lax",
    maxAge: opts.maxAge,
    secure: opts.secure,
  });
}
