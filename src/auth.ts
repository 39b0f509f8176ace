import jwt, { type JwtPayload } from "jsonwebtoken";
import jwksClient from "jwks-rsa";
import crypto from "node:crypto";
import type { IncomingMessage } from "node:http";
import type { Auth0Config } from "./config.js";
import { EmailConflictError, type FoodPlannerDb } from "./db.js";
import { HttpError, errorMessage } from "./errors.js";
import { getBearerToken, isRecord } from "./http.js";
import { type Logger, createLogger } from "./logger.js";
import type { FetchLike } from "./open-food-facts.js";
import type { IdentityClaims, User } from "./types.js";

export const STATE_COOKIE = "food_planner_oauth_state";

export type KeyResolver = (kid: string | undefined) => Promise<string>;

export type TokenClaims = {
  sub: string;
  email?: string;
  name?: string;
  picture?: string;
};

export type TokenSet = {
  access_token: string;
  id_token: string;
  token_type: string;
  expires_in?: number;
};

export type CallbackResult = {
  user: User;
  created: boolean;
  tokens: TokenSet;
};

export function createJwksKeyResolver(domain: string): KeyResolver {
  const client = jwksClient({
    jwksUri: `https://${domain}/.well-known/jwks.json`,
    cache: true,
    rateLimit: true,
    jwksRequestsPerMinute: 10,
  });
  return async (kid) => {
    const key = await client.getSigningKey(kid);
    return key.getPublicKey();
  };
}

export function generateState(): string {
  return crypto.randomBytes(16).toString("hex");
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

function toTokenSet(data: unknown): TokenSet | null {
  if (!isRecord(data)) {
    return null;
  }
  const { access_token, id_token, token_type, expires_in } = data;
  if (typeof access_token !== "string" || typeof id_token !== "string") {
    return null;
  }
  return {
    access_token,
    id_token,
    token_type: typeof token_type === "string" ? token_type : "Bearer",
    expires_in: typeof expires_in === "number" ? expires_in : undefined,
  };
}

// ── Authenticator ───────────────────────────────────────────────────────────

export type AuthenticatorOptions = {
  resolveKey?: KeyResolver;
  fetch?: FetchLike;
  logger?: Logger;
};

/** Auth0 login flow plus RS256 bearer-token verification against the tenant JWKS. */
export class Auth0Authenticator {
  private readonly resolveKey: KeyResolver | null;
  private readonly fetchImpl: FetchLike;
  private readonly log: Logger;

  constructor(
    private readonly db: FoodPlannerDb,
    private readonly config: Auth0Config | null,
    private readonly baseUrl: string,
    opts: AuthenticatorOptions = {},
  ) {
    this.resolveKey = opts.resolveKey ?? (config ? createJwksKeyResolver(config.domain) : null);
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
    this.log = opts.logger ?? createLogger("auth");
  }

  get configured(): boolean {
    return this.config !== null;
  }

  private requireConfig(): Auth0Config {
    if (!this.config) {
      throw new HttpError(503, "Authentication is not configured");
    }
    return this.config;
  }

  get callbackUrl(): string {
    return `${this.baseUrl}/auth/callback`;
  }

  async verifyToken(token: string, audience?: string): Promise<TokenClaims> {
    const config = this.requireConfig();
    if (!this.resolveKey) {
      throw new HttpError(503, "Authentication is not configured");
    }

    const decoded = jwt.decode(token, { complete: true });
    if (!decoded) {
      throw new HttpError(401, "Invalid token: malformed JWT");
    }

    let payload: string | JwtPayload;
    try {
      const key = await this.resolveKey(decoded.header.kid);
      payload = jwt.verify(token, key, {
        algorithms: ["RS256"],
        audience: audience ?? config.audience,
        issuer: `https://${config.domain}/`,
      });
    } catch (err) {
      throw new HttpError(401, `Invalid token: ${errorMessage(err)}`);
    }

    if (typeof payload === "string" || typeof payload.sub !== "string" || !payload.sub) {
      throw new HttpError(401, "Invalid token: missing subject");
    }
    return {
      sub: payload.sub,
      email: optionalString(payload.email),
      name: optionalString(payload.name),
      picture: optionalString(payload.picture),
    };
  }

  /** Resolves the bearer token on the request to a stored user, creating one on first sight. */
  async authenticate(req: IncomingMessage): Promise<User> {
    const token = getBearerToken(req);
    if (!token) {
      throw new HttpError(401, "Authentication required");
    }
    const claims = await this.verifyToken(token);
    const existing = this.db.getUserByAuth0Id(claims.sub);
    if (existing) {
      return existing;
    }
    if (!claims.email) {
      throw new HttpError(401, "Unknown user: token has no email claim");
    }
    const { user } = this.upsertUser({ ...claims, email: claims.email });
    this.log.info("Created user from bearer token", { userId: user.id });
    return user;
  }

  private upsertUser(claims: IdentityClaims): { user: User; created: boolean } {
    try {
      return this.db.upsertUserFromClaims(claims);
    } catch (err) {
      if (err instanceof EmailConflictError) {
        this.log.warn("Identity shares an email with another user", { sub: claims.sub });
        throw new HttpError(409, "Email already linked to another account");
      }
      throw err;
    }
  }

  // ── Login flow ────────────────────────────────────────────────────────

  buildLoginUrl(state: string): string {
    const config = this.requireConfig();
    const params = new URLSearchParams({
      response_type: "code",
      client_id: config.clientId,
      redirect_uri: this.callbackUrl,
      scope: "openid profile email",
      state,
    });
    if (config.audience !== config.clientId) {
      params.set("audience", config.audience);
    }
    return `https://${config.domain}/authorize?${params.toString()}`;
  }

  buildLogoutUrl(): string {
    const config = this.requireConfig();
    const params = new URLSearchParams({ returnTo: `${this.baseUrl}/`, client_id: config.clientId });
    return `https://${config.domain}/v2/logout?${params.toString()}`;
  }

  async exchangeCode(code: string): Promise<TokenSet> {
    const config = this.requireConfig();
    let res: Response;
    try {
      res = await this.fetchImpl(`https://${config.domain}/oauth/token`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          grant_type: "authorization_code",
          client_id: config.clientId,
          client_secret: config.clientSecret,
          code,
          redirect_uri: this.callbackUrl,
        }),
      });
    } catch (err) {
      this.log.error("Auth0 token request failed", { error: errorMessage(err) });
      throw new HttpError(502, "Could not reach the identity provider");
    }
    if (!res.ok) {
      this.log.warn("Auth0 rejected authorization code", { status: res.status });
      throw new HttpError(401, "Authorization code exchange failed");
    }
    const tokens = toTokenSet(await res.json());
    if (!tokens) {
      throw new HttpError(502, "Identity provider returned an unexpected token response");
    }
    return tokens;
  }

  async handleCallback(code: string): Promise<CallbackResult> {
    const config = this.requireConfig();
    const tokens = await this.exchangeCode(code);
    const claims = await this.verifyToken(tokens.id_token, config.clientId);
    if (!claims.email) {
      throw new HttpError(400, "ID token has no email claim");
    }
    const { user, created } = this.upsertUser({ ...claims, email: claims.email });
    this.log.info(created ? "New user signed up" : "User signed in", { userId: user.id });
    return { user, created, tokens };
  }
}
