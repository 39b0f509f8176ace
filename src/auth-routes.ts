import { STATE_COOKIE, generateState } from "./auth.js";
import { type AppContext, type AuthedHandler, withUser } from "./context.js";
import { HttpError } from "./errors.js";
import {
  type HttpRoute,
  type RouteHandler,
  byMethod,
  createBodyValidator,
  jsonResponse,
  parseCookies,
  readJsonBody,
  redirect,
  serializeCookie,
} from "./http.js";
import { daysBetween, dateKey } from "./nutrition.js";
import { sanitizeList, sanitizeText } from "./sanitize.js";
import { DemoDataBody, PreferencesBody } from "./schemas.js";

const validateProfile = createBodyValidator(PreferencesBody);
const validateDemoData = createBodyValidator(DemoDataBody);

const STATE_MAX_AGE = 600;

export function createAuthRoutes(app: AppContext): HttpRoute[] {
  const authed = (fn: AuthedHandler) => withUser(app, fn);
  const secureCookies = app.config.baseUrl.startsWith("https://");

  const login: RouteHandler = async (_req, res) => {
    const state = generateState();
    const location = app.auth.buildLoginUrl(state);
    redirect(res, location, [
      serializeCookie(STATE_COOKIE, state, { maxAge: STATE_MAX_AGE, secure: secureCookies }),
    ]);
  };

  const callback: RouteHandler = async (req, res, ctx) => {
    const error = ctx.url.searchParams.get("error");
    if (error) {
      const description = ctx.url.searchParams.get("error_description") ?? error;
      throw new HttpError(401, `Login failed: ${description}`);
    }
    const code = ctx.url.searchParams.get("code");
    const state = ctx.url.searchParams.get("state");
    const expected = parseCookies(req)[STATE_COOKIE];
    if (!code || !state) {
      throw new HttpError(400, "Missing code or state");
    }
    if (!expected || expected !== state) {
      throw new HttpError(400, "Invalid login state");
    }
    const result = await app.auth.handleCallback(code);
    res.setHeader("Set-Cookie", serializeCookie(STATE_COOKIE, "", { maxAge: 0, secure: secureCookies }));
    jsonResponse(res, 200, {
      user: result.user,
      is_new_user: result.created,
      access_token: result.tokens.access_token,
      id_token: result.tokens.id_token,
      token_type: result.tokens.token_type,
      expires_in: result.tokens.expires_in,
    });
  };

  const logout: RouteHandler = async (_req, res) => {
    redirect(res, app.auth.buildLogoutUrl(), [
      serializeCookie(STATE_COOKIE, "", { maxAge: 0, secure: secureCookies }),
    ]);
  };

  const profile = authed(async (_req, res, _ctx, user) => {
    const daysActive = Math.max(1, daysBetween(user.created_at.slice(0, 10), dateKey(app.now())) + 1);
    jsonResponse(res, 200, { user, days_active: daysActive });
  });

  const updateProfile = authed(async (req, res, _ctx, user) => {
    const body = validateProfile(await readJsonBody(req));
    const updated = app.db.updatePreferences(user.id, {
      daily_calorie_goal: body.daily_calorie_goal ?? 2000,
      preferred_cuisine: sanitizeText(body.preferred_cuisine ?? ""),
      dietary_restrictions: sanitizeList(body.dietary_restrictions ?? []),
    });
    jsonResponse(res, 200, { user: updated, message: "Profile updated successfully" });
  });

  const demoData = authed(async (req, res, _ctx, user) => {
    const body = validateDemoData(await readJsonBody(req));
    const result = app.demo.generate(user.id, body.months ?? 6);
    jsonResponse(res, 201, result);
  });

  return [
    { path: "/auth/login", handler: byMethod({ GET: login }) },
    { path: "/auth/callback", handler: byMethod({ GET: callback }) },
    { path: "/auth/logout", handler: byMethod({ GET: logout }) },
    { path: "/auth/profile", handler: byMethod({ GET: profile, PUT: updateProfile }) },
    { path: "/auth/demo-data", handler: byMethod({ POST: demoData }) },
  ];
}
