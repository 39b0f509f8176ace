import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { resolveDbPath } from "./config.js";
import {
  type AIRecommendation,
  type DailyPlan,
  type Food,
  type FoodDraft,
  type FoodLogEntry,
  type IdentityClaims,
  type JsonObject,
  type MealType,
  type NutritionData,
  type NutritionValue,
  type Rating,
  type RecommendationType,
  type User,
  type UserPreferences,
  isMealType,
  isRecommendationType,
} from "./types.js";

// ── Schema ──────────────────────────────────────────────────────────────────

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS users (
  id                   INTEGER PRIMARY KEY AUTOINCREMENT,
  auth0_user_id        TEXT NOT NULL UNIQUE,
  email                TEXT NOT NULL UNIQUE,
  name                 TEXT NOT NULL,
  picture_url          TEXT,
  created_at           TEXT NOT NULL,
  daily_calorie_goal   INTEGER NOT NULL DEFAULT 2000,
  dietary_restrictions TEXT NOT NULL DEFAULT '[]',
  preferred_cuisine    TEXT
);

CREATE TABLE IF NOT EXISTS foods (
  id             INTEGER PRIMARY KEY AUTOINCREMENT,
  upc_code       TEXT UNIQUE,
  name           TEXT NOT NULL,
  brand          TEXT NOT NULL DEFAULT '',
  ingredients    TEXT NOT NULL DEFAULT '',
  nutrition_data TEXT NOT NULL DEFAULT '{}',
  created_at     TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_foods_name ON foods(name);

CREATE TABLE IF NOT EXISTS food_logs (
  id        INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id   INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  food_id   INTEGER NOT NULL REFERENCES foods(id),
  quantity  REAL NOT NULL CHECK (quantity > 0),
  meal_type TEXT NOT NULL CHECK (meal_type IN ('breakfast', 'lunch', 'dinner', 'snack')),
  logged_at TEXT NOT NULL,
  notes     TEXT NOT NULL DEFAULT ''
);

CREATE INDEX IF NOT EXISTS idx_food_logs_user_logged ON food_logs(user_id, logged_at);

CREATE TABLE IF NOT EXISTS daily_plans (
  id                INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id           INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  date              TEXT NOT NULL,
  meals_planned     TEXT NOT NULL DEFAULT '{}',
  nutritional_goals TEXT NOT NULL DEFAULT '{}',
  created_at        TEXT NOT NULL,
  UNIQUE (user_id, date)
);

CREATE TABLE IF NOT EXISTS ai_recommendations (
  id                  INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id             INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  recommendation_type TEXT NOT NULL,
  recommendation_text TEXT NOT NULL,
  context_data        TEXT NOT NULL DEFAULT '{}',
  created_at          TEXT NOT NULL,
  is_used             INTEGER NOT NULL DEFAULT 0,
  rating              INTEGER CHECK (rating IN (1, -1))
);

CREATE INDEX IF NOT EXISTS idx_ai_recommendations_user ON ai_recommendations(user_id, created_at);
`;

// ── Row shapes ──────────────────────────────────────────────────────────────

type UserRow = {
  id: number;
  auth0_user_id: string;
  email: string;
  name: string;
  picture_url: string | null;
  created_at: string;
  daily_calorie_goal: number;
  dietary_restrictions: string;
  preferred_cuisine: string | null;
};

type FoodRow = {
  id: number;
  upc_code: string | null;
  name: string;
  brand: string;
  ingredients: string;
  nutrition_data: string;
  created_at: string;
};

type FoodLogJoinRow = {
  id: number;
  user_id: number;
  food_id: number;
  quantity: number;
  meal_type: string;
  logged_at: string;
  notes: string;
  f_upc_code: string | null;
  f_name: string;
  f_brand: string;
  f_ingredients: string;
  f_nutrition_data: string;
  f_created_at: string;
};

type DailyPlanRow = {
  id: number;
  user_id: number;
  date: string;
  meals_planned: string;
  nutritional_goals: string;
  created_at: string;
};

type RecommendationRow = {
  id: number;
  user_id: number;
  recommendation_type: string;
  recommendation_text: string;
  context_data: string;
  created_at: string;
  is_used: number;
  rating: number | null;
};

const LOG_SELECT = `
  SELECT l.id, l.user_id, l.food_id, l.quantity, l.meal_type, l.logged_at, l.notes,
         f.upc_code AS f_upc_code, f.name AS f_name, f.brand AS f_brand,
         f.ingredients AS f_ingredients, f.nutrition_data AS f_nutrition_data,
         f.created_at AS f_created_at
  FROM food_logs l
  JOIN foods f ON f.id = l.food_id
`;

// ── JSON column helpers ─────────────────────────────────────────────────────

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function parseJsonObject(text: string): JsonObject {
  const value = parseJson(text);
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return {};
  }
  const out: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    out[key] = entry;
  }
  return out;
}

function parseStringArray(text: string): string[] {
  const value = parseJson(text);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

function toNutritionValue(value: unknown): NutritionValue | undefined {
  if (
    value === null ||
    typeof value === "number" ||
    typeof value === "string" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === "string");
  }
  return undefined;
}

export function parseNutritionData(text: string): NutritionData {
  const data: NutritionData = {};
  for (const [key, raw] of Object.entries(parseJsonObject(text))) {
    const value = toNutritionValue(raw);
    if (value !== undefined) {
      data[key] = value;
    }
  }
  return data;
}

// ── Row mapping ─────────────────────────────────────────────────────────────

function toUser(row: UserRow): User {
  return {
    ...row,
    dietary_restrictions: parseStringArray(row.dietary_restrictions),
  };
}

function toFood(row: FoodRow): Food {
  return { ...row, nutrition_data: parseNutritionData(row.nutrition_data) };
}

function toLogEntry(row: FoodLogJoinRow): FoodLogEntry {
  // The CHECK constraint keeps meal_type valid; snack is the catch-all.
  const mealType: MealType = isMealType(row.meal_type) ? row.meal_type : "snack";
  return {
    id: row.id,
    user_id: row.user_id,
    food_id: row.food_id,
    quantity: row.quantity,
    meal_type: mealType,
    logged_at: row.logged_at,
    notes: row.notes,
    food: {
      id: row.food_id,
      upc_code: row.f_upc_code,
      name: row.f_name,
      brand: row.f_brand,
      ingredients: row.f_ingredients,
      nutrition_data: parseNutritionData(row.f_nutrition_data),
      created_at: row.f_created_at,
    },
  };
}

function toPlan(row: DailyPlanRow): DailyPlan {
  return {
    ...row,
    meals_planned: parseJsonObject(row.meals_planned),
    nutritional_goals: parseJsonObject(row.nutritional_goals),
  };
}

function toRating(value: number | null): Rating | null {
  if (value === 1 || value === -1) {
    return value;
  }
  return null;
}

function toRecommendation(row: RecommendationRow): AIRecommendation {
  const type: RecommendationType = isRecommendationType(row.recommendation_type)
    ? row.recommendation_type
    : "meal";
  return {
    ...row,
    recommendation_type: type,
    context_data: parseJsonObject(row.context_data),
    is_used: row.is_used === 1,
    rating: toRating(row.rating),
  };
}

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

// ── Inputs ──────────────────────────────────────────────────────────────────

export type NewFoodLog = {
  userId: number;
  foodId: number;
  quantity: number;
  mealType: MealType;
  notes?: string;
  loggedAt?: string;
};

export type FoodLogUpdate = {
  quantity?: number;
  meal_type?: MealType;
  notes?: string;
};

export type NewRecommendation = {
  userId: number;
  type: RecommendationType;
  text: string;
  context: JsonObject;
};

/** Another user row already holds this email. */
export class EmailConflictError extends Error {
  constructor(readonly email: string) {
    super(`Email ${email} belongs to another user`);
    this.name = "EmailConflictError";
  }
}

export type FoodPlannerDbOptions = {
  /** Clock for created_at and default logged_at stamps. */
  now?: () => Date;
};

// ── Database class ──────────────────────────────────────────────────────────

export class FoodPlannerDb {
  private db: Database.Database;
  private readonly now: () => Date;

  constructor(dbPath?: string, opts: FoodPlannerDbOptions = {}) {
    this.now = opts.now ?? (() => new Date());
    const resolvedPath = dbPath ?? resolveDbPath(process.env.FOOD_PLANNER_STATE_DIR);
    const dir = path.dirname(resolvedPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    this.db = new Database(resolvedPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);
  }

  // ── Users ─────────────────────────────────────────────────────────────

  getUser(id: number): User | null {
    const row = this.db.prepare<[number], UserRow>("SELECT * FROM users WHERE id = ?").get(id);
    return row ? toUser(row) : null;
  }

  getUserByAuth0Id(auth0UserId: string): User | null {
    const row = this.db
      .prepare<[string], UserRow>("SELECT * FROM users WHERE auth0_user_id = ?")
      .get(auth0UserId);
    return row ? toUser(row) : null;
  }

  getUserByEmail(email: string): User | null {
    const row = this.db.prepare<[string], UserRow>("SELECT * FROM users WHERE email = ?").get(email);
    return row ? toUser(row) : null;
  }

  /**
   * Creates the user on first sight, otherwise refreshes email, name and picture.
   * Throws {@link EmailConflictError} when another identity already owns the email.
   */
  upsertUserFromClaims(claims: IdentityClaims): { user: User; created: boolean } {
    const existing = this.getUserByAuth0Id(claims.sub);
    const name = claims.name?.trim() || claims.email;
    const picture = claims.picture ?? null;

    const owner = this.getUserByEmail(claims.email);
    if (owner && owner.id !== existing?.id) {
      throw new EmailConflictError(claims.email);
    }

    if (existing) {
      this.db
        .prepare("UPDATE users SET email = ?, name = ?, picture_url = ? WHERE id = ?")
        .run(claims.email, name, picture ?? existing.picture_url, existing.id);
      return { user: this.requireUser(existing.id), created: false };
    }

    const result = this.db
      .prepare(
        `INSERT INTO users (auth0_user_id, email, name, picture_url, created_at)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(claims.sub, claims.email, name, picture, this.now().toISOString());
    return { user: this.requireUser(Number(result.lastInsertRowid)), created: true };
  }

  updatePreferences(userId: number, prefs: Partial<UserPreferences>): User {
    const current = this.requireUser(userId);
    const next: UserPreferences = {
      daily_calorie_goal: prefs.daily_calorie_goal ?? current.daily_calorie_goal,
      preferred_cuisine:
        prefs.preferred_cuisine !== undefined ? prefs.preferred_cuisine : current.preferred_cuisine,
      dietary_restrictions: prefs.dietary_restrictions ?? current.dietary_restrictions,
    };
    this.db
      .prepare(
        `UPDATE users SET daily_calorie_goal = ?, preferred_cuisine = ?, dietary_restrictions = ?
         WHERE id = ?`,
      )
      .run(
        next.daily_calorie_goal,
        next.preferred_cuisine,
        JSON.stringify(next.dietary_restrictions),
        userId,
      );
    return this.requireUser(userId);
  }

  private requireUser(id: number): User {
    const user = this.getUser(id);
    if (!user) {
      throw new Error(`User ${id} not found`);
    }
    return user;
  }

  // ── Foods ─────────────────────────────────────────────────────────────

  getFood(id: number): Food | null {
    const row = this.db.prepare<[number], FoodRow>("SELECT * FROM foods WHERE id = ?").get(id);
    return row ? toFood(row) : null;
  }

  getFoodByUpc(upc: string): Food | null {
    const row = this.db
      .prepare<[string], FoodRow>("SELECT * FROM foods WHERE upc_code = ?")
      .get(upc);
    return row ? toFood(row) : null;
  }

  searchFoods(query: string, limit: number): Food[] {
    const pattern = `%${escapeLike(query.toLowerCase())}%`;
    return this.db
      .prepare<[string, number], FoodRow>(
        `SELECT * FROM foods WHERE lower(name) LIKE ? ESCAPE '\\' ORDER BY name ASC, id ASC LIMIT ?`,
      )
      .all(pattern, limit)
      .map(toFood);
  }

  listFoods(): Food[] {
    return this.db.prepare<[], FoodRow>("SELECT * FROM foods ORDER BY id ASC").all().map(toFood);
  }

  countFoods(): number {
    const row = this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM foods").get();
    return row?.n ?? 0;
  }

  /** Inserts a food; a draft whose UPC is already stored returns the stored row. */
  insertFood(draft: FoodDraft): Food {
    const result = this.db
      .prepare(
        `INSERT INTO foods (upc_code, name, brand, ingredients, nutrition_data, created_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(upc_code) DO NOTHING`,
      )
      .run(
        draft.upc_code,
        draft.name,
        draft.brand,
        draft.ingredients,
        JSON.stringify(draft.nutrition_data),
        this.now().toISOString(),
      );

    const food =
      result.changes === 0 && draft.upc_code
        ? this.getFoodByUpc(draft.upc_code)
        : this.getFood(Number(result.lastInsertRowid));
    if (!food) {
      throw new Error(`Failed to store food "${draft.name}"`);
    }
    return food;
  }

  insertFoods(drafts: FoodDraft[]): Food[] {
    const txn = this.db.transaction((items: FoodDraft[]) => items.map((d) => this.insertFood(d)));
    return txn(drafts);
  }

  // ── Food logs ─────────────────────────────────────────────────────────

  insertLog(params: NewFoodLog): FoodLogEntry {
    const result = this.db
      .prepare(
        `INSERT INTO food_logs (user_id, food_id, quantity, meal_type, logged_at, notes)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        params.userId,
        params.foodId,
        params.quantity,
        params.mealType,
        params.loggedAt ?? this.now().toISOString(),
        params.notes ?? "",
      );
    const entry = this.getLog(Number(result.lastInsertRowid));
    if (!entry) {
      throw new Error("Failed to store food log");
    }
    return entry;
  }

  /** Inserts all logs in one transaction; returns how many were written. */
  insertLogs(logs: NewFoodLog[]): number {
    const stmt = this.db.prepare(
      `INSERT INTO food_logs (user_id, food_id, quantity, meal_type, logged_at, notes)
       VALUES (?, ?, ?, ?, ?, ?)`,
    );
    const txn = this.db.transaction((batch: NewFoodLog[]) => {
      for (const log of batch) {
        stmt.run(
          log.userId,
          log.foodId,
          log.quantity,
          log.mealType,
          log.loggedAt ?? this.now().toISOString(),
          log.notes ?? "",
        );
      }
      return batch.length;
    });
    return txn(logs);
  }

  getLog(id: number): FoodLogEntry | null {
    const row = this.db.prepare<[number], FoodLogJoinRow>(`${LOG_SELECT} WHERE l.id = ?`).get(id);
    return row ? toLogEntry(row) : null;
  }

  updateLog(id: number, changes: FoodLogUpdate): FoodLogEntry | null {
    const current = this.getLog(id);
    if (!current) {
      return null;
    }
    this.db
      .prepare("UPDATE food_logs SET quantity = ?, meal_type = ?, notes = ? WHERE id = ?")
      .run(
        changes.quantity ?? current.quantity,
        changes.meal_type ?? current.meal_type,
        changes.notes ?? current.notes,
        id,
      );
    return this.getLog(id);
  }

  deleteLog(id: number): boolean {
    const result = this.db.prepare("DELETE FROM food_logs WHERE id = ?").run(id);
    return result.changes > 0;
  }

  getLogsPage(userId: number, page: number, perPage: number): { logs: FoodLogEntry[]; total: number } {
    const total =
      this.db
        .prepare<[number], { n: number }>("SELECT COUNT(*) AS n FROM food_logs WHERE user_id = ?")
        .get(userId)?.n ?? 0;
    const logs = this.db
      .prepare<[number, number, number], FoodLogJoinRow>(
        `${LOG_SELECT} WHERE l.user_id = ? ORDER BY l.logged_at DESC, l.id DESC LIMIT ? OFFSET ?`,
      )
      .all(userId, perPage, (page - 1) * perPage)
      .map(toLogEntry);
    return { logs, total };
  }

  /** Logs whose UTC day falls within [from, to], both `YYYY-MM-DD`, oldest first. */
  getLogsByDateRange(userId: number, from: string, to: string): FoodLogEntry[] {
    return this.db
      .prepare<[number, string, string], FoodLogJoinRow>(
        `${LOG_SELECT}
         WHERE l.user_id = ? AND substr(l.logged_at, 1, 10) BETWEEN ? AND ?
         ORDER BY l.logged_at ASC, l.id ASC`,
      )
      .all(userId, from, to)
      .map(toLogEntry);
  }

  getRecentLogs(userId: number, limit: number): FoodLogEntry[] {
    return this.db
      .prepare<[number, number], FoodLogJoinRow>(
        `${LOG_SELECT} WHERE l.user_id = ? ORDER BY l.logged_at DESC, l.id DESC LIMIT ?`,
      )
      .all(userId, limit)
      .map(toLogEntry);
  }

  getFirstLogDate(userId: number): string | null {
    const row = this.db
      .prepare<[number], { first: string | null }>(
        "SELECT MIN(logged_at) AS first FROM food_logs WHERE user_id = ?",
      )
      .get(userId);
    return row?.first ?? null;
  }

  // ── Daily plans ───────────────────────────────────────────────────────

  getPlan(userId: number, date: string): DailyPlan | null {
    const row = this.db
      .prepare<[number, string], DailyPlanRow>(
        "SELECT * FROM daily_plans WHERE user_id = ? AND date = ?",
      )
      .get(userId, date);
    return row ? toPlan(row) : null;
  }

  upsertPlan(
    userId: number,
    date: string,
    plan: { meals_planned?: JsonObject; nutritional_goals?: JsonObject },
  ): DailyPlan {
    const current = this.getPlan(userId, date);
    const meals = plan.meals_planned ?? current?.meals_planned ?? {};
    const goals = plan.nutritional_goals ?? current?.nutritional_goals ?? {};
    this.db
      .prepare(
        `INSERT INTO daily_plans (user_id, date, meals_planned, nutritional_goals, created_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(user_id, date) DO UPDATE SET
           meals_planned = excluded.meals_planned,
           nutritional_goals = excluded.nutritional_goals`,
      )
      .run(userId, date, JSON.stringify(meals), JSON.stringify(goals), this.now().toISOString());
    const saved = this.getPlan(userId, date);
    if (!saved) {
      throw new Error(`Failed to store plan for ${date}`);
    }
    return saved;
  }

  // ── AI recommendations ────────────────────────────────────────────────

  insertRecommendation(params: NewRecommendation): AIRecommendation {
    const result = this.db
      .prepare(
        `INSERT INTO ai_recommendations
           (user_id, recommendation_type, recommendation_text, context_data, created_at)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(
        params.userId,
        params.type,
        params.text,
        JSON.stringify(params.context),
        this.now().toISOString(),
      );
    const rec = this.getRecommendation(Number(result.lastInsertRowid), params.userId);
    if (!rec) {
      throw new Error("Failed to store recommendation");
    }
    return rec;
  }

  getRecommendation(id: number, userId: number): AIRecommendation | null {
    const row = this.db
      .prepare<[number, number], RecommendationRow>(
        "SELECT * FROM ai_recommendations WHERE id = ? AND user_id = ?",
      )
      .get(id, userId);
    return row ? toRecommendation(row) : null;
  }

  rateRecommendation(id: number, userId: number, rating: Rating): AIRecommendation | null {
    const result = this.db
      .prepare("UPDATE ai_recommendations SET rating = ? WHERE id = ? AND user_id = ?")
      .run(rating, id, userId);
    return result.changes > 0 ? this.getRecommendation(id, userId) : null;
  }

  markRecommendationUsed(id: number, userId: number): AIRecommendation | null {
    const result = this.db
      .prepare("UPDATE ai_recommendations SET is_used = 1 WHERE id = ? AND user_id = ?")
      .run(id, userId);
    return result.changes > 0 ? this.getRecommendation(id, userId) : null;
  }

  listUnusedRecommendations(userId: number, limit: number): AIRecommendation[] {
    return this.db
      .prepare<[number, number], RecommendationRow>(
        `SELECT * FROM ai_recommendations WHERE user_id = ? AND is_used = 0
         ORDER BY created_at DESC, id DESC LIMIT ?`,
      )
      .all(userId, limit)
      .map(toRecommendation);
  }

  /** Recommendations not rated thumbs-down, newest first. */
  listVisibleRecommendations(userId: number, limit = 20): AIRecommendation[] {
    return this.db
      .prepare<[number, number], RecommendationRow>(
        `SELECT * FROM ai_recommendations WHERE user_id = ? AND (rating IS NULL OR rating = 1)
         ORDER BY created_at DESC, id DESC LIMIT ?`,
      )
      .all(userId, limit)
      .map(toRecommendation);
  }

  // ── Cleanup ───────────────────────────────────────────────────────────

  close(): void {
    this.db.close();
  }
}
