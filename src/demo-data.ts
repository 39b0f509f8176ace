import { type Static, Type } from "@sinclair/typebox";
import AjvModule from "ajv";
import { readDataFile } from "./data-files.js";
import type { FoodPlannerDb, NewFoodLog } from "./db.js";
import { type Logger, createLogger } from "./logger.js";
import { addDays, dateKey, logCalories, toNumber } from "./nutrition.js";
import { type Food, type FoodDraft, type DemoDataResult, type MealType, MEAL_TYPES } from "./types.js";

const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true, strict: false });

// ── Data file schemas ───────────────────────────────────────────────────────

const Range = Type.Tuple([Type.Integer(), Type.Integer()]);

const MealPatternSchema = Type.Object({
  hours: Range,
  snackHours: Type.Optional(Type.Array(Type.Integer(), { minItems: 1 })),
  quantities: Range,
  foods: Type.Array(Type.String(), { minItems: 1 }),
});

const DemoPatternsSchema = Type.Object({
  meals: Type.Object({
    breakfast: MealPatternSchema,
    lunch: MealPatternSchema,
    dinner: MealPatternSchema,
    snack: MealPatternSchema,
  }),
  seasonal: Type.Object({
    winter: Type.Array(Type.String()),
    spring: Type.Array(Type.String()),
    summer: Type.Array(Type.String()),
    autumn: Type.Array(Type.String()),
  }),
});

const StarterFoodsSchema = Type.Array(
  Type.Object({
    name: Type.String({ minLength: 1 }),
    brand: Type.String(),
    calories: Type.Number({ minimum: 0 }),
    protein: Type.Number({ minimum: 0 }),
    carbs: Type.Number({ minimum: 0 }),
    fat: Type.Number({ minimum: 0 }),
    fiber: Type.Number({ minimum: 0 }),
    sugar: Type.Number({ minimum: 0 }),
    sodium: Type.Number({ minimum: 0 }),
  }),
  { minItems: 1 },
);

export type DemoPatterns = Static<typeof DemoPatternsSchema>;
type MealPattern = Static<typeof MealPatternSchema>;
type Season = keyof DemoPatterns["seasonal"];

const validatePatterns = ajv.compile<DemoPatterns>(DemoPatternsSchema);
const validateStarterFoods = ajv.compile<Static<typeof StarterFoodsSchema>>(StarterFoodsSchema);

export function loadDemoPatterns(): DemoPatterns {
  const data = readDataFile("demo-meal-patterns.json");
  if (!validatePatterns(data)) {
    throw new Error(`Invalid demo-meal-patterns.json: ${ajv.errorsText(validatePatterns.errors)}`);
  }
  return data;
}

export function loadStarterFoods(): FoodDraft[] {
  const data = readDataFile("starter-foods.json");
  if (!validateStarterFoods(data)) {
    throw new Error(`Invalid starter-foods.json: ${ajv.errorsText(validateStarterFoods.errors)}`);
  }
  return data.map((f) => ({
    upc_code: null,
    name: f.name,
    brand: f.brand,
    ingredients: "",
    nutrition_data: {
      calories_per_100g: f.calories,
      protein_per_100g: f.protein,
      carbs_per_100g: f.carbs,
      fat_per_100g: f.fat,
      fiber_per_100g: f.fiber,
      sugar_per_100g: f.sugar,
      sodium_per_100g: f.sodium,
    },
  }));
}

// ── Generator ───────────────────────────────────────────────────────────────

const DAY_LOG_PROBABILITY = 0.85;
const MEAL_PROBABILITY: Record<Exclude<MealType, "snack">, number> = {
  breakfast: 0.95,
  lunch: 0.9,
  dinner: 0.98,
};
const SNACK_COUNTS = [0, 1, 2];
const SNACK_COUNT_WEIGHTS = [0.3, 0.6, 0.1];
const SEASONAL_CHANCE = 0.3;

export function seasonOf(key: string): Season {
  const month = Number(key.slice(5, 7));
  if (month === 12 || month <= 2) {
    return "winter";
  }
  if (month <= 5) {
    return "spring";
  }
  return month <= 8 ? "summer" : "autumn";
}

export type DemoDataOptions = {
  random?: () => number;
  now?: () => Date;
  patterns?: DemoPatterns;
  logger?: Logger;
};

export class DemoDataGenerator {
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly patterns: DemoPatterns;
  private readonly log: Logger;

  constructor(
    private readonly db: FoodPlannerDb,
    opts: DemoDataOptions = {},
  ) {
    this.random = opts.random ?? Math.random;
    this.now = opts.now ?? (() => new Date());
    this.patterns = opts.patterns ?? loadDemoPatterns();
    this.log = opts.logger ?? createLogger("demo-data");
  }

  private randInt(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  private choice<T>(items: readonly T[]): T {
    const item = items[Math.floor(this.random() * items.length)] ?? items[0];
    if (item === undefined) {
      throw new Error("choice() needs a non-empty list");
    }
    return item;
  }

  private weightedChoice<T>(items: readonly T[], weights: readonly number[]): T {
    const total = weights.reduce((a, b) => a + b, 0);
    let r = this.random() * total;
    for (let i = 0; i < items.length; i++) {
      r -= weights[i] ?? 0;
      const item = items[i];
      if (r < 0 && item !== undefined) {
        return item;
      }
    }
    return this.choice(items);
  }

  private pickFood(meal: MealType, foods: Food[], season: Season): Food {
    const pool = [...this.patterns.meals[meal].foods];
    const seasonal = this.patterns.seasonal[season];
    if (this.random() < SEASONAL_CHANCE && seasonal.length > 0) {
      pool.push(...seasonal);
    }
    const wanted = pool.map((name) => name.toLowerCase());
    const matching = foods.filter((food) => {
      const name = food.name.toLowerCase();
      return wanted.some((w) => name.includes(w));
    });
    return this.choice(matching.length > 0 ? matching : foods);
  }

  /** Grams by calorie density: dense foods get small portions. */
  private pickQuantity(pattern: MealPattern, food: Food): number {
    const density = toNumber(food.nutrition_data.calories_per_100g) ?? 200;
    if (density > 500) {
      return this.randInt(15, 50);
    }
    if (density > 300) {
      return this.randInt(50, 120);
    }
    return this.randInt(pattern.quantities[0], pattern.quantities[1]);
  }

  private pickTime(key: string, meal: MealType): string {
    const pattern = this.patterns.meals[meal];
    const hour = pattern.snackHours
      ? this.choice(pattern.snackHours)
      : this.randInt(pattern.hours[0], pattern.hours[1]);
    const minute = this.randInt(0, 59);
    return `${key}T${String(hour).padStart(2, "0")}:${String(minute).padStart(2, "0")}:00.000Z`;
  }

  private ensureFoods(): Food[] {
    const foods = this.db.listFoods();
    if (foods.length > 0) {
      return foods;
    }
    const inserted = this.db.insertFoods(loadStarterFoods());
    this.log.info("Seeded starter foods", { count: inserted.length });
    return inserted;
  }

  generate(userId: number, months: number): DemoDataResult {
    const foods = this.ensureFoods();
    const today = dateKey(this.now());
    const logs: NewFoodLog[] = [];
    const breakdown: Partial<Record<MealType, number>> = {};
    const datesWithLogs = new Set<string>();
    let calories = 0;

    for (let key = addDays(today, -months * 30); key <= today; key = addDays(key, 1)) {
      if (this.random() >= DAY_LOG_PROBABILITY) {
        continue;
      }
      const season = seasonOf(key);
      const weekday = new Date(`${key}T00:00:00.000Z`).getUTCDay();
      const isWeekend = weekday === 0 || weekday === 6;
      const notes = `Demo data for ${new Date(`${key}T00:00:00.000Z`).toLocaleDateString("en-US", {
        month: "long",
        day: "2-digit",
        year: "numeric",
        timeZone: "UTC",
      })}`;

      const meals: MealType[] = [];
      for (const meal of MEAL_TYPES) {
        if (meal === "snack") {
          const keep = isWeekend ? 0.7 : 0.5;
          const attempts = this.weightedChoice(SNACK_COUNTS, SNACK_COUNT_WEIGHTS);
          for (let i = 0; i < attempts; i++) {
            if (this.random() < keep) {
              meals.push("snack");
            }
          }
        } else if (this.random() < MEAL_PROBABILITY[meal]) {
          meals.push(meal);
        }
      }

      for (const meal of meals) {
        const food = this.pickFood(meal, foods, season);
        const quantity = this.pickQuantity(this.patterns.meals[meal], food);
        const loggedAt = this.pickTime(key, meal);
        logs.push({ userId, foodId: food.id, quantity, mealType: meal, loggedAt, notes });
        breakdown[meal] = (breakdown[meal] ?? 0) + 1;
        calories += logCalories({
          id: 0,
          user_id: userId,
          food_id: food.id,
          quantity,
          meal_type: meal,
          logged_at: loggedAt,
          notes,
          food,
        });
      }
      if (meals.length > 0) {
        datesWithLogs.add(key);
      }
    }

    const created = this.db.insertLogs(logs);
    const uniqueDates = datesWithLogs.size;
    this.log.info("Generated demo data", { userId, months, logs: created, days: uniqueDates });
    return {
      logs_created: created,
      unique_dates: uniqueDates,
      avg_calories_per_day: uniqueDates > 0 ? Math.round(calories / uniqueDates) : 0,
      meal_breakdown: breakdown,
      date_range: `${months} months`,
      message: `Successfully created ${created} demo food logs across ${uniqueDates} days`,
    };
  }
}
