import { Type } from "@sinclair/typebox";

export const MealTypeSchema = Type.Union([
  Type.Literal("breakfast"),
  Type.Literal("lunch"),
  Type.Literal("dinner"),
  Type.Literal("snack"),
]);

export const LogFoodBody = Type.Object({
  food_id: Type.Integer({ minimum: 1 }),
  quantity: Type.Number({ exclusiveMinimum: 0, maximum: 10_000 }),
  meal_type: MealTypeSchema,
  notes: Type.Optional(Type.String({ maxLength: 500 })),
});

export const UpdateLogBody = Type.Object({
  quantity: Type.Optional(Type.Number({ exclusiveMinimum: 0, maximum: 10_000 })),
  meal_type: Type.Optional(MealTypeSchema),
  notes: Type.Optional(Type.String({ maxLength: 500 })),
});

const Nutrient = Type.Optional(Type.Number({ minimum: 0 }));

export const CustomFoodBody = Type.Object({
  name: Type.String({ minLength: 1, maxLength: 200 }),
  brand: Type.Optional(Type.String({ maxLength: 100 })),
  ingredients: Type.Optional(Type.String({ maxLength: 2000 })),
  calories: Nutrient,
  protein: Nutrient,
  carbs: Nutrient,
  fat: Nutrient,
  fiber: Nutrient,
  sugar: Nutrient,
  sodium: Nutrient,
});

const CalorieGoal = Type.Integer({ minimum: 500, maximum: 10_000 });
const Cuisine = Type.Union([Type.String({ maxLength: 100 }), Type.Null()]);
const Restrictions = Type.Array(Type.String({ maxLength: 50 }), { maxItems: 20 });

export const PreferencesBody = Type.Object({
  daily_calorie_goal: Type.Optional(CalorieGoal),
  preferred_cuisine: Type.Optional(Cuisine),
  dietary_restrictions: Type.Optional(Restrictions),
});

export const RecommendBody = Type.Object({
  type: Type.Optional(
    Type.Union([Type.Literal("meal"), Type.Literal("snack"), Type.Literal("alternative")]),
  ),
});

export const RateBody = Type.Object({
  rating: Type.Union([Type.Literal(1), Type.Literal(-1)]),
});

export const InsightsBody = Type.Object({
  days: Type.Optional(Type.Integer({ minimum: 1, maximum: 365 })),
});

export const AlternativesBody = Type.Object({
  food_name: Type.String({ minLength: 1, maxLength: 200 }),
});

export const DemoDataBody = Type.Object({
  months: Type.Optional(Type.Integer({ minimum: 1, maximum: 24 })),
});

export const PlanBody = Type.Object({
  meals_planned: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  nutritional_goals: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

export const ScanBody = Type.Object({
  image: Type.String({ minLength: 1 }),
  media_type: Type.Optional(Type.String()),
  filename: Type.Optional(Type.String()),
});
