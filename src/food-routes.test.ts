import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  type TestServer,
  authHeader,
  foodDraft,
  makeTestServer,
  request,
} from "./test-utils.js";
import type { Food, FoodLogView } from "./types.js";

let server: TestServer;
let headers: Record<string, string>;

beforeEach(() => {
  server = makeTestServer({ config: { itemsPerPage: 2 } });
  headers = authHeader();
});

afterEach(() => {
  server.cleanup();
});

function call(method: string, url: string, body?: unknown) {
  return request(server.host, method, url, { body, headers });
}

async function logOatmeal(quantity = 100): Promise<FoodLogView> {
  const food = server.db.getFoodByUpc("12345670") ?? server.db.insertFood(foodDraft("Oatmeal", 68, { upc_code: "12345670" }));
  const res = await call("POST", "/api/food/log", { food_id: food.id, quantity, meal_type: "breakfast" });
  return res.json<{ log: FoodLogView }>().log;
}

describe("GET /food/search", () => {
  it("searches by name", async () => {
    server.db.insertFood(foodDraft("Brown Rice", 123));
    const res = await call("GET", "/food/search?q=rice");
    const body = res.json<{ query: string; upc: string; foods: Food[] }>();
    expect(body.query).toBe("rice");
    expect(body.upc).toBe("");
    expect(body.foods.map((f) => f.name)).toEqual(["Brown Rice"]);
  });

  it("searches by UPC", async () => {
    server.db.insertFood(foodDraft("Oatmeal", 68, { upc_code: "12345670" }));
    const found = await call("GET", "/food/search?upc=12345670");
    expect(found.json<{ foods: Food[] }>().foods.map((f) => f.name)).toEqual(["Oatmeal"]);

    const missing = await call("GET", "/food/search?upc=99999997");
    expect(missing.json<{ foods: Food[] }>().foods).toEqual([]);
  });

  it("returns nothing without a query", async () => {
    expect((await call("GET", "/food/search")).json()).toEqual({ query: "", upc: "", foods: [] });
  });
});

describe("POST /food/custom", () => {
  it("creates a food from per-100g values", async () => {
    const res = await call("POST", "/food/custom", {
      name: "Grandma's <em>Soup</em>",
      brand: "Home",
      calories: 45,
      protein: "3.5",
    });

    expect(res.statusCode).toBe(201);
    const { food, message } = res.json<{ food: Food; message: string }>();
    expect(food.name).toBe("Grandma's Soup");
    expect(message).toBe('Custom food "Grandma\'s Soup" added successfully');
    expect(food.nutrition_data).toEqual({
      calories_per_100g: 45,
      protein_per_100g: 3.5,
      carbs_per_100g: 0,
      fat_per_100g: 0,
      fiber_per_100g: 0,
      sugar_per_100g: 0,
      sodium_per_100g: 0,
    });
  });

  it("stores markup hidden inside broken tags as inert text", async () => {
    const res = await call("POST", "/food/custom", { name: "<<b>img src=x onerror=alert(1)>Cake" });

    expect(res.statusCode).toBe(201);
    expect(res.json<{ food: Food }>().food.name).toBe("&lt;img src=x onerror=alert(1)&gt;Cake");
  });

  it("rejects negative nutrients and blank names", async () => {
    expect((await call("POST", "/food/custom", { name: "Soup", calories: -1 })).statusCode).toBe(400);
    const blank = await call("POST", "/food/custom", { name: "<p></p>" });
    expect(blank.statusCode).toBe(400);
    expect(blank.json()).toEqual({ error: "Food name is required" });
  });
});

describe("GET /food/history", () => {
  it("pages through the user's logs", async () => {
    await logOatmeal(100);
    await logOatmeal(200);
    await logOatmeal(300);

    const page1 = await call("GET", "/food/history");
    const body = page1.json<{ logs: FoodLogView[]; pagination: unknown }>();
    expect(body.logs.map((l) => l.quantity)).toEqual([300, 200]);
    expect(body.pagination).toEqual({
      page: 1,
      per_page: 2,
      total: 3,
      pages: 2,
      has_next: true,
      has_prev: false,
    });

    const page2 = await call("GET", "/food/history?page=2");
    expect(page2.json<{ logs: FoodLogView[] }>().logs.map((l) => l.quantity)).toEqual([100]);
  });

  it("reports one empty page when there is nothing logged", async () => {
    const res = await call("GET", "/food/history");
    expect(res.json()).toEqual({
      logs: [],
      pagination: { page: 1, per_page: 2, total: 0, pages: 1, has_next: false, has_prev: false },
    });
  });
});

describe("/food/logs/:id", () => {
  it("edits the user's own log", async () => {
    const log = await logOatmeal(100);
    const res = await call("PUT", `/food/logs/${log.id}`, { quantity: 250, meal_type: "snack" });

    expect(res.statusCode).toBe(200);
    const body = res.json<{ log: FoodLogView; message: string }>();
    expect(body.message).toBe("Food log updated successfully");
    expect(body.log.quantity).toBe(250);
    expect(body.log.meal_type).toBe("snack");
    expect(body.log.calories).toBe(170);
  });

  it("deletes the user's own log", async () => {
    const log = await logOatmeal(100);
    const res = await call("DELETE", `/food/logs/${log.id}`);
    expect(res.json<{ deleted: boolean }>().deleted).toBe(true);
    expect(server.db.getLog(log.id)).toBeNull();
  });

  it("protects other users' logs", async () => {
    const log = await logOatmeal(100);
    headers = authHeader({ sub: "auth0|eve", email: "eve@example.com" });

    const edit = await call("PUT", `/food/logs/${log.id}`, { quantity: 1 });
    expect(edit.statusCode).toBe(403);
    expect(edit.json()).toEqual({ error: "You can only edit your own food logs" });

    const del = await call("DELETE", `/food/logs/${log.id}`);
    expect(del.statusCode).toBe(403);
    expect(del.json()).toEqual({ error: "You can only delete your own food logs" });
    expect(server.db.getLog(log.id)).not.toBeNull();
  });

  it("answers 404 and 405", async () => {
    expect((await call("DELETE", "/food/logs/999")).statusCode).toBe(404);
    expect((await call("GET", "/food/logs/1")).statusCode).toBe(405);
    expect((await call("DELETE", "/food/logs/abc")).statusCode).toBe(400);
  });
});
