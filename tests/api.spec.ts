import { describe, it, expect, beforeEach, afterEach, beforeAll, afterAll, vi } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import request from "supertest";
import type { Express } from "express";
import { createApp } from "../src/app";
import { createServices, type AppServices } from "../src/services";
import { InMemoryStore } from "../src/services/inMemoryStore";
import { JsonFileStore } from "../src/db/jsonFileStore";
import { SessionGate } from "../src/middleware/auth";
import { HOUR_MS, manualClock, testEnv } from "./helpers";

function buildApp(envOverrides: Record<string, string> = {}) {
  const clock = manualClock("2026-03-10T08:00:00.000Z");
  const env = testEnv(envOverrides);
  const services = createServices(new InMemoryStore(), env, { clock: clock.now });
  const app = createApp({ env, services });
  return { app, clock, services };
}

async function registerAndLogin(app: Express, email = "a@x.com", password = "pw123", name = "Ann") {
  await request(app).post("/register").send({ name, email, password }).expect(201);
  const res = await request(app).post("/login").send({ email, password }).expect(200);
  return `Bearer ${res.body.token}`;
}

describe("HTTP API", () => {
  let app: Express;
  let clock: ReturnType<typeof manualClock>;
  let services: AppServices;

  beforeAll(() => {
    // auth rejections and 500s are logged; keep test output readable
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterAll(() => {
    vi.restoreAllMocks();
  });

  beforeEach(() => {
    ({ app, clock, services } = buildApp());
  });

  it("GET /health", async () => {
    const res = await request(app).get("/health").expect(200);
    expect(res.text).toBe("ok");
  });

  it("walks through a day of tracking and resets the next day", async () => {
    const reg = await request(app)
      .post("/register")
      .send({ name: "Ann", email: "a@x.com", password: "pw123" })
      .expect(201);
    expect(reg.body).toEqual({ ok: true, msg: "registered" });

    const login = await request(app).post("/login").send({ email: "a@x.com", password: "pw123" }).expect(200);
    expect(login.body).toMatchObject({
      ok: true,
      email: "a@x.com",
      name: "Ann",
      goal: { calories: 2000, protein: 100, carbs: 250, fats: 70 },
      calibration: null,
      tokenType: "Bearer",
      expiresIn: "24h",
      today: { calories: 0, protein: 0, carbs: 0, fats: 0 },
    });
    expect(login.body).not.toHaveProperty("passwordHash");
    const auth = `Bearer ${login.body.token}`;

    const goal = await request(app)
      .post("/set-goal")
      .set("Authorization", auth)
      .send({ calories: 2200, protein: 120, carbs: 260, fats: 80 })
      .expect(200);
    expect(goal.body.goal).toEqual({ calories: 2200, protein: 120, carbs: 260, fats: 80 });

    await request(app)
      .post("/add-meal")
      .set("Authorization", auth)
      .send({ name: "Lunch", macros: { calories: 300 } })
      .expect(201);
    clock.advance(2 * HOUR_MS);
    await request(app)
      .post("/add-meal")
      .set("Authorization", auth)
      .send({ name: "Snack", macros: { calories: 150 } })
      .expect(201);

    const today = await request(app).get("/today").set("Authorization", auth).expect(200);
    expect(today.body.date).toBe("2026-03-10");
    expect(today.body.totals.calories).toBe(450);
    expect(today.body.goal).toEqual({ calories: 2200, protein: 120, carbs: 260, fats: 80 });
    expect(today.body.meals).toHaveLength(2);

    clock.set("2026-03-11T00:30:00.000Z");
    const tomorrow = await request(app).get("/today").set("Authorization", auth).expect(200);
    expect(tomorrow.body.date).toBe("2026-03-11");
    expect(tomorrow.body.totals).toEqual({ calories: 0, protein: 0, carbs: 0, fats: 0 });
  });

  describe("POST /register", () => {
    it("rejects a duplicate email", async () => {
      await request(app).post("/register").send({ name: "Ann", email: "a@x.com", password: "pw123" }).expect(201);
      const res = await request(app)
        .post("/register")
        .send({ name: "Ann", email: "A@X.COM", password: "pw123" })
        .expect(400);

      expect(res.body).toEqual({ ok: false, error: "Email already registered" });
    });

    it("rejects a short password", async () => {
      const res = await request(app)
        .post("/register")
        .send({ name: "Ann", email: "a@x.com", password: "abc" })
        .expect(400);

      expect(res.body.error).toBe("Password too short (min 4 chars)");
    });

    it("rejects a malformed email", async () => {
      const res = await request(app)
        .post("/register")
        .send({ name: "Ann", email: "not-an-email", password: "pw123" })
        .expect(400);

      expect(res.body.error).toBe("Validation failed");
    });

    it("rejects malformed JSON", async () => {
      const res = await request(app)
        .post("/register")
        .set("Content-Type", "application/json")
        .send("{ nope")
        .expect(400);

      expect(res.body).toEqual({ ok: false, error: "Malformed JSON body" });
    });
  });

  describe("POST /login", () => {
    it("rejects a wrong password", async () => {
      await request(app).post("/register").send({ name: "Ann", email: "a@x.com", password: "pw123" }).expect(201);
      const res = await request(app).post("/login").send({ email: "a@x.com", password: "pw12" }).expect(401);

      expect(res.body).toEqual({ ok: false, error: "Invalid credentials" });
    });

    it("is rate limited", async () => {
      ({ app } = buildApp({ RATE_LIMIT_AUTH_MAX: "2" }));

      await request(app).post("/login").send({ email: "a@x.com", password: "pw123" }).expect(401);
      await request(app).post("/login").send({ email: "a@x.com", password: "pw123" }).expect(401);
      const res = await request(app).post("/login").send({ email: "a@x.com", password: "pw123" }).expect(429);

      expect(res.body.ok).toBe(false);
      expect(res.headers["retry-after"]).toBeDefined();
    });
  });

  describe("session gate", () => {
    it("requires a token on protected routes", async () => {
      for (const path of ["/get-goal", "/today", "/history"]) {
        const res = await request(app).get(path).expect(401);
        expect(res.body).toEqual({ ok: false, error: "Authentication required" });
      }
      await request(app).post("/add-meal").send({ macros: { calories: 1 } }).expect(401);
    });

    it("ignores an email supplied in the body or query", async () => {
      await registerAndLogin(app);
      await request(app).get("/today?email=a@x.com").expect(401);
      await request(app).post("/set-goal").send({ email: "a@x.com", calories: 1, protein: 1, carbs: 1, fats: 1 }).expect(401);
    });

    it("rejects an expired token", async () => {
      const auth = await registerAndLogin(app);
      clock.advance(24 * HOUR_MS + 1000);

      const res = await request(app).get("/today").set("Authorization", auth).expect(401);
      expect(res.body.error).toBe("Invalid or expired token");
    });

    it("rejects a token signed with another key", async () => {
      await registerAndLogin(app);
      const foreign = new SessionGate({ secret: "another-test-secret" }).issue("a@x.com");

      await request(app).get("/today").set("Authorization", `Bearer ${foreign}`).expect(401);
    });

    it("404s when the token's account does not exist", async () => {
      const auth = `Bearer ${services.sessions.issue("ghost@x.com")}`;

      const res = await request(app).get("/get-goal").set("Authorization", auth).expect(404);
      expect(res.body).toEqual({ ok: false, error: "User not found" });
    });
  });

  describe("goals", () => {
    it("accepts a nested goal and reports it from /get-goal", async () => {
      const auth = await registerAndLogin(app);
      await request(app)
        .post("/set-goal")
        .set("Authorization", auth)
        .send({ goal: { calories: 1800, protein: 90, carbs: 200, fats: 60 } })
        .expect(200);

      const res = await request(app).get("/get-goal").set("Authorization", auth).expect(200);
      expect(res.body).toEqual({
        ok: true,
        goal: { calories: 1800, protein: 90, carbs: 200, fats: 60 },
        calibration: null,
        today: { calories: 0, protein: 0, carbs: 0, fats: 0 },
      });
    });

    it("rejects a non-positive component and keeps the old goal", async () => {
      const auth = await registerAndLogin(app);
      const res = await request(app)
        .post("/set-goal")
        .set("Authorization", auth)
        .send({ calories: 2200, protein: 0, carbs: 260, fats: 80 })
        .expect(400);
      expect(res.body.error).toBe("Goal protein must be a positive number");

      const after = await request(app).get("/get-goal").set("Authorization", auth).expect(200);
      expect(after.body.goal).toEqual({ calories: 2000, protein: 100, carbs: 250, fats: 70 });
    });

    it("rejects a partial goal", async () => {
      const auth = await registerAndLogin(app);
      const res = await request(app).post("/set-goal").set("Authorization", auth).send({ calories: 2200 }).expect(400);

      expect(res.body.error).toBe("Validation failed");
    });
  });

  describe("POST /analyze", () => {
    it("logs fixed defaults when nothing is supplied", async () => {
      const auth = await registerAndLogin(app);
      const res = await request(app).post("/analyze").set("Authorization", auth).send({}).expect(201);

      expect(res.body.estimator).toBe("fixed-default");
      expect(res.body.macros).toEqual({ calories: 250, protein: 12, carbs: 30, fats: 8 });
      expect(res.body.today).toEqual({ calories: 250, protein: 12, carbs: 30, fats: 8 });
      expect(res.body.meal.name).toBe("Meal");
    });

    it("scales hints by the stored calibration", async () => {
      const auth = await registerAndLogin(app);
      const cal = await request(app)
        .post("/calibrate")
        .set("Authorization", auth)
        .send({ small: 0.5, medium: 1.2, large: 2 })
        .expect(200);
      expect(cal.body).toEqual({ ok: true, calibration: { small: 0.5, medium: 1.2, large: 2 } });

      const res = await request(app)
        .post("/analyze")
        .set("Authorization", auth)
        .send({ name: "Poke", calories: 400, protein: 20, carbs: 50, fats: 10, bowl_size: "medium", portion: 50 })
        .expect(201);

      expect(res.body.estimator).toBe("calibrated-scale");
      expect(res.body.macros).toEqual({ calories: 240, protein: 12, carbs: 30, fats: 6 });
    });

    it("runs the image heuristic on a base64 payload", async () => {
      const auth = await registerAndLogin(app);
      const res = await request(app)
        .post("/analyze")
        .set("Authorization", auth)
        .send({ image: "data:image/jpeg;base64,aGVsbG8=" })
        .expect(201);

      expect(res.body.estimator).toBe("image-heuristic");
      expect(res.body.macros).toEqual({ calories: 155, protein: 10, carbs: 20, fats: 8 });
    });

    it("accepts a multipart upload", async () => {
      const auth = await registerAndLogin(app);
      const res = await request(app)
        .post("/analyze")
        .set("Authorization", auth)
        .field("portion", "200")
        .attach("image", Buffer.from("hello"), "bowl.jpg")
        .expect(201);

      expect(res.body.estimator).toBe("image-heuristic");
      expect(res.body.macros).toEqual({ calories: 310, protein: 20, carbs: 40, fats: 16 });
    });

    it("rejects an unknown bowl size", async () => {
      const auth = await registerAndLogin(app);
      await request(app).post("/analyze").set("Authorization", auth).send({ bowl_size: "huge" }).expect(400);
    });
  });

  describe("GET /history", () => {
    it("lists every meal newest first", async () => {
      const auth = await registerAndLogin(app);
      for (const name of ["breakfast", "lunch", "dinner"]) {
        await request(app)
          .post("/add-meal")
          .set("Authorization", auth)
          .send({ name, macros: { calories: 100, protein: 5, carbs: 10, fats: 2 } })
          .expect(201);
        clock.advance(HOUR_MS);
      }
      clock.set("2026-03-12T08:00:00.000Z");
      const fresh = await request(app).post("/login").send({ email: "a@x.com", password: "pw123" }).expect(200);

      const res = await request(app).get("/history").set("Authorization", `Bearer ${fresh.body.token}`).expect(200);
      expect(res.body.meals.map((m: { name: string }) => m.name)).toEqual(["dinner", "lunch", "breakfast"]);
    });
  });

  it("answers unknown routes with JSON 404", async () => {
    const res = await request(app).get("/nope").expect(404);
    expect(res.body).toEqual({ ok: false, error: "Not Found: GET /nope" });
  });

  describe("with the JSON file backend", () => {
    let dir: string;
    let file: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "nutrition-api-"));
      file = path.join(dir, "db.json");
      const env = testEnv({ STORAGE_DRIVER: "file", DATA_FILE: file });
      services = createServices(new JsonFileStore(file), env, { clock: clock.now });
      app = createApp({ env, services });
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it("records every meal from concurrent requests", async () => {
      const auth = await registerAndLogin(app);

      const responses = await Promise.all(
        Array.from({ length: 20 }, (_, i) =>
          request(app)
            .post("/add-meal")
            .set("Authorization", auth)
            .send({ name: `bite-${i}`, macros: { calories: 10 } })
        )
      );
      expect(responses.map((r) => r.status)).toEqual(Array(20).fill(201));

      const history = await request(app).get("/history").set("Authorization", auth).expect(200);
      expect(history.body.meals).toHaveLength(20);
      const today = await request(app).get("/today").set("Authorization", auth).expect(200);
      expect(today.body.totals.calories).toBe(200);
    });

    it("answers a damaged record with a generic 500", async () => {
      const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
      const auth = await registerAndLogin(app);

      const onDisk = JSON.parse(await fs.readFile(file, "utf8"));
      delete onDisk.users["a@x.com"].goal.fats;
      await fs.writeFile(file, JSON.stringify(onDisk));

      const res = await request(app).get("/get-goal").set("Authorization", auth).expect(500);
      expect(res.body).toEqual({ ok: false, error: "Internal server error" });
      expect(errors).toHaveBeenCalledTimes(1);
    });
  });
});
