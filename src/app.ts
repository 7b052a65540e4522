import express, { type Express, type Request, type Response } from "express";
import cors from "cors";
import morgan from "morgan";
import type { Env } from "./middleware/validateEnv";
import { getAllowedOrigins } from "./middleware/validateEnv";
import { authMiddleware } from "./middleware/auth";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { rateLimitMiddleware } from "./middleware/rateLimiter";
import { createAuthRouter } from "./routes/auth";
import { createGoalsRouter } from "./routes/goals";
import { createMealsRouter } from "./routes/meals";
import type { AppServices } from "./services";

export interface AppOptions {
  env: Env;
  services: AppServices;
}

export function createApp({ env, services }: AppOptions): Express {
  const app = express();

  // ======================================================================
  //                     CORE MIDDLEWARE (CORS, LOGGING, BODY)
  // ======================================================================

  const allowlist = getAllowedOrigins(env);

  app.use(
    cors({
      origin: (origin, cb) => {
        // Allow server-to-server/no-origin requests, and everyone when no allowlist is configured
        if (!origin || !allowlist) return cb(null, true);
        if (allowlist.includes(origin)) return cb(null, true);
        return cb(null, false);
      },
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "Accept"],
    })
  );

  if (env.NODE_ENV !== "test") {
    app.use(morgan("dev"));
  }

  // Base64 images ride in JSON bodies on /analyze
  app.use(express.json({ limit: "2mb" }));
  app.use(express.urlencoded({ extended: true }));

  // ======================================================================
  //                       HEALTH CHECK + ROUTES
  // ======================================================================

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).send("ok");
  });

  const authLimit = rateLimitMiddleware({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    maxRequests: env.RATE_LIMIT_AUTH_MAX,
    message: "Too many attempts, please try again later",
  });
  app.use(["/register", "/login"], authLimit);

  app.use(createAuthRouter(services));

  // Everything below requires a bearer token
  const requireAuth = authMiddleware(services.sessions);
  app.use(
    ["/set-goal", "/get-goal", "/calibrate", "/analyze", "/add-meal", "/today", "/history"],
    requireAuth
  );
  app.use(createGoalsRouter(services));
  app.use(createMealsRouter(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export default createApp;
