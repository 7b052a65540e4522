// src/middleware/validateEnv.ts
import { z } from "zod";
import { STORAGE_DRIVERS } from "../db/storage";

const positiveNumber = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) => Number(v))
    .pipe(z.number().positive());

/**
 * Environment variable validation schema.
 * Validates all required environment variables at startup.
 */
const envSchema = z
  .object({
    // Server
    PORT: z.string().default("3000").transform((v) => Number(v)).pipe(z.number().int().nonnegative()),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

    // Storage
    STORAGE_DRIVER: z.enum(STORAGE_DRIVERS).default("file"),
    DATA_FILE: z.string().default("db_demo.json"),
    DATABASE_URL: z.string().optional(),

    // JWT Authentication
    JWT_SECRET: z.string().min(16, "JWT_SECRET must be at least 16 characters"),
    JWT_EXPIRES_IN: z
      .string()
      .regex(/^\d+(d|h|m|s)$/, "JWT_EXPIRES_IN must look like 24h, 60m, 7d")
      .default("24h"),

    // CORS
    ALLOWED_ORIGINS: z.string().optional(),

    // Accounts
    MIN_PASSWORD_LENGTH: positiveNumber("4"),
    PASSWORD_SALT_ROUNDS: z.string().default("12").transform((v) => Number(v)).pipe(z.number().int().min(4).max(15)),
    DEFAULT_CALORIES_TARGET: positiveNumber("2000"),
    DEFAULT_PROTEIN_TARGET: positiveNumber("100"),
    DEFAULT_CARBS_TARGET: positiveNumber("250"),
    DEFAULT_FAT_TARGET: positiveNumber("70"),

    // Rate limiting (register + login)
    RATE_LIMIT_WINDOW_MS: positiveNumber("60000"),
    RATE_LIMIT_AUTH_MAX: positiveNumber("10"),
  })
  .refine((env) => env.STORAGE_DRIVER !== "postgres" || !!env.DATABASE_URL, {
    message: "DATABASE_URL is required when STORAGE_DRIVER=postgres",
    path: ["DATABASE_URL"],
  });

export type Env = z.infer<typeof envSchema>;

let validatedEnv: Env | null = null;

/**
 * Parse an environment without touching the process-wide cache.
 * Throws if required variables are missing or invalid.
 */
export function parseEnvironment(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error("Environment validation failed:");
    for (const error of result.error.errors) {
      console.error(`  - ${error.path.join(".")}: ${error.message}`);
    }
    throw new Error("Invalid environment configuration. See errors above.");
  }

  return result.data;
}

/**
 * Validates process.env at startup and caches the result.
 * Logs warnings for optional but recommended variables.
 */
export function validateEnvironment(source: NodeJS.ProcessEnv = process.env): Env {
  if (validatedEnv) return validatedEnv;

  validatedEnv = parseEnvironment(source);

  const warnings: string[] = [];

  if (validatedEnv.STORAGE_DRIVER === "memory" && validatedEnv.NODE_ENV !== "test") {
    warnings.push("STORAGE_DRIVER=memory - accounts and meals are lost on restart");
  }

  if (!validatedEnv.ALLOWED_ORIGINS && validatedEnv.NODE_ENV === "production") {
    warnings.push("ALLOWED_ORIGINS is not set - CORS allows every origin");
  }

  if (warnings.length > 0) {
    console.warn("\nEnvironment warnings:");
    warnings.forEach((w) => console.warn(`  - ${w}`));
    console.warn("");
  }

  console.log("Environment validation passed");
  return validatedEnv;
}

export function getAllowedOrigins(env: Env): string[] | null {
  if (!env.ALLOWED_ORIGINS) return null;
  return env.ALLOWED_ORIGINS.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export default validateEnvironment;
