import { parseEnvironment, type Env } from "../src/middleware/validateEnv";

export const TEST_SECRET = "test-secret-0123456789";

export function testEnv(overrides: Record<string, string> = {}): Env {
  return parseEnvironment({
    NODE_ENV: "test",
    STORAGE_DRIVER: "memory",
    JWT_SECRET: TEST_SECRET,
    PASSWORD_SALT_ROUNDS: "4",
    ...overrides,
  });
}

/** Lowest bcrypt cost, for tests that register accounts. */
export const TEST_SALT_ROUNDS = 4;

/** A clock tests can move by hand. */
export function manualClock(start: string) {
  let current = new Date(start);
  return {
    now: () => new Date(current.getTime()),
    set: (iso: string) => {
      current = new Date(iso);
    },
    advance: (ms: number) => {
      current = new Date(current.getTime() + ms);
    },
  };
}

export const HOUR_MS = 60 * 60 * 1000;
