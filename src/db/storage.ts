import type { z } from "zod";
import type { Account, MealRecord } from "../domain/types";

/**
 * Persistence seam for the account store and meal ledger.
 *
 * Each call is one logical read or write; nothing spans records. Two
 * concurrent `updateAccount` calls for the same email race and the last
 * write wins.
 */
export interface Storage {
  getAccount(email: string): Promise<Account | null>;
  /** Resolves false (and writes nothing) when the email is already taken. */
  insertAccount(account: Account): Promise<boolean>;
  updateAccount(account: Account): Promise<void>;
  insertMeal(meal: MealRecord): Promise<void>;
  /** Meals owned by `email`, in insertion order. */
  listMeals(email: string): Promise<MealRecord[]>;
}

export const STORAGE_DRIVERS = ["memory", "file", "postgres"] as const;
export type StorageDriver = (typeof STORAGE_DRIVERS)[number];

/**
 * Persisted data that no longer matches its schema. Not the caller's fault,
 * so it is answered as a server error.
 */
export class StorageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StorageError";
  }
}

/**
 * Validate something read back from a backend, raising StorageError instead
 * of a ZodError.
 */
export function parseStored<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new StorageError(`Stored ${what} is invalid (${issues})`);
  }
  return result.data;
}
