import fs from "fs/promises";
import path from "path";
import type { Account, DataFile, MealRecord } from "../domain/types";
import { DataFileSchema } from "../schema";
import { StorageError, parseStored, type Storage } from "./storage";

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Single JSON document `{ users, meals }`, read on every call and rewritten
 * wholesale on every mutation.
 *
 * Calls on one instance run one at a time. Nothing coordinates separate
 * processes (or two instances) sharing the same file.
 */
export class JsonFileStore implements Storage {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  /**
   * Run `task` after everything queued before it. A failed task rejects its
   * own caller only; the queue moves on.
   */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async load(): Promise<DataFile> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (!isMissingFile(err)) throw err;
      const empty: DataFile = { users: {}, meals: [] };
      await this.save(empty);
      return empty;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      throw new StorageError(`${this.filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    return parseStored(DataFileSchema, decoded, `document ${this.filePath}`);
  }

  private async save(data: DataFile): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(data, null, 2), "utf8");
  }

  getAccount(email: string): Promise<Account | null> {
    return this.serialize(async () => {
      const db = await this.load();
      return db.users[email] ?? null;
    });
  }

  insertAccount(account: Account): Promise<boolean> {
    return this.serialize(async () => {
      const db = await this.load();
      if (db.users[account.email]) return false;
      db.users[account.email] = account;
      await this.save(db);
      return true;
    });
  }

  updateAccount(account: Account): Promise<void> {
    return this.serialize(async () => {
      const db = await this.load();
      db.users[account.email] = account;
      await this.save(db);
    });
  }

  insertMeal(meal: MealRecord): Promise<void> {
    return this.serialize(async () => {
      const db = await this.load();
      db.meals.push(meal);
      await this.save(db);
    });
  }

  listMeals(email: string): Promise<MealRecord[]> {
    return this.serialize(async () => {
      const db = await this.load();
      return db.meals.filter((m) => m.email === email);
    });
  }
}
