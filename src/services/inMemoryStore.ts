import type { Account, MealRecord } from "../domain/types";
import type { Storage } from "../db/storage";

// Records are copied in and out so callers can't mutate stored state.
function clone<T>(value: T): T {
  return structuredClone(value);
}

export class InMemoryStore implements Storage {
  private readonly users = new Map<string, Account>();
  private readonly meals: MealRecord[] = [];

  async getAccount(email: string): Promise<Account | null> {
    const account = this.users.get(email);
    return account ? clone(account) : null;
  }

  async insertAccount(account: Account): Promise<boolean> {
    if (this.users.has(account.email)) return false;
    this.users.set(account.email, clone(account));
    return true;
  }

  async updateAccount(account: Account): Promise<void> {
    this.users.set(account.email, clone(account));
  }

  async insertMeal(meal: MealRecord): Promise<void> {
    this.meals.push(clone(meal));
  }

  async listMeals(email: string): Promise<MealRecord[]> {
    return this.meals.filter((m) => m.email === email).map(clone);
  }
}
