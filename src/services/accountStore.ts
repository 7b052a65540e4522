import type { Storage } from "../db/storage";
import { ConflictError, InvalidInputError, NotFoundError, UnauthorizedError } from "../domain/errors";
import type { Account, BowlSize, Calibration, Goal, PublicAccount } from "../domain/types";
import { type Clock, systemClock } from "../utils/date";
import { SALT_ROUNDS, hashPassword, verifyPassword } from "./passwords";

export interface AccountStoreOptions {
  minPasswordLength?: number;
  /** bcrypt cost factor. */
  saltRounds?: number;
  defaultGoal?: Goal;
  clock?: Clock;
}

export interface RegisterInput {
  name: string;
  email: string;
  password: string;
  bowlSize?: BowlSize;
  targetWeight?: number;
}

export const DEFAULT_GOAL: Goal = { calories: 2000, protein: 100, carbs: 250, fats: 70 };

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function toPublic(account: Account): PublicAccount {
  const { passwordHash: _hash, ...rest } = account;
  return rest;
}

function requirePositive(label: string, values: Record<string, number>): void {
  for (const [key, value] of Object.entries(values)) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidInputError(`${label} ${key} must be a positive number`);
    }
  }
}

export class AccountStore {
  private readonly minPasswordLength: number;
  private readonly saltRounds: number;
  private readonly defaultGoal: Goal;
  private readonly clock: Clock;

  constructor(private readonly storage: Storage, options: AccountStoreOptions = {}) {
    this.minPasswordLength = options.minPasswordLength ?? 4;
    this.saltRounds = options.saltRounds ?? SALT_ROUNDS;
    this.defaultGoal = options.defaultGoal ?? DEFAULT_GOAL;
    this.clock = options.clock ?? systemClock;
  }

  async register(input: RegisterInput): Promise<PublicAccount> {
    const email = normalizeEmail(input.email);

    if (await this.storage.getAccount(email)) {
      throw new ConflictError("Email already registered");
    }
    if (input.password.length < this.minPasswordLength) {
      throw new InvalidInputError(`Password too short (min ${this.minPasswordLength} chars)`);
    }

    const account: Account = {
      email,
      name: input.name,
      passwordHash: await hashPassword(input.password, this.saltRounds),
      goal: { ...this.defaultGoal },
      calibration: null,
      profile: {},
      created: this.clock().toISOString(),
    };
    if (input.bowlSize) account.profile.bowlSize = input.bowlSize;
    if (input.targetWeight !== undefined) account.profile.targetWeight = input.targetWeight;

    // A concurrent registration can slip past the lookup above
    if (!(await this.storage.insertAccount(account))) {
      throw new ConflictError("Email already registered");
    }
    return toPublic(account);
  }

  /**
   * Unknown email and wrong password fail identically.
   */
  async login(email: string, password: string): Promise<PublicAccount> {
    const account = await this.storage.getAccount(normalizeEmail(email));
    if (!account || !(await verifyPassword(password, account.passwordHash))) {
      throw new UnauthorizedError("Invalid credentials");
    }
    return toPublic(account);
  }

  async getProfile(email: string): Promise<PublicAccount> {
    return toPublic(await this.require(email));
  }

  async getGoal(email: string): Promise<Goal> {
    return (await this.require(email)).goal;
  }

  /**
   * Replaces the stored goal wholesale; no field is carried over.
   */
  async setGoal(email: string, goal: Goal): Promise<Goal> {
    const account = await this.require(email);
    requirePositive("Goal", { ...goal });

    account.goal = {
      calories: goal.calories,
      protein: goal.protein,
      carbs: goal.carbs,
      fats: goal.fats,
    };
    await this.storage.updateAccount(account);
    return account.goal;
  }

  async setCalibration(email: string, calibration: Calibration): Promise<Calibration> {
    const account = await this.require(email);
    requirePositive("Calibration", { ...calibration });

    account.calibration = {
      small: calibration.small,
      medium: calibration.medium,
      large: calibration.large,
    };
    await this.storage.updateAccount(account);
    return account.calibration;
  }

  private async require(email: string): Promise<Account> {
    const account = await this.storage.getAccount(normalizeEmail(email));
    if (!account) {
      throw new NotFoundError("User not found");
    }
    return account;
  }
}
