import { hash, compare } from "bcryptjs";

export const SALT_ROUNDS = 12;

/**
 * Hashes a password using bcrypt
 */
export async function hashPassword(password: string, rounds: number = SALT_ROUNDS): Promise<string> {
  return await hash(password, rounds);
}

/**
 * Compares a plain text password with a stored bcrypt hash.
 * Anything that isn't a bcrypt hash never matches.
 */
export async function verifyPassword(password: string, hashedPassword: string): Promise<boolean> {
  return await compare(password, hashedPassword);
}
