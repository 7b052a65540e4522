// src/middleware/auth.ts
// Session gate: signed, time-limited bearer tokens

import type { Request, Response, NextFunction } from "express";
import crypto from "crypto";
import { z } from "zod";
import { UnauthorizedError } from "../domain/errors";
import { type Clock, systemClock, toUnixSeconds } from "../utils/date";

/**
 * JWT-shaped token signed with HMAC-SHA256 (node crypto, no jwt library).
 *
 * Token format: base64url(header).base64url(payload).base64url(signature)
 *
 * Validity is decided by signature and expiry alone; nothing is looked up
 * server-side.
 */

export interface AuthPayload {
  sub: string;  // account email
  iat: number;  // issued at (unix timestamp)
  exp: number;  // expires at (unix timestamp)
}

const AuthPayloadSchema = z.object({
  sub: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
});

export interface AuthenticatedRequest extends Request {
  auth?: AuthPayload;
}

function base64urlEncode(data: string): string {
  return Buffer.from(data)
    .toString("base64")
    .replace(/\+/g, "-")
    .replace(/\//g, "_")
    .replace(/=+$/, "");
}

function base64urlDecode(data: string): string {
  const padded = data + "=".repeat((4 - (data.length % 4)) % 4);
  return Buffer.from(padded.replace(/-/g, "+").replace(/_/g, "/"), "base64").toString();
}

function sign(payload: string, secret: string): string {
  return crypto
    .createHmac("sha256", secret)
    .update(payload)
    .digest("base64")
    .replace(/\+/g, "-")
    .replace(/\//g, "_")
    .replace(/=+$/, "");
}

function signaturesMatch(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && crypto.timingSafeEqual(left, right);
}

/**
 * Parse an expiry like "24h", "7d", "60m" or "30s" into seconds.
 */
export function parseExpiresIn(expiresIn: string): number {
  const match = expiresIn.match(/^(\d+)(d|h|m|s)$/);
  if (!match) {
    throw new Error(`Invalid token lifetime: ${expiresIn}`);
  }
  const value = parseInt(match[1], 10);
  switch (match[2]) {
    case "d": return value * 24 * 60 * 60;
    case "h": return value * 60 * 60;
    case "m": return value * 60;
    default: return value;
  }
}

/**
 * Create an authentication token for an account.
 */
export function createToken(
  email: string,
  secret: string,
  expiresIn: string = "24h",
  now: number = toUnixSeconds(new Date())
): string {
  const header = { alg: "HS256", typ: "JWT" };
  const payload: AuthPayload = {
    sub: email,
    iat: now,
    exp: now + parseExpiresIn(expiresIn),
  };

  const headerB64 = base64urlEncode(JSON.stringify(header));
  const payloadB64 = base64urlEncode(JSON.stringify(payload));
  const signature = sign(`${headerB64}.${payloadB64}`, secret);

  return `${headerB64}.${payloadB64}.${signature}`;
}

/**
 * Verify and decode an authentication token.
 * Returns null for a bad signature, a malformed payload, or `exp < now`.
 */
export function verifyToken(
  token: string,
  secret: string,
  now: number = toUnixSeconds(new Date())
): AuthPayload | null {
  const parts = token.split(".");
  if (parts.length !== 3) return null;

  const [headerB64, payloadB64, signature] = parts;

  const expectedSig = sign(`${headerB64}.${payloadB64}`, secret);
  if (!signaturesMatch(signature, expectedSig)) return null;

  let decoded: unknown;
  try {
    decoded = JSON.parse(base64urlDecode(payloadB64));
  } catch {
    return null;
  }

  const parsed = AuthPayloadSchema.safeParse(decoded);
  if (!parsed.success) return null;

  if (parsed.data.exp < now) return null;

  return parsed.data;
}

export interface SessionGateOptions {
  secret: string;
  expiresIn?: string;
  clock?: Clock;
}

/**
 * Issues tokens at login and authenticates them on protected requests.
 */
export class SessionGate {
  private readonly secret: string;
  readonly expiresIn: string;
  private readonly clock: Clock;

  constructor(options: SessionGateOptions) {
    this.secret = options.secret;
    this.expiresIn = options.expiresIn ?? "24h";
    this.clock = options.clock ?? systemClock;
    // Fail at startup rather than on the first login
    parseExpiresIn(this.expiresIn);
  }

  issue(email: string): string {
    return createToken(email, this.secret, this.expiresIn, toUnixSeconds(this.clock()));
  }

  /**
   * Returns the verified claims (`sub` is the caller's email), or throws UnauthorizedError.
   */
  authenticate(authorization: string | undefined): AuthPayload {
    if (!authorization?.startsWith("Bearer ")) {
      throw new UnauthorizedError("Authentication required");
    }
    const payload = verifyToken(authorization.slice(7).trim(), this.secret, toUnixSeconds(this.clock()));
    if (!payload) {
      throw new UnauthorizedError("Invalid or expired token");
    }
    return payload;
  }
}

/**
 * Authentication middleware.
 * Requires `Authorization: Bearer <token>`; the token's subject becomes the
 * acting identity for the rest of the request.
 */
export function authMiddleware(gate: SessionGate) {
  return (req: AuthenticatedRequest, _res: Response, next: NextFunction) => {
    try {
      req.auth = gate.authenticate(req.headers.authorization);
    } catch (err) {
      console.warn(`[auth] ${req.method} ${req.originalUrl} rejected: ${err instanceof Error ? err.message : String(err)}`);
      return next(err);
    }
    next();
  };
}

/**
 * Email of the authenticated caller. Only valid behind authMiddleware.
 */
export function getAccountEmail(req: AuthenticatedRequest): string {
  if (!req.auth) {
    throw new UnauthorizedError("Authentication required");
  }
  return req.auth.sub;
}

export default authMiddleware;
