/**
 * Authentication Middleware
 *
 * Stand-in for the external auth layer: API keys (pf_xxx) are looked up by
 * their sha-256 hash in the api_keys table and resolve to a user id + plan.
 * Downstream code trusts the resulting AuthContext without re-verifying it.
 */

import { createHash, randomBytes } from 'node:crypto';
import { eq } from 'drizzle-orm';
import type { Context, MiddlewareHandler } from 'hono';
import type { DB } from '../db';
import { apiKeys } from '../db/schema';
import type { Plan } from '../billing/types';
import { UnauthenticatedError } from '../errors';
import type { AppEnv, AuthContext } from '../types';

const KEY_PREFIX = 'pf_';

export function hashApiKey(key: string): string {
  return createHash('sha256').update(key).digest('hex');
}

/**
 * Create an API key for a user. Only the hash is stored; the plaintext is
 * returned once.
 */
export function issueApiKey(db: DB, userId: string, plan: Plan = 'free'): string {
  const key = `${KEY_PREFIX}${randomBytes(24).toString('hex')}`;
  db.insert(apiKeys)
    .values({
      keyHash: hashApiKey(key),
      userId,
      plan,
      isActive: true,
      createdAt: new Date().toISOString(),
    })
    .run();
  return key;
}

export function revokeApiKey(db: DB, key: string): boolean {
  const result = db
    .update(apiKeys)
    .set({ isActive: false })
    .where(eq(apiKeys.keyHash, hashApiKey(key)))
    .run();
  return result.changes > 0;
}

/**
 * Auth middleware for Hono
 *
 * 1. Extract Bearer token from Authorization header
 * 2. Look up its hash → user id + plan
 * 3. Attach AuthContext to the request
 */
export function authMiddleware(db: DB): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const authHeader = c.req.header('Authorization');
    if (!authHeader) {
      throw new UnauthenticatedError('Missing Authorization header');
    }

    const parts = authHeader.split(' ');
    if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
      throw new UnauthenticatedError('Invalid Authorization header format. Use: Bearer pf_xxx');
    }

    const key = parts[1];
    if (!key.startsWith(KEY_PREFIX)) {
      throw new UnauthenticatedError();
    }

    const row = db.select().from(apiKeys).where(eq(apiKeys.keyHash, hashApiKey(key))).get();
    if (!row || !row.isActive) {
      throw new UnauthenticatedError('Invalid or inactive API key');
    }

    c.set('auth', { userId: row.userId, plan: row.plan });
    await next();
  };
}

/**
 * Get auth context from request (after auth middleware)
 */
export function getAuth(c: Context<AppEnv>): AuthContext {
  return c.get('auth');
}
