/**
 * Idempotency Store
 *
 * One reserve-then-execute primitive shared by the ledger (debit keys, credit
 * source events) and the payment webhook processor (provider event ids).
 *
 * 1. INSERT (scope, key) with status=pending → the inserting caller owns the work
 * 2. Owner runs the operation, stores the JSON result, flips status=completed
 * 3. Anyone else: same request hash + completed → replay stored result,
 *    pending → poll until the owner finishes, different hash → reject
 *
 * A failed operation deletes its reservation so the same key can be retried.
 */

import { createHash, randomUUID } from 'node:crypto';
import { and, eq } from 'drizzle-orm';
import type { DB } from './index';
import { idempotencyRecords, type IdempotencyRecordRow } from './schema';
import { IdempotencyKeyReuseError, InternalError } from '../errors';

export interface Decoder<T> {
  parse(value: unknown): T;
}

export interface IdempotentOutcome<T> {
  result: T;
  replayed: boolean;
}

export interface IdempotencyRecord {
  scope: string;
  key: string;
  status: 'pending' | 'completed';
  createdAt: string;
  completedAt: string | null;
  result: unknown;
}

export interface IdempotencyStoreOptions {
  pollIntervalMs: number;
  pollTimeoutMs: number;
  staleAfterMs: number;
}

/** Per-call overrides for operations that stay pending longer than usual */
export type RunOptions = Partial<Pick<IdempotencyStoreOptions, 'pollTimeoutMs' | 'staleAfterMs'>>;

const DEFAULT_OPTIONS: IdempotencyStoreOptions = {
  pollIntervalMs: 10,
  pollTimeoutMs: 5_000,
  staleAfterMs: 30_000,
};

/**
 * Deep key-sort so logically equal arguments hash the same.
 */
export function canonicalize(value: unknown): unknown {
  if (value === null || typeof value !== 'object') return value;
  if (Array.isArray(value)) return value.map(canonicalize);
  const entries = Object.entries(value).sort(([a], [b]) => a.localeCompare(b));
  return Object.fromEntries(entries.map(([k, v]) => [k, canonicalize(v)]));
}

export function hashArgs(args: unknown): string {
  return createHash('sha256').update(JSON.stringify(canonicalize(args) ?? null)).digest('hex');
}

export class IdempotencyStore {
  private readonly options: IdempotencyStoreOptions;

  constructor(
    private readonly db: DB,
    options: Partial<IdempotencyStoreOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async run<T>(
    scope: string,
    key: string,
    args: unknown,
    decoder: Decoder<T>,
    operation: () => Promise<T>,
    options: RunOptions = {},
  ): Promise<IdempotentOutcome<T>> {
    return this.reserve(scope, key, args, decoder, operation, { ...this.options, ...options }, 0);
  }

  private async reserve<T>(
    scope: string,
    key: string,
    args: unknown,
    decoder: Decoder<T>,
    operation: () => Promise<T>,
    options: IdempotencyStoreOptions,
    attempt: number,
  ): Promise<IdempotentOutcome<T>> {
    const requestHash = hashArgs(args);
    const reservation = `${requestHash}:${randomUUID()}`;

    const reserved = this.db
      .insert(idempotencyRecords)
      .values({
        scope,
        key,
        requestHash: reservation,
        status: 'pending',
        createdAt: new Date().toISOString(),
      })
      .onConflictDoNothing()
      .run();

    if (reserved.changes === 1) {
      return { result: await this.executeAndComplete(scope, key, reservation, operation), replayed: false };
    }

    const existing = this.find(scope, key);
    if (!existing) {
      // Reservation vanished between our insert and read (owner failed); try once more
      if (attempt > 0) throw new InternalError(`Idempotency: unable to reserve ${scope}/${key}`);
      return this.reserve(scope, key, args, decoder, operation, options, attempt + 1);
    }

    if (hashOf(existing) !== requestHash) {
      throw new IdempotencyKeyReuseError(scope, key);
    }

    if (existing.status === 'completed') {
      return { result: decoder.parse(parseStored(existing.result)), replayed: true };
    }

    if (Date.now() - Date.parse(existing.createdAt) > options.staleAfterMs && attempt === 0) {
      const reclaimed = this.db
        .delete(idempotencyRecords)
        .where(
          and(
            eq(idempotencyRecords.scope, scope),
            eq(idempotencyRecords.key, key),
            eq(idempotencyRecords.requestHash, existing.requestHash),
            eq(idempotencyRecords.status, 'pending'),
          ),
        )
        .run();
      if (reclaimed.changes > 0) {
        console.warn(`[IDEMPOTENCY] Reclaimed stale reservation ${scope}/${key}`);
        return this.reserve(scope, key, args, decoder, operation, options, attempt + 1);
      }
    }

    return this.pollForCompletion(scope, key, args, decoder, operation, options, attempt);
  }

  lookup(scope: string, key: string): IdempotencyRecord | null {
    const row = this.find(scope, key);
    if (!row) return null;
    return {
      scope: row.scope,
      key: row.key,
      status: row.status,
      createdAt: row.createdAt,
      completedAt: row.completedAt,
      result: parseStored(row.result),
    };
  }

  private find(scope: string, key: string): IdempotencyRecordRow | undefined {
    return this.db
      .select()
      .from(idempotencyRecords)
      .where(and(eq(idempotencyRecords.scope, scope), eq(idempotencyRecords.key, key)))
      .get();
  }

  private async executeAndComplete<T>(
    scope: string,
    key: string,
    reservation: string,
    operation: () => Promise<T>,
  ): Promise<T> {
    const owned = and(
      eq(idempotencyRecords.scope, scope),
      eq(idempotencyRecords.key, key),
      eq(idempotencyRecords.requestHash, reservation),
    );

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      this.db.delete(idempotencyRecords).where(and(owned, eq(idempotencyRecords.status, 'pending'))).run();
      throw error;
    }

    const completed = this.db
      .update(idempotencyRecords)
      .set({
        status: 'completed',
        result: JSON.stringify(result),
        completedAt: new Date().toISOString(),
      })
      .where(owned)
      .run();

    if (completed.changes === 0) {
      console.warn(`[IDEMPOTENCY] Reservation ${scope}/${key} was reclaimed before completion`);
    }
    return result;
  }

  private async pollForCompletion<T>(
    scope: string,
    key: string,
    args: unknown,
    decoder: Decoder<T>,
    operation: () => Promise<T>,
    options: IdempotencyStoreOptions,
    attempt: number,
  ): Promise<IdempotentOutcome<T>> {
    const deadline = Date.now() + options.pollTimeoutMs;

    while (Date.now() < deadline) {
      await sleep(options.pollIntervalMs);
      const row = this.find(scope, key);
      if (!row) {
        // Owner failed and released the key; take it over
        if (attempt > 0) break;
        return this.reserve(scope, key, args, decoder, operation, options, attempt + 1);
      }
      if (row.status === 'completed') {
        return { result: decoder.parse(parseStored(row.result)), replayed: true };
      }
    }

    throw new InternalError(`Idempotency: timed out waiting for ${scope}/${key}`);
  }
}

// The stored hash carries the owner token after a colon: "<args-hash>:<owner>"
function hashOf(row: IdempotencyRecordRow): string {
  return row.requestHash.split(':')[0];
}

function parseStored(value: string | null): unknown {
  return value === null ? null : JSON.parse(value);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
