/**
 * Credit Ledger
 *
 * Single source of truth for credit balances. Every mutation:
 * - is keyed (debit: idempotency key, credit: source event id) through the IdempotencyStore
 * - compare-and-sets the account `version`, retrying a bounded number of times
 * - updates the balance and appends the transaction in one SQLite transaction
 */

import { and, desc, eq, sql } from 'drizzle-orm';
import type { DB } from '../db';
import { creditAccounts, ledgerTransactions, type CreditAccountRow, type LedgerTransactionRow } from '../db/schema';
import { IdempotencyStore, sleep } from '../db/idempotency';
import {
  AccountArchivedError,
  ConcurrentUpdateConflictError,
  InsufficientCreditsError,
  ValidationError,
} from '../errors';
import {
  ledgerTransactionSchema,
  type CreditAccount,
  type CreditContext,
  type LedgerOutcome,
  type LedgerTransaction,
  type MutationContext,
  type Plan,
  type TransactionType,
} from './types';

export const DEBIT_SCOPE = 'ledger:debit';
export const CREDIT_SCOPE = 'ledger:credit';

export interface LedgerOptions {
  starterGrantCredits: number;
  maxRetries: number;
  /** Back-off step between CAS attempts; attempt n waits n × backoffMs */
  backoffMs?: number;
}

interface Mutation {
  transactionId: string;
  type: TransactionType;
  /** Unsigned amount; the sign is derived from the type */
  amount: number;
  sourceEventId: string | null;
  requestId: string | null;
  description: string | null;
}

export class CreditLedger {
  private readonly backoffMs: number;

  constructor(
    private readonly db: DB,
    private readonly idempotency: IdempotencyStore,
    private readonly options: LedgerOptions,
  ) {
    this.backoffMs = options.backoffMs ?? 5;
  }

  // ===========================================================================
  // READS
  // ===========================================================================

  /**
   * Balance snapshot. Creates the account (with the starter grant) on first use.
   */
  async balance(userId: string): Promise<CreditAccount> {
    return this.ensureAccount(userId);
  }

  async ensureAccount(userId: string, plan: Plan = 'free'): Promise<CreditAccount> {
    const existing = this.findAccount(userId);
    if (existing) return toAccount(existing);
    return toAccount(this.createAccount(userId, plan));
  }

  async transactions(userId: string, limit = 50): Promise<LedgerTransaction[]> {
    const rows = this.db
      .select()
      .from(ledgerTransactions)
      .where(eq(ledgerTransactions.userId, userId))
      .orderBy(desc(ledgerTransactions.createdAt), sql`rowid DESC`)
      .limit(limit)
      .all();
    return rows.map(toTransaction);
  }

  // ===========================================================================
  // MUTATIONS
  // ===========================================================================

  /**
   * Debit `amount` credits. A repeated key with the same arguments returns
   * the original transaction with `replayed: true`.
   */
  async debit(
    userId: string,
    amount: number,
    idempotencyKey: string,
    context: MutationContext = {},
  ): Promise<LedgerOutcome> {
    assertAmount(amount);
    assertKey(idempotencyKey, 'idempotency key');

    const { result, replayed } = await this.idempotency.run(
      DEBIT_SCOPE,
      idempotencyKey,
      { userId, amount },
      ledgerTransactionSchema,
      () =>
        this.apply(userId, {
          transactionId: idempotencyKey,
          type: 'debit',
          amount,
          sourceEventId: null,
          requestId: context.requestId ?? null,
          description: context.description ?? null,
        }),
    );

    if (replayed) {
      console.log(`[LEDGER] Duplicate debit ${idempotencyKey} for ${userId}, returning prior result`);
    }
    return { transaction: result, replayed };
  }

  /**
   * Credit `amount` credits, at most once per `sourceEventId`.
   */
  async credit(
    userId: string,
    amount: number,
    sourceEventId: string,
    context: CreditContext = {},
  ): Promise<LedgerOutcome> {
    assertAmount(amount);
    assertKey(sourceEventId, 'source event id');
    const type = context.type ?? 'purchase';

    const { result, replayed } = await this.idempotency.run(
      CREDIT_SCOPE,
      sourceEventId,
      { userId, amount, type },
      ledgerTransactionSchema,
      () =>
        this.apply(userId, {
          transactionId: `${type}:${sourceEventId}`,
          type,
          amount,
          sourceEventId,
          requestId: context.requestId ?? null,
          description: context.description ?? null,
        }),
    );

    if (replayed) {
      console.log(`[LEDGER] Duplicate credit for source ${sourceEventId}, returning prior result`);
    }
    return { transaction: result, replayed };
  }

  /**
   * Soft-archive: debits are refused afterwards, credits still land.
   */
  async archive(userId: string): Promise<CreditAccount> {
    const account = await this.ensureAccount(userId);
    if (account.archivedAt) return account;

    const now = new Date().toISOString();
    this.db
      .update(creditAccounts)
      .set({ archivedAt: now, updatedAt: now, version: sql`${creditAccounts.version} + 1` })
      .where(eq(creditAccounts.userId, userId))
      .run();
    console.log(`[LEDGER] Archived account ${userId}`);

    return this.ensureAccount(userId);
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async apply(userId: string, mutation: Mutation): Promise<LedgerTransaction> {
    for (let attempt = 1; attempt <= this.options.maxRetries; attempt++) {
      // Read and CAS are separated by a suspension point; concurrent mutations
      // on the same account interleave here and are caught by the version check
      const account = await this.ensureAccount(userId);
      const delta = this.validate(account, mutation);

      const written = this.compareAndAppend(account, mutation, delta);
      if (written) {
        console.log(
          `[LEDGER] ${mutation.type} ${mutation.amount} for ${userId} → balance ${written.balanceAfter} (${written.transactionId})`,
        );
        return written;
      }

      console.warn(`[LEDGER] Version conflict on ${userId} (attempt ${attempt}/${this.options.maxRetries})`);
      if (attempt < this.options.maxRetries) {
        await sleep(attempt * this.backoffMs);
      }
    }

    throw new ConcurrentUpdateConflictError(userId, this.options.maxRetries);
  }

  private validate(account: CreditAccount, mutation: Mutation): AccountDelta {
    switch (mutation.type) {
      case 'debit':
        if (account.archivedAt) throw new AccountArchivedError(account.userId);
        if (account.balance < mutation.amount) {
          throw new InsufficientCreditsError(account.userId, mutation.amount, account.balance);
        }
        return { balance: -mutation.amount, purchased: 0, spent: mutation.amount };
      case 'refund':
        if (mutation.amount > account.totalSpent) {
          throw new ValidationError(
            `Refund of ${mutation.amount} exceeds total spent (${account.totalSpent}) for ${account.userId}`,
          );
        }
        return { balance: mutation.amount, purchased: 0, spent: -mutation.amount };
      case 'purchase':
      case 'credit':
        return { balance: mutation.amount, purchased: mutation.amount, spent: 0 };
    }
  }

  /**
   * Returns null when the account version moved since it was read.
   */
  private compareAndAppend(
    account: CreditAccount,
    mutation: Mutation,
    delta: AccountDelta,
  ): LedgerTransaction | null {
    const now = new Date().toISOString();
    const balanceAfter = account.balance + delta.balance;

    return this.db.transaction((tx) => {
      const updated = tx
        .update(creditAccounts)
        .set({
          balance: balanceAfter,
          totalPurchased: account.totalPurchased + delta.purchased,
          totalSpent: account.totalSpent + delta.spent,
          version: account.version + 1,
          updatedAt: now,
        })
        .where(and(eq(creditAccounts.userId, account.userId), eq(creditAccounts.version, account.version)))
        .run();

      if (updated.changes === 0) return null;

      const row: LedgerTransactionRow = {
        id: mutation.transactionId,
        userId: account.userId,
        type: mutation.type,
        amount: mutation.type === 'debit' ? -mutation.amount : mutation.amount,
        balanceAfter,
        sourceEventId: mutation.sourceEventId,
        requestId: mutation.requestId,
        description: mutation.description,
        createdAt: now,
      };
      tx.insert(ledgerTransactions).values(row).run();
      return toTransaction(row);
    });
  }

  private findAccount(userId: string): CreditAccountRow | undefined {
    return this.db.select().from(creditAccounts).where(eq(creditAccounts.userId, userId)).get();
  }

  /**
   * Insert the account and its starter grant atomically. If another caller
   * created it first, their row wins and no grant is applied here.
   */
  private createAccount(userId: string, plan: Plan): CreditAccountRow {
    const grant = this.options.starterGrantCredits;
    const now = new Date().toISOString();

    this.db.transaction((tx) => {
      const inserted = tx
        .insert(creditAccounts)
        .values({
          userId,
          balance: grant,
          totalPurchased: grant,
          totalSpent: 0,
          starterGrantUsed: true,
          plan,
          version: 0,
          createdAt: now,
          updatedAt: now,
        })
        .onConflictDoNothing()
        .run();

      if (inserted.changes === 1 && grant > 0) {
        tx.insert(ledgerTransactions)
          .values({
            id: `credit:starter:${userId}`,
            userId,
            type: 'credit',
            amount: grant,
            balanceAfter: grant,
            sourceEventId: `starter:${userId}`,
            requestId: null,
            description: 'Starter grant',
            createdAt: now,
          })
          .run();
        console.log(`[LEDGER] Created account ${userId} with starter grant of ${grant}`);
      }
    });

    const row = this.findAccount(userId);
    if (!row) throw new Error(`Credit account ${userId} missing after creation`);
    return row;
  }
}

interface AccountDelta {
  balance: number;
  purchased: number;
  spent: number;
}

function assertAmount(amount: number): void {
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new ValidationError(`Amount must be a positive integer, got ${amount}`);
  }
}

function assertKey(key: string, label: string): void {
  if (key.trim().length === 0) {
    throw new ValidationError(`A non-empty ${label} is required`);
  }
}

function toAccount(row: CreditAccountRow): CreditAccount {
  return {
    userId: row.userId,
    balance: row.balance,
    totalPurchased: row.totalPurchased,
    totalSpent: row.totalSpent,
    starterGrantUsed: row.starterGrantUsed,
    plan: row.plan,
    version: row.version,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    archivedAt: row.archivedAt,
  };
}

function toTransaction(row: LedgerTransactionRow): LedgerTransaction {
  return {
    transactionId: row.id,
    userId: row.userId,
    type: row.type,
    amount: row.amount,
    balanceAfter: row.balanceAfter,
    sourceEventId: row.sourceEventId,
    requestId: row.requestId,
    description: row.description,
    createdAt: row.createdAt,
  };
}
