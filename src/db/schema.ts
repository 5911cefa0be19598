import { sqliteTable, text, integer, primaryKey, index } from 'drizzle-orm/sqlite-core';

// ============================================================================
// CREDIT ACCOUNTS
// ============================================================================

export const creditAccounts = sqliteTable('credit_accounts', {
  userId: text('user_id').primaryKey(),
  balance: integer('balance').notNull().default(0),
  totalPurchased: integer('total_purchased').notNull().default(0),
  totalSpent: integer('total_spent').notNull().default(0),
  starterGrantUsed: integer('starter_grant_used', { mode: 'boolean' }).notNull().default(false),
  plan: text('plan', { enum: ['free', 'pro'] }).notNull().default('free'),
  version: integer('version').notNull().default(0),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
  archivedAt: text('archived_at'),
});

// ============================================================================
// LEDGER TRANSACTIONS (append-only)
// ============================================================================

export const ledgerTransactions = sqliteTable(
  'ledger_transactions',
  {
    id: text('id').primaryKey(),
    userId: text('user_id').notNull().references(() => creditAccounts.userId),
    type: text('type', { enum: ['purchase', 'refund', 'debit', 'credit'] }).notNull(),
    amount: integer('amount').notNull(),
    balanceAfter: integer('balance_after').notNull(),
    sourceEventId: text('source_event_id').unique(),
    requestId: text('request_id'),
    description: text('description'),
    createdAt: text('created_at').notNull(),
  },
  (table) => ({
    userIdx: index('ledger_transactions_user_idx').on(table.userId, table.createdAt),
  }),
);

// ============================================================================
// IDEMPOTENCY RECORDS
// ============================================================================

export const idempotencyRecords = sqliteTable(
  'idempotency_records',
  {
    scope: text('scope').notNull(),
    key: text('key').notNull(),
    requestHash: text('request_hash').notNull(),
    status: text('status', { enum: ['pending', 'completed'] }).notNull(),
    result: text('result'),
    createdAt: text('created_at').notNull(),
    completedAt: text('completed_at'),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.scope, table.key] }),
  }),
);

// ============================================================================
// WEBHOOK DELIVERIES
// ============================================================================

export const webhookEvents = sqliteTable('webhook_events', {
  id: text('id').primaryKey(),
  eventId: text('event_id').notNull(),
  provider: text('provider').notNull(),
  type: text('type').notNull(),
  outcome: text('outcome', { enum: ['processed', 'replayed', 'ignored', 'failed'] }).notNull(),
  error: text('error'),
  receivedAt: text('received_at').notNull(),
});

// ============================================================================
// API KEYS
// ============================================================================

export const apiKeys = sqliteTable('api_keys', {
  keyHash: text('key_hash').primaryKey(),
  userId: text('user_id').notNull(),
  plan: text('plan', { enum: ['free', 'pro'] }).notNull().default('free'),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  createdAt: text('created_at').notNull(),
});

// Type exports for convenience
export type CreditAccountRow = typeof creditAccounts.$inferSelect;
export type LedgerTransactionRow = typeof ledgerTransactions.$inferSelect;
export type IdempotencyRecordRow = typeof idempotencyRecords.$inferSelect;
export type WebhookEventRow = typeof webhookEvents.$inferSelect;
export type ApiKeyRow = typeof apiKeys.$inferSelect;
