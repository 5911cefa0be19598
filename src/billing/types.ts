/**
 * Billing Types
 *
 * Credit accounts, ledger transactions and payment events.
 * Amounts are whole credits.
 */

import { z } from 'zod';

// =============================================================================
// ACCOUNTS
// =============================================================================

export type Plan = 'free' | 'pro';

/**
 * Per-user credit account
 *
 * Invariant: balance = totalPurchased − totalSpent, balance ≥ 0.
 * purchase/credit raise totalPurchased, debit raises totalSpent,
 * refund lowers totalSpent.
 */
export interface CreditAccount {
  userId: string;
  balance: number;
  totalPurchased: number;
  totalSpent: number;
  starterGrantUsed: boolean;
  plan: Plan;
  version: number;
  createdAt: string;
  updatedAt: string;
  archivedAt: string | null;
}

// =============================================================================
// TRANSACTIONS
// =============================================================================

export const TRANSACTION_TYPES = ['purchase', 'refund', 'debit', 'credit'] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export type CreditType = Exclude<TransactionType, 'debit'>;

export const ledgerTransactionSchema = z.object({
  transactionId: z.string(),
  userId: z.string(),
  type: z.enum(TRANSACTION_TYPES),
  /** Signed: negative for debits */
  amount: z.number().int(),
  balanceAfter: z.number().int().nonnegative(),
  sourceEventId: z.string().nullable(),
  requestId: z.string().nullable(),
  description: z.string().nullable(),
  createdAt: z.string(),
});

export type LedgerTransaction = z.infer<typeof ledgerTransactionSchema>;

/**
 * Result of a ledger mutation. `replayed` marks a duplicate operation:
 * the key was already applied and the original transaction is returned.
 */
export interface LedgerOutcome {
  transaction: LedgerTransaction;
  replayed: boolean;
}

export interface MutationContext {
  requestId?: string;
  description?: string;
}

export interface CreditContext extends MutationContext {
  type?: CreditType;
}

// =============================================================================
// CREDIT PACKS & PLANS
// =============================================================================

export const creditPackSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  credits: z.number().int().positive(),
  price_cents: z.number().int().positive(),
  currency: z.string().length(3).default('usd'),
});

export type CreditPack = z.infer<typeof creditPackSchema>;

export const planSchema = z.object({
  id: z.enum(['free', 'pro']),
  name: z.string(),
  description: z.string(),
  features: z.array(z.string()),
});

export const billingCatalogSchema = z.object({
  plans: z.array(planSchema),
  credit_packs: z.array(creditPackSchema).min(1),
});

export type BillingCatalog = z.infer<typeof billingCatalogSchema>;

// =============================================================================
// PAYMENT EVENTS
// =============================================================================

/**
 * Provider-neutral payment event, produced by a verifier after the
 * provider's signature has been checked.
 */
export interface PaymentEvent {
  eventId: string;
  type: string;
  /** True for event types that should grant credits */
  grantsCredits: boolean;
  userId?: string;
  creditAmount?: number;
}

export const webhookResultSchema = z.object({
  event_id: z.string(),
  action: z.enum(['credited', 'ignored']),
  user_id: z.string().nullable(),
  credits: z.number().int().nonnegative(),
  transaction_id: z.string().nullable(),
  balance_after: z.number().int().nullable(),
});

export type WebhookResult = z.infer<typeof webhookResultSchema>;

export interface WebhookOutcome {
  result: WebhookResult;
  replayed: boolean;
}
