/**
 * Credit & Billing API Routes
 *
 *   GET    /credits                balance snapshot
 *   GET    /credits/transactions   recent ledger entries, newest first
 *   DELETE /credits/account        soft-archive the account
 *   GET    /billing/tiers          plans and credit packs (public)
 *   POST   /billing/checkout       Stripe Checkout for a credit pack
 */

import { Hono, type MiddlewareHandler } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { getAuth } from '../middleware/auth';
import { rejectInvalid } from '../middleware/errors';
import { PaymentsUnavailableError, ValidationError } from '../errors';
import type { AppEnv } from '../types';
import type { CreditLedger } from './ledger';
import type { StripeGateway } from './payments';
import type { BillingCatalog, CreditAccount, LedgerTransaction } from './types';

// =============================================================================
// RESPONSE SHAPES
// =============================================================================

export function accountBody(account: CreditAccount) {
  return {
    user_id: account.userId,
    balance: account.balance,
    total_purchased: account.totalPurchased,
    total_spent: account.totalSpent,
    starter_grant_used: account.starterGrantUsed,
    plan: account.plan,
    version: account.version,
    archived_at: account.archivedAt,
  };
}

export function transactionBody(transaction: LedgerTransaction) {
  return {
    transaction_id: transaction.transactionId,
    user_id: transaction.userId,
    type: transaction.type,
    amount: transaction.amount,
    balance_after: transaction.balanceAfter,
    source_event_id: transaction.sourceEventId,
    request_id: transaction.requestId,
    description: transaction.description,
    created_at: transaction.createdAt,
  };
}

// =============================================================================
// CREDITS
// =============================================================================

const transactionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export function createCreditRoutes(ledger: CreditLedger, auth: MiddlewareHandler<AppEnv>) {
  const credits = new Hono<AppEnv>();

  credits.get('/', auth, async (c) => {
    const { userId, plan } = getAuth(c);
    const account = await ledger.ensureAccount(userId, plan);
    return c.json(accountBody(account));
  });

  credits.get('/transactions', auth, zValidator('query', transactionsQuerySchema, rejectInvalid), async (c) => {
    const { userId } = getAuth(c);
    const { limit } = c.req.valid('query');
    const transactions = await ledger.transactions(userId, limit);
    return c.json({
      transactions: transactions.map(transactionBody),
      total: transactions.length,
    });
  });

  credits.delete('/account', auth, async (c) => {
    const { userId } = getAuth(c);
    const account = await ledger.archive(userId);
    return c.json({ archived: true, account: accountBody(account) });
  });

  return credits;
}

// =============================================================================
// BILLING
// =============================================================================

const checkoutSchema = z.object({
  pack_id: z.string().min(1),
});

export function createBillingRoutes(
  catalog: BillingCatalog,
  gateway: StripeGateway | null,
  auth: MiddlewareHandler<AppEnv>,
) {
  const billing = new Hono<AppEnv>();

  billing.get('/tiers', (c) => {
    return c.json({
      plans: catalog.plans,
      credit_packs: catalog.credit_packs,
    });
  });

  billing.post('/checkout', auth, zValidator('json', checkoutSchema, rejectInvalid), async (c) => {
    const { userId } = getAuth(c);
    const { pack_id } = c.req.valid('json');

    const pack = catalog.credit_packs.find((p) => p.id === pack_id);
    if (!pack) {
      throw new ValidationError(`Unknown credit pack: ${pack_id}`);
    }
    if (!gateway) {
      throw new PaymentsUnavailableError();
    }

    const session = await gateway.createCheckout(userId, pack);
    return c.json({
      session_id: session.sessionId,
      url: session.url,
      pack_id: pack.id,
      credits: pack.credits,
    });
  });

  return billing;
}
