/**
 * Integration Tests: Credit Account Routes
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { call, createTestContext, createUserId, expectError, getResponseBody, type TestContext } from '../helpers';

interface TransactionsBody {
  transactions: Array<{
    transaction_id: string;
    type: string;
    amount: number;
    balance_after: number;
    request_id: string | null;
    description: string | null;
  }>;
  total: number;
}

describe('Credit routes', () => {
  let ctx: TestContext;
  let userId: string;
  let apiKey: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    ctx = createTestContext();
    userId = createUserId();
    apiKey = ctx.keyFor(userId);
  });

  afterEach(() => {
    ctx.close();
  });

  describe('GET /credits', () => {
    it('opens an account with the starter grant', async () => {
      const response = await call(ctx, 'GET', '/credits', { apiKey });

      expect(response.status).toBe(200);
      expect(await getResponseBody(response)).toEqual({
        user_id: userId,
        balance: 10,
        total_purchased: 10,
        total_spent: 0,
        starter_grant_used: true,
        plan: 'free',
        version: 0,
        archived_at: null,
      });
    });

    it('records the plan of the key that opened the account', async () => {
      const proUser = createUserId();
      const response = await call(ctx, 'GET', '/credits', { apiKey: ctx.keyFor(proUser, 'pro') });
      expect(await getResponseBody(response)).toMatchObject({ user_id: proUser, plan: 'pro' });
    });

    it('requires authentication', async () => {
      await expectError(await call(ctx, 'GET', '/credits'), 401, 'Unauthenticated');
    });
  });

  describe('GET /credits/transactions', () => {
    it('lists executions newest first', async () => {
      await call(ctx, 'POST', '/execute', {
        apiKey,
        body: { text: 'hello' },
        headers: { 'Idempotency-Key': 'req-t1' },
      });

      const response = await call(ctx, 'GET', '/credits/transactions', { apiKey });
      const body = await getResponseBody<TransactionsBody>(response);

      expect(body.total).toBe(2);
      expect(body.transactions[0]).toMatchObject({
        transaction_id: `exec:${userId}:req-t1`,
        type: 'debit',
        amount: -2,
        balance_after: 8,
        request_id: 'req-t1',
        description: 'Execution via chat.general',
      });
      expect(body.transactions[1]).toMatchObject({ transaction_id: `credit:starter:${userId}`, amount: 10 });
    });

    it('honours the limit', async () => {
      await ctx.services.ledger.debit(userId, 1, 'd1');

      const response = await call(ctx, 'GET', '/credits/transactions?limit=1', { apiKey });
      const body = await getResponseBody<TransactionsBody>(response);

      expect(body.total).toBe(1);
      expect(body.transactions[0].transaction_id).toBe('d1');
    });

    it('rejects an out-of-range limit', async () => {
      await expectError(await call(ctx, 'GET', '/credits/transactions?limit=0', { apiKey }), 400, 'ValidationError');
    });
  });

  describe('DELETE /credits/account', () => {
    it('archives the account and blocks further spending', async () => {
      const response = await call(ctx, 'DELETE', '/credits/account', { apiKey });

      expect(response.status).toBe(200);
      const body = await getResponseBody<{ archived: boolean; account: { archived_at: string | null; version: number } }>(
        response,
      );
      expect(body.archived).toBe(true);
      expect(body.account.archived_at).toEqual(expect.any(String));
      expect(body.account.version).toBe(1);

      await expectError(
        await call(ctx, 'POST', '/execute', { apiKey, body: { text: 'hello' } }),
        403,
        'AccountArchived',
      );
    });
  });
});
