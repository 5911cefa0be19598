/**
 * Billing Integration Tests
 *
 * Plans, credit packs and Stripe Checkout sessions.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { server } from '../mocks/server';
import { capturedRequests, errorHandlers } from '../mocks/handlers';
import { call, createTestContext, createUserId, expectError, getResponseBody, type TestContext } from '../helpers';

describe('Billing API Integration', () => {
  let ctx: TestContext;
  let userId: string;
  let apiKey: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    ctx = createTestContext();
    userId = createUserId();
    apiKey = ctx.keyFor(userId);
  });

  afterEach(() => {
    ctx.close();
  });

  describe('GET /billing/tiers', () => {
    it('is public and lists plans and packs', async () => {
      const response = await call(ctx, 'GET', '/billing/tiers');

      expect(response.status).toBe(200);
      const body = await getResponseBody<{ plans: Array<{ id: string }>; credit_packs: Array<{ id: string; credits: number }> }>(
        response,
      );
      expect(body.plans.map((p) => p.id)).toEqual(['free', 'pro']);
      expect(body.credit_packs.map((p) => [p.id, p.credits])).toEqual([
        ['pack_100', 100],
        ['pack_500', 500],
        ['pack_2000', 2000],
      ]);
    });
  });

  describe('POST /billing/checkout', () => {
    it('creates a Checkout session for the pack', async () => {
      const response = await call(ctx, 'POST', '/billing/checkout', { apiKey, body: { pack_id: 'pack_100' } });

      expect(response.status).toBe(200);
      expect(await getResponseBody(response)).toEqual({
        session_id: 'cs_test_session',
        url: 'https://checkout.stripe.com/c/pay/cs_test_session',
        pack_id: 'pack_100',
        credits: 100,
      });

      const form = new URLSearchParams(await capturedRequests.stripe[0].text());
      expect(form.get('metadata[user_id]')).toBe(userId);
      expect(form.get('metadata[credits]')).toBe('100');
    });

    it('rejects unknown packs', async () => {
      const body = await expectError(
        await call(ctx, 'POST', '/billing/checkout', { apiKey, body: { pack_id: 'pack_9000' } }),
        400,
        'ValidationError',
      );
      expect(body.message).toBe('Unknown credit pack: pack_9000');
      expect(capturedRequests.stripe).toHaveLength(0);
    });

    it('requires authentication', async () => {
      await expectError(
        await call(ctx, 'POST', '/billing/checkout', { body: { pack_id: 'pack_100' } }),
        401,
        'Unauthenticated',
      );
    });

    it('reports Stripe failures as internal errors', async () => {
      server.use(errorHandlers.stripeDeclined);

      await expectError(
        await call(ctx, 'POST', '/billing/checkout', { apiKey, body: { pack_id: 'pack_100' } }),
        500,
        'InternalError',
      );
    });

    it('returns 503 when payments are not configured', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const unconfigured = createTestContext({ env: { STRIPE_WEBHOOK_SECRET: '' } });
      try {
        await expectError(
          await call(unconfigured, 'POST', '/billing/checkout', {
            apiKey: unconfigured.keyFor(createUserId()),
            body: { pack_id: 'pack_100' },
          }),
          503,
          'PaymentsUnavailable',
        );
      } finally {
        unconfigured.close();
      }
    });
  });
});
