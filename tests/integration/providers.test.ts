/**
 * Integration Tests: Provider Health & Service Info
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  FakeProvider,
  call,
  createTestContext,
  createUserId,
  expectError,
  getResponseBody,
  type TestContext,
} from '../helpers';
import type { HealthRecord } from '../../src/services/registry';

interface ProvidersBody {
  providers: Array<HealthRecord & { model_classes: string[] }>;
  healthy: number;
  total: number;
}

describe('Provider health and service endpoints', () => {
  let ctx: TestContext;
  let alpha: FakeProvider;
  let apiKey: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    alpha = new FakeProvider('alpha');
    ctx = createTestContext({ adapters: [alpha, new FakeProvider('beta', ['fast'])] });
    apiKey = ctx.keyFor(createUserId());
  });

  afterEach(() => {
    ctx.close();
  });

  describe('GET /providers/health', () => {
    it('lists every provider with its model classes', async () => {
      const response = await call(ctx, 'GET', '/providers/health', { apiKey });

      expect(response.status).toBe(200);
      const body = await getResponseBody<ProvidersBody>(response);
      expect(body.total).toBe(2);
      expect(body.healthy).toBe(2);
      expect(body.providers).toEqual([
        {
          provider: 'alpha',
          healthy: true,
          latency_ms: null,
          last_checked_at: null,
          last_error: null,
          consecutive_failures: 0,
          model_classes: ['fast', 'smart'],
        },
        {
          provider: 'beta',
          healthy: true,
          latency_ms: null,
          last_checked_at: null,
          last_error: null,
          consecutive_failures: 0,
          model_classes: ['fast'],
        },
      ]);
    });

    it('reflects a provider that failed during execution', async () => {
      alpha.failWith('HTTP 500');
      await call(ctx, 'POST', '/execute', { apiKey, body: { text: 'hello' } });

      const body = await getResponseBody<ProvidersBody>(await call(ctx, 'GET', '/providers/health', { apiKey }));

      expect(body.healthy).toBe(1);
      expect(body.providers[0]).toMatchObject({
        provider: 'alpha',
        healthy: false,
        last_error: 'HTTP 500',
        consecutive_failures: 1,
      });
    });

    it('requires authentication', async () => {
      await expectError(await call(ctx, 'GET', '/providers/health'), 401, 'Unauthenticated');
    });
  });

  describe('GET /health', () => {
    it('reports execution counters', async () => {
      await call(ctx, 'POST', '/execute', { apiKey, body: { text: 'hello' } });

      const response = await call(ctx, 'GET', '/health');
      const body = await getResponseBody<{ status: string; execution: Record<string, unknown> }>(response);

      expect(body.status).toBe('healthy');
      expect(body.execution).toEqual({
        received: 1,
        completed: 1,
        failed: 0,
        replayed: 0,
        refunds: 0,
        failures: {},
      });
    });
  });

  describe('GET /', () => {
    it('describes the service', async () => {
      const body = await getResponseBody<{ name: string; status: string }>(await call(ctx, 'GET', '/'));
      expect(body).toMatchObject({ name: 'promptforge-orchestrator', status: 'ok' });
    });
  });
});
