/**
 * Test Application Helpers
 *
 * Builds the full app over an in-memory database, the JSON catalog in
 * config/ and fake provider adapters.
 */

import Stripe from 'stripe';
import { buildServices, createApp, type Services } from '../../src/app';
import { loadConfig, type AppConfig } from '../../src/config';
import { openDatabase } from '../../src/db';
import { loadCatalog, type Catalog } from '../../src/engine/catalog';
import { issueApiKey } from '../../src/middleware/auth';
import type { Plan } from '../../src/billing/types';
import type { ProviderAdapter } from '../../src/services/providers';
import { FakeProvider } from './fake-provider';

export interface TestContextOptions {
  env?: Record<string, string>;
  adapters?: ProviderAdapter[];
  catalog?: Catalog;
}

export interface TestContext {
  app: ReturnType<typeof createApp>;
  services: Services;
  config: AppConfig;
  providers: ProviderAdapter[];
  /** Issue an API key for a user */
  keyFor(userId: string, plan?: Plan): string;
  close(): void;
}

/**
 * Settlement adjustments are effectively off (threshold 10) unless a test
 * sets BILLING_ADJUST_THRESHOLD itself.
 */
export const TEST_ENV: Record<string, string> = {
  NODE_ENV: 'test',
  DATABASE_PATH: ':memory:',
  STARTER_GRANT_CREDITS: '10',
  PROVIDER_TIMEOUT_MS: '1000',
  PROVIDER_MAX_FAILOVER: '2',
  HEALTH_PROBE_INTERVAL_MS: '0',
  BILLING_ADJUST_THRESHOLD: '10',
  TOKENS_PER_CREDIT: '500',
  STRIPE_SECRET_KEY: 'sk_test_stripe',
  STRIPE_WEBHOOK_SECRET: 'whsec_test',
  PUBLIC_APP_URL: 'http://localhost:3000',
};

export function createStripeClient(): Stripe {
  return new Stripe('sk_test_stripe', {
    httpClient: Stripe.createFetchHttpClient(),
    maxNetworkRetries: 0,
  });
}

export function createTestContext(options: TestContextOptions = {}): TestContext {
  const config = loadConfig({ ...TEST_ENV, ...options.env });
  const handle = openDatabase(config.databasePath);
  const catalog = options.catalog ?? loadCatalog(config.configDir, config.routing.defaultPipelineId);
  const providers = options.adapters ?? [new FakeProvider('alpha'), new FakeProvider('beta')];

  const services = buildServices(config, handle.db, catalog, {
    adapters: providers,
    stripeClient: createStripeClient(),
    idempotency: { pollIntervalMs: 5 },
    backoffMs: 1,
  });
  const app = createApp(services, { logRequests: false });

  return {
    app,
    services,
    config,
    providers,
    keyFor: (userId, plan = 'free') => issueApiKey(handle.db, userId, plan),
    close: () => handle.close(),
  };
}

// =============================================================================
// REQUESTS
// =============================================================================

export interface RequestOptions {
  apiKey?: string;
  body?: unknown;
  headers?: Record<string, string>;
}

export async function call(
  ctx: TestContext,
  method: string,
  path: string,
  options: RequestOptions = {},
): Promise<Response> {
  const headers: Record<string, string> = { ...options.headers };
  if (options.apiKey) headers.Authorization = `Bearer ${options.apiKey}`;
  if (options.body !== undefined) headers['Content-Type'] = 'application/json';

  return ctx.app.request(path, {
    method,
    headers,
    body: options.body === undefined ? undefined : JSON.stringify(options.body),
  });
}

/**
 * Parse response body as JSON
 */
export async function getResponseBody<T = unknown>(response: Response): Promise<T> {
  return (await response.json()) as T;
}
