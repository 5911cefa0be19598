/**
 * Application assembly
 *
 * buildServices() wires the service graph from config + catalog;
 * createApp() mounts routes on top of it. Tests call both with an in-memory
 * database and fake provider adapters.
 *
 *   GET    /                       service info
 *   GET    /health                 liveness + execution counters
 *   POST   /execute                run a request (auth)
 *   POST   /route                  dry-run routing (auth)
 *   GET    /credits                balance (auth)
 *   GET    /credits/transactions   ledger history (auth)
 *   DELETE /credits/account        archive account (auth)
 *   GET    /billing/tiers          plans and packs
 *   POST   /billing/checkout       Stripe Checkout (auth)
 *   GET    /providers/health       provider health (auth)
 *   POST   /webhooks/:provider     payment webhooks (signature verified)
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import Stripe from 'stripe';
import type { AppConfig } from './config';
import type { DB } from './db';
import { IdempotencyStore, type IdempotencyStoreOptions } from './db/idempotency';
import { CreditLedger } from './billing/ledger';
import { StripeGateway, type PaymentGateway } from './billing/payments';
import { WebhookProcessor, createWebhookRoutes } from './billing/webhooks';
import { createBillingRoutes, createCreditRoutes } from './billing/routes';
import type { Catalog } from './engine/catalog';
import { PipelineRouter } from './engine/router';
import { TechniqueMatcher } from './engine/matcher';
import { ExecutionEngine } from './engine/execution';
import { createProviderAdapters, type ProviderAdapter } from './services/providers';
import { ProviderRegistry } from './services/registry';
import { HealthMonitor } from './services/health';
import { authMiddleware } from './middleware/auth';
import { errorHandler, notFoundHandler } from './middleware/errors';
import { createExecuteRoutes } from './routes/execute';
import { createProviderRoutes } from './routes/providers';
import type { AppEnv } from './types';

export const SERVICE_NAME = 'promptforge-orchestrator';
export const SERVICE_VERSION = '1.0.0';

export interface Services {
  db: DB;
  catalog: Catalog;
  idempotency: IdempotencyStore;
  ledger: CreditLedger;
  registry: ProviderRegistry;
  monitor: HealthMonitor;
  router: PipelineRouter;
  matcher: TechniqueMatcher;
  engine: ExecutionEngine;
  webhooks: WebhookProcessor;
  /** Null when Stripe keys are not configured */
  stripe: StripeGateway | null;
  gateways: PaymentGateway[];
}

export interface ServiceOverrides {
  /** Replaces the HTTP adapters built from providers.json */
  adapters?: ProviderAdapter[];
  /** Stripe client to use instead of one built from STRIPE_SECRET_KEY */
  stripeClient?: Stripe;
  idempotency?: Partial<IdempotencyStoreOptions>;
  /** Ledger CAS back-off step */
  backoffMs?: number;
  env?: NodeJS.ProcessEnv;
}

export function buildServices(
  config: AppConfig,
  db: DB,
  catalog: Catalog,
  overrides: ServiceOverrides = {},
): Services {
  const idempotency = new IdempotencyStore(db, overrides.idempotency);
  const ledger = new CreditLedger(db, idempotency, {
    starterGrantCredits: config.ledger.starterGrantCredits,
    maxRetries: config.ledger.maxRetries,
    backoffMs: overrides.backoffMs,
  });

  const adapters = overrides.adapters ?? createProviderAdapters(catalog.providers, overrides.env);
  const registry = new ProviderRegistry(adapters, {
    timeoutMs: config.providers.timeoutMs,
    maxFailover: config.providers.maxFailover,
  });
  const monitor = new HealthMonitor(registry, {
    intervalMs: config.providers.probeIntervalMs,
    timeoutMs: config.providers.timeoutMs,
  });

  const router = new PipelineRouter(catalog.pipelines, {
    defaultPipelineId: config.routing.defaultPipelineId,
    killSwitches: config.routing.killSwitches,
  });
  const matcher = new TechniqueMatcher(catalog.techniques);
  const engine = new ExecutionEngine(router, matcher, registry, ledger, idempotency, {
    tokensPerCredit: config.billing.tokensPerCredit,
    adjustThreshold: config.billing.adjustThreshold,
    duplicateWaitMs: config.providers.timeoutMs * (config.providers.maxFailover + 1) + 5_000,
  });

  let stripe: StripeGateway | null = null;
  const { secretKey, webhookSecret, publicAppUrl } = config.stripe;
  const client = overrides.stripeClient ?? (secretKey ? new Stripe(secretKey) : null);
  if (client && webhookSecret) {
    stripe = new StripeGateway(client, { webhookSecret, publicAppUrl });
  } else {
    console.warn('[BILLING] Stripe keys not configured; checkout and webhooks disabled');
  }

  const webhooks = new WebhookProcessor(db, idempotency, ledger);
  const gateways: PaymentGateway[] = stripe ? [stripe] : [];

  return {
    db,
    catalog,
    idempotency,
    ledger,
    registry,
    monitor,
    router,
    matcher,
    engine,
    webhooks,
    stripe,
    gateways,
  };
}

export function createApp(services: Services, options: { logRequests?: boolean } = {}) {
  const app = new Hono<AppEnv>();
  const auth = authMiddleware(services.db);

  // ===========================================================================
  // GLOBAL MIDDLEWARE
  // ===========================================================================

  app.use('*', cors());
  if (options.logRequests ?? true) {
    app.use('*', logger());
  }

  // ===========================================================================
  // PUBLIC ROUTES
  // ===========================================================================

  app.get('/', (c) => {
    return c.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: 'ok',
      endpoints: {
        execute: 'POST /execute',
        route: 'POST /route',
        credits: 'GET /credits',
        billing: 'GET /billing/tiers',
        providers: 'GET /providers/health',
      },
    });
  });

  app.get('/health', (c) => {
    return c.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      execution: services.engine.stats(),
    });
  });

  // Signature verified, not Bearer token
  app.route('/webhooks', createWebhookRoutes(services.webhooks, services.gateways));

  // ===========================================================================
  // AUTHENTICATED ROUTES
  // ===========================================================================

  app.route('/', createExecuteRoutes(services.engine, auth));
  app.route('/credits', createCreditRoutes(services.ledger, auth));
  app.route('/billing', createBillingRoutes(services.catalog.billing, services.stripe, auth));
  app.route('/providers', createProviderRoutes(services.registry, auth));

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  app.notFound(notFoundHandler);
  app.onError(errorHandler);

  return app;
}
