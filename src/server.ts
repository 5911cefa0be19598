/**
 * Server entry point
 *
 * config → database → catalog → services → HTTP
 */

import { serve } from '@hono/node-server';
import { loadConfig } from './config';
import { openDatabase } from './db';
import { loadCatalog } from './engine/catalog';
import { buildServices, createApp, SERVICE_NAME, SERVICE_VERSION } from './app';

const config = loadConfig();
const handle = openDatabase(config.databasePath);
const catalog = loadCatalog(config.configDir, config.routing.defaultPipelineId);
const services = buildServices(config, handle.db, catalog);
const app = createApp(services);

services.monitor.start();

const healthy = services.registry.snapshot().length;
console.log(`
${SERVICE_NAME} v${SERVICE_VERSION}

Server:     http://localhost:${config.port}
Providers:  ${healthy} registered
Pipelines:  ${catalog.pipelines.length} (default: ${config.routing.defaultPipelineId})
Payments:   ${services.stripe ? 'stripe' : 'disabled'}

Execution:
   POST /execute              (run a request, debits credits)
   POST /route                (dry run)
Credits:
   GET  /credits              (balance)
   GET  /credits/transactions (ledger)
Billing:
   GET  /billing/tiers        (plans + credit packs)
   POST /billing/checkout     (Stripe Checkout)
`);

const server = serve({
  fetch: app.fetch,
  port: config.port,
});

function shutdown(signal: string): void {
  console.log(`[SERVER] ${signal} received, shutting down`);
  services.monitor.stop();
  server.close(() => {
    handle.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export default app;
