/**
 * Provider health
 * GET /providers/health
 */

import { Hono, type MiddlewareHandler } from 'hono';
import type { ProviderRegistry } from '../services/registry';
import type { AppEnv } from '../types';

export function createProviderRoutes(registry: ProviderRegistry, auth: MiddlewareHandler<AppEnv>) {
  const providers = new Hono<AppEnv>();

  providers.get('/health', auth, (c) => {
    const records = registry.snapshot();
    const capabilities = new Map(registry.list().map((adapter) => [adapter.name, adapter.modelClasses]));

    return c.json({
      providers: records.map((record) => ({
        ...record,
        model_classes: capabilities.get(record.provider) ?? [],
      })),
      healthy: records.filter((record) => record.healthy).length,
      total: records.length,
    });
  });

  return providers;
}
