/**
 * Runtime Configuration
 *
 * Environment variables are parsed once into a typed AppConfig.
 * Pipeline, technique, provider and credit-pack definitions live in JSON under
 * CONFIG_DIR and are loaded by src/engine/catalog.ts.
 */

import 'dotenv/config';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const DEFAULT_CONFIG_DIR = fileURLToPath(new URL('../config', import.meta.url));

const csv = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0),
  );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_PATH: z.string().default(':memory:'),
  CONFIG_DIR: z.string().default(DEFAULT_CONFIG_DIR),
  STARTER_GRANT_CREDITS: z.coerce.number().int().nonnegative().default(10),
  LEDGER_MAX_RETRIES: z.coerce.number().int().positive().default(5),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  PROVIDER_MAX_FAILOVER: z.coerce.number().int().nonnegative().default(2),
  HEALTH_PROBE_INTERVAL_MS: z.coerce.number().int().nonnegative().default(60_000),
  BILLING_ADJUST_THRESHOLD: z.coerce.number().nonnegative().default(0.2),
  TOKENS_PER_CREDIT: z.coerce.number().int().positive().default(500),
  DEFAULT_PIPELINE_ID: z.string().default('general.default'),
  STRIPE_SECRET_KEY: z.string().optional(),
  STRIPE_WEBHOOK_SECRET: z.string().optional(),
  PUBLIC_APP_URL: z.string().url().default('http://localhost:3000'),
  KILL_SWITCHES: csv,
});

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  databasePath: string;
  configDir: string;
  ledger: {
    starterGrantCredits: number;
    maxRetries: number;
  };
  providers: {
    timeoutMs: number;
    maxFailover: number;
    probeIntervalMs: number;
  };
  billing: {
    adjustThreshold: number;
    tokensPerCredit: number;
  };
  routing: {
    defaultPipelineId: string;
    killSwitches: string[];
  };
  stripe: {
    secretKey?: string;
    webhookSecret?: string;
    publicAppUrl: string;
  };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const env = parsed.data;
  return Object.freeze({
    env: env.NODE_ENV,
    port: env.PORT,
    databasePath: env.DATABASE_PATH,
    configDir: env.CONFIG_DIR,
    ledger: {
      starterGrantCredits: env.STARTER_GRANT_CREDITS,
      maxRetries: env.LEDGER_MAX_RETRIES,
    },
    providers: {
      timeoutMs: env.PROVIDER_TIMEOUT_MS,
      maxFailover: env.PROVIDER_MAX_FAILOVER,
      probeIntervalMs: env.HEALTH_PROBE_INTERVAL_MS,
    },
    billing: {
      adjustThreshold: env.BILLING_ADJUST_THRESHOLD,
      tokensPerCredit: env.TOKENS_PER_CREDIT,
    },
    routing: {
      defaultPipelineId: env.DEFAULT_PIPELINE_ID,
      killSwitches: env.KILL_SWITCHES,
    },
    stripe: {
      secretKey: env.STRIPE_SECRET_KEY,
      webhookSecret: env.STRIPE_WEBHOOK_SECRET,
      publicAppUrl: env.PUBLIC_APP_URL,
    },
  });
}
