/**
 * Catalog loading
 *
 * Reads pipelines, techniques, providers and billing packs from JSON files in
 * the config directory, validates them with zod and cross-checks references.
 * Any problem is a PipelineConfigurationError at start-up, never at request time.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { PipelineConfigurationError } from '../errors';
import { billingCatalogSchema, type BillingCatalog } from '../billing/types';
import { providerConfigSchema, type ProviderConfig } from '../services/providers';
import { pipelineSchema, techniqueSchema, type Pipeline, type Technique } from './types';

export interface Catalog {
  pipelines: Pipeline[];
  techniques: Technique[];
  providers: ProviderConfig[];
  billing: BillingCatalog;
}

const pipelinesFileSchema = z.object({ pipelines: z.array(pipelineSchema).min(1) });
const techniquesFileSchema = z.object({ techniques: z.array(techniqueSchema) });
const providersFileSchema = z.object({ providers: z.array(providerConfigSchema) });

function readJson<T>(configDir: string, file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const path = join(configDir, file);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PipelineConfigurationError(`Cannot read ${path}: ${message}`);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new PipelineConfigurationError(`Invalid ${file}: ${problems}`);
  }
  return result.data;
}

function assertUnique(kind: string, ids: string[]): void {
  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) throw new PipelineConfigurationError(`Duplicate ${kind} id "${id}"`);
    seen.add(id);
  }
}

/**
 * Cross-reference checks shared by file loading and tests that build
 * catalogs in memory.
 */
export function validateCatalog(pipelines: Pipeline[], techniques: Technique[], defaultPipelineId: string): void {
  assertUnique('pipeline', pipelines.map((p) => p.id));
  assertUnique('technique', techniques.map((t) => t.id));

  const known = new Set(techniques.map((t) => t.id));
  for (const pipeline of pipelines) {
    for (const techniqueId of pipeline.technique_ids) {
      if (!known.has(techniqueId)) {
        throw new PipelineConfigurationError(`Pipeline ${pipeline.id} references unknown technique "${techniqueId}"`);
      }
    }
  }

  if (!pipelines.some((p) => p.id === defaultPipelineId)) {
    throw new PipelineConfigurationError(`Default pipeline "${defaultPipelineId}" is not defined`);
  }
}

export function loadCatalog(configDir: string, defaultPipelineId: string): Catalog {
  const { pipelines } = readJson(configDir, 'pipelines.json', pipelinesFileSchema);
  const { techniques } = readJson(configDir, 'techniques.json', techniquesFileSchema);
  const { providers } = readJson(configDir, 'providers.json', providersFileSchema);
  const billing = readJson(configDir, 'billing.json', billingCatalogSchema);

  validateCatalog(pipelines, techniques, defaultPipelineId);
  assertUnique('provider', providers.map((p) => p.name));
  assertUnique('credit pack', billing.credit_packs.map((p) => p.id));

  console.log(
    `[CATALOG] Loaded ${pipelines.length} pipelines, ${techniques.length} techniques, ${providers.length} providers`,
  );
  return { pipelines, techniques, providers, billing };
}
