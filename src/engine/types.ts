/**
 * Engine Types
 *
 * Pipelines, techniques and contracts are configuration, validated with zod
 * when the catalog loads and read-only afterwards.
 */

import { z } from 'zod';

/** Matches any intent or client */
export const WILDCARD = 'any';

// =============================================================================
// CONTRACTS
// =============================================================================

export const FIELD_TYPES = ['string', 'number', 'boolean', 'array', 'object'] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

export const contractSchema = z.object({
  name: z.string().min(1),
  format: z.enum(['json', 'text']).default('text'),
  /** Required field → type. Text contracts validate fields of { content } */
  fields: z.record(z.enum(FIELD_TYPES)).default({}),
});

export type Contract = z.infer<typeof contractSchema>;

// =============================================================================
// TECHNIQUES
// =============================================================================

export const matchRuleSchema = z.object({
  always: z.boolean().default(false),
  intents: z.array(z.string()).default([]),
  keywords: z.array(z.string().min(1)).default([]),
  /** Slash commands that force the technique on, without the leading "/" */
  aliases: z.array(z.string().min(1)).default([]),
  weights: z
    .object({
      intent: z.number().min(0).max(1),
      keyword: z.number().min(0).max(1),
    })
    .default({ intent: 0.6, keyword: 0.4 }),
});

export type MatchRule = z.infer<typeof matchRuleSchema>;

export const techniqueSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  /** Fragment with {{slot}} placeholders */
  template: z.string().min(1),
  cost: z.number().int().nonnegative().default(1),
  match: matchRuleSchema.default({}),
});

export type Technique = z.infer<typeof techniqueSchema>;

// =============================================================================
// OUTPUT STYLES
// =============================================================================

/** How the answer is laid out for the calling surface */
export const OUTPUT_STYLE_INSTRUCTIONS = {
  paragraphs_and_bullets: 'Answer in short paragraphs, using bullet points for lists.',
  imperative_lines: 'Answer as short imperative lines, one action per line.',
  agent_plan: 'Answer with a numbered plan of concrete steps, then state the first action to take.',
  marketing_friendly: 'Answer in a warm, upbeat tone suited to a public web page.',
} as const;

export type OutputStyle = keyof typeof OUTPUT_STYLE_INSTRUCTIONS;

const OUTPUT_STYLES = [
  'paragraphs_and_bullets',
  'imperative_lines',
  'agent_plan',
  'marketing_friendly',
] as const satisfies readonly OutputStyle[];

// =============================================================================
// PIPELINES
// =============================================================================

export const pipelineSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  intents: z.array(z.string().min(1)).min(1),
  clients: z.array(z.string().min(1)).min(1),
  /** When present the pipeline applies only to these modes */
  modes: z.array(z.string().min(1)).optional(),
  technique_ids: z.array(z.string().min(1)).default([]),
  contract: contractSchema,
  model_class: z.string().min(1),
  threshold: z.number().min(0).max(1).default(0.5),
  /** At least 1, so every execution reserves credits */
  base_cost: z.number().int().positive().default(1),
  pro_only: z.boolean().default(false),
  system_prompt: z.string().optional(),
  output_style: z.enum(OUTPUT_STYLES).optional(),
});

export type Pipeline = z.infer<typeof pipelineSchema>;

// =============================================================================
// REQUESTS
// =============================================================================

export interface RouteQuery {
  intent: string;
  client: string;
  mode: string;
}

export const REQUEST_DEFAULTS: RouteQuery = {
  intent: 'chat',
  client: WILDCARD,
  mode: 'free',
};
