/**
 * AI Provider Adapters
 *
 * Each configured provider is an adapter that speaks one wire format
 * (OpenAI chat completions, Anthropic messages, or OpenRouter's
 * OpenAI-compatible API) and maps a model class ("fast", "smart", ...)
 * onto a concrete model name.
 *
 * Adapters do not retry or track health; the registry does that.
 */

import { z } from 'zod';
import { ProviderCallError } from '../errors';
import { countTokens } from '../billing/tokens';
import type { Message, ModelClass, ProviderRequest, ProviderResponse, ProviderWireFormat, TokenUsage } from '../types';

// =============================================================================
// PROVIDER CONFIGS
// =============================================================================

export const providerConfigSchema = z.object({
  name: z.string().min(1),
  format: z.enum(['openai', 'anthropic', 'openrouter']),
  base_url: z.string().url(),
  api_key_env: z.string().min(1),
  /** model class → provider model name */
  models: z.record(z.string().min(1)),
});

export type ProviderConfig = z.infer<typeof providerConfigSchema>;

export interface ProviderAdapter {
  readonly name: string;
  readonly modelClasses: readonly ModelClass[];
  invoke(request: ProviderRequest, modelClass: ModelClass, signal: AbortSignal): Promise<ProviderResponse>;
  /** Cheap reachability check used by the health monitor */
  probe?(signal: AbortSignal): Promise<void>;
}

const AUTH_HEADERS: Record<ProviderWireFormat, string> = {
  openai: 'Authorization',
  anthropic: 'x-api-key',
  openrouter: 'Authorization',
};

// =============================================================================
// RESPONSE SCHEMAS
// =============================================================================

const openAIResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

const anthropicResponseSchema = z.object({
  model: z.string().optional(),
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

// =============================================================================
// REQUEST TRANSFORMATION
// =============================================================================

/**
 * Anthropic uses system as a separate top-level field
 */
function transformForAnthropic(model: string, request: ProviderRequest): Record<string, unknown> {
  const systemMessages = request.messages.filter((m) => m.role === 'system');
  const otherMessages = request.messages.filter((m) => m.role !== 'system');

  const body: Record<string, unknown> = {
    model,
    messages: otherMessages.map((m) => ({ role: m.role, content: m.content })),
    max_tokens: request.max_tokens ?? 4096,
  };

  if (systemMessages.length > 0) {
    body.system = systemMessages.map((m) => m.content).join('\n\n');
  }
  if (request.temperature !== undefined) body.temperature = request.temperature;

  return body;
}

function transformForOpenAI(model: string, request: ProviderRequest): Record<string, unknown> {
  const body: Record<string, unknown> = {
    model,
    messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
  };
  if (request.max_tokens !== undefined) body.max_tokens = request.max_tokens;
  if (request.temperature !== undefined) body.temperature = request.temperature;
  if (request.json) body.response_format = { type: 'json_object' };
  return body;
}

// =============================================================================
// HTTP ADAPTER
// =============================================================================

export class HttpProviderAdapter implements ProviderAdapter {
  readonly name: string;
  readonly modelClasses: readonly ModelClass[];

  constructor(
    private readonly config: ProviderConfig,
    private readonly apiKey: string,
  ) {
    this.name = config.name;
    this.modelClasses = Object.keys(config.models);
  }

  async invoke(request: ProviderRequest, modelClass: ModelClass, signal: AbortSignal): Promise<ProviderResponse> {
    const model = this.config.models[modelClass];
    if (!model) {
      throw new ProviderCallError(this.name, `does not serve model class "${modelClass}"`);
    }

    const isAnthropic = this.config.format === 'anthropic';
    const endpoint = isAnthropic ? `${this.config.base_url}/messages` : `${this.config.base_url}/chat/completions`;
    const body = isAnthropic ? transformForAnthropic(model, request) : transformForOpenAI(model, request);

    console.log(`[PROVIDER] ${this.name}: POST ${endpoint} (${modelClass} → ${model})`);
    const started = Date.now();

    const response = await fetch(endpoint, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new ProviderCallError(this.name, `HTTP ${response.status}: ${errorBody.slice(0, 200)}`, response.status);
    }

    const json: unknown = await response.json();
    const parsed = isAnthropic ? parseAnthropic(json, model) : parseOpenAI(json, model);
    if (!parsed) {
      throw new ProviderCallError(this.name, 'unexpected response shape');
    }

    return {
      provider: this.name,
      model: parsed.model,
      content: parsed.content,
      usage: parsed.usage ?? estimateUsage(request.messages, parsed.content),
      latency_ms: Date.now() - started,
    };
  }

  async probe(signal: AbortSignal): Promise<void> {
    const response = await fetch(`${this.config.base_url}/models`, {
      method: 'GET',
      headers: this.headers(),
      signal,
    });
    if (!response.ok) {
      throw new ProviderCallError(this.name, `health probe returned HTTP ${response.status}`, response.status);
    }
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    const authHeader = AUTH_HEADERS[this.config.format];

    switch (this.config.format) {
      case 'anthropic':
        headers[authHeader] = this.apiKey;
        headers['anthropic-version'] = '2023-06-01';
        break;
      case 'openrouter':
        headers[authHeader] = `Bearer ${this.apiKey}`;
        headers['X-Title'] = 'PromptForge';
        break;
      case 'openai':
        headers[authHeader] = `Bearer ${this.apiKey}`;
        break;
    }
    return headers;
  }
}

interface ParsedCompletion {
  model: string;
  content: string;
  usage?: TokenUsage;
}

function parseOpenAI(json: unknown, requestedModel: string): ParsedCompletion | null {
  const result = openAIResponseSchema.safeParse(json);
  if (!result.success) return null;
  const { data } = result;
  return {
    model: data.model ?? requestedModel,
    content: data.choices[0].message.content ?? '',
    usage: data.usage,
  };
}

function parseAnthropic(json: unknown, requestedModel: string): ParsedCompletion | null {
  const result = anthropicResponseSchema.safeParse(json);
  if (!result.success) return null;
  const { data } = result;
  const content = data.content
    .filter((block) => block.type === 'text')
    .map((block) => block.text ?? '')
    .join('');
  return {
    model: data.model ?? requestedModel,
    content,
    usage: data.usage && {
      prompt_tokens: data.usage.input_tokens,
      completion_tokens: data.usage.output_tokens,
      total_tokens: data.usage.input_tokens + data.usage.output_tokens,
    },
  };
}

/**
 * Fallback when a provider omits usage.
 */
export function estimateUsage(messages: Message[], completion: string): TokenUsage {
  const prompt = messages.reduce((sum, m) => sum + countTokens(m.content), 0);
  const completionTokens = countTokens(completion);
  return {
    prompt_tokens: prompt,
    completion_tokens: completionTokens,
    total_tokens: prompt + completionTokens,
  };
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Build adapters for every configured provider whose API key is present.
 */
export function createProviderAdapters(
  configs: ProviderConfig[],
  env: NodeJS.ProcessEnv = process.env,
): ProviderAdapter[] {
  const adapters: ProviderAdapter[] = [];
  for (const config of configs) {
    const apiKey = env[config.api_key_env];
    if (!apiKey) {
      console.warn(`[PROVIDER] ${config.name}: ${config.api_key_env} not set, skipping`);
      continue;
    }
    adapters.push(new HttpProviderAdapter(config, apiKey));
  }
  return adapters;
}
