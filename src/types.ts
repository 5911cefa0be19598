/**
 * Core Types
 *
 * Shared across providers, engine and routes.
 */

import type { Plan } from './billing/types';

// =============================================================================
// PROVIDERS
// =============================================================================

/** Wire protocol an adapter speaks */
export type ProviderWireFormat = 'openai' | 'anthropic' | 'openrouter';

export type ModelClass = string;

// =============================================================================
// MESSAGES
// =============================================================================

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

// =============================================================================
// PROVIDER CALLS
// =============================================================================

export interface ProviderRequest {
  messages: Message[];
  max_tokens?: number;
  temperature?: number;
  /** Ask the provider for a JSON object response where supported */
  json?: boolean;
}

export interface TokenUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ProviderResponse {
  provider: string;
  model: string;
  content: string;
  usage: TokenUsage;
  latency_ms: number;
}

// =============================================================================
// REQUEST CONTEXT (set by auth middleware)
// =============================================================================

export interface AuthContext {
  userId: string;
  plan: Plan;
}

export interface AppEnv {
  Variables: {
    auth: AuthContext;
  };
}
