/**
 * Execution Engine
 *
 * One request, one state machine:
 *
 *   RECEIVED → CREDIT_RESERVED → PROVIDER_CALLED → CONTRACT_VALIDATED → BILLED → COMPLETED
 *                     └──────────────── any failure ──────────────────→ FAILED
 *
 * Credits are debited before any provider call. Every failure after the debit
 * and before BILLED issues a compensating refund keyed `exec:<user_id>:<request_id>`;
 * the refund does not use the caller's abort signal, so it runs even when
 * the client has gone away.
 *
 * Whole executions are idempotent on the request id: a completed request
 * replays its stored result without calling a provider or charging again.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  ContractViolationError,
  IdempotencyKeyReuseError,
  InsufficientCreditsError,
  RequestAbortedError,
  describeError,
  toForgeError,
} from '../errors';
import type { IdempotencyStore } from '../db/idempotency';
import type { CreditLedger } from '../billing/ledger';
import type { Plan } from '../billing/types';
import { computeAdjustment, creditsToTokens } from '../billing/tokens';
import type { ProviderRegistry } from '../services/registry';
import type { Message, ProviderRequest } from '../types';
import { parseCommands } from './commands';
import { validateContract } from './contracts';
import type { TechniqueMatcher, TechniqueScore } from './matcher';
import { composePrompt } from './render';
import type { PipelineRouter } from './router';
import { OUTPUT_STYLE_INSTRUCTIONS, type Contract, type Pipeline, type RouteQuery, type Technique } from './types';

export const EXECUTION_STATES = [
  'RECEIVED',
  'CREDIT_RESERVED',
  'PROVIDER_CALLED',
  'CONTRACT_VALIDATED',
  'BILLED',
  'COMPLETED',
  'FAILED',
] as const;

export type ExecutionState = (typeof EXECUTION_STATES)[number];

// =============================================================================
// RESULT SHAPE (stored for idempotent replay, so it is a schema)
// =============================================================================

const transitionSchema = z.object({
  state: z.enum(EXECUTION_STATES),
  at: z.string(),
  elapsed_ms: z.number(),
  reason: z.string().optional(),
});

export const executionResultSchema = z.object({
  rendered_output: z.object({
    content: z.string(),
    json: z.record(z.unknown()).optional(),
  }),
  diagnostics: z.object({
    request_id: z.string(),
    pipeline_id: z.string(),
    fallback: z.boolean(),
    query: z.object({ intent: z.string(), client: z.string(), mode: z.string() }),
    techniques: z.array(z.object({ technique_id: z.string(), score: z.number(), included: z.boolean() })),
    provider: z.string(),
    model: z.string(),
    attempts: z.array(
      z.object({
        provider: z.string(),
        outcome: z.enum(['success', 'error', 'timeout']),
        latency_ms: z.number(),
        error: z.string().optional(),
      }),
    ),
    tokens: z.object({
      prompt: z.number(),
      completion: z.number(),
      total: z.number(),
      estimated: z.number(),
    }),
    estimated_credits: z.number(),
    adjustment: z
      .object({
        delta_credits: z.number(),
        deviation: z.number(),
        shortfall: z.number(),
      })
      .nullable(),
    timing_ms: z.number(),
    states: z.array(transitionSchema),
    rendered_prompt: z.string().optional(),
  }),
  credits_used: z.number(),
});

export type ExecutionResult = z.infer<typeof executionResultSchema>;
export type StateTransition = z.infer<typeof transitionSchema>;

// =============================================================================
// INPUTS
// =============================================================================

export interface ExecuteRequest {
  text: string;
  intent?: string;
  client?: string;
  mode?: string;
  /** Include the rendered prompt in diagnostics */
  explain?: boolean;
}

export interface ExecuteContext {
  userId: string;
  plan: Plan;
  /** Client idempotency key; a UUID is generated when absent */
  requestId?: string;
  signal?: AbortSignal;
}

export interface ExecutionPlan {
  query: RouteQuery;
  pipeline: Pipeline;
  fallback: boolean;
  techniques: Technique[];
  scores: TechniqueScore[];
  estimatedCredits: number;
  estimatedTokens: number;
  prompt: string;
  baseText: string;
}

export interface EngineOptions {
  tokensPerCredit: number;
  adjustThreshold: number;
  /** Upper bound on how long a duplicate request waits for the original */
  duplicateWaitMs: number;
}

export interface EngineStats {
  received: number;
  completed: number;
  failed: number;
  replayed: number;
  refunds: number;
  failures: Record<string, number>;
}

export const EXECUTE_SCOPE = 'execute';

// =============================================================================
// TRACE
// =============================================================================

class ExecutionTrace {
  readonly transitions: StateTransition[] = [];
  private readonly started = Date.now();

  constructor(readonly requestId: string) {
    this.enter('RECEIVED');
  }

  get state(): ExecutionState {
    return this.transitions[this.transitions.length - 1].state;
  }

  get elapsed(): number {
    return Date.now() - this.started;
  }

  enter(state: ExecutionState, reason?: string): void {
    const transition: StateTransition = { state, at: new Date().toISOString(), elapsed_ms: this.elapsed };
    if (reason) transition.reason = reason;
    this.transitions.push(transition);
  }
}

// =============================================================================
// ENGINE
// =============================================================================

export class ExecutionEngine {
  private readonly counters: EngineStats = {
    received: 0,
    completed: 0,
    failed: 0,
    replayed: 0,
    refunds: 0,
    failures: {},
  };

  constructor(
    private readonly router: PipelineRouter,
    private readonly matcher: TechniqueMatcher,
    private readonly registry: ProviderRegistry,
    private readonly ledger: CreditLedger,
    private readonly idempotency: IdempotencyStore,
    private readonly options: EngineOptions,
  ) {}

  stats(): EngineStats {
    return { ...this.counters, failures: { ...this.counters.failures } };
  }

  /**
   * Routing, matching, rendering and cost estimate with no side effects.
   */
  plan(request: ExecuteRequest, plan: Plan): ExecutionPlan {
    const parsed = parseCommands(request.text);
    const decision = this.router.resolve(request, plan);
    const { query, pipeline } = decision;

    const commandNames = parsed.commands.map((command) => command.name);
    const { techniques, scores } = this.matcher.match(parsed.text, query.intent, pipeline, commandNames);

    const { prompt } = composePrompt(parsed.text, techniques, { ...query, args: parsed.args });
    const estimatedCredits = pipeline.base_cost + techniques.reduce((sum, t) => sum + t.cost, 0);

    return {
      query,
      pipeline,
      fallback: decision.fallback,
      techniques,
      scores,
      estimatedCredits,
      estimatedTokens: creditsToTokens(estimatedCredits, this.options.tokensPerCredit),
      prompt,
      baseText: parsed.text,
    };
  }

  async execute(request: ExecuteRequest, context: ExecuteContext): Promise<{ result: ExecutionResult; replayed: boolean }> {
    const requestId = context.requestId ?? randomUUID();
    this.counters.received++;

    // Client keys are only unique per user
    const outcome = await this.idempotency.run(
      EXECUTE_SCOPE,
      scopedKey(context.userId, requestId),
      {
        userId: context.userId,
        text: request.text,
        intent: request.intent ?? null,
        client: request.client ?? null,
        mode: request.mode ?? null,
      },
      executionResultSchema,
      () => this.run(request, context, requestId),
      { pollTimeoutMs: this.options.duplicateWaitMs, staleAfterMs: this.options.duplicateWaitMs },
    );

    if (outcome.replayed) {
      this.counters.replayed++;
      console.log(`[ENGINE] ${requestId} already completed, replaying stored result`);
    }
    // The stored result always carries the prompt; explain only decides whether it is returned
    return { result: request.explain ? outcome.result : withoutPrompt(outcome.result), replayed: outcome.replayed };
  }

  private async run(request: ExecuteRequest, context: ExecuteContext, requestId: string): Promise<ExecutionResult> {
    const trace = new ExecutionTrace(requestId);
    const ledgerKey = scopedKey(context.userId, requestId);
    const debitKey = `exec:${ledgerKey}`;
    let debited = 0;

    try {
      const plan = this.plan(request, context.plan);

      // RECEIVED → CREDIT_RESERVED
      if (context.signal?.aborted) {
        throw new RequestAbortedError('credit reservation');
      }
      const debit = await this.ledger.debit(context.userId, plan.estimatedCredits, debitKey, {
        requestId,
        description: `Execution via ${plan.pipeline.id}`,
      });
      if (debit.replayed) {
        // A fresh execution found its debit already applied: an earlier attempt
        // with this request id failed and was refunded
        throw new IdempotencyKeyReuseError(
          EXECUTE_SCOPE,
          requestId,
          `Request id "${requestId}" belongs to a request that already failed; retry with a new key`,
        );
      }
      debited = plan.estimatedCredits;
      trace.enter('CREDIT_RESERVED');

      // CREDIT_RESERVED → PROVIDER_CALLED
      const providerRequest = this.buildProviderRequest(plan);
      const { response, attempts } = await this.registry.executeWithFailover(
        providerRequest,
        plan.pipeline.model_class,
        context.signal,
      );
      trace.enter('PROVIDER_CALLED');

      // PROVIDER_CALLED → CONTRACT_VALIDATED
      const validation = validateContract(plan.pipeline.contract, response.content);
      if (!validation.ok) {
        throw new ContractViolationError(plan.pipeline.contract.name, validation.violations);
      }
      trace.enter('CONTRACT_VALIDATED');

      // CONTRACT_VALIDATED → BILLED
      const billing = await this.settle(context.userId, requestId, plan.estimatedCredits, response.usage.total_tokens);
      debited = 0;
      trace.enter('BILLED');

      trace.enter('COMPLETED');
      this.counters.completed++;
      console.log(
        `[ENGINE] ${requestId} completed via ${plan.pipeline.id}/${response.provider} (${billing.creditsUsed} credits)`,
      );

      const result: ExecutionResult = {
        rendered_output: validation.json ? { content: response.content, json: validation.json } : { content: response.content },
        diagnostics: {
          request_id: requestId,
          pipeline_id: plan.pipeline.id,
          fallback: plan.fallback,
          query: plan.query,
          techniques: plan.scores,
          provider: response.provider,
          model: response.model,
          attempts,
          tokens: {
            prompt: response.usage.prompt_tokens,
            completion: response.usage.completion_tokens,
            total: response.usage.total_tokens,
            estimated: plan.estimatedTokens,
          },
          estimated_credits: plan.estimatedCredits,
          adjustment: billing.adjustment,
          timing_ms: trace.elapsed,
          states: trace.transitions,
          rendered_prompt: plan.prompt,
        },
        credits_used: billing.creditsUsed,
      };
      return result;
    } catch (error) {
      const kind = toForgeError(error).kind;
      trace.enter('FAILED', kind);
      this.counters.failed++;
      this.counters.failures[kind] = (this.counters.failures[kind] ?? 0) + 1;
      console.warn(
        `[ENGINE] ${requestId} FAILED after ${trace.transitions[trace.transitions.length - 2].state}: ${describeError(error)}`,
      );

      if (debited > 0) {
        await this.refund(context.userId, requestId, debited);
      }
      throw error;
    }
  }

  private buildProviderRequest(plan: ExecutionPlan): ProviderRequest {
    const messages: Message[] = [];
    const { system_prompt, output_style, contract } = plan.pipeline;
    const style = output_style ? OUTPUT_STYLE_INSTRUCTIONS[output_style] : undefined;
    const system = [system_prompt, style, contractInstructions(contract)]
      .filter((part): part is string => Boolean(part))
      .join('\n\n');
    if (system) {
      messages.push({ role: 'system', content: system });
    }
    messages.push({ role: 'user', content: plan.prompt });

    return { messages, json: plan.pipeline.contract.format === 'json' };
  }

  /**
   * Reconcile the estimate with real usage. Extra charges are capped at the
   * remaining balance; the uncollected part is logged as a shortfall.
   */
  private async settle(
    userId: string,
    requestId: string,
    estimatedCredits: number,
    actualTokens: number,
  ): Promise<{ creditsUsed: number; adjustment: ExecutionResult['diagnostics']['adjustment'] }> {
    const { deltaCredits, deviation } = computeAdjustment(
      estimatedCredits,
      actualTokens,
      this.options.tokensPerCredit,
      this.options.adjustThreshold,
    );
    if (deltaCredits === 0) {
      return { creditsUsed: estimatedCredits, adjustment: null };
    }

    const key = `adjust:${scopedKey(userId, requestId)}`;
    if (deltaCredits < 0) {
      await this.ledger.credit(userId, -deltaCredits, key, {
        type: 'refund',
        requestId,
        description: 'Usage below estimate',
      });
      return {
        creditsUsed: estimatedCredits + deltaCredits,
        adjustment: { delta_credits: deltaCredits, deviation, shortfall: 0 },
      };
    }

    const { balance } = await this.ledger.balance(userId);
    const collectible = Math.min(deltaCredits, balance);
    let collected = 0;
    if (collectible > 0) {
      try {
        await this.ledger.debit(userId, collectible, key, { requestId, description: 'Usage above estimate' });
        collected = collectible;
      } catch (error) {
        if (!(error instanceof InsufficientCreditsError)) throw error;
        // Balance moved between the read and the debit; record it as shortfall
      }
    }

    const shortfall = deltaCredits - collected;
    if (shortfall > 0) {
      console.warn(`[ENGINE] ${requestId} usage exceeded balance; ${shortfall} credit(s) uncollected`);
    }
    return {
      creditsUsed: estimatedCredits + collected,
      adjustment: { delta_credits: collected, deviation, shortfall },
    };
  }

  private async refund(userId: string, requestId: string, amount: number): Promise<void> {
    try {
      await this.ledger.credit(userId, amount, `exec:${scopedKey(userId, requestId)}`, {
        type: 'refund',
        requestId,
        description: 'Compensating refund for failed execution',
      });
      this.counters.refunds++;
      console.log(`[ENGINE] ${requestId} refunded ${amount} credit(s) to ${userId}`);
    } catch (refundError) {
      // The original failure is what the caller sees; this needs an operator
      console.error(`[ENGINE] Compensating refund FAILED for ${requestId} (${amount} credits, ${userId}):`, refundError);
    }
  }
}

function scopedKey(userId: string, requestId: string): string {
  return `${userId}:${requestId}`;
}

function withoutPrompt(result: ExecutionResult): ExecutionResult {
  const diagnostics = { ...result.diagnostics };
  delete diagnostics.rendered_prompt;
  return { ...result, diagnostics };
}

function contractInstructions(contract: Contract): string | null {
  if (contract.format !== 'json') return null;
  const fields = Object.entries(contract.fields)
    .map(([name, type]) => `"${name}" (${type})`)
    .join(', ');
  return fields
    ? `Respond with a single JSON object containing: ${fields}.`
    : 'Respond with a single JSON object.';
}
