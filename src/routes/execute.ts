/**
 * Execution Routes
 *
 *   POST /execute   run a request through its pipeline (debits credits)
 *   POST /route     dry run: pipeline, technique scores and estimated cost
 *
 * Flow for /execute:
 *   1. Auth → done by middleware
 *   2. Validate body + Idempotency-Key
 *   3. Engine: route → match → debit → provider → contract → bill
 *   4. Respond { status, data: { rendered_output, diagnostics }, credits_used }
 */

import { Hono, type MiddlewareHandler } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { getAuth } from '../middleware/auth';
import { rejectInvalid } from '../middleware/errors';
import { ValidationError } from '../errors';
import type { ExecutionEngine } from '../engine/execution';
import type { AppEnv } from '../types';

const tag = z.string().trim().min(1).max(64);

export const executeRequestSchema = z.object({
  text: z.string().min(1).max(50_000),
  intent: tag.optional(),
  client: tag.optional(),
  mode: tag.optional(),
  explain: z.boolean().optional(),
});

const IDEMPOTENCY_KEY = /^[\w.:-]{1,128}$/;

export function createExecuteRoutes(engine: ExecutionEngine, auth: MiddlewareHandler<AppEnv>) {
  const routes = new Hono<AppEnv>();

  routes.post('/execute', auth, zValidator('json', executeRequestSchema, rejectInvalid), async (c) => {
    const { userId, plan } = getAuth(c);
    const body = c.req.valid('json');

    const idempotencyKey = c.req.header('Idempotency-Key');
    if (idempotencyKey !== undefined && !IDEMPOTENCY_KEY.test(idempotencyKey)) {
      throw new ValidationError('Idempotency-Key must be 1-128 characters of [A-Za-z0-9_.:-]');
    }

    const { result, replayed } = await engine.execute(body, {
      userId,
      plan,
      requestId: idempotencyKey,
      signal: c.req.raw.signal,
    });

    c.header('X-Request-Id', result.diagnostics.request_id);
    if (replayed) {
      c.header('Idempotent-Replayed', 'true');
    }

    return c.json({
      status: 'success',
      data: {
        rendered_output: result.rendered_output,
        diagnostics: result.diagnostics,
      },
      credits_used: result.credits_used,
    });
  });

  routes.post('/route', auth, zValidator('json', executeRequestSchema, rejectInvalid), (c) => {
    const { plan: userPlan } = getAuth(c);
    const body = c.req.valid('json');
    const plan = engine.plan(body, userPlan);

    return c.json({
      pipeline_id: plan.pipeline.id,
      fallback: plan.fallback,
      query: plan.query,
      model_class: plan.pipeline.model_class,
      contract: plan.pipeline.contract,
      output_style: plan.pipeline.output_style ?? null,
      techniques: plan.scores,
      estimated_credits: plan.estimatedCredits,
      estimated_tokens: plan.estimatedTokens,
      ...(body.explain ? { rendered_prompt: plan.prompt } : {}),
    });
  });

  return routes;
}
