/**
 * Pipeline Router
 *
 * Deterministic pipeline choice for an (intent, client, mode) triple.
 *
 * Candidates: intents contain the intent (or "any"), clients contain the
 * client (or "any"), and modes, when declared, contain the mode.
 * Specificity: exact intent +4, exact client +2, declared mode +1.
 * Highest wins; ties go to the pipeline declared first.
 */

import { KillSwitchError, NoPipelineMatchError, PipelineConfigurationError, ProRequiredError } from '../errors';
import type { Plan } from '../billing/types';
import { REQUEST_DEFAULTS, WILDCARD, type Pipeline, type RouteQuery } from './types';

export interface RouterOptions {
  defaultPipelineId: string;
  /** "intent:mode:client" keys; any part may be "*" */
  killSwitches?: readonly string[];
}

export interface RouteDecision {
  pipeline: Pipeline;
  query: RouteQuery;
  specificity: number;
  fallback: boolean;
}

export function normalizeQuery(query: Partial<RouteQuery>): RouteQuery {
  const pick = (value: string | undefined, fallback: string) => {
    const trimmed = value?.trim().toLowerCase();
    return trimmed ? trimmed : fallback;
  };
  return {
    intent: pick(query.intent, REQUEST_DEFAULTS.intent),
    client: pick(query.client, REQUEST_DEFAULTS.client),
    mode: pick(query.mode, REQUEST_DEFAULTS.mode),
  };
}

export function killSwitchKey({ intent, mode, client }: RouteQuery): string {
  return `${intent}:${mode}:${client}`;
}

export class PipelineRouter {
  private readonly pipelines: readonly Pipeline[];
  private readonly killSwitches: string[][];

  constructor(
    pipelines: readonly Pipeline[],
    private readonly options: RouterOptions,
  ) {
    this.pipelines = pipelines;
    this.killSwitches = (options.killSwitches ?? []).map((key) => key.trim().toLowerCase().split(':'));
  }

  get defaultPipeline(): Pipeline | undefined {
    return this.pipelines.find((p) => p.id === this.options.defaultPipelineId);
  }

  list(): readonly Pipeline[] {
    return this.pipelines;
  }

  /**
   * Most specific non-default pipeline. Throws NoPipelineMatch when none applies.
   */
  route(intent: string, client: string, mode: string): RouteDecision {
    const query = { intent, client, mode };
    let best: { pipeline: Pipeline; specificity: number } | null = null;

    for (const pipeline of this.pipelines) {
      if (pipeline.id === this.options.defaultPipelineId) continue;
      const specificity = scorePipeline(pipeline, query);
      if (specificity === null) continue;
      // Strictly greater: ties keep the earlier declaration
      if (!best || specificity > best.specificity) {
        best = { pipeline, specificity };
      }
    }

    if (!best) {
      throw new NoPipelineMatchError(intent, client, mode);
    }
    return { pipeline: best.pipeline, query, specificity: best.specificity, fallback: false };
  }

  /**
   * Request-level routing: defaults for absent fields, kill switches, the
   * default-pipeline fallback and pro gating.
   */
  resolve(request: Partial<RouteQuery>, plan: Plan): RouteDecision {
    const query = normalizeQuery(request);

    if (this.isKilled(query)) {
      console.warn(`[ROUTER] Kill switch engaged for ${killSwitchKey(query)}`);
      throw new KillSwitchError(killSwitchKey(query));
    }

    let decision: RouteDecision;
    try {
      decision = this.route(query.intent, query.client, query.mode);
    } catch (error) {
      if (!(error instanceof NoPipelineMatchError)) throw error;

      const fallback = this.defaultPipeline;
      if (!fallback) {
        throw new PipelineConfigurationError(
          `No pipeline matches ${killSwitchKey(query)} and default pipeline "${this.options.defaultPipelineId}" is missing`,
        );
      }
      console.log(`[ROUTER] No pipeline for ${killSwitchKey(query)}, using default ${fallback.id}`);
      decision = { pipeline: fallback, query, specificity: 0, fallback: true };
    }

    if (decision.pipeline.pro_only && plan !== 'pro') {
      throw new ProRequiredError(decision.pipeline.id);
    }
    return decision;
  }

  isKilled(query: RouteQuery): boolean {
    const parts = [query.intent, query.mode, query.client];
    return this.killSwitches.some(
      (key) => key.length === 3 && key.every((part, i) => part === '*' || part === parts[i]),
    );
  }
}

/**
 * Specificity of a candidate, or null when the pipeline does not apply.
 */
export function scorePipeline(pipeline: Pipeline, query: RouteQuery): number | null {
  const exactIntent = pipeline.intents.includes(query.intent);
  if (!exactIntent && !pipeline.intents.includes(WILDCARD)) return null;

  const exactClient = query.client !== WILDCARD && pipeline.clients.includes(query.client);
  if (!exactClient && !pipeline.clients.includes(WILDCARD)) return null;

  if (pipeline.modes && !pipeline.modes.includes(query.mode)) return null;

  return (exactIntent ? 4 : 0) + (exactClient ? 2 : 0) + (pipeline.modes ? 1 : 0);
}
